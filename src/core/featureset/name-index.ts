import { DuplicateNameError, UnknownNameError } from '../../errors';
import type { DuplicateNamePolicy } from '../config';
import type { Index } from '../indices';
import { all, type ColSelector, type Name } from '../types';

/**
 * Name Index - maps feature names to column positions.
 *
 * Built once per feature set. Under the `'last'` policy a repeated name maps
 * to its last position while the name list itself keeps every occurrence.
 */
export class NameIndex<N extends Name> {
  private readonly _positions: Map<N, number>;
  private readonly _names: readonly N[];

  private constructor(positions: Map<N, number>, names: readonly N[]) {
    this._positions = positions;
    this._names = names;
  }

  static build<N extends Name>(names: Iterable<N>, policy: DuplicateNamePolicy = 'last'): NameIndex<N> {
    const list = Array.from(names);
    const positions = new Map<N, number>();
    for (let i = 0; i < list.length; i++) {
      const name = list[i];
      const previous = positions.get(name);
      if (previous !== undefined && policy === 'error') {
        throw new DuplicateNameError(name, previous, i);
      }
      positions.set(name, i);
    }
    return new NameIndex<N>(positions, list);
  }

  /** Number of distinct names. */
  get size(): number {
    return this._positions.size;
  }

  has(name: N): boolean {
    return this._positions.has(name);
  }

  /** Column of `name`, or -1. */
  indexOf(name: N): number {
    return this._positions.get(name) ?? -1;
  }

  /**
   * Resolves a column selector.
   *
   * Returns a column number for a single name, the positions for a name
   * list (order preserved), or `null` for `all`.
   */
  resolve(selector: ColSelector<N>): number | Index {
    if (selector === all) return null;
    if (isNameList(selector)) return this.resolveMany(selector);
    return this._lookup(selector);
  }

  resolveMany(names: readonly N[]): Int32Array {
    const out = new Int32Array(names.length);
    for (let i = 0; i < names.length; i++) {
      out[i] = this._lookup(names[i]);
    }
    return out;
  }

  private _lookup(name: N): number {
    const position = this._positions.get(name);
    if (position === undefined) {
      throw new UnknownNameError(name, this._names);
    }
    return position;
  }
}

export function isNameList<N extends Name>(selector: ColSelector<N>): selector is readonly N[] {
  return Array.isArray(selector);
}
