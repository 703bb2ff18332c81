import { composeIndex, type Index, materializeIndex } from './indices';

/**
 * Vector - an immutable 1D sequence backing labels and names.
 *
 * A vector either owns its values or is a zero-copy view selecting positions
 * of another vector's storage. Views of views select straight from the
 * backing storage.
 *
 * @example
 * ```ts
 * const names = Vector.from(['a', 'b', 'c']);
 * const picked = names.take(Int32Array.of(2, 0), true); // view: ['c', 'a']
 * picked.isView; // true
 * ```
 */
export class Vector<T> implements Iterable<T> {
  readonly length: number;

  private readonly _data: readonly T[];
  private readonly _index: Index;

  /**
   * Private constructor - use factory methods instead.
   */
  private constructor(data: readonly T[], index: Index) {
    this._data = data;
    this._index = index;
    this.length = index === null ? data.length : index.length;
  }

  // Factory Methods
  // ===============================================================

  /**
   * Creates an owning vector, copying `values`.
   */
  static from<T>(values: Iterable<T>): Vector<T> {
    return new Vector<T>(Array.from(values), null);
  }

  /**
   * Wraps an array the caller hands over (internal use).
   */
  static _own<T>(values: T[]): Vector<T> {
    return new Vector<T>(values, null);
  }

  // Element Access
  // ===============================================================

  /**
   * Gets element at position.
   * Returns undefined for out-of-bounds access.
   */
  at(position: number): T | undefined {
    if (!Number.isInteger(position) || position < 0 || position >= this.length) {
      return undefined;
    }
    return this._data[this._index === null ? position : this._index[position]];
  }

  /** Whether this vector shares storage with another vector. */
  get isView(): boolean {
    return this._index !== null;
  }

  /**
   * Positions of this vector's elements in its backing storage.
   */
  parentIndices(): Int32Array {
    return materializeIndex(this._index, this._data.length);
  }

  /**
   * Selects `positions` (relative to this vector); `null` selects everything.
   *
   * With `asView` the result shares this vector's storage, otherwise it owns
   * a copy.
   */
  take(positions: Index, asView: boolean): Vector<T> {
    const index = composeIndex(this._index, positions);
    if (asView) {
      return new Vector<T>(this._data, index ?? materializeIndex(null, this._data.length));
    }
    if (index === null) {
      return new Vector<T>(this._data.slice(), null);
    }
    const out = new Array<T>(index.length);
    for (let i = 0; i < index.length; i++) out[i] = this._data[index[i]];
    return new Vector<T>(out, null);
  }

  /**
   * Element-wise `===` comparison.
   */
  equals(other: Vector<T>): boolean {
    if (this.length !== other.length) return false;
    let i = 0;
    for (const value of other) {
      if (this._valueAt(i++) !== value) return false;
    }
    return true;
  }

  /** Returns a fresh array of the values. */
  toArray(): T[] {
    const out = new Array<T>(this.length);
    for (let i = 0; i < this.length; i++) out[i] = this._valueAt(i);
    return out;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this._valueAt(i);
    }
  }

  private _valueAt(position: number): T {
    return this._data[this._index === null ? position : this._index[position]];
  }
}
