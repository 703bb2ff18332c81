import { LabelMismatchError, RowMismatchError, SchemaError, ValueConflictError } from '../../errors';
import { indicesEqual } from '../indices';
import { Matrix } from '../matrix';
import type { FeatureKind, Label, Name } from '../types';
import { Vector } from '../vector';
import { FeatureSet } from './featureset';

/**
 * Merges feature sets left to right.
 *
 * @example
 * ```ts
 * const a = fs.view(all, ['a', 'b']);
 * const b = fs.view(all, ['b', 'c']);
 * merge(a, b).parent === fs; // true - still a view of fs
 * ```
 */
export function merge<L extends Label, N extends Name, F extends FeatureKind>(
  first: FeatureSet<L, N, F>,
  ...rest: FeatureSet<L, N, F>[]
): FeatureSet<L, N, F> {
  return rest.reduce((merged, next) => mergePair(merged, next), first);
}

/**
 * Merges two feature sets.
 *
 * 1. The same instance merges to itself.
 * 2. Containers sharing a root merge to a view of that root holding the
 *    column union, provided they select the same rows.
 * 3. Anything else merges to an owned container: the feature kinds and the
 *    labels must be equal,
 *    identically named columns must hold equal values, and `b`'s new
 *    columns are appended after `a`'s.
 */
export function mergePair<L extends Label, N extends Name, F extends FeatureKind>(
  a: FeatureSet<L, N, F>,
  b: FeatureSet<L, N, F>,
): FeatureSet<L, N, F> {
  if (a === b) return a;
  if (a.root === b.root) return mergeSubviews(a, b);
  return mergeGeneric(a, b);
}

function mergeSubviews<L extends Label, N extends Name, F extends FeatureKind>(
  a: FeatureSet<L, N, F>,
  b: FeatureSet<L, N, F>,
): FeatureSet<L, N, F> {
  const [aRows, aCols] = a.parentIndices();
  const [bRows, bCols] = b.parentIndices();
  if (!indicesEqual(aRows, bRows)) {
    throw new RowMismatchError(aRows.length, bRows.length);
  }

  const seen = new Set<number>();
  const cols: number[] = [];
  for (const col of [...aCols, ...bCols]) {
    if (seen.has(col)) continue;
    seen.add(col);
    cols.push(col);
  }
  return FeatureSet._viewOf(a.root, aRows, Int32Array.from(cols));
}

function mergeGeneric<L extends Label, N extends Name, F extends FeatureKind>(
  a: FeatureSet<L, N, F>,
  b: FeatureSet<L, N, F>,
): FeatureSet<L, N, F> {
  if (a.kind !== b.kind) {
    throw new SchemaError(
      `cannot merge feature kinds '${a.kind}' and '${b.kind}'`,
      'Convert both feature sets to the same kind before merging',
    );
  }
  assertSameLabels(a.labels, b.labels);

  const common = unique(a.names).filter((name) => b.nameIndex.has(name));
  for (const name of common) {
    const aCol = a.nameIndex.indexOf(name);
    const bCol = b.nameIndex.indexOf(name);
    for (let r = 0; r < a.length; r++) {
      if (a.features.get(r, aCol) !== b.features.get(r, bCol)) {
        throw new ValueConflictError(name, r);
      }
    }
  }

  const onlyB = unique(b.names).filter((name) => !a.nameIndex.has(name));
  const onlyBCols = b.nameIndex.resolveMany(onlyB);

  return FeatureSet._owned(
    a.labels.take(null, false),
    Vector._own([...a.names, ...onlyB]),
    Matrix.hconcat(a.features, b.features, onlyBCols),
  );
}

function assertSameLabels<L extends Label>(a: Vector<L>, b: Vector<L>): void {
  if (a.length !== b.length) {
    throw new LabelMismatchError(null, a.length, b.length);
  }
  let r = 0;
  for (const label of b) {
    if (a.at(r) !== label) {
      throw new LabelMismatchError(r, a.length, b.length);
    }
    r++;
  }
}

function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}
