import type { Matrix } from '../matrix';
import type { FeatureKind, Label, Name } from '../types';
import type { Vector } from '../vector';
import type { FeatureSetView } from './interface';

/** FNV-1a hash constants */
const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

/**
 * Structural equality: same labels, names and feature values.
 * Identity, timestamps and view/owned status are ignored.
 */
export function structurallyEqual(
  a: FeatureSetView<Label, Name, FeatureKind>,
  b: FeatureSetView<Label, Name, FeatureKind>,
): boolean {
  return (
    a.features.kind === b.features.kind &&
    a.labels.equals(b.labels) &&
    a.names.equals(b.names) &&
    a.features.equals(b.features)
  );
}

/**
 * 32-bit FNV-1a over labels, names and features, consistent with
 * `structurallyEqual`.
 */
export function hashFeatureSet(
  fs: FeatureSetView<Label, Name, FeatureKind>,
  seed: number = FNV_OFFSET_BASIS,
): number {
  let h = hashVector(fs.labels, seed >>> 0);
  h = hashVector(fs.names, h);
  return hashMatrix(fs.features, h);
}

function hashVector(values: Vector<Label>, seed: number): number {
  let h = hashString(`v${values.length}`, seed);
  for (const value of values) {
    h = hashString(typeof value === 'number' ? `n${value}` : `s${value}`, h);
  }
  return h;
}

function hashMatrix(matrix: Matrix<FeatureKind>, seed: number): number {
  let h = hashString(`m${matrix.rows}x${matrix.cols}`, seed);
  for (let r = 0; r < matrix.rows; r++) {
    for (let c = 0; c < matrix.cols; c++) {
      h = hashString(String(matrix.get(r, c)), h);
    }
  }
  return h;
}

function hashString(text: string, seed: number): number {
  let h = seed;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  // separator so that ['ab'] and ['a', 'b'] differ
  h ^= 0xff;
  h = Math.imul(h, FNV_PRIME);
  return h >>> 0;
}
