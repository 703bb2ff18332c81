import { SchemaError } from '../../errors';

/**
 * Sample label type.
 */
export type Label = string | number;

/**
 * Feature name type. Names are compared with `===`.
 */
export type Name = string | number;

/**
 * Numeric kinds a feature matrix can be stored as.
 */
export type FeatureKind = 'float64' | 'float32' | 'int32';

/**
 * Maps FeatureKind to its TypedArray storage.
 */
export type StorageType<F extends FeatureKind> = F extends 'float64'
  ? Float64Array
  : F extends 'float32'
    ? Float32Array
    : F extends 'int32'
      ? Int32Array
      : never;

/**
 * Union of every feature storage array.
 */
export type AnyStorage = Float64Array | Float32Array | Int32Array;

export const FEATURE_KINDS: readonly FeatureKind[] = ['float64', 'float32', 'int32'];

/**
 * Bytes per element for each feature kind.
 */
export const BYTES_PER_ELEMENT: Readonly<Record<FeatureKind, number>> = {
  float64: 8,
  float32: 4,
  int32: 4,
};

export function isFeatureKind(value: unknown): value is FeatureKind {
  return value === 'float64' || value === 'float32' || value === 'int32';
}

/**
 * Creates zeroed storage for given kind and length.
 */
export function createStorage<F extends FeatureKind>(kind: F, length: number): StorageType<F>;
export function createStorage(kind: FeatureKind, length: number): AnyStorage {
  switch (kind) {
    case 'float64':
      return new Float64Array(length);
    case 'float32':
      return new Float32Array(length);
    case 'int32':
      return new Int32Array(length);
    default:
      throw new SchemaError(`unknown feature kind '${String(kind)}'`, 'supported kinds: float64, float32, int32');
  }
}

/**
 * Creates storage over an existing byte buffer without copying.
 */
export function storageOver<F extends FeatureKind>(
  kind: F,
  buffer: ArrayBufferLike,
  byteOffset: number,
  length: number,
): StorageType<F>;
export function storageOver(
  kind: FeatureKind,
  buffer: ArrayBufferLike,
  byteOffset: number,
  length: number,
): AnyStorage {
  switch (kind) {
    case 'float64':
      return new Float64Array(buffer, byteOffset, length);
    case 'float32':
      return new Float32Array(buffer, byteOffset, length);
    case 'int32':
      return new Int32Array(buffer, byteOffset, length);
    default:
      throw new SchemaError(`unknown feature kind '${String(kind)}'`, 'supported kinds: float64, float32, int32');
  }
}
