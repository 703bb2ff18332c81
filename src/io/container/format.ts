/**
 * Container file layout (little-endian).
 *
 * ```text
 * header     magic u32 | version u32 | fieldCount u32 | directoryLength u32
 * directory  per field: nameLength u16 | name utf8 | kind u8 | dim0 u32 | dim1 u32
 *                       | dataOffset u64 | dataLength u64
 * data       payloads at absolute offsets, each aligned to 8 bytes
 * ```
 */

import type { FeatureKind } from '../../core/types';

export const CONTAINER_MAGIC = 0x54455346; // "FSET"
export const CONTAINER_VERSION = 1;
export const HEADER_SIZE = 16;
export const PAYLOAD_ALIGNMENT = 8;
export const FILE_EXTENSION = 'fset';

/** Field names every container must hold */
export const REQUIRED_FIELDS = ['id', 'created_at', 'labels', 'names', 'features'] as const;
export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * On-disk field kinds.
 */
export enum FieldKind {
  /** Scalar UTF-8 string */
  Utf8 = 1,
  /** `dim0` strings, each u32 byte length + bytes */
  Utf8List = 2,
  /** `dim0` float64 values */
  Float64List = 3,
  /** `dim0 × dim1` row-major matrices */
  Float64Matrix = 16,
  Float32Matrix = 17,
  Int32Matrix = 18,
}

export const MATRIX_KINDS: Readonly<Record<FeatureKind, FieldKind>> = {
  float64: FieldKind.Float64Matrix,
  float32: FieldKind.Float32Matrix,
  int32: FieldKind.Int32Matrix,
};

export function featureKindOf(kind: FieldKind): FeatureKind | null {
  switch (kind) {
    case FieldKind.Float64Matrix:
      return 'float64';
    case FieldKind.Float32Matrix:
      return 'float32';
    case FieldKind.Int32Matrix:
      return 'int32';
    default:
      return null;
  }
}

/**
 * Directory entry of one field.
 */
export interface FieldEntry {
  name: string;
  kind: FieldKind;
  dim0: number;
  dim1: number;
  /** Absolute byte offset of the payload */
  dataOffset: number;
  dataLength: number;
}

/** Bytes a directory entry with an `nameBytes`-long name occupies */
export function entrySize(nameBytes: number): number {
  return 2 + nameBytes + 1 + 4 + 4 + 8 + 8;
}

export function align(offset: number): number {
  const rest = offset % PAYLOAD_ALIGNMENT;
  return rest === 0 ? offset : offset + PAYLOAD_ALIGNMENT - rest;
}
