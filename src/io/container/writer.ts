import * as fs from 'node:fs';
import * as path from 'node:path';
import { getConfig } from '../../core/config';
import type { IFeatureSet } from '../../core/featureset';
import type { Matrix } from '../../core/matrix';
import type { FeatureKind, Label, Name } from '../../core/types';
import type { Vector } from '../../core/vector';
import { SchemaError } from '../../errors';
import {
  align,
  CONTAINER_MAGIC,
  CONTAINER_VERSION,
  entrySize,
  FieldKind,
  FILE_EXTENSION,
  HEADER_SIZE,
  MATRIX_KINDS,
} from './format';

/**
 * What persistence needs from a feature set.
 */
export type PersistableFeatureSet = Pick<
  IFeatureSet<Label, Name, FeatureKind>,
  'id' | 'createdAt' | 'labels' | 'names' | 'features'
>;

export interface SaveToOptions {
  /** Target directory (default: current working directory) */
  directory?: string;
}

interface Payload {
  name: string;
  kind: FieldKind;
  dim0: number;
  dim1: number;
  bytes: Uint8Array;
}

const encoder = new TextEncoder();

/**
 * Default file name of a feature set: `<id>.fset`.
 */
export function filename(featureSet: Pick<PersistableFeatureSet, 'id'>): string {
  return `${featureSet.id}.${FILE_EXTENSION}`;
}

/**
 * Writes `featureSet` to `filePath`, replacing any existing file.
 *
 * A view is written as the values it shows, not its root's storage.
 * Missing parent directories are created. Writes are not atomic.
 */
export function save(filePath: string, featureSet: PersistableFeatureSet): void {
  const payloads: Payload[] = [
    encodeString('id', featureSet.id),
    encodeString('created_at', featureSet.createdAt.toISOString()),
    encodeSequence('labels', featureSet.labels),
    encodeSequence('names', featureSet.names),
    encodeMatrix('features', featureSet.features),
  ];

  const nameBytes = payloads.map((p) => encoder.encode(p.name));
  const directoryLength = nameBytes.reduce((sum, bytes) => sum + entrySize(bytes.length), 0);

  const head = new Uint8Array(HEADER_SIZE + directoryLength);
  const view = new DataView(head.buffer);
  view.setUint32(0, CONTAINER_MAGIC, true);
  view.setUint32(4, CONTAINER_VERSION, true);
  view.setUint32(8, payloads.length, true);
  view.setUint32(12, directoryLength, true);

  const offsets: number[] = [];
  let cursor = HEADER_SIZE;
  let dataOffset = align(HEADER_SIZE + directoryLength);
  for (let i = 0; i < payloads.length; i++) {
    const payload = payloads[i];
    const name = nameBytes[i];
    view.setUint16(cursor, name.length, true);
    head.set(name, cursor + 2);
    cursor += 2 + name.length;
    view.setUint8(cursor, payload.kind);
    view.setUint32(cursor + 1, payload.dim0, true);
    view.setUint32(cursor + 5, payload.dim1, true);
    view.setBigUint64(cursor + 9, BigInt(dataOffset), true);
    view.setBigUint64(cursor + 17, BigInt(payload.bytes.length), true);
    cursor += 25;
    offsets.push(dataOffset);
    dataOffset = align(dataOffset + payload.bytes.length);
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const fd = fs.openSync(filePath, 'w');
  try {
    writeAll(fd, head, 0);
    for (let i = 0; i < payloads.length; i++) {
      writeAll(fd, payloads[i].bytes, offsets[i]);
    }
    // pad to the aligned end so empty trailing payloads stay in bounds
    fs.ftruncateSync(fd, dataOffset);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Writes `featureSet` to `<directory>/<id>.fset` and returns the path.
 */
export function saveTo(featureSet: PersistableFeatureSet, options: SaveToOptions = {}): string {
  const filePath = path.join(options.directory ?? '.', filename(featureSet));
  getConfig().logger.info('Created file', { path: filePath });
  save(filePath, featureSet);
  return filePath;
}

function writeAll(fd: number, bytes: Uint8Array, position: number): void {
  let written = 0;
  while (written < bytes.length) {
    written += fs.writeSync(fd, bytes, written, bytes.length - written, position + written);
  }
}

function encodeString(name: string, value: string): Payload {
  return { name, kind: FieldKind.Utf8, dim0: 1, dim1: 0, bytes: encoder.encode(value) };
}

/**
 * Numbers are stored as float64, strings as length-prefixed UTF-8.
 */
function encodeSequence(name: string, values: Vector<Label>): Payload {
  const items = values.toArray();
  const numbers: number[] = [];
  const strings: string[] = [];
  for (const item of items) {
    if (typeof item === 'number') numbers.push(item);
    else strings.push(item);
  }

  if (strings.length === 0) {
    const data = Float64Array.from(numbers);
    return {
      name,
      kind: FieldKind.Float64List,
      dim0: data.length,
      dim1: 0,
      bytes: new Uint8Array(data.buffer),
    };
  }
  if (numbers.length > 0) {
    throw new SchemaError(
      `cannot persist '${name}' mixing numbers and strings`,
      'use either numeric or string values for labels and for names',
    );
  }

  const encoded = strings.map((s) => encoder.encode(s));
  const bytes = new Uint8Array(encoded.reduce((sum, e) => sum + 4 + e.length, 0));
  const view = new DataView(bytes.buffer);
  let cursor = 0;
  for (const e of encoded) {
    view.setUint32(cursor, e.length, true);
    bytes.set(e, cursor + 4);
    cursor += 4 + e.length;
  }
  return { name, kind: FieldKind.Utf8List, dim0: encoded.length, dim1: 0, bytes };
}

function encodeMatrix(name: string, matrix: Matrix<FeatureKind>): Payload {
  // host byte order; the format assumes a little-endian host
  const data = matrix.toStorage();
  return {
    name,
    kind: MATRIX_KINDS[matrix.kind],
    dim0: matrix.rows,
    dim1: matrix.cols,
    bytes: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
  };
}
