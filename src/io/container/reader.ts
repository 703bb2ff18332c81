import * as fs from 'node:fs';
import { getConfig } from '../../core/config';
import { FeatureSet } from '../../core/featureset';
import { Matrix } from '../../core/matrix';
import { BYTES_PER_ELEMENT, type FeatureKind, type Label, type Name, storageOver } from '../../core/types';
import { Vector } from '../../core/vector';
import { InvalidContainerError } from '../../errors';
import {
  CONTAINER_MAGIC,
  CONTAINER_VERSION,
  featureKindOf,
  type FieldEntry,
  FieldKind,
  HEADER_SIZE,
  REQUIRED_FIELDS,
} from './format';
import { readExactly, withFile } from './file';
import { PagedStore } from './paged-store';

/**
 * An opened container: its path and field directory.
 */
export interface ContainerHandle {
  readonly path: string;
  readonly fields: ReadonlyMap<string, FieldEntry>;
}

export interface LoadOptions {
  /** Read feature values lazily, page by page (default: false) */
  mmap?: boolean;
  /** Page size for lazy reads (default: getConfig().pageSizeBytes) */
  pageSizeBytes?: number;
  /** Cached pages for lazy reads (default: getConfig().maxCachedPages) */
  maxCachedPages?: number;
}

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads the header and field directory of a container.
 *
 * Throws `InvalidContainerError` when the file is not a container.
 */
export function openContainer(path: string): ContainerHandle {
  return withFile(path, (fd) => ({ path, fields: readDirectory(fd, path) }));
}

/**
 * Whether the container holds every required field. Extra fields are allowed.
 *
 * A path that exists but is not a container is not valid.
 */
export function isValid(target: string | ContainerHandle): boolean {
  if (typeof target !== 'string') {
    return missingField(target) === null;
  }
  try {
    return isValid(openContainer(target));
  } catch (e) {
    if (e instanceof InvalidContainerError) return false;
    throw e;
  }
}

/**
 * Loads a feature set saved with `save()`.
 *
 * Identity and timestamp come from the file; the result always owns its
 * storage, even when a view was saved. With `mmap` the feature values are
 * read on first access.
 */
export function load(path: string, options: LoadOptions = {}): FeatureSet<Label, Name, FeatureKind> {
  return withFile(path, (fd) => {
    const handle: ContainerHandle = { path, fields: readDirectory(fd, path) };
    const missing = missingField(handle);
    if (missing !== null) {
      throw new InvalidContainerError(path, `missing required field '${missing}'`);
    }

    const id = readString(fd, path, field(handle, 'id'));
    const createdAtText = readString(fd, path, field(handle, 'created_at'));
    const createdAt = new Date(createdAtText);
    if (Number.isNaN(createdAt.getTime())) {
      throw new InvalidContainerError(path, `created_at '${createdAtText}' is not an ISO-8601 timestamp`);
    }

    const labels = readSequence(fd, path, field(handle, 'labels'));
    const names = readSequence(fd, path, field(handle, 'names'));
    const featuresEntry = field(handle, 'features');
    const kind = featureKindOf(featuresEntry.kind);
    if (kind === null) {
      throw new InvalidContainerError(path, `field 'features' is not a matrix`);
    }
    const rows = featuresEntry.dim0;
    const cols = featuresEntry.dim1;
    if (featuresEntry.dataLength !== rows * cols * BYTES_PER_ELEMENT[kind]) {
      throw new InvalidContainerError(path, `field 'features' does not hold ${rows} × ${cols} values`);
    }
    if (labels.length !== rows || names.length !== cols) {
      throw new InvalidContainerError(
        path,
        `${labels.length} labels and ${names.length} names do not fit a ${rows} × ${cols} matrix`,
      );
    }

    const config = getConfig();
    const features = options.mmap
      ? Matrix.fromStore(
          new PagedStore(path, kind, rows, cols, featuresEntry.dataOffset, {
            pageSizeBytes: options.pageSizeBytes ?? config.pageSizeBytes,
            maxCachedPages: options.maxCachedPages ?? config.maxCachedPages,
          }),
        )
      : Matrix.fromStorage(
          kind,
          storageOver(
            kind,
            readExactly(fd, path, featuresEntry.dataOffset, featuresEntry.dataLength).buffer,
            0,
            rows * cols,
          ),
          rows,
          cols,
        );

    return FeatureSet._owned(Vector._own(labels), Vector._own(names), features, { id, createdAt });
  });
}

function missingField(handle: ContainerHandle): string | null {
  for (const name of REQUIRED_FIELDS) {
    if (!handle.fields.has(name)) return name;
  }
  return null;
}

function field(handle: ContainerHandle, name: string): FieldEntry {
  const entry = handle.fields.get(name);
  if (!entry) {
    throw new InvalidContainerError(handle.path, `missing required field '${name}'`);
  }
  return entry;
}

function readDirectory(fd: number, path: string): Map<string, FieldEntry> {
  const size = fs.fstatSync(fd).size;
  if (size < HEADER_SIZE) {
    throw new InvalidContainerError(path, 'file is too small to hold a header');
  }

  const header = new DataView(readExactly(fd, path, 0, HEADER_SIZE).buffer);
  if (header.getUint32(0, true) !== CONTAINER_MAGIC) {
    throw new InvalidContainerError(path, 'not a feature set container (bad magic number)');
  }
  const version = header.getUint32(4, true);
  if (version !== CONTAINER_VERSION) {
    throw new InvalidContainerError(path, `unsupported container version ${version}`);
  }
  const fieldCount = header.getUint32(8, true);
  const directoryLength = header.getUint32(12, true);
  if (HEADER_SIZE + directoryLength > size) {
    throw new InvalidContainerError(path, 'field directory extends past the end of the file');
  }

  const bytes = readExactly(fd, path, HEADER_SIZE, directoryLength);
  const view = new DataView(bytes.buffer);
  const fields = new Map<string, FieldEntry>();
  let cursor = 0;
  for (let i = 0; i < fieldCount; i++) {
    if (cursor + 2 > directoryLength) {
      throw new InvalidContainerError(path, `field directory entry ${i} is truncated`);
    }
    const nameLength = view.getUint16(cursor, true);
    if (cursor + 2 + nameLength + 25 > directoryLength) {
      throw new InvalidContainerError(path, `field directory entry ${i} is truncated`);
    }
    const name = decodeText(bytes.subarray(cursor + 2, cursor + 2 + nameLength), path);
    cursor += 2 + nameLength;
    const entry: FieldEntry = {
      name,
      kind: view.getUint8(cursor),
      dim0: view.getUint32(cursor + 1, true),
      dim1: view.getUint32(cursor + 5, true),
      dataOffset: Number(view.getBigUint64(cursor + 9, true)),
      dataLength: Number(view.getBigUint64(cursor + 17, true)),
    };
    cursor += 25;
    if (entry.dataOffset + entry.dataLength > size) {
      throw new InvalidContainerError(path, `field '${name}' extends past the end of the file`);
    }
    fields.set(name, entry);
  }
  return fields;
}

function readString(fd: number, path: string, entry: FieldEntry): string {
  if (entry.kind !== FieldKind.Utf8) {
    throw new InvalidContainerError(path, `field '${entry.name}' is not a string`);
  }
  return decodeText(readExactly(fd, path, entry.dataOffset, entry.dataLength), path);
}

function readSequence(fd: number, path: string, entry: FieldEntry): Label[] {
  const bytes = readExactly(fd, path, entry.dataOffset, entry.dataLength);

  if (entry.kind === FieldKind.Float64List) {
    if (entry.dataLength !== entry.dim0 * 8) {
      throw new InvalidContainerError(path, `field '${entry.name}' does not hold ${entry.dim0} numbers`);
    }
    return Array.from(new Float64Array(bytes.buffer, 0, entry.dim0));
  }

  if (entry.kind === FieldKind.Utf8List) {
    const view = new DataView(bytes.buffer);
    const out: string[] = [];
    let cursor = 0;
    for (let i = 0; i < entry.dim0; i++) {
      if (cursor + 4 > bytes.length) {
        throw new InvalidContainerError(path, `field '${entry.name}' is truncated at item ${i}`);
      }
      const length = view.getUint32(cursor, true);
      if (cursor + 4 + length > bytes.length) {
        throw new InvalidContainerError(path, `field '${entry.name}' is truncated at item ${i}`);
      }
      out.push(decodeText(bytes.subarray(cursor + 4, cursor + 4 + length), path));
      cursor += 4 + length;
    }
    return out;
  }

  throw new InvalidContainerError(path, `field '${entry.name}' is not a sequence`);
}

function decodeText(bytes: Uint8Array, path: string): string {
  try {
    return decoder.decode(bytes);
  } catch (e) {
    throw new InvalidContainerError(
      path,
      `invalid UTF-8 text (${e instanceof Error ? e.message : String(e)})`,
    );
  }
}
