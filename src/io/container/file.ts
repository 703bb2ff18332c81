import * as fs from 'node:fs';
import { InvalidContainerError } from '../../errors';

/**
 * Opens `path` read-only for the duration of `fn`.
 */
export function withFile<T>(path: string, fn: (fd: number) => T): T {
  const fd = fs.openSync(path, 'r');
  try {
    return fn(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Reads exactly `length` bytes at `position` into a fresh, 8-byte aligned
 * buffer.
 */
export function readExactly(fd: number, path: string, position: number, length: number): Uint8Array {
  const out = new Uint8Array(length);
  let read = 0;
  while (read < length) {
    const n = fs.readSync(fd, out, read, length - read, position + read);
    if (n === 0) {
      throw new InvalidContainerError(path, `unexpected end of file at byte ${position + read}`);
    }
    read += n;
  }
  return out;
}
