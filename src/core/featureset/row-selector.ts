import { IndexOutOfBoundsError, SchemaError, ShapeMismatchError } from '../../errors';
import type { Index } from '../indices';
import { all, Range, type RowSelector } from '../types';

const SLICE_PATTERN = /^\s*(\d*)\s*:\s*(\d*)\s*$/;

/**
 * Resolves a row selector against `rowCount` rows.
 *
 * Returns the row number for a scalar selector, the selected positions for a
 * list, mask, range or slice, or `null` for `all`.
 */
export function resolveRows(selector: RowSelector, rowCount: number): number | Index {
  if (typeof selector === 'number') return checkRow(selector, rowCount);
  if (selector === all) return null;
  if (selector instanceof Range) return fromRange(selector, rowCount);
  if (typeof selector === 'string') return fromSlice(selector, rowCount);
  if (isMask(selector)) return fromMask(selector, rowCount);

  const out = new Int32Array(selector.length);
  for (let i = 0; i < selector.length; i++) {
    out[i] = checkRow(selector[i], rowCount);
  }
  return out;
}

function checkRow(row: number, rowCount: number): number {
  if (!Number.isInteger(row) || row < 0 || row >= rowCount) {
    throw new IndexOutOfBoundsError(row, 0, rowCount - 1);
  }
  return row;
}

function isMask(selector: readonly number[] | readonly boolean[]): selector is readonly boolean[] {
  return selector.length > 0 && typeof selector[0] === 'boolean';
}

function fromMask(mask: readonly boolean[], rowCount: number): Int32Array {
  if (mask.length !== rowCount) {
    throw new ShapeMismatchError('row mask', rowCount, mask.length);
  }
  const picked: number[] = [];
  for (let i = 0; i < mask.length; i++) {
    if (mask[i]) picked.push(i);
  }
  return Int32Array.from(picked);
}

function fromRange(selected: Range, rowCount: number): Int32Array {
  const out = new Int32Array(selected.length);
  let i = 0;
  for (const row of selected) {
    out[i++] = checkRow(row, rowCount);
  }
  return out;
}

/**
 * `'start:end'` slices, clamped to the row count like `Array.prototype.slice`.
 */
function fromSlice(slice: string, rowCount: number): Int32Array {
  const match = SLICE_PATTERN.exec(slice);
  if (!match) {
    throw new SchemaError(
      `invalid row slice '${slice}'`,
      "row slices look like '2:5', '3:', ':4' or ':'",
    );
  }
  const start = Math.min(match[1] ? Number(match[1]) : 0, rowCount);
  const end = Math.min(match[2] ? Number(match[2]) : rowCount, rowCount);
  const length = Math.max(0, end - start);
  const out = new Int32Array(length);
  for (let i = 0; i < length; i++) out[i] = start + i;
  return out;
}
