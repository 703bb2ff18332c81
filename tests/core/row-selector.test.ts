import { describe, expect, test } from 'vitest';
import { resolveRows } from '../../src/core/featureset';
import { all, range } from '../../src/core/types';
import { IndexOutOfBoundsError, SchemaError, ShapeMismatchError } from '../../src/errors';

function positions(result: number | Int32Array | null): number[] | number | null {
  return result instanceof Int32Array ? Array.from(result) : result;
}

describe('resolveRows', () => {
  test('a number is returned as is', () => {
    expect(resolveRows(3, 5)).toBe(3);
  });

  test('all resolves to null', () => {
    expect(resolveRows(all, 5)).toBeNull();
  });

  test('lists keep order and repeats', () => {
    expect(positions(resolveRows([4, 0, 4], 5))).toEqual([4, 0, 4]);
  });

  test('masks select true rows', () => {
    expect(positions(resolveRows([true, false, true], 3))).toEqual([0, 2]);
  });

  test('masks must cover every row', () => {
    expect(() => resolveRows([true, false], 3)).toThrow(ShapeMismatchError);
  });

  test('an empty list selects nothing', () => {
    expect(positions(resolveRows([], 3))).toEqual([]);
  });

  test('ranges are walked with their step', () => {
    expect(positions(resolveRows(range(4, 0, -2), 5))).toEqual([4, 2]);
    expect(() => resolveRows(range(0, 6), 5)).toThrow(IndexOutOfBoundsError);
  });

  test('invalid ranges are rejected on creation', () => {
    expect(() => range(0, 5, 0)).toThrow(RangeError);
  });

  test('slices behave like Array.prototype.slice', () => {
    expect(positions(resolveRows('1:3', 5))).toEqual([1, 2]);
    expect(positions(resolveRows(':', 3))).toEqual([0, 1, 2]);
    expect(positions(resolveRows('4:2', 5))).toEqual([]);
    expect(positions(resolveRows('3:99', 5))).toEqual([3, 4]);
  });

  test('malformed slices throw SchemaError', () => {
    expect(() => resolveRows('a:b', 5)).toThrow(SchemaError);
    expect(() => resolveRows('-1:', 5)).toThrow(SchemaError);
  });

  test('out-of-bounds rows report the valid range', () => {
    try {
      resolveRows(5, 5);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(IndexOutOfBoundsError);
      if (e instanceof IndexOutOfBoundsError) {
        expect(e.index).toBe(5);
        expect(e.hint).toBe('valid range is 0 to 4');
      }
    }
  });

  test('non-integer rows are out of bounds', () => {
    expect(() => resolveRows(1.5, 5)).toThrow(IndexOutOfBoundsError);
  });
});
