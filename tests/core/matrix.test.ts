import { describe, expect, test } from 'vitest';
import { DenseStore, Matrix } from '../../src/core/matrix';
import { ShapeMismatchError } from '../../src/errors';

describe('Matrix', () => {
  const m = Matrix.fromRows(
    [
      [1, 2, 3],
      [4, 5, 6],
    ],
    'float64',
  );

  describe('creation', () => {
    test('fromRows() lays values out row-major', () => {
      expect(m.rows).toBe(2);
      expect(m.cols).toBe(3);
      expect(m.get(1, 2)).toBe(6);
      expect(Array.from(m.toStorage())).toEqual([1, 2, 3, 4, 5, 6]);
    });

    test('fromRows() converts to the requested kind', () => {
      expect(Matrix.fromRows([[1.7, -2.2]], 'int32').toArray()).toEqual([[1, -2]]);
      expect(Matrix.fromRows([[0.1]], 'float32').get(0, 0)).toBe(Math.fround(0.1));
    });

    test('fromRows() shapes an empty input from cols', () => {
      const empty = Matrix.fromRows([], 'float64', 4);
      expect(empty.rows).toBe(0);
      expect(empty.cols).toBe(4);
    });

    test('fromStorage() checks the element count', () => {
      expect(() => Matrix.fromStorage('float64', new Float64Array(5), 2, 3)).toThrow(ShapeMismatchError);
    });

    test('fromStore() reads through the store', () => {
      const store = new DenseStore('int32', Int32Array.of(7, 8, 9, 10), 2, 2);
      const wrapped = Matrix.fromStore(store);
      expect(wrapped.kind).toBe('int32');
      expect(wrapped.isLazy).toBe(false);
      expect(wrapped.toArray()).toEqual([
        [7, 8],
        [9, 10],
      ]);
    });
  });

  describe('selection', () => {
    test('row() and col() copy values', () => {
      expect(m.row(0)).toEqual([1, 2, 3]);
      expect(m.col(1)).toEqual([2, 5]);
    });

    test('take() as a view shares the store', () => {
      const v = m.take(null, Int32Array.of(2, 0), true);
      expect(v.isView).toBe(true);
      expect(v.sharesStoreWith(m)).toBe(true);
      expect(v.toArray()).toEqual([
        [3, 1],
        [6, 4],
      ]);
      const [rows, cols] = v.parentIndices();
      expect(Array.from(rows)).toEqual([0, 1]);
      expect(Array.from(cols)).toEqual([2, 0]);
    });

    test('take() of a view composes indices against the store', () => {
      const v = m.take(Int32Array.of(1), Int32Array.of(2, 1, 0), true);
      const w = v.take(null, Int32Array.of(0, 2), true);
      expect(w.sharesStoreWith(m)).toBe(true);
      expect(w.toArray()).toEqual([[6, 4]]);
      expect(Array.from(w.parentIndices()[1])).toEqual([2, 0]);
    });

    test('take() without asView copies', () => {
      const c = m.take(Int32Array.of(1), null, false);
      expect(c.isView).toBe(false);
      expect(c.sharesStoreWith(m)).toBe(false);
      expect(c.toArray()).toEqual([[4, 5, 6]]);
    });

    test('copy() of a view is dense', () => {
      const c = m.take(null, Int32Array.of(1), true).copy();
      expect(c.isView).toBe(false);
      expect(Array.from(c.toStorage())).toEqual([2, 5]);
    });
  });

  describe('hconcat()', () => {
    test('appends the selected right columns', () => {
      const right = Matrix.fromRows([[7, 8, 9], [10, 11, 12]], 'float64');
      const joined = Matrix.hconcat(m, right, Int32Array.of(2, 0));
      expect(joined.toArray()).toEqual([
        [1, 2, 3, 9, 7],
        [4, 5, 6, 12, 10],
      ]);
    });

    test('keeps the left kind', () => {
      const left = Matrix.fromRows([[1]], 'int32');
      const right = Matrix.fromRows([[2.5]], 'float64');
      const joined = Matrix.hconcat(left, right, Int32Array.of(0));
      expect(joined.kind).toBe('int32');
      expect(joined.toArray()).toEqual([[1, 2]]);
    });

    test('requires equal row counts', () => {
      const right = Matrix.fromRows([[1]], 'float64');
      expect(() => Matrix.hconcat(m, right, Int32Array.of(0))).toThrow(ShapeMismatchError);
    });
  });

  test('equals() compares shape and values only', () => {
    expect(m.equals(Matrix.fromRows([[1, 2, 3], [4, 5, 6]], 'int32'))).toBe(true);
    expect(m.equals(Matrix.fromRows([[1, 2, 3]], 'float64'))).toBe(false);
    expect(m.equals(Matrix.fromRows([[1, 2, 3], [4, 5, 7]], 'float64'))).toBe(false);
  });
});
