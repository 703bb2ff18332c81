import { afterEach, describe, expect, test } from 'vitest';
import { configure, resetConfig } from '../../src/core/config';
import { FeatureSet } from '../../src/core/featureset';
import { Matrix } from '../../src/core/matrix';
import { all, range } from '../../src/core/types';
import {
  DuplicateNameError,
  IndexOutOfBoundsError,
  ShapeMismatchError,
  UnknownNameError,
} from '../../src/errors';

// 9 samples of 3 labels, values 1..36 row by row
const labels = [1, 1, 1, 2, 2, 2, 3, 3, 3];
const names = ['feature1', 'feature2', 'feature3', 'feature4'];
const values = labels.map((_, r) => names.map((_, c) => r * 4 + c + 1));

function sample() {
  return FeatureSet.from(labels, names, values);
}

describe('FeatureSet', () => {
  afterEach(() => {
    resetConfig();
  });

  describe('construction', () => {
    test('from() keeps labels, names and values', () => {
      const fs = sample();
      expect(fs.shape).toEqual([9, 4]);
      expect(fs.length).toBe(9);
      expect(fs.kind).toBe('float64');
      expect(fs.labels.toArray()).toEqual(labels);
      expect(fs.names.toArray()).toEqual(names);
      expect(fs.features.toArray()).toEqual(values);
      expect(fs.parent).toBeNull();
      expect(fs.isView).toBe(false);
      expect(fs.root).toBe(fs);
    });

    test('assigns a UUID and creation time', () => {
      const before = Date.now();
      const fs = sample();
      expect(fs.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(fs.createdAt.getTime()).toBeGreaterThanOrEqual(before);
      expect(sample().id).not.toBe(fs.id);
    });

    test('accepts an explicit identity', () => {
      const createdAt = new Date('2024-05-01T12:00:00.000Z');
      const fs = FeatureSet.from([1], ['a'], [[1]], { id: 'fixed-id', createdAt });
      expect(fs.id).toBe('fixed-id');
      expect(fs.createdAt).toBe(createdAt);
    });

    test('rejects labels that do not match the row count', () => {
      expect(() => FeatureSet.from([1, 2], ['a'], [[1]])).toThrow(ShapeMismatchError);
    });

    test('rejects names that do not match the column count', () => {
      const matrix = Matrix.fromRows([[1, 2]], 'float64');
      expect(() => FeatureSet.fromMatrix([1], ['a'], matrix)).toThrow(ShapeMismatchError);
    });

    test('rejects ragged rows', () => {
      expect(() => FeatureSet.from([1, 2], ['a', 'b'], [[1, 2], [3]])).toThrow(ShapeMismatchError);
    });

    test('allows an empty feature set', () => {
      const fs = FeatureSet.from([], ['a', 'b'], []);
      expect(fs.shape).toEqual([0, 2]);
      expect(fs.get(all, 'a')).toEqual([]);
    });

    test('fromXy() names features 1..K', () => {
      const fs = FeatureSet.fromXy(
        [
          [1, 2, 3],
          [4, 5, 6],
        ],
        ['x', 'y'],
      );
      expect(fs.names.toArray()).toEqual([1, 2, 3]);
      expect(fs.labels.toArray()).toEqual(['x', 'y']);
      expect(fs.get(1, 3)).toBe(6);
    });

    test('fromXy() keeps the kind of a matrix', () => {
      const fs = FeatureSet.fromXy(Matrix.fromRows([[1.9], [-2.9]], 'int32'), [0, 1]);
      expect(fs.kind).toBe('int32');
      expect(fs.get(all, 1)).toEqual([1, -2]);
    });

    test('fromMatrix() copies a matrix view', () => {
      const matrix = Matrix.fromRows([[1, 2], [3, 4]], 'float64');
      const picked = matrix.take(Int32Array.of(1), null, true);
      const fs = FeatureSet.fromMatrix(['b'], ['x', 'y'], picked);
      expect(fs.features.isView).toBe(false);
      expect(fs.features.sharesStoreWith(matrix)).toBe(false);
      expect(fs.get(0, all)).toEqual([3, 4]);
    });
  });

  describe('duplicate names', () => {
    test('last occurrence wins by default', () => {
      const fs = FeatureSet.from([1], ['a', 'b', 'a'], [[1, 2, 3]]);
      expect(fs.get(0, 'a')).toBe(3);
      expect(fs.names.toArray()).toEqual(['a', 'b', 'a']);
      expect(fs.nameIndex.size).toBe(2);
    });

    test("are rejected under duplicateNames: 'error'", () => {
      configure({ duplicateNames: 'error' });
      expect(() => FeatureSet.from([1], ['a', 'b', 'a'], [[1, 2, 3]])).toThrow(DuplicateNameError);
    });
  });

  describe('get()', () => {
    const fs = sample();

    test('row and name return a scalar', () => {
      expect(fs.get(0, 'feature1')).toBe(1);
      expect(fs.get(8, 'feature4')).toBe(36);
    });

    test('all rows of one name return the column', () => {
      expect(fs.get(all, 'feature2')).toEqual([2, 6, 10, 14, 18, 22, 26, 30, 34]);
    });

    test('one row of all names returns the row', () => {
      expect(fs.get(2, all)).toEqual([9, 10, 11, 12]);
    });

    test('one row of a name list follows the list order', () => {
      expect(fs.get(2, ['feature3', 'feature1'])).toEqual([11, 9]);
    });

    test('a row list of one name returns those values', () => {
      expect(fs.get([0, 3], 'feature1')).toEqual([1, 13]);
    });

    test('a boolean mask selects matching rows', () => {
      const mask = fs.labels.toArray().map((label) => label === 3);
      expect(fs.get(mask, 'feature1')).toEqual([25, 29, 33]);
    });

    test('a range selects stepped rows', () => {
      expect(fs.get(range(0, 9, 3), 'feature1')).toEqual([1, 13, 25]);
    });

    test('slice strings select and clamp', () => {
      expect(fs.get('7:', 'feature1')).toEqual([29, 33]);
      expect(fs.get('7:100', 'feature1')).toEqual([29, 33]);
      expect(fs.get(':2', 'feature1')).toEqual([1, 5]);
    });

    test('two-dimensional selection returns an owned feature set', () => {
      const sub = fs.get([3, 4, 5], ['feature1', 'feature2']);
      expect(sub).toBeInstanceOf(FeatureSet);
      expect(sub.parent).toBeNull();
      expect(sub.isView).toBe(false);
      expect(sub.labels.toArray()).toEqual([2, 2, 2]);
      expect(sub.names.toArray()).toEqual(['feature1', 'feature2']);
      expect(sub.features.toArray()).toEqual([
        [13, 14],
        [17, 18],
        [21, 22],
      ]);
      expect(sub.features.sharesStoreWith(fs.features)).toBe(false);
      expect(sub.id).not.toBe(fs.id);
    });

    test('get of a view copies from the root', () => {
      const view = fs.view('3:6', all);
      const copied = view.get([0, 2], ['feature4']);
      expect(copied.parent).toBeNull();
      expect(copied.features.toArray()).toEqual([[16], [24]]);
    });

    test('unknown names throw UnknownNameError', () => {
      expect(() => fs.get(0, 'feature9')).toThrow(UnknownNameError);
      expect(() => fs.get(all, ['feature1', 'missing'])).toThrow(UnknownNameError);
    });

    test('rows out of bounds throw IndexOutOfBoundsError', () => {
      expect(() => fs.get(9, 'feature1')).toThrow(IndexOutOfBoundsError);
      expect(() => fs.get(-1, 'feature1')).toThrow(IndexOutOfBoundsError);
      expect(() => fs.get([0, 12], 'feature1')).toThrow(IndexOutOfBoundsError);
    });
  });

  describe('view()', () => {
    const fs = sample();

    test('scalar selections return values, not views', () => {
      expect(fs.view(0, 'feature1')).toBe(1);
      expect(fs.view(all, 'feature3')).toEqual(fs.get(all, 'feature3'));
    });

    test('two-dimensional selection shares storage with the root', () => {
      const v = fs.view([3, 4, 5], ['feature1', 'feature2']);
      expect(v.parent).toBe(fs);
      expect(v.isView).toBe(true);
      expect(v.root).toBe(fs);
      expect(v.features.sharesStoreWith(fs.features)).toBe(true);
      expect(v.labels.toArray()).toEqual([2, 2, 2]);
      expect(v.features.toArray()).toEqual([
        [13, 14],
        [17, 18],
        [21, 22],
      ]);
      const [rows, cols] = v.parentIndices();
      expect(Array.from(rows)).toEqual([3, 4, 5]);
      expect(Array.from(cols)).toEqual([0, 1]);
    });

    test('a view equals the copy of the same selection', () => {
      const v = fs.view([3, 4, 5], ['feature1', 'feature2']);
      const g = fs.get([3, 4, 5], ['feature1', 'feature2']);
      expect(v.equals(g)).toBe(true);
      expect(v.hashCode()).toBe(g.hashCode());
    });

    test('all/all is a view of every row and column', () => {
      const v = fs.view(all, all);
      expect(v.parent).toBe(fs);
      const [rows, cols] = v.parentIndices();
      expect(Array.from(rows)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
      expect(Array.from(cols)).toEqual([0, 1, 2, 3]);
      expect(v.equals(fs)).toBe(true);
    });

    test('a view of a view points at the root', () => {
      const v = fs.view('3:6', all);
      const w = v.view([1, 2], ['feature4']);
      expect(w.parent).toBe(fs);
      const [rows, cols] = w.parentIndices();
      expect(Array.from(rows)).toEqual([4, 5]);
      expect(Array.from(cols)).toEqual([3]);
      expect(w.features.toArray()).toEqual([[20], [24]]);
      expect(w.labels.toArray()).toEqual([2, 2]);
    });

    test('views report positions relative to themselves', () => {
      const v = fs.view([8, 0], ['feature4', 'feature1']);
      expect(v.get(0, 'feature4')).toBe(36);
      expect(v.get(1, 'feature1')).toBe(1);
      expect(() => v.get(2, 'feature1')).toThrow(IndexOutOfBoundsError);
      expect(() => v.get(0, 'feature2')).toThrow(UnknownNameError);
    });
  });

  describe('copy()', () => {
    test('copy of a view owns its storage', () => {
      const fs = sample();
      const v = fs.view([0, 1], ['feature2']);
      const c = v.copy();
      expect(c.parent).toBeNull();
      expect(c.id).not.toBe(v.id);
      expect(c.features.sharesStoreWith(fs.features)).toBe(false);
      expect(c.equals(v)).toBe(true);
    });
  });

  describe('iteration', () => {
    const fs = FeatureSet.from(['a', 'b'], ['x', 'y'], [
      [1, 2],
      [3, 4],
    ]);

    test('eachRow() yields label and values', () => {
      expect([...fs.eachRow()]).toEqual([
        ['a', [1, 2]],
        ['b', [3, 4]],
      ]);
      expect([...fs]).toEqual([...fs.eachRow()]);
    });

    test('eachCol() yields name and values', () => {
      expect([...fs.eachCol()]).toEqual([
        ['x', [1, 3]],
        ['y', [2, 4]],
      ]);
    });
  });

  describe('equality', () => {
    test('equal contents are equal regardless of identity', () => {
      const a = sample();
      const b = sample();
      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });

    test('a different value, label or name breaks equality', () => {
      const base = FeatureSet.from([1, 2], ['a', 'b'], [[1, 2], [3, 4]]);
      expect(base.equals(FeatureSet.from([1, 2], ['a', 'b'], [[1, 2], [3, 5]]))).toBe(false);
      expect(base.equals(FeatureSet.from([1, 3], ['a', 'b'], [[1, 2], [3, 4]]))).toBe(false);
      expect(base.equals(FeatureSet.from([1, 2], ['a', 'c'], [[1, 2], [3, 4]]))).toBe(false);
    });

    test('feature kinds must match', () => {
      const f64 = FeatureSet.fromMatrix([1], ['a'], Matrix.fromRows([[2]], 'float64'));
      const i32 = FeatureSet.fromMatrix([1], ['a'], Matrix.fromRows([[2]], 'int32'));
      expect(f64.equals(i32)).toBe(false);
    });

    test('string and numeric labels hash differently', () => {
      const numeric = FeatureSet.from([1], ['a'], [[1]]);
      const text = FeatureSet.from(['1'], ['a'], [[1]]);
      expect(numeric.equals(text)).toBe(false);
      expect(numeric.hashCode()).not.toBe(text.hashCode());
    });
  });

  test('toString() shows kind, shape and view status', () => {
    const fs = sample();
    expect(fs.toString()).toBe('FeatureSet<float64>[9 × 4]');
    expect(fs.view('0:3', all).toString()).toBe('FeatureSet<float64>[3 × 4] view');
  });
});
