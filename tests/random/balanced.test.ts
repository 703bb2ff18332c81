import { describe, expect, test } from 'vitest';
import { createRng, randomFeatureSet } from '../../src/random';
import { SchemaError } from '../../src/errors';

describe('randomFeatureSet', () => {
  test('defaults to 10 samples, 10 features and 2 labels', () => {
    const fs = randomFeatureSet(undefined, undefined, { rng: createRng(1) });
    expect(fs.shape).toEqual([10, 10]);
    expect(fs.labels.toArray()).toEqual([1, 1, 1, 1, 1, 2, 2, 2, 2, 2]);
    expect(fs.names.toArray()).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  test('every label covers the same number of samples', () => {
    const fs = randomFeatureSet(50, 30, { labelCount: 10, rng: createRng(2) });
    const counts = new Map<number, number>();
    for (const label of fs.labels) counts.set(label, (counts.get(label) ?? 0) + 1);
    expect(counts.size).toBe(10);
    expect([...counts.values()].every((count) => count === 5)).toBe(true);
  });

  test('values are center(i) * place(j) plus noise', () => {
    const fs = randomFeatureSet(4, 2, { labelCount: 2, random: () => 0 });
    expect(fs.features.toArray()).toEqual([
      [3.5, 7],
      [5.25, 10.5],
      [7, 14],
      [8.75, 17.5],
    ]);
  });

  test('custom center, place and noise receive 1-based positions', () => {
    const fs = randomFeatureSet(2, 3, {
      labelCount: 1,
      center: (i) => i,
      place: (j) => 10 * j,
      random: (i, j) => i * 100 + j,
    });
    expect(fs.features.toArray()).toEqual([
      [111, 122, 133],
      [221, 242, 263],
    ]);
  });

  test('the same seed generates the same values', () => {
    const a = randomFeatureSet(10, 4, { rng: createRng(7) });
    const b = randomFeatureSet(10, 4, { rng: createRng(7) });
    expect(a.equals(b)).toBe(true);
    expect(a.equals(randomFeatureSet(10, 4, { rng: createRng(8) }))).toBe(false);
  });

  test('labels can be mapped', () => {
    const fs = randomFeatureSet(4, 1, { labelCount: 2, label: (k: number) => `class-${k}`, random: () => 0 });
    expect(fs.labels.toArray()).toEqual(['class-1', 'class-1', 'class-2', 'class-2']);
  });

  test('too few samples for the default label count throw SchemaError', () => {
    expect(() => randomFeatureSet(4, 2)).toThrow(SchemaError);
  });

  test('samples must divide evenly across labels', () => {
    expect(() => randomFeatureSet(10, 3, { labelCount: 3 })).toThrow(SchemaError);
  });
});

describe('createRng', () => {
  test('uniform values fall in [0, 1)', () => {
    const rng = createRng(42);
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  test('seeds reproduce sequences', () => {
    const a = createRng(3);
    const b = createRng(3);
    const fromA = [a.next(), a.normal(), a.normal(), a.normal()];
    const fromB = [b.next(), b.normal(), b.normal(), b.normal()];
    expect(fromA).toEqual(fromB);
  });

  test('normal values centre on zero', () => {
    const rng = createRng(11);
    let sum = 0;
    for (let i = 0; i < 10000; i++) sum += rng.normal();
    expect(Math.abs(sum / 10000)).toBeLessThan(0.05);
  });
});
