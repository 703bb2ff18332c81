import { FeatureSet } from '../core/featureset';
import type { Label } from '../core/types';
import { SchemaError } from '../errors';
import { createRng, randomSeed, type Rng } from './rng';

export interface RandomFeatureSetOptions {
  /** Distinct labels (default: sampleCount / 5, rounded down) */
  labelCount?: number;
  /** Row factor of sample `i` (1-based) */
  center?: (i: number) => number;
  /** Column factor of feature `j` (1-based) */
  place?: (j: number) => number;
  /** Noise added at (i, j) (default: rng.normal()) */
  random?: (i: number, j: number) => number;
  /** Generator used by the default noise (default: seeded from Math.random) */
  rng?: Rng;
}

export interface LabeledRandomFeatureSetOptions<L extends Label> extends RandomFeatureSetOptions {
  /** Maps label number 1..labelCount to a label */
  label: (k: number) => L;
}

/**
 * Generates a per-label balanced feature set for tests and examples.
 *
 * Labels 1..labelCount each cover `sampleCount / labelCount` consecutive
 * rows; names are 1..featureCount; the value at (i, j) is
 * `center(i) * place(j) + random(i, j)`.
 *
 * @example
 * ```ts
 * const fs = randomFeatureSet(50, 30, { labelCount: 10, rng: createRng(42) });
 * fs.shape; // [50, 30]
 * ```
 */
export function randomFeatureSet(
  sampleCount?: number,
  featureCount?: number,
  options?: RandomFeatureSetOptions,
): FeatureSet<number, number, 'float64'>;
export function randomFeatureSet<L extends Label>(
  sampleCount: number,
  featureCount: number,
  options: LabeledRandomFeatureSetOptions<L>,
): FeatureSet<L, number, 'float64'>;
export function randomFeatureSet<L extends Label>(
  sampleCount = 10,
  featureCount = 10,
  options: RandomFeatureSetOptions & { label?: (k: number) => L } = {},
): FeatureSet<L, number, 'float64'> | FeatureSet<number, number, 'float64'> {
  const labelCount = options.labelCount ?? Math.floor(sampleCount / 5);
  if (!Number.isInteger(labelCount) || labelCount <= 0) {
    throw new SchemaError(
      `label count must be a positive integer, got ${labelCount}`,
      'pass at least 5 samples or an explicit labelCount',
    );
  }
  if (sampleCount % labelCount !== 0) {
    throw new SchemaError(
      `${sampleCount} samples cannot be split evenly across ${labelCount} labels`,
      'sampleCount must be a multiple of labelCount',
    );
  }

  const perLabel = sampleCount / labelCount;
  const center = options.center ?? ((i: number) => (i - 1) / labelCount + 1);
  const place = options.place ?? ((j: number) => (7 * j) / featureCount);
  const rng = options.rng ?? createRng(randomSeed());
  const random = options.random ?? (() => rng.normal());

  const labelNumbers = Array.from({ length: sampleCount }, (_, i) => Math.floor(i / perLabel) + 1);
  const names = Array.from({ length: featureCount }, (_, j) => j + 1);
  const rows = Array.from({ length: sampleCount }, (_, r) =>
    Array.from({ length: featureCount }, (_, c) => center(r + 1) * place(c + 1) + random(r + 1, c + 1)),
  );

  const label = options.label;
  if (label) {
    return FeatureSet.from(labelNumbers.map(label), names, rows);
  }
  return FeatureSet.from(labelNumbers, names, rows);
}
