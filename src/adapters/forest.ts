/**
 * Ensemble-training adapter.
 *
 * Extracts `(labels, features)` from a feature set and forwards them, with
 * the configuration merged over the defaults, to a random-forest backend
 * supplied by the caller.
 */

import { z } from 'zod';
import type { FeatureSetView } from '../core/featureset';
import type { FeatureKind, Label, Name } from '../core/types';
import { SchemaError, ShapeMismatchError } from '../errors';

export interface ForestConfig {
  /** Features considered per split, -1 for automatic */
  subfeatureCount: number;
  treeCount: number;
  /** Fraction of samples drawn for each tree */
  partialSampling: number;
  /** -1 for unbounded */
  maxDepth: number;
  minSamplesLeaf: number;
  minSamplesSplit: number;
  minPurityIncrease: number;
}

export interface CrossValidationConfig extends ForestConfig {
  foldCount: number;
}

export const DEFAULT_FOREST_CONFIG: Readonly<ForestConfig> = {
  subfeatureCount: -1,
  treeCount: 10,
  partialSampling: 0.7,
  maxDepth: -1,
  minSamplesLeaf: 1,
  minSamplesSplit: 2,
  minPurityIncrease: 0.0,
};

export const DEFAULT_CROSS_VALIDATION_CONFIG: Readonly<CrossValidationConfig> = {
  foldCount: 4,
  ...DEFAULT_FOREST_CONFIG,
};

const forestConfigSchema = z.object({
  subfeatureCount: z.number().int().min(-1),
  treeCount: z.number().int().min(1),
  partialSampling: z.number().gt(0).max(1),
  maxDepth: z.number().int().min(-1),
  minSamplesLeaf: z.number().int().min(1),
  minSamplesSplit: z.number().int().min(2),
  minPurityIncrease: z.number().min(0),
});

const crossValidationConfigSchema = forestConfigSchema.extend({
  foldCount: z.number().int().min(2),
});

/**
 * The external training routine.
 */
export interface ForestBackend<L extends Label, Model> {
  buildForest(labels: L[], features: number[][], config: ForestConfig): Model;
  /** Accuracy of each fold */
  crossValidate(labels: L[], features: number[][], config: CrossValidationConfig): number[];
  applyForest(model: Model, features: number[][]): L[];
}

export interface ConfusionMatrix<L extends Label> {
  /** Class order of rows (actual) and columns (predicted) */
  classes: L[];
  counts: number[][];
  accuracy: number;
  /** Cohen's kappa */
  kappa: number;
}

type AnyView<L extends Label> = FeatureSetView<L, Name, FeatureKind>;

/**
 * @example
 * ```ts
 * const forest = new ForestAdapter(myBackend);
 * const model = forest.buildForest(fs, { treeCount: 100 });
 * forest.confusionMatrix(model, holdout).accuracy;
 * ```
 */
export class ForestAdapter<L extends Label, Model> {
  private readonly _backend: ForestBackend<L, Model>;

  constructor(backend: ForestBackend<L, Model>) {
    this._backend = backend;
  }

  buildForest(fs: AnyView<L>, config: Partial<ForestConfig> = {}): Model {
    const merged = validate(forestConfigSchema, { ...DEFAULT_FOREST_CONFIG, ...config });
    return this._backend.buildForest(fs.labels.toArray(), fs.features.toArray(), merged);
  }

  crossValidate(fs: AnyView<L>, config: Partial<CrossValidationConfig> = {}): number[] {
    const merged = validate(crossValidationConfigSchema, {
      ...DEFAULT_CROSS_VALIDATION_CONFIG,
      ...config,
    });
    return this._backend.crossValidate(fs.labels.toArray(), fs.features.toArray(), merged);
  }

  /** Predicted label of every row. */
  applyForest(model: Model, fs: AnyView<L>): L[] {
    return this._backend.applyForest(model, fs.features.toArray());
  }

  /** Predictions of `model` against the labels of `fs`. */
  confusionMatrix(model: Model, fs: AnyView<L>): ConfusionMatrix<L> {
    return confusionMatrix(fs.labels.toArray(), this.applyForest(model, fs));
  }
}

function validate<T>(schema: z.ZodType<T>, config: unknown): T {
  const parsed = schema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchemaError(
      `invalid forest configuration: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`,
      'see DEFAULT_FOREST_CONFIG for accepted options',
    );
  }
  return parsed.data;
}

/**
 * Counts predictions per (actual, predicted) class pair.
 *
 * Classes are the sorted distinct values of both sequences, numbers before
 * strings. When chance agreement is total, kappa is 1 for perfect accuracy
 * and 0 otherwise.
 */
export function confusionMatrix<L extends Label>(actual: readonly L[], predicted: readonly L[]): ConfusionMatrix<L> {
  if (actual.length !== predicted.length) {
    throw new ShapeMismatchError('predictions', actual.length, predicted.length);
  }

  const classes = [...new Set([...actual, ...predicted])].sort(compareLabels);
  const position = new Map<L, number>(classes.map((c, i) => [c, i]));
  const counts = classes.map(() => new Array<number>(classes.length).fill(0));
  for (let i = 0; i < actual.length; i++) {
    const row = position.get(actual[i]) ?? 0;
    const col = position.get(predicted[i]) ?? 0;
    counts[row][col]++;
  }

  const n = actual.length;
  let agree = 0;
  let chance = 0;
  for (let k = 0; k < classes.length; k++) {
    agree += counts[k][k];
    const rowSum = counts[k].reduce((s, v) => s + v, 0);
    const colSum = counts.reduce((s, row) => s + row[k], 0);
    chance += rowSum * colSum;
  }
  const accuracy = n === 0 ? 0 : agree / n;
  const expected = n === 0 ? 0 : chance / (n * n);
  const kappa = expected === 1 ? (accuracy === 1 ? 1 : 0) : (accuracy - expected) / (1 - expected);

  return { classes, counts, accuracy, kappa };
}

function compareLabels(a: Label, b: Label): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}
