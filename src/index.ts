/**
 * featureset - labelled feature matrices for machine learning.
 *
 * A feature set pairs one label per sample (row) with one name per feature
 * (column) over a numeric matrix. Selections copy with `get()` or share
 * storage with `view()`; containers merge by column and persist to `.fset`
 * files that can be read back eagerly or page by page.
 *
 * @example
 * ```ts
 * import { FeatureSet, all, merge, saveTo, load } from 'featureset';
 *
 * const fs = FeatureSet.from([1, 1, 2], ['height', 'width'], [
 *   [1.5, 2.0],
 *   [1.7, 2.2],
 *   [3.1, 4.0],
 * ]);
 *
 * const a = fs.view(all, ['height']);
 * const b = fs.view(all, ['width']);
 * const both = merge(a, b); // still a view of fs
 *
 * const file = saveTo(both, { directory: './out' });
 * const back = load(file, { mmap: true });
 * ```
 */

// Core type system
export type { Label, Name, FeatureKind, StorageType, AnyStorage } from './core/types';
export type { All, RowsSelector, RowSelector, NamesSelector, ColSelector } from './core/types';
export { all, Range, range, FEATURE_KINDS, isFeatureKind } from './core/types';

// Data structures
export { Vector } from './core/vector';
export { Matrix, DenseStore } from './core/matrix';
export type { MatrixStore } from './core/matrix';
export {
  FeatureSet,
  NameIndex,
  merge,
  mergePair,
  structurallyEqual,
  hashFeatureSet,
} from './core/featureset';
export type { FeatureSetOptions, IFeatureSet, FeatureSetView } from './core/featureset';

// Configuration
export {
  configure,
  getConfig,
  resetConfig,
  getDefaultConfig,
  consoleLogger,
  silentLogger,
} from './core/config';
export type { FeatureSetConfig, DuplicateNamePolicy, Logger } from './core/config';

// Persistence
export { save, saveTo, filename, load, isValid, openContainer, PagedStore, FILE_EXTENSION } from './io/container';
export type { ContainerHandle, LoadOptions, SaveToOptions, PersistableFeatureSet } from './io/container';

// Adapters
export { schema, rows, columns, subset } from './adapters/tables';
export type { TableSchema, SubsetOptions } from './adapters/tables';
export {
  ForestAdapter,
  confusionMatrix,
  DEFAULT_FOREST_CONFIG,
  DEFAULT_CROSS_VALIDATION_CONFIG,
} from './adapters/forest';
export type {
  ForestBackend,
  ForestConfig,
  CrossValidationConfig,
  ConfusionMatrix,
} from './adapters/forest';

// Random generation
export { randomFeatureSet, createRng } from './random';
export type { Rng, RandomFeatureSetOptions, LabeledRandomFeatureSetOptions } from './random';

// Errors
export {
  FeatureSetError,
  ShapeMismatchError,
  UnknownNameError,
  DuplicateNameError,
  IndexOutOfBoundsError,
  RowMismatchError,
  LabelMismatchError,
  ValueConflictError,
  InvalidContainerError,
  SchemaError,
} from './errors';
