/**
 * Error module - exports all featureset error types.
 */

export { FeatureSetError } from './base';
export { ShapeMismatchError } from './shape-mismatch';
export { UnknownNameError } from './unknown-name';
export { DuplicateNameError } from './duplicate-name';
export { IndexOutOfBoundsError } from './index-out-of-bounds';
export { RowMismatchError, LabelMismatchError, ValueConflictError } from './merge-errors';
export { InvalidContainerError } from './invalid-container';
export { SchemaError } from './schema-error';
