/**
 * Core type system module.
 */

export type { Label, Name, FeatureKind, StorageType, AnyStorage } from './dtype';
export {
  FEATURE_KINDS,
  BYTES_PER_ELEMENT,
  isFeatureKind,
  createStorage,
  storageOver,
} from './dtype';

export type { All, RowsSelector, RowSelector, NamesSelector, ColSelector } from './selectors';
export { all, Range, range } from './selectors';
