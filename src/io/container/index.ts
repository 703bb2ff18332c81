export { save, saveTo, filename } from './writer';
export type { PersistableFeatureSet, SaveToOptions } from './writer';
export { load, isValid, openContainer } from './reader';
export type { ContainerHandle, LoadOptions } from './reader';
export { PagedStore } from './paged-store';
export type { PagedStoreOptions } from './paged-store';
export {
  CONTAINER_MAGIC,
  CONTAINER_VERSION,
  FILE_EXTENSION,
  REQUIRED_FIELDS,
  FieldKind,
} from './format';
export type { FieldEntry, RequiredField } from './format';
