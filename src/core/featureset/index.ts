export { FeatureSet } from './featureset';
export type { FeatureSetOptions } from './featureset';
export type { IFeatureSet, FeatureSetView } from './interface';
export { NameIndex } from './name-index';
export { resolveRows } from './row-selector';
export { merge, mergePair } from './merge';
export { structurallyEqual, hashFeatureSet } from './equality';
