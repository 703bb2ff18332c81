export { createRng, randomSeed } from './rng';
export type { Rng } from './rng';
export { randomFeatureSet } from './balanced';
export type { RandomFeatureSetOptions, LabeledRandomFeatureSetOptions } from './balanced';
