export { Matrix } from './matrix';
export { DenseStore } from './store';
export type { MatrixStore } from './store';
