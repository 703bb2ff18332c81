import type { FeatureKind, StorageType } from '../types';

/**
 * Backing storage of a feature matrix.
 *
 * Stores are addressed by absolute (row, col) positions and never change
 * after construction.
 */
export interface MatrixStore<F extends FeatureKind> {
  readonly kind: F;
  readonly rows: number;
  readonly cols: number;
  /** Whether values are read from disk on first access */
  readonly lazy: boolean;

  /** Value at an absolute position. Positions are trusted. */
  get(row: number, col: number): number;

  /** Copies `count` values of `row` starting at `col` into `target[offset..]`. */
  readRow(row: number, col: number, count: number, target: StorageType<F>, offset: number): void;
}

/**
 * In-memory row-major store.
 */
export class DenseStore<F extends FeatureKind> implements MatrixStore<F> {
  readonly kind: F;
  readonly rows: number;
  readonly cols: number;
  readonly lazy = false;
  readonly data: StorageType<F>;

  constructor(kind: F, data: StorageType<F>, rows: number, cols: number) {
    this.kind = kind;
    this.data = data;
    this.rows = rows;
    this.cols = cols;
  }

  get(row: number, col: number): number {
    return this.data[row * this.cols + col];
  }

  readRow(row: number, col: number, count: number, target: StorageType<F>, offset: number): void {
    const start = row * this.cols + col;
    target.set(this.data.subarray(start, start + count), offset);
  }
}
