import { ShapeMismatchError } from '../../errors';
import { composeIndex, type Index, materializeIndex } from '../indices';
import { createStorage, type FeatureKind, type StorageType } from '../types';
import { DenseStore, type MatrixStore } from './store';

/**
 * Matrix - an immutable 2D numeric matrix with zero-copy row/column views.
 *
 * A matrix reads through a `MatrixStore` (in-memory or file-backed) and an
 * optional row and column index. Views compose indices against the same
 * store, so a view of a view still reads the backing storage directly.
 *
 * @example
 * ```ts
 * const m = Matrix.fromRows([[1, 2, 3], [4, 5, 6]], 'float64');
 * const v = m.take(null, Int32Array.of(2, 0), true);
 * v.toArray(); // [[3, 1], [6, 4]]
 * ```
 */
export class Matrix<F extends FeatureKind = 'float64'> {
  readonly kind: F;
  readonly rows: number;
  readonly cols: number;

  private readonly _store: MatrixStore<F>;
  private readonly _rowIndex: Index;
  private readonly _colIndex: Index;

  /**
   * Private constructor - use factory methods instead.
   */
  private constructor(store: MatrixStore<F>, rowIndex: Index, colIndex: Index) {
    this.kind = store.kind;
    this._store = store;
    this._rowIndex = rowIndex;
    this._colIndex = colIndex;
    this.rows = rowIndex === null ? store.rows : rowIndex.length;
    this.cols = colIndex === null ? store.cols : colIndex.length;
  }

  // Factory Methods
  // ===============================================================

  /**
   * Creates a matrix of `kind` from row-major nested arrays.
   * `cols` is required to shape an input without rows.
   */
  static fromRows<F extends FeatureKind>(
    values: readonly (readonly number[])[],
    kind: F,
    cols?: number,
  ): Matrix<F> {
    const rowCount = values.length;
    const colCount = cols ?? (rowCount > 0 ? values[0].length : 0);
    const data = createStorage(kind, rowCount * colCount);
    for (let r = 0; r < rowCount; r++) {
      const row = values[r];
      if (row.length !== colCount) {
        throw new ShapeMismatchError(`row ${r}`, colCount, row.length);
      }
      data.set(row, r * colCount);
    }
    return new Matrix<F>(new DenseStore<F>(kind, data, rowCount, colCount), null, null);
  }

  /**
   * Wraps row-major storage the caller hands over (no copy).
   */
  static fromStorage<F extends FeatureKind>(
    kind: F,
    data: StorageType<F>,
    rows: number,
    cols: number,
  ): Matrix<F> {
    if (data.length !== rows * cols) {
      throw new ShapeMismatchError('feature storage', rows * cols, data.length);
    }
    return new Matrix<F>(new DenseStore<F>(kind, data, rows, cols), null, null);
  }

  /**
   * Reads through an arbitrary store, e.g. a file-backed one.
   */
  static fromStore<F extends FeatureKind>(store: MatrixStore<F>): Matrix<F> {
    return new Matrix<F>(store, null, null);
  }

  /**
   * Horizontally concatenates `left` with `right`, taking only
   * `rightCols` of `right`. Always returns an owned matrix of `left.kind`.
   */
  static hconcat<F extends FeatureKind>(
    left: Matrix<F>,
    right: Matrix<FeatureKind>,
    rightCols: Int32Array,
  ): Matrix<F> {
    if (left.rows !== right.rows) {
      throw new ShapeMismatchError('right matrix rows', left.rows, right.rows);
    }
    const cols = left.cols + rightCols.length;
    const data = createStorage(left.kind, left.rows * cols);
    const buffer = new Array<number>(cols);
    for (let r = 0; r < left.rows; r++) {
      for (let c = 0; c < left.cols; c++) {
        buffer[c] = left.get(r, c);
      }
      for (let c = 0; c < rightCols.length; c++) {
        buffer[left.cols + c] = right.get(r, rightCols[c]);
      }
      data.set(buffer, r * cols);
    }
    return Matrix.fromStorage(left.kind, data, left.rows, cols);
  }

  // Element Access
  // ===============================================================

  /**
   * Value at (row, col). Positions are relative to this matrix and trusted.
   */
  get(row: number, col: number): number {
    return this._store.get(this._storeRow(row), this._storeCol(col));
  }

  /** Copies one row into a plain array. */
  row(row: number): number[] {
    const out = new Array<number>(this.cols);
    for (let c = 0; c < this.cols; c++) out[c] = this.get(row, c);
    return out;
  }

  /** Copies one column into a plain array. */
  col(col: number): number[] {
    const out = new Array<number>(this.rows);
    for (let r = 0; r < this.rows; r++) out[r] = this.get(r, col);
    return out;
  }

  /** Whether this matrix selects a subset of its store. */
  get isView(): boolean {
    return this._rowIndex !== null || this._colIndex !== null;
  }

  /** Whether values are paged in from a file on first access. */
  get isLazy(): boolean {
    return this._store.lazy;
  }

  /** Whether both matrices read the same store. */
  sharesStoreWith(other: Matrix<FeatureKind>): boolean {
    return this._store === other._store;
  }

  /**
   * Row and column positions of this matrix in its store.
   */
  parentIndices(): [rows: Int32Array, cols: Int32Array] {
    return [
      materializeIndex(this._rowIndex, this._store.rows),
      materializeIndex(this._colIndex, this._store.cols),
    ];
  }

  // Selection
  // ===============================================================

  /**
   * Selects rows and columns (relative positions, `null` = all).
   *
   * With `asView` the result shares this matrix's store, otherwise it owns a
   * dense copy.
   */
  take(rows: Index, cols: Index, asView: boolean): Matrix<F> {
    const rowIndex = composeIndex(this._rowIndex, rows);
    const colIndex = composeIndex(this._colIndex, cols);
    if (asView) {
      return new Matrix<F>(
        this._store,
        rowIndex ?? materializeIndex(null, this._store.rows),
        colIndex ?? materializeIndex(null, this._store.cols),
      );
    }
    return new Matrix<F>(this._store, rowIndex, colIndex).copy();
  }

  /**
   * Dense owned copy of the visible values.
   */
  copy(): Matrix<F> {
    return Matrix.fromStorage(this.kind, this.toStorage(), this.rows, this.cols);
  }

  /**
   * Row-major copy of the visible values.
   */
  toStorage(): StorageType<F> {
    const out = createStorage(this.kind, this.rows * this.cols);
    const store = this._store;
    const colIndex = this._colIndex;
    const buffer = new Array<number>(this.cols);
    for (let r = 0; r < this.rows; r++) {
      const storeRow = this._storeRow(r);
      if (colIndex === null) {
        store.readRow(storeRow, 0, this.cols, out, r * this.cols);
        continue;
      }
      for (let c = 0; c < this.cols; c++) {
        buffer[c] = store.get(storeRow, colIndex[c]);
      }
      out.set(buffer, r * this.cols);
    }
    return out;
  }

  /** Nested row-major arrays of the visible values. */
  toArray(): number[][] {
    const out = new Array<number[]>(this.rows);
    for (let r = 0; r < this.rows; r++) out[r] = this.row(r);
    return out;
  }

  /**
   * Same shape and element-wise `===` values. Kind and storage are ignored.
   */
  equals(other: Matrix<FeatureKind>): boolean {
    if (this.rows !== other.rows || this.cols !== other.cols) return false;
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (this.get(r, c) !== other.get(r, c)) return false;
      }
    }
    return true;
  }

  private _storeRow(row: number): number {
    return this._rowIndex === null ? row : this._rowIndex[row];
  }

  private _storeCol(col: number): number {
    return this._colIndex === null ? col : this._colIndex[col];
  }
}
