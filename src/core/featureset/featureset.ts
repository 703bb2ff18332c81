import { v4 as uuidv4 } from 'uuid';
import { ShapeMismatchError } from '../../errors';
import { getConfig } from '../config';
import { composeIndex, type Index, materializeIndex } from '../indices';
import { Matrix } from '../matrix';
import type {
  ColSelector,
  FeatureKind,
  Label,
  Name,
  NamesSelector,
  RowSelector,
  RowsSelector,
} from '../types';
import { Vector } from '../vector';
import { hashFeatureSet, structurallyEqual } from './equality';
import type { IFeatureSet } from './interface';
import { NameIndex } from './name-index';
import { resolveRows } from './row-selector';

/**
 * Identity overrides accepted by the factories.
 */
export interface FeatureSetOptions {
  /** Defaults to a fresh UUID v4 */
  id?: string;
  /** Defaults to now */
  createdAt?: Date;
}

interface FeatureSetParts<L extends Label, N extends Name, F extends FeatureKind> {
  id: string;
  createdAt: Date;
  labels: Vector<L>;
  names: Vector<N>;
  features: Matrix<F>;
  parent: FeatureSet<L, N, F> | null;
  /** Positions within `parent`, null when every row/column is selected */
  rowIndex: Index;
  colIndex: Index;
}

/**
 * FeatureSet - sample labels, feature names and a feature matrix.
 *
 * Rows are samples (one label each), columns are features (one name each).
 * Instances are immutable. Selecting with `get()` copies, selecting with
 * `view()` shares storage with the root container.
 *
 * |         | 'height' | 'width' |
 * |:-------:|:--------:|:-------:|
 * | 'cat'   |   24.1   |   40.3  |
 * | 'dog'   |   55.0   |   70.2  |
 *
 * @example
 * ```ts
 * const fs = FeatureSet.from(['cat', 'dog'], ['height', 'width'], [
 *   [24.1, 40.3],
 *   [55.0, 70.2],
 * ]);
 * fs.get(1, 'width'); // 70.2
 * fs.get(all, 'height'); // [24.1, 55.0]
 * const v = fs.view(all, ['width']); // zero-copy, v.parent === fs
 * ```
 */
export class FeatureSet<L extends Label = Label, N extends Name = Name, F extends FeatureKind = 'float64'>
  implements IFeatureSet<L, N, F>
{
  readonly id: string;
  readonly createdAt: Date;
  readonly labels: Vector<L>;
  readonly names: Vector<N>;
  readonly features: Matrix<F>;
  readonly kind: F;
  readonly shape: readonly [rows: number, cols: number];
  readonly nameIndex: NameIndex<N>;
  readonly parent: FeatureSet<L, N, F> | null;

  /** @internal */
  private readonly _rowIndex: Index;
  /** @internal */
  private readonly _colIndex: Index;

  /**
   * Private constructor - use factory methods instead.
   */
  private constructor(parts: FeatureSetParts<L, N, F>) {
    const { labels, names, features } = parts;
    if (labels.length !== features.rows) {
      throw new ShapeMismatchError('labels', features.rows, labels.length);
    }
    if (names.length !== features.cols) {
      throw new ShapeMismatchError('names', features.cols, names.length);
    }

    this.id = parts.id;
    this.createdAt = parts.createdAt;
    this.labels = labels;
    this.names = names;
    this.features = features;
    this.kind = features.kind;
    this.shape = [features.rows, features.cols] as const;
    this.nameIndex = NameIndex.build(names, getConfig().duplicateNames);
    this.parent = parts.parent;
    this._rowIndex = parts.rowIndex;
    this._colIndex = parts.colIndex;
  }

  // Factory Methods
  // ===============================================================

  /**
   * Creates a float64 feature set from labels, names and row-major values.
   */
  static from<L extends Label, N extends Name>(
    labels: Iterable<L>,
    names: Iterable<N>,
    rows: readonly (readonly number[])[],
    options: FeatureSetOptions = {},
  ): FeatureSet<L, N, 'float64'> {
    const nameList = Array.from(names);
    return FeatureSet.fromMatrix(labels, nameList, Matrix.fromRows(rows, 'float64', nameList.length), options);
  }

  /**
   * Creates a feature set over `matrix`. A matrix that is itself a view is
   * copied so the result owns its storage.
   */
  static fromMatrix<L extends Label, N extends Name, F extends FeatureKind>(
    labels: Iterable<L>,
    names: Iterable<N>,
    matrix: Matrix<F>,
    options: FeatureSetOptions = {},
  ): FeatureSet<L, N, F> {
    return new FeatureSet<L, N, F>({
      id: options.id ?? uuidv4(),
      createdAt: options.createdAt ?? new Date(),
      labels: Vector.from(labels),
      names: Vector.from(names),
      features: matrix.isView ? matrix.copy() : matrix,
      parent: null,
      rowIndex: null,
      colIndex: null,
    });
  }

  /**
   * Creates a feature set from a feature matrix `X` and labels `y`.
   * Names are assigned as 1..K.
   */
  static fromXy<L extends Label>(
    X: readonly (readonly number[])[],
    y: Iterable<L>,
    options?: FeatureSetOptions,
  ): FeatureSet<L, number, 'float64'>;
  static fromXy<L extends Label, F extends FeatureKind>(
    X: Matrix<F>,
    y: Iterable<L>,
    options?: FeatureSetOptions,
  ): FeatureSet<L, number, F>;
  static fromXy<L extends Label, F extends FeatureKind>(
    X: Matrix<F> | readonly (readonly number[])[],
    y: Iterable<L>,
    options: FeatureSetOptions = {},
  ): FeatureSet<L, number, F> | FeatureSet<L, number, 'float64'> {
    if (X instanceof Matrix) {
      return FeatureSet.fromMatrix(y, autoNames(X.cols), X, options);
    }
    const cols = X.length > 0 ? X[0].length : 0;
    return FeatureSet.from(y, autoNames(cols), X, options);
  }

  /**
   * Creates a view of `root` at root-relative positions (internal use).
   */
  static _viewOf<L extends Label, N extends Name, F extends FeatureKind>(
    root: FeatureSet<L, N, F>,
    rows: Index,
    cols: Index,
  ): FeatureSet<L, N, F> {
    const rowIndex = rows ?? materializeIndex(null, root.shape[0]);
    const colIndex = cols ?? materializeIndex(null, root.shape[1]);
    return new FeatureSet<L, N, F>({
      id: uuidv4(),
      createdAt: new Date(),
      labels: root.labels.take(rowIndex, true),
      names: root.names.take(colIndex, true),
      features: root.features.take(rowIndex, colIndex, true),
      parent: root,
      rowIndex,
      colIndex,
    });
  }

  /**
   * Creates an owned feature set from parts the caller hands over (internal use).
   */
  static _owned<L extends Label, N extends Name, F extends FeatureKind>(
    labels: Vector<L>,
    names: Vector<N>,
    features: Matrix<F>,
    options: FeatureSetOptions = {},
  ): FeatureSet<L, N, F> {
    return new FeatureSet<L, N, F>({
      id: options.id ?? uuidv4(),
      createdAt: options.createdAt ?? new Date(),
      labels,
      names,
      features,
      parent: null,
      rowIndex: null,
      colIndex: null,
    });
  }

  // Shape
  // ===============================================================

  /** Number of samples (rows). */
  get length(): number {
    return this.shape[0];
  }

  /** Whether this container shares storage with its root. */
  get isView(): boolean {
    return this.parent !== null;
  }

  /** The container owning the storage this one reads. */
  get root(): FeatureSet<L, N, F> {
    return this.parent ?? this;
  }

  /**
   * Row and column positions of this container within `root`.
   */
  parentIndices(): [rows: Int32Array, cols: Int32Array] {
    return [
      materializeIndex(this._rowIndex, this.root.shape[0]),
      materializeIndex(this._colIndex, this.root.shape[1]),
    ];
  }

  // Indexing
  // ===============================================================

  /**
   * Selects values, copying.
   *
   * - row and name scalar: the value
   * - one scalar: the row or column values as an array
   * - otherwise: a new owned feature set
   */
  get(row: number, col: N): number;
  get(row: number, col: NamesSelector<N>): number[];
  get(row: RowsSelector, col: N): number[];
  get(row: RowsSelector, col: NamesSelector<N>): FeatureSet<L, N, F>;
  get(row: RowSelector, col: ColSelector<N>): number | number[] | FeatureSet<L, N, F>;
  get(row: RowSelector, col: ColSelector<N>): number | number[] | FeatureSet<L, N, F> {
    return this._select(row, col, false);
  }

  /**
   * Selects values like `get()`, but a two-dimensional selection returns a
   * view sharing storage with `root`, whose `parent` is `root`.
   */
  view(row: number, col: N): number;
  view(row: number, col: NamesSelector<N>): number[];
  view(row: RowsSelector, col: N): number[];
  view(row: RowsSelector, col: NamesSelector<N>): FeatureSet<L, N, F>;
  view(row: RowSelector, col: ColSelector<N>): number | number[] | FeatureSet<L, N, F>;
  view(row: RowSelector, col: ColSelector<N>): number | number[] | FeatureSet<L, N, F> {
    return this._select(row, col, true);
  }

  private _select(
    row: RowSelector,
    col: ColSelector<N>,
    asView: boolean,
  ): number | number[] | FeatureSet<L, N, F> {
    const rows = resolveRows(row, this.shape[0]);
    const cols = this.nameIndex.resolve(col);

    if (typeof rows === 'number') {
      if (typeof cols === 'number') return this.features.get(rows, cols);
      return cols === null ? this.features.row(rows) : Array.from(cols, (c) => this.features.get(rows, c));
    }
    if (typeof cols === 'number') {
      return rows === null ? this.features.col(cols) : Array.from(rows, (r) => this.features.get(r, cols));
    }

    if (asView) {
      return FeatureSet._viewOf(
        this.root,
        composeIndex(this._rowIndex, rows),
        composeIndex(this._colIndex, cols),
      );
    }
    return FeatureSet._owned(
      this.labels.take(rows, false),
      this.names.take(cols, false),
      this.features.take(rows, cols, false),
    );
  }

  // Copying
  // ===============================================================

  /**
   * Owned copy with independent storage and a fresh identity.
   */
  copy(): FeatureSet<L, N, F> {
    return FeatureSet._owned(
      this.labels.take(null, false),
      this.names.take(null, false),
      this.features.copy(),
    );
  }

  // Iteration
  // ===============================================================

  *eachRow(): IterableIterator<[label: L, values: number[]]> {
    let r = 0;
    for (const label of this.labels) {
      yield [label, this.features.row(r++)];
    }
  }

  *eachCol(): IterableIterator<[name: N, values: number[]]> {
    let c = 0;
    for (const name of this.names) {
      yield [name, this.features.col(c++)];
    }
  }

  [Symbol.iterator](): IterableIterator<[label: L, values: number[]]> {
    return this.eachRow();
  }

  // Comparison
  // ===============================================================

  /**
   * Structural equality: same class, feature kind, labels, names and values.
   */
  equals(other: IFeatureSet<Label, Name, FeatureKind>): boolean {
    return this.constructor === other.constructor && structurallyEqual(this, other);
  }

  hashCode(seed?: number): number {
    return hashFeatureSet(this, seed);
  }

  toString(): string {
    return `FeatureSet<${this.kind}>[${this.shape[0]} × ${this.shape[1]}]${this.isView ? ' view' : ''}`;
  }
}

function autoNames(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i + 1);
}
