import type { Matrix } from '../matrix';
import type { ColSelector, FeatureKind, Label, Name, NamesSelector, RowSelector, RowsSelector } from '../types';
import type { Vector } from '../vector';

/**
 * Accessors every feature set exposes to adapters and persistence.
 */
export interface FeatureSetView<L extends Label, N extends Name, F extends FeatureKind> {
  readonly labels: Vector<L>;
  readonly names: Vector<N>;
  readonly features: Matrix<F>;
  readonly shape: readonly [rows: number, cols: number];
}

/**
 * Full feature set contract.
 *
 * Implementations must supply every member; there are no default bodies.
 */
export interface IFeatureSet<L extends Label, N extends Name, F extends FeatureKind>
  extends FeatureSetView<L, N, F> {
  readonly id: string;
  readonly createdAt: Date;
  readonly kind: F;

  /** Root container this one views into, or null when it owns its storage */
  readonly parent: IFeatureSet<L, N, F> | null;
  readonly root: IFeatureSet<L, N, F>;

  get(row: number, col: N): number;
  get(row: number, col: NamesSelector<N>): number[];
  get(row: RowsSelector, col: N): number[];
  get(row: RowsSelector, col: NamesSelector<N>): IFeatureSet<L, N, F>;
  get(row: RowSelector, col: ColSelector<N>): number | number[] | IFeatureSet<L, N, F>;

  view(row: number, col: N): number;
  view(row: number, col: NamesSelector<N>): number[];
  view(row: RowsSelector, col: N): number[];
  view(row: RowsSelector, col: NamesSelector<N>): IFeatureSet<L, N, F>;
  view(row: RowSelector, col: ColSelector<N>): number | number[] | IFeatureSet<L, N, F>;

  /** Row and column positions of this container within `root`. */
  parentIndices(): [rows: Int32Array, cols: Int32Array];

  /** Rows as `[label, values]` pairs, in label order. */
  eachRow(): IterableIterator<[label: L, values: number[]]>;

  /** Columns as `[name, values]` pairs, in name order. */
  eachCol(): IterableIterator<[name: N, values: number[]]>;

  equals(other: IFeatureSet<Label, Name, FeatureKind>): boolean;
  hashCode(seed?: number): number;
}
