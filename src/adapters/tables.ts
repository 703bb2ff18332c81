/**
 * Tabular access to feature sets for generic data-processing code.
 *
 * Built only on the public accessors, `get()` and `view()`.
 */

import type { FeatureSet } from '../core/featureset';
import { all, type FeatureKind, type Label, type Name, type RowsSelector } from '../core/types';

/**
 * Field names and their (uniform) value kind.
 */
export interface TableSchema<N extends Name, F extends FeatureKind> {
  readonly names: N[];
  readonly types: F[];
}

export interface SubsetOptions {
  /** `false` copies the selected rows; anything else returns a view */
  viewHint?: boolean;
}

export function schema<L extends Label, N extends Name, F extends FeatureKind>(
  fs: FeatureSet<L, N, F>,
): TableSchema<N, F> {
  return {
    names: fs.names.toArray(),
    types: Array.from({ length: fs.shape[1] }, () => fs.kind),
  };
}

/**
 * Rows as records keyed by `String(name)`, in label order.
 */
export function* rows<L extends Label, N extends Name, F extends FeatureKind>(
  fs: FeatureSet<L, N, F>,
): IterableIterator<Record<string, number>> {
  const keys = fs.names.toArray().map(String);
  for (const [, values] of fs.eachRow()) {
    const record: Record<string, number> = {};
    for (let c = 0; c < keys.length; c++) record[keys[c]] = values[c];
    yield record;
  }
}

/**
 * Column table keyed by `String(name)`, in name order.
 */
export function columns<L extends Label, N extends Name, F extends FeatureKind>(
  fs: FeatureSet<L, N, F>,
): Record<string, number[]> {
  const table: Record<string, number[]> = {};
  for (const [name, values] of fs.eachCol()) {
    table[String(name)] = values;
  }
  return table;
}

/**
 * Selects rows, keeping every column.
 */
export function subset<L extends Label, N extends Name, F extends FeatureKind>(
  fs: FeatureSet<L, N, F>,
  selected: RowsSelector,
  options: SubsetOptions = {},
): FeatureSet<L, N, F> {
  return options.viewHint === false ? fs.get(selected, all) : fs.view(selected, all);
}
