import type { Name } from './dtype';

/**
 * Selects every row or every column.
 *
 * @example
 * ```ts
 * fs.get(all, 'height'); // whole column
 * fs.view(range(0, 10), all); // first ten rows, every column
 * ```
 */
export const all: unique symbol = Symbol('featureset.all');
export type All = typeof all;

/**
 * Half-open integer range `[start, stop)` walked with `step`.
 */
export class Range {
  readonly start: number;
  readonly stop: number;
  readonly step: number;

  constructor(start: number, stop: number, step = 1) {
    if (!Number.isInteger(start) || !Number.isInteger(stop) || !Number.isInteger(step) || step === 0) {
      throw new RangeError(`invalid range(${start}, ${stop}, ${step})`);
    }
    this.start = start;
    this.stop = stop;
    this.step = step;
  }

  get length(): number {
    const span = this.step > 0 ? this.stop - this.start : this.start - this.stop;
    return span <= 0 ? 0 : Math.ceil(span / Math.abs(this.step));
  }

  *[Symbol.iterator](): IterableIterator<number> {
    for (let i = 0, v = this.start; i < this.length; i++, v += this.step) {
      yield v;
    }
  }
}

/**
 * Shorthand for `new Range(start, stop, step)`.
 */
export function range(start: number, stop: number, step = 1): Range {
  return new Range(start, stop, step);
}

/** Row selectors that pick more than one row */
export type RowsSelector = All | Range | string | readonly number[] | readonly boolean[];

/** Any row selector */
export type RowSelector = number | RowsSelector;

/** Column selectors that pick more than one column */
export type NamesSelector<N extends Name> = All | readonly N[];

/** Any column selector */
export type ColSelector<N extends Name> = N | NamesSelector<N>;
