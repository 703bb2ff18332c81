import { FeatureSetError } from './base';

/**
 * Thrown when a row position falls outside the container.
 */
export class IndexOutOfBoundsError extends FeatureSetError {
  override readonly code = 'INDEX_OUT_OF_BOUNDS';

  readonly index: number;
  readonly min: number;
  readonly max: number;

  constructor(index: number, min: number, max: number) {
    super(
      `index ${index} is out of bounds`,
      max >= min ? `valid range is ${min} to ${max}` : 'the feature set has no rows',
    );
    this.name = 'IndexOutOfBoundsError';
    this.index = index;
    this.min = min;
    this.max = max;
  }

  protected override _getTitle(): string {
    return 'index out of bounds';
  }

  protected override _getExpression(): string {
    return `fs.get(${this.index}, ...)`;
  }
}
