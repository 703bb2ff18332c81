import { FeatureSetError } from './base';

/**
 * Thrown when a sequence length disagrees with the matrix it must align with.
 */
export class ShapeMismatchError extends FeatureSetError {
  override readonly code = 'SHAPE_MISMATCH';

  /** What was measured, e.g. `'labels'` or `'row 3'` */
  readonly subject: string;
  readonly expected: number;
  readonly actual: number;

  constructor(subject: string, expected: number, actual: number) {
    super(
      `${subject} has length ${actual}, expected ${expected}`,
      'labels must match the row count and names must match the column count',
    );
    this.name = 'ShapeMismatchError';
    this.subject = subject;
    this.expected = expected;
    this.actual = actual;
  }

  protected override _getTitle(): string {
    return 'shape mismatch';
  }

  protected override _getExpression(): string {
    return `new FeatureSet(labels, names, features)`;
  }
}
