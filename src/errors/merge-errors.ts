import type { Name } from '../core/types';
import { FeatureSetError } from './base';

/**
 * Two views of the same root were merged with different row selections.
 */
export class RowMismatchError extends FeatureSetError {
  override readonly code = 'ROW_MISMATCH';

  readonly leftRows: number;
  readonly rightRows: number;

  constructor(leftRows: number, rightRows: number) {
    super(
      leftRows === rightRows
        ? `row selections of ${leftRows} rows select different rows of the shared root`
        : `row selections differ in length (${leftRows} vs ${rightRows})`,
      'views of the same root can only be merged when they select the same rows',
    );
    this.name = 'RowMismatchError';
    this.leftRows = leftRows;
    this.rightRows = rightRows;
  }

  protected override _getTitle(): string {
    return 'row mismatch';
  }

  protected override _getExpression(): string {
    return 'merge(a, b)';
  }
}

/**
 * Two unrelated feature sets were merged with different labels.
 */
export class LabelMismatchError extends FeatureSetError {
  override readonly code = 'LABEL_MISMATCH';

  /** First differing row, or `null` when the lengths differ */
  readonly row: number | null;

  constructor(row: number | null, leftLength: number, rightLength: number) {
    super(
      row === null
        ? `label sequences differ in length (${leftLength} vs ${rightLength})`
        : `labels differ at row ${row}`,
      'feature sets can only be merged when their labels are equal in value and order',
    );
    this.name = 'LabelMismatchError';
    this.row = row;
  }

  protected override _getTitle(): string {
    return 'label mismatch';
  }

  protected override _getExpression(): string {
    return 'merge(a, b)';
  }
}

/**
 * Identically named columns disagree in value.
 */
export class ValueConflictError extends FeatureSetError {
  override readonly code = 'VALUE_CONFLICT';

  readonly featureName: Name;
  readonly row: number;

  constructor(featureName: Name, row: number) {
    super(
      `identically named features with different values: '${String(featureName)}' differs at row ${row}`,
      'drop or rename one of the conflicting columns before merging',
    );
    this.name = 'ValueConflictError';
    this.featureName = featureName;
    this.row = row;
  }

  protected override _getTitle(): string {
    return 'value conflict';
  }

  protected override _getExpression(): string {
    return 'merge(a, b)';
  }
}
