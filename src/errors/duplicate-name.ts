import type { Name } from '../core/types';
import { FeatureSetError } from './base';

/**
 * Thrown for repeated feature names when the duplicate policy is `'error'`.
 */
export class DuplicateNameError extends FeatureSetError {
  override readonly code = 'DUPLICATE_NAME';

  readonly featureName: Name;
  readonly firstPosition: number;
  readonly secondPosition: number;

  constructor(featureName: Name, firstPosition: number, secondPosition: number) {
    super(
      `name '${String(featureName)}' appears at columns ${firstPosition} and ${secondPosition}`,
      "rename the column, or configure({ duplicateNames: 'last' }) to let the last one win",
    );
    this.name = 'DuplicateNameError';
    this.featureName = featureName;
    this.firstPosition = firstPosition;
    this.secondPosition = secondPosition;
  }

  protected override _getTitle(): string {
    return 'duplicate name';
  }
}
