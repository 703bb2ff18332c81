import type { Name } from '../core/types';
import { FeatureSetError } from './base';

const MAX_LISTED = 8;

/**
 * Thrown when a column name cannot be resolved.
 */
export class UnknownNameError extends FeatureSetError {
  override readonly code = 'UNKNOWN_NAME';

  readonly featureName: Name;
  readonly available: readonly Name[];

  constructor(featureName: Name, available: readonly Name[]) {
    const listed = available.slice(0, MAX_LISTED).map((n) => `'${String(n)}'`);
    const more = available.length > MAX_LISTED ? `, ... (${available.length} total)` : '';
    super(
      `name '${String(featureName)}' does not exist`,
      available.length > 0
        ? `available names are: ${listed.join(', ')}${more}`
        : 'the feature set has no columns',
    );
    this.name = 'UnknownNameError';
    this.featureName = featureName;
    this.available = available;
  }

  protected override _getTitle(): string {
    return 'unknown name';
  }

  protected override _getExpression(): string {
    return `fs.get(rows, '${String(this.featureName)}')`;
  }
}
