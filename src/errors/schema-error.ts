import { FeatureSetError } from './base';

/**
 * Values that cannot be represented, persisted or generated as requested.
 */
export class SchemaError extends FeatureSetError {
  override readonly code = 'SCHEMA_ERROR';

  constructor(detail: string, hint?: string) {
    super(detail, hint);
    this.name = 'SchemaError';
  }

  protected override _getTitle(): string {
    return 'schema error';
  }
}
