import { FeatureSetError } from './base';

/**
 * The file at `path` is not a readable feature set container.
 */
export class InvalidContainerError extends FeatureSetError {
  override readonly code = 'INVALID_CONTAINER';

  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`${path}: ${reason}`, 'required fields are id, created_at, labels, names, features');
    this.name = 'InvalidContainerError';
    this.path = path;
    this.reason = reason;
  }

  protected override _getTitle(): string {
    return 'invalid container';
  }

  protected override _getExpression(): string {
    return `load('${this.path}')`;
  }

  protected override _getDetail(): string {
    return this.reason;
  }
}
