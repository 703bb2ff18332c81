/**
 * Base error for every failure raised by featureset.
 *
 * Errors carry a short message, an optional hint, and render a compiler-style
 * report through `format()`:
 *
 * ```text
 * error: unknown name at tests/merge.test.ts:12:7
 *   --> fs.get(0, 'height')
 *    |
 *    └── name 'height' does not exist
 * help: available names are: 'width', 'depth'
 * ```
 */
export class FeatureSetError extends Error {
  readonly code: string = 'FEATURESET_ERROR';
  readonly hint: string | undefined;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'FeatureSetError';
    this.hint = hint;
  }

  /** Short lower-case title used on the first line of `format()`. */
  protected _getTitle(): string {
    return this.message;
  }

  /** Call expression shown after the `-->` pointer. */
  protected _getExpression(): string {
    return this._getLocation();
  }

  /** Detail line shown under the tree branch. */
  protected _getDetail(): string {
    return this.message;
  }

  /**
   * First stack frame outside the errors module, as `file:line:col`.
   */
  protected _getLocation(): string {
    const frames = (this.stack ?? '').split('\n').slice(1);
    for (const frame of frames) {
      const trimmed = frame.trim();
      if (trimmed.includes('/errors/')) continue;
      const match = /\(?([^()\s]+:\d+:\d+)\)?$/.exec(trimmed);
      if (match?.[1]) return match[1];
    }
    return '<unknown>';
  }

  format(): string {
    const lines = [
      `error: ${this._getTitle()} at ${this._getLocation()}`,
      `  --> ${this._getExpression()}`,
      '   |',
      `   └── ${this._getDetail()}`,
    ];
    if (this.hint) {
      lines.push(`help: ${this.hint}`);
    }
    return lines.join('\n');
  }
}
