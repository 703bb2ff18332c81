import { z } from 'zod';
import { SchemaError } from '../../errors';
import { consoleLogger, type Logger } from './logger';

/**
 * How repeated feature names are handled when the name index is built.
 *
 * - `'last'`: the last occurrence wins lookups, names are kept verbatim
 * - `'error'`: construction fails with `DuplicateNameError`
 */
export type DuplicateNamePolicy = 'last' | 'error';

/**
 * Global configuration.
 */
export interface FeatureSetConfig {
  /** Duplicate name handling (default: 'last') */
  duplicateNames: DuplicateNamePolicy;

  /** Page size of lazily loaded feature matrices, in bytes (default: 64KB) */
  pageSizeBytes: number;

  /** Pages kept in memory per lazily loaded matrix (default: 64) */
  maxCachedPages: number;

  /** Destination for library log messages (default: console) */
  logger: Logger;
}

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    'info' in value &&
    typeof value.debug === 'function' &&
    typeof value.info === 'function',
  { message: 'logger must implement debug and info' },
);

const configSchema = z
  .object({
    duplicateNames: z.enum(['last', 'error']),
    pageSizeBytes: z.number().int().min(8),
    maxCachedPages: z.number().int().min(1),
    logger: loggerSchema,
  })
  .partial()
  .strict();

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: FeatureSetConfig = {
  duplicateNames: 'last',
  pageSizeBytes: 64 * 1024, // 64KB
  maxCachedPages: 64,
  logger: consoleLogger,
};

/** Current global configuration */
let currentConfig: FeatureSetConfig = { ...DEFAULT_CONFIG };

/**
 * Configure global behaviour.
 *
 * @example
 * ```ts
 * import { configure, silentLogger } from 'featureset';
 *
 * // Reject duplicate feature names
 * configure({ duplicateNames: 'error' });
 *
 * // Mute the "Created file" messages
 * configure({ logger: silentLogger });
 * ```
 */
export function configure(options: Partial<FeatureSetConfig>): void {
  const parsed = configSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchemaError(
      `invalid configuration: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue'}`,
      'see FeatureSetConfig for accepted options',
    );
  }
  currentConfig = { ...currentConfig, ...options };
}

/**
 * Get current configuration.
 */
export function getConfig(): Readonly<FeatureSetConfig> {
  return currentConfig;
}

/**
 * Reset configuration to defaults.
 */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): Readonly<FeatureSetConfig> {
  return DEFAULT_CONFIG;
}
