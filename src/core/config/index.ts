/**
 * Global configuration module.
 */

export { configure, getConfig, resetConfig, getDefaultConfig } from './config';
export type { FeatureSetConfig, DuplicateNamePolicy } from './config';

export { consoleLogger, silentLogger } from './logger';
export type { Logger } from './logger';
