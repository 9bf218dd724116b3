/**
 * Configuration loading.
 */

export * from './types.js';
export { loadConfig, resolveConfig, validateConfig, ConfigValidationError } from './loader.js';
export type { ConfigOverrides, LoadConfigOptions } from './loader.js';
