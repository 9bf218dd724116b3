/**
 * Configuration loader for the PubChem client.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isRecord } from '../core/guards.js';
import { isLogLevel, type LogLevel } from '../core/logger.js';
import type { AppConfig, ServiceConfig, PollingConfig, CacheConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.PUBCHEM_CONFIG_PATH or './pubchem.yaml') */
  configPath?: string;
}

/**
 * Partial configuration as written in a config file.
 */
export interface ConfigOverrides {
  service?: Partial<ServiceConfig>;
  polling?: Partial<PollingConfig>;
  cache?: Partial<CacheConfig>;
  logLevel?: LogLevel;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Return empty string if no value and no default
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isHttpUrl(value: unknown): boolean {
  if (typeof value !== 'string') return false;
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validate service configuration.
 */
function validateServiceConfig(config: unknown, path = 'service'): asserts config is Partial<ServiceConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.baseUrl !== undefined && !isHttpUrl(config.baseUrl)) {
    throw new ConfigValidationError('baseUrl must be an http(s) URL', `${path}.baseUrl`, config.baseUrl);
  }

  if (config.viewBaseUrl !== undefined && !isHttpUrl(config.viewBaseUrl)) {
    throw new ConfigValidationError('viewBaseUrl must be an http(s) URL', `${path}.viewBaseUrl`, config.viewBaseUrl);
  }

  if (config.timeoutMs !== undefined && !isPositiveInteger(config.timeoutMs)) {
    throw new ConfigValidationError('timeoutMs must be a positive integer', `${path}.timeoutMs`, config.timeoutMs);
  }

  if (config.userAgent !== undefined && typeof config.userAgent !== 'string') {
    throw new ConfigValidationError('userAgent must be a string', `${path}.userAgent`, config.userAgent);
  }
}

/**
 * Validate polling configuration.
 */
function validatePollingConfig(config: unknown, path = 'polling'): asserts config is Partial<PollingConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.intervalMs !== undefined && !isPositiveInteger(config.intervalMs)) {
    throw new ConfigValidationError('intervalMs must be a positive integer', `${path}.intervalMs`, config.intervalMs);
  }

  if (config.maxWaitMs !== undefined && !isPositiveInteger(config.maxWaitMs)) {
    throw new ConfigValidationError('maxWaitMs must be a positive integer', `${path}.maxWaitMs`, config.maxWaitMs);
  }
}

/**
 * Validate cache configuration.
 */
function validateCacheConfig(config: unknown, path = 'cache'): asserts config is Partial<CacheConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.enabled !== undefined && typeof config.enabled !== 'boolean') {
    throw new ConfigValidationError('enabled must be a boolean', `${path}.enabled`, config.enabled);
  }

  if (config.maxEntries !== undefined && !isPositiveInteger(config.maxEntries)) {
    throw new ConfigValidationError('maxEntries must be a positive integer', `${path}.maxEntries`, config.maxEntries);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is ConfigOverrides {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.service !== undefined) {
    validateServiceConfig(config.service);
  }

  if (config.polling !== undefined) {
    validatePollingConfig(config.polling);
  }

  if (config.cache !== undefined) {
    validateCacheConfig(config.cache);
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', 'logLevel', config.logLevel);
  }
}

/**
 * Merge overrides onto the defaults.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): AppConfig {
  return {
    service: { ...DEFAULT_CONFIG.service, ...overrides.service },
    polling: { ...DEFAULT_CONFIG.polling, ...overrides.polling },
    cache: { ...DEFAULT_CONFIG.cache, ...overrides.cache },
    logLevel: overrides.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.PUBCHEM_CONFIG_PATH
    ?? './pubchem.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return resolveConfig();
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return resolveConfig();
  }

  // Substitute environment variables
  const substituted = substituteEnvVarsRecursive(parsed);

  validateConfig(substituted);
  return resolveConfig(substituted);
}

