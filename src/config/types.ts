/**
 * Configuration types for the PubChem client.
 *
 * These types define the structure of pubchem.yaml and provide
 * type-safe access to client configuration.
 */

import type { LogLevel } from '../core/logger.js';

/**
 * Top-level client configuration.
 */
export interface AppConfig {
  service: ServiceConfig;
  polling: PollingConfig;
  cache: CacheConfig;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
}

/**
 * PubChem endpoints and HTTP settings.
 */
export interface ServiceConfig {
  /** PUG REST base URL (default: https://pubchem.ncbi.nlm.nih.gov/rest/pug) */
  baseUrl: string;
  /** PUG View base URL, used for safety data */
  viewBaseUrl: string;
  /** Per-request timeout in ms (default 30_000) */
  timeoutMs: number;
  /** Optional User-Agent header */
  userAgent?: string;
}

/**
 * Listkey polling for asynchronous searches.
 */
export interface PollingConfig {
  /** Delay between status requests in ms (default 2_000) */
  intervalMs: number;
  /** Give up after this many ms (default 120_000) */
  maxWaitMs: number;
}

/**
 * In-process response cache.
 */
export interface CacheConfig {
  enabled: boolean;
  /** Entries kept before the least recently used one is evicted */
  maxEntries: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  service: {
    baseUrl: 'https://pubchem.ncbi.nlm.nih.gov/rest/pug',
    viewBaseUrl: 'https://pubchem.ncbi.nlm.nih.gov/rest/pug_view',
    timeoutMs: 30_000,
  },
  polling: {
    intervalMs: 2_000,
    maxWaitMs: 120_000,
  },
  cache: {
    enabled: false,
    maxEntries: 500,
  },
  logLevel: 'info',
};
