/**
 * pubchem-pug-client: typed client for the PubChem PUG REST service.
 *
 * This is the main entry point for the library.
 */

// Errors and logging
export * from './core/errors.js';
export { createLogger, formatLogLine, isLogLevel, LOG_LEVELS } from './core/logger.js';
export type { LogContext, Logger, LoggerOptions, LogLevel, LogSink } from './core/logger.js';

// Configuration
export * from './config/index.js';

// Requests
export * from './request/index.js';

// Transport
export * from './transport/index.js';

// Decoding
export * from './decode/index.js';

// Records
export * from './records/index.js';

// Safety data
export * from './safety/index.js';

// Client
export { PubChemClient } from './client/PubChemClient.js';
export type {
  CompoundQueryOptions,
  DownloadOptions,
  ImageOptions,
  PubChemClientOptions,
  QueryOptions,
} from './client/PubChemClient.js';

// MCP server
export { createMcpServer } from './mcp/index.js';
