/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { PubChemError } from '../core/errors.js';

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Error result for a failed tool call. Library errors keep their code.
 */
export function toolError(err: unknown): CallToolResult {
  if (err instanceof PubChemError) {
    return errorResult(`${err.code}: ${err.message}`);
  }
  return errorResult(`Tool error: ${err instanceof Error ? err.message : String(err)}`);
}
