/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer } from './McpServerFactory.js';
export { registerPubChemTools } from './tools/pubchemTools.js';
