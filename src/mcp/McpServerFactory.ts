/**
 * Factory function for creating the MCP server with the PubChem tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PubChemClient } from '../client/PubChemClient.js';
import { registerPubChemTools } from './tools/pubchemTools.js';

/**
 * Create and configure an MCP server bound to the given client.
 */
export function createMcpServer(client: PubChemClient): McpServer {
  const server = new McpServer(
    { name: 'pubchem-pug-client', version: '1.0.0' },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerPubChemTools(server, client);

  return server;
}
