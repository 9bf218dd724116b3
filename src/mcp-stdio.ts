/**
 * MCP stdio transport entry point.
 *
 * Serves the PubChem tools over stdio.
 * Usage: npx tsx src/mcp-stdio.ts [configPath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { PubChemClient } from './client/PubChemClient.js';
import { loadConfig } from './config/loader.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const configPath = process.argv[2];

  // Redirect all console to stderr so stdout stays clean for MCP JSON-RPC
  const toStderr = (...args: unknown[]) => {
    process.stderr.write(args.map(String).join(' ') + '\n');
  };
  console.log = toStderr;
  console.info = toStderr;
  console.debug = toStderr;
  console.warn = toStderr;
  console.error = toStderr;

  const config = await loadConfig(configPath ? { configPath } : {});
  console.log(`Starting PubChem MCP server (base: ${config.service.baseUrl})`);

  const mcpServer = createMcpServer(PubChemClient.fromConfig(config));
  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err}\n`);
  process.exit(1);
});
