#!/usr/bin/env node
/**
 * SF Symbols codegen MCP server
 *
 * Serves the generate_symbols tool over stdio. stdout carries the protocol,
 * so all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer, SERVER_NAME, SERVER_VERSION, tools } from './server.js';

async function main(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[server] ${SERVER_NAME} v${SERVER_VERSION} listening on stdio`);
  console.error(`[server] tools: ${tools.map(tool => tool.name).join(', ')}`);
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
