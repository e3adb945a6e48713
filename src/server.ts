/**
 * MCP server wiring - tool listing and dispatch
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import {
  executeGenerateSymbols,
  formatGenerateSymbolsResponse,
  generateSymbolsTool,
  parseGenerateSymbolsArgs,
} from './edge/tools/index.js';
import { ConfigValidationError, formatValidationErrors } from './config-loader.js';

export const SERVER_NAME = 'sfsymbols-codegen';
export const SERVER_VERSION = '1.0.0';

export const tools: Tool[] = [generateSymbolsTool];

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
};

/**
 * Run a tool by name; failures come back as `isError` responses
 */
export async function handleToolCall(name: string, args: unknown): Promise<ToolResponse> {
  try {
    switch (name) {
      case generateSymbolsTool.name: {
        const result = await executeGenerateSymbols(parseGenerateSymbolsArgs(args));
        return {
          content: formatGenerateSymbolsResponse(result),
          isError: !result.success,
        };
      }

      default:
        return {
          content: [{ type: 'text', text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }
  } catch (error) {
    const errorMessage =
      error instanceof ConfigValidationError
        ? formatValidationErrors(error)
        : error instanceof Error
          ? error.message
          : String(error);
    console.error('[server] Tool error:', errorMessage);

    return {
      content: [{ type: 'text', text: `# Error\n\n${errorMessage}` }],
      isError: true,
    };
  }
}

export function createServer(): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args);
  });

  return server;
}
