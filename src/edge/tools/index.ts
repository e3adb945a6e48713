/**
 * Edge Tools - MCP tool implementations
 */

export {
  generateSymbolsTool,
  executeGenerateSymbols,
  formatGenerateSymbolsResponse,
  parseGenerateSymbolsArgs,
  type GenerateSymbolsArgs,
  type GenerateSymbolsResult,
} from './generate-symbols.js';
