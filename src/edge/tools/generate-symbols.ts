/**
 * generate_symbols MCP Tool
 *
 * Catalog directory → Swift accessors for every symbol, with optional write
 * to the configured output path.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import AjvModule from 'ajv';
import { resolve } from 'path';
import { isCatalogError, loadCatalog } from '../../catalog/index.js';
import {
  ConfigValidationError,
  formatValidationErrors,
  loadGeneratorConfigOrDefault,
  mergeConfigs,
  toGenerateOptions,
} from '../../config-loader.js';
import type { GeneratorConfig } from '../../config-schema.js';
import {
  generateSymbolSource,
  isGenerationError,
  type AccessModifier,
  type GenerationResult,
  type ImageFramework,
  type LocalizationFlag,
  type MissingAvailabilityPolicy,
} from '../../core/index.js';
import { writeGeneratedSource, type WriteResult } from '../file-writer.js';

const Ajv = AjvModule.default;

/**
 * Input arguments for generate_symbols tool
 */
export interface GenerateSymbolsArgs {
  projectRoot?: string;
  catalogDir?: string;
  outputPath?: string;
  accessModifier?: AccessModifier;
  enabledExtensions?: ImageFramework[];
  exportSemanticSymbols?: boolean;
  exportLocalizations?: LocalizationFlag;
  onMissingAvailability?: MissingAvailabilityPolicy;
  /** Return the source without writing it, even when outputPath is set */
  dryRun?: boolean;
}

const inputSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    projectRoot: {
      type: 'string',
      description: 'Directory to search for configuration and resolve relative paths from (default: current working directory)',
    },
    catalogDir: {
      type: 'string',
      description: 'Directory holding name_availability.json and the auxiliary name tables',
    },
    outputPath: {
      type: 'string',
      description: 'Swift file to write (default: from configuration; not written when unset)',
    },
    accessModifier: {
      type: 'string',
      enum: ['public', 'package', 'internal', 'fileprivate', 'private'],
      description: 'Access modifier for generated declarations (default: internal)',
    },
    enabledExtensions: {
      type: 'array',
      uniqueItems: true,
      items: { type: 'string', enum: ['SwiftUI', 'UIKit', 'AppKit'] },
      description: 'Companion image extensions to emit (default: all)',
    },
    exportSemanticSymbols: {
      type: 'boolean',
      description: 'Also emit accessors for semantic names (default: false)',
    },
    exportLocalizations: {
      type: 'string',
      enum: ['both', 'languageCode', 'rightToLeft'],
      description: 'Localized variants to keep (default: none)',
    },
    onMissingAvailability: {
      type: 'string',
      enum: ['fail', 'skip'],
      description: 'Abort or skip when a symbol has no release record (default: fail)',
    },
    dryRun: {
      type: 'boolean',
      description: 'Return the source without writing the output file (default: false)',
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateArgs = ajv.compile<GenerateSymbolsArgs>(inputSchema);

/**
 * Tool definition for MCP server
 */
export const generateSymbolsTool: Tool = {
  name: 'generate_symbols',
  description: `Generate a Swift file with one typed accessor per SF Symbol.

Reads the symbol catalog from catalogDir, filters localized variants, and emits:
• SFSymbolResource with a static property per symbol
• @available, deprecation and usage-restriction annotations per symbol
• UIImage, NSImage and SwiftUI Image extensions mirroring every accessor

Options not passed here come from .sfsymbolsrc.json (or package.json "sfsymbols").`,
  inputSchema,
};

/**
 * Result from generate_symbols tool
 */
export interface GenerateSymbolsResult {
  success: boolean;
  generation?: GenerationResult;
  writeResult?: WriteResult;
  error?: string;
}

/**
 * Parse raw tool arguments
 *
 * @throws {ConfigValidationError} If arguments do not match the input schema
 */
export function parseGenerateSymbolsArgs(raw: unknown): GenerateSymbolsArgs {
  const args = raw ?? {};
  if (!validateArgs(args)) {
    const errors = (validateArgs.errors ?? []).map(err => ({
      path: err.instancePath || '(root)',
      message: err.message ?? 'Unknown error',
    }));
    throw new ConfigValidationError('Invalid generate_symbols arguments', errors);
  }
  return args;
}

/**
 * Tool arguments as a configuration override; paths resolve from the project root
 */
function argsToConfig(args: GenerateSymbolsArgs, projectRoot: string): Partial<GeneratorConfig> {
  return {
    catalogDir: args.catalogDir === undefined ? undefined : resolve(projectRoot, args.catalogDir),
    outputPath: args.outputPath === undefined ? undefined : resolve(projectRoot, args.outputPath),
    accessModifier: args.accessModifier,
    enabledExtensions: args.enabledExtensions,
    exportSemanticSymbols: args.exportSemanticSymbols,
    exportLocalizations: args.exportLocalizations,
    onMissingAvailability: args.onMissingAvailability,
  };
}

function describeError(error: unknown): string {
  if (error instanceof ConfigValidationError) return formatValidationErrors(error);
  if (isCatalogError(error) || isGenerationError(error)) return error.getUserMessage();
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute the generate_symbols tool
 */
export async function executeGenerateSymbols(args: GenerateSymbolsArgs): Promise<GenerateSymbolsResult> {
  const projectRoot = resolve(args.projectRoot ?? process.cwd());

  try {
    const fileConfig = await loadGeneratorConfigOrDefault(projectRoot);
    const config = mergeConfigs(fileConfig, argsToConfig(args, projectRoot));

    if (config.catalogDir === undefined) {
      return {
        success: false,
        error: 'No catalog directory: pass catalogDir or set it in .sfsymbolsrc.json',
      };
    }

    const catalog = await loadCatalog(config.catalogDir);
    const generation = generateSymbolSource(catalog, toGenerateOptions(config));

    for (const diagnostic of generation.diagnostics) {
      console.error(`[generate_symbols] ${diagnostic.symbolName}: ${diagnostic.message}`);
    }
    console.error(
      `[generate_symbols] ${generation.symbolNames.length} symbols, ${generation.aliasNames.length} semantic aliases`
    );

    if (config.outputPath === undefined || args.dryRun === true) {
      return { success: true, generation };
    }

    const writeResult = await writeGeneratedSource(config.outputPath, generation.source);
    if (!writeResult.success) {
      return { success: false, generation, writeResult, error: writeResult.error };
    }
    return { success: true, generation, writeResult };
  } catch (error) {
    console.error('[generate_symbols] Generation failed:', error);
    return { success: false, error: describeError(error) };
  }
}

/**
 * Format the result for MCP response
 */
export function formatGenerateSymbolsResponse(
  result: GenerateSymbolsResult
): Array<{ type: 'text'; text: string }> {
  const { generation, writeResult } = result;

  if (!result.success || !generation) {
    return [{ type: 'text', text: `# Error\n\n${result.error ?? 'No result generated'}` }];
  }

  const lines = [
    '# Generated SF Symbol accessors',
    '',
    `- Symbols: ${generation.symbolNames.length}`,
    `- Semantic aliases: ${generation.aliasNames.length}`,
  ];
  if (writeResult) {
    lines.push(`- Written to: \`${writeResult.path}\` (${writeResult.bytes} bytes)`);
  }
  if (generation.diagnostics.length > 0) {
    lines.push('', '## Diagnostics', '');
    for (const diagnostic of generation.diagnostics) {
      lines.push(`- \`${diagnostic.symbolName}\`: ${diagnostic.message}`);
    }
  }

  return [
    { type: 'text', text: lines.join('\n') },
    { type: 'text', text: generation.source },
  ];
}
