/**
 * Generator configuration loader
 * Uses cosmiconfig to search for configuration in various formats
 */

import { cosmiconfig } from 'cosmiconfig';
import AjvModule from 'ajv';
import { resolve, dirname } from 'path';
import { toLocalizationOptions } from './core/generation/localization.js';
import type { GenerateOptions } from './core/types.js';
import { DEFAULT_CONFIG, generatorConfigSchema, type GeneratorConfig } from './config-schema.js';

const Ajv = AjvModule.default;

/**
 * Module name for cosmiconfig
 */
const MODULE_NAME = 'sfsymbols';

/**
 * Configuration search locations (in priority order)
 */
const SEARCH_PLACES = [
  '.sfsymbolsrc.json',
  '.sfsymbolsrc.js',
  'sfsymbols.config.js',
  '.config/sfsymbols.json',
  'package.json',
];

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<Partial<GeneratorConfig>>(generatorConfigSchema);

const explorer = cosmiconfig(MODULE_NAME, { searchPlaces: SEARCH_PLACES });

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates a raw configuration object
 *
 * @param config - Raw configuration from file or tool arguments
 * @param source - Where the configuration came from (for errors)
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateConfigObject(config: unknown, source: string): Partial<GeneratorConfig> {
  if (!validateConfig(config)) {
    const errors = (validateConfig.errors ?? []).map(err => ({
      path: err.instancePath || '(root)',
      message: err.message ?? 'Unknown error',
    }));
    throw new ConfigValidationError(`Invalid configuration in ${source}`, errors);
  }
  return config;
}

/**
 * Relative paths in a configuration file are taken from the file's directory
 */
function resolvePaths(config: Partial<GeneratorConfig>, filepath: string): Partial<GeneratorConfig> {
  const base = dirname(filepath);
  const resolved = { ...config };
  if (config.catalogDir !== undefined) resolved.catalogDir = resolve(base, config.catalogDir);
  if (config.outputPath !== undefined) resolved.outputPath = resolve(base, config.outputPath);
  return resolved;
}

/**
 * Loads generator configuration from filesystem
 *
 * @param searchFrom - Directory to start search from (defaults to current)
 * @returns Found configuration or null if not found
 * @throws {ConfigValidationError} If configuration is invalid
 */
export async function loadGeneratorConfig(
  searchFrom?: string
): Promise<Partial<GeneratorConfig> | null> {
  const result = await explorer.search(searchFrom);

  if (!result || result.isEmpty || result.config === undefined || result.config === null) {
    return null;
  }

  return resolvePaths(validateConfigObject(result.config, result.filepath), result.filepath);
}

/**
 * Loads configuration merged over DEFAULT_CONFIG
 *
 * @param searchFrom - Directory to search in
 */
export async function loadGeneratorConfigOrDefault(searchFrom?: string): Promise<GeneratorConfig> {
  return mergeConfigs(DEFAULT_CONFIG, await loadGeneratorConfig(searchFrom));
}

/**
 * Clears cosmiconfig cache (useful for tests)
 */
export function clearConfigCache(): void {
  explorer.clearCaches();
}

/**
 * Formats validation errors for user output
 */
export function formatValidationErrors(error: ConfigValidationError): string {
  const errorList = error.errors.map(err => `  - ${err.path}: ${err.message}`).join('\n');

  return `${error.message}\n\nErrors:\n${errorList}`;
}

/**
 * Merges two configs, with defined override values taking priority
 */
export function mergeConfigs(
  base: GeneratorConfig,
  override: Partial<GeneratorConfig> | null
): GeneratorConfig {
  if (!override) return base;

  return {
    catalogDir: override.catalogDir ?? base.catalogDir,
    outputPath: override.outputPath ?? base.outputPath,
    accessModifier: override.accessModifier ?? base.accessModifier,
    enabledExtensions: override.enabledExtensions ?? base.enabledExtensions,
    exportSemanticSymbols: override.exportSemanticSymbols ?? base.exportSemanticSymbols,
    exportLocalizations: override.exportLocalizations ?? base.exportLocalizations,
    onMissingAvailability: override.onMissingAvailability ?? base.onMissingAvailability,
  };
}

/**
 * Generation options for a resolved configuration
 */
export function toGenerateOptions(config: GeneratorConfig): GenerateOptions {
  return {
    accessModifier: config.accessModifier,
    enabledExtensions: [...config.enabledExtensions],
    exportSemanticSymbols: config.exportSemanticSymbols,
    localization: toLocalizationOptions(config.exportLocalizations),
    onMissingAvailability: config.onMissingAvailability,
  };
}
