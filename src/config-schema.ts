/**
 * Generator configuration schema
 * Defines the TypeScript interface and the JSON Schema used for validation
 */

import type { LocalizationFlag } from './core/generation/localization.js';
import type { AccessModifier, ImageFramework, MissingAvailabilityPolicy } from './core/types.js';

/**
 * Main generator configuration
 */
export interface GeneratorConfig {
  /** Directory holding the catalog JSON files */
  catalogDir?: string;

  /** Where to write the generated Swift file; nothing is written when unset */
  outputPath?: string;

  /** Access modifier applied to every generated declaration */
  accessModifier: AccessModifier;

  /** Companion image extensions to emit */
  enabledExtensions: ImageFramework[];

  /** Also emit accessors for semantic names */
  exportSemanticSymbols: boolean;

  /** Localized variants to keep */
  exportLocalizations?: LocalizationFlag;

  /** What to do with symbols whose release record is missing */
  onMissingAvailability: MissingAvailabilityPolicy;
}

/**
 * JSON Schema for a configuration file; every key is optional and merged
 * over DEFAULT_CONFIG
 */
export const generatorConfigSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    catalogDir: {
      type: 'string',
      minLength: 1,
    },
    outputPath: {
      type: 'string',
      minLength: 1,
    },
    accessModifier: {
      type: 'string',
      enum: ['public', 'package', 'internal', 'fileprivate', 'private'],
    },
    enabledExtensions: {
      type: 'array',
      uniqueItems: true,
      items: {
        type: 'string',
        enum: ['SwiftUI', 'UIKit', 'AppKit'],
      },
    },
    exportSemanticSymbols: {
      type: 'boolean',
    },
    exportLocalizations: {
      type: 'string',
      enum: ['both', 'languageCode', 'rightToLeft'],
    },
    onMissingAvailability: {
      type: 'string',
      enum: ['fail', 'skip'],
    },
  },
} as const;

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: GeneratorConfig = {
  accessModifier: 'internal',
  enabledExtensions: ['SwiftUI', 'UIKit', 'AppKit'],
  exportSemanticSymbols: false,
  onMissingAvailability: 'fail',
};
