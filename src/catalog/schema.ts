/**
 * JSON Schemas for the catalog files
 */

import type { ReleaseVersions } from '../core/types.js';

export interface NameAvailabilityFile {
  symbols: Record<string, string>;
  year_to_release: Record<string, ReleaseVersions>;
}

export const CATALOG_FILES = {
  availability: 'name_availability.json',
  aliases: 'name_aliases.json',
  fillVariants: 'nofill_to_fill.json',
  semanticNames: 'semantic_to_descriptive_name.json',
  restrictions: 'symbol_restrictions.json',
} as const;

const versionString = { type: 'string' } as const;

export const nameAvailabilitySchema = {
  type: 'object',
  required: ['symbols', 'year_to_release'],
  properties: {
    symbols: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
    year_to_release: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['iOS', 'macOS', 'tvOS', 'watchOS', 'visionOS'],
        properties: {
          iOS: versionString,
          macOS: versionString,
          tvOS: versionString,
          watchOS: versionString,
          visionOS: versionString,
        },
      },
    },
  },
} as const;

export const stringTableSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const;
