/**
 * Catalog loader
 * Reads the symbol catalog and its auxiliary tables from a directory of JSON files
 */

import AjvModule from 'ajv';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { SymbolCatalog } from '../core/types.js';
import { CatalogError } from './errors.js';
import {
  CATALOG_FILES,
  nameAvailabilitySchema,
  stringTableSchema,
  type NameAvailabilityFile,
} from './schema.js';

const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true });
const validateNameAvailability = ajv.compile<NameAvailabilityFile>(nameAvailabilitySchema);
const validateStringTable = ajv.compile<Record<string, string>>(stringTableSchema);

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new CatalogError(`Catalog file not found: ${filePath}`, 'CATALOG_NOT_FOUND', filePath);
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`Cannot parse ${filePath}: ${reason}`, 'CATALOG_PARSE_ERROR', filePath);
  }
}

function invalid(
  filePath: string,
  errors: ReadonlyArray<{ instancePath: string; message?: string }> | null | undefined
): CatalogError {
  const details = (errors ?? []).map(err => ({
    path: err.instancePath || '(root)',
    message: err.message ?? 'Unknown error',
  }));
  return new CatalogError(`Invalid catalog file ${filePath}`, 'CATALOG_INVALID', filePath, details);
}

async function loadStringTable(directory: string, fileName: string): Promise<Record<string, string>> {
  const filePath = join(directory, fileName);
  const data = await readJson(filePath);
  if (!validateStringTable(data)) {
    throw invalid(filePath, validateStringTable.errors);
  }
  return data;
}

/**
 * Load every catalog file from `directory`
 *
 * @throws {CatalogError} When a file is missing, is not JSON or has the wrong shape
 */
export async function loadCatalog(directory: string): Promise<SymbolCatalog> {
  const availabilityPath = join(directory, CATALOG_FILES.availability);
  const availability = await readJson(availabilityPath);
  if (!validateNameAvailability(availability)) {
    throw invalid(availabilityPath, validateNameAvailability.errors);
  }

  const [aliases, fillVariants, semanticNames, restrictions] = await Promise.all([
    loadStringTable(directory, CATALOG_FILES.aliases),
    loadStringTable(directory, CATALOG_FILES.fillVariants),
    loadStringTable(directory, CATALOG_FILES.semanticNames),
    loadStringTable(directory, CATALOG_FILES.restrictions),
  ]);

  return {
    symbols: availability.symbols,
    releases: availability.year_to_release,
    aliases,
    fillVariants,
    semanticNames,
    restrictions,
  };
}
