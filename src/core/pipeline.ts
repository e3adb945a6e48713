/**
 * Pipeline - symbol catalog to Swift source
 *
 * Stages run in a fixed order: select names, resolve availability, derive
 * identifiers, add semantic aliases, build the file, render. The core never
 * logs; problems that do not abort the run come back as diagnostics.
 */

import { lookupAvailability } from './availability.js';
import { GenerationError } from './errors.js';
import {
  buildSymbolFile,
  filterSymbolNames,
  semanticAliasEntry,
  sortSymbolNames,
  symbolEntry,
  type AccessorEntry,
} from './generation/index.js';
import { createDefaultMutators, type DeclarationMutator } from './mutators/index.js';
import { deriveIdentifier } from './naming/identifier.js';
import { renderFile } from './rendering/text-renderer.js';
import type {
  GenerateOptions,
  GenerationDiagnostic,
  GenerationResult,
  LocalizationOptions,
  MissingAvailabilityPolicy,
  SymbolCatalog,
} from './types.js';
import { IMAGE_FRAMEWORKS } from './types.js';
import { ownEntry } from './utils/records.js';

export const DEFAULT_GENERATE_OPTIONS: GenerateOptions = {
  accessModifier: 'internal',
  enabledExtensions: [...IMAGE_FRAMEWORKS],
  exportSemanticSymbols: false,
  localization: { languageCode: false, rightToLeft: false },
  onMissingAvailability: 'fail',
};

export interface SemanticAlias {
  semanticName: string;
  entry: AccessorEntry;
}

/**
 * Sorted catalog names, without the localized variants not asked for
 */
function selectSymbols(catalog: SymbolCatalog, localization: LocalizationOptions): string[] {
  return filterSymbolNames(sortSymbolNames(Object.keys(catalog.symbols)), localization);
}

/**
 * Keep symbols with a release record
 *
 * @throws {GenerationError} MISSING_AVAILABILITY under the 'fail' policy
 */
function resolveAvailability(
  catalog: SymbolCatalog,
  names: readonly string[],
  policy: MissingAvailabilityPolicy,
  diagnostics: GenerationDiagnostic[]
): string[] {
  return names.filter(name => {
    const lookup = lookupAvailability(catalog, name);
    if (lookup.status === 'found') return true;

    const message =
      lookup.status === 'missingRelease'
        ? `availability key "${lookup.key}" has no release record`
        : 'symbol is not in the catalog';
    if (policy === 'fail') {
      throw new GenerationError(
        `Cannot resolve availability of "${name}": ${message}`,
        'MISSING_AVAILABILITY',
        [name]
      );
    }
    diagnostics.push({ symbolName: name, message: `skipped: ${message}` });
    return false;
  });
}

/**
 * One entry per symbol, keyed by identifier
 *
 * @throws {GenerationError} INVALID_IDENTIFIER or IDENTIFIER_COLLISION
 */
function deriveEntries(names: readonly string[]): Map<string, AccessorEntry> {
  const entries = new Map<string, AccessorEntry>();
  for (const name of names) {
    const id = deriveIdentifier(name);
    if (id.length === 0) {
      throw new GenerationError(
        `Symbol "${name}" yields an empty identifier`,
        'INVALID_IDENTIFIER',
        [name]
      );
    }
    const existing = entries.get(id);
    if (existing) {
      throw new GenerationError(
        `Symbols "${existing.systemName}" and "${name}" both derive the identifier ${id}`,
        'IDENTIFIER_COLLISION',
        [existing.systemName, name]
      );
    }
    entries.set(id, symbolEntry(name, id));
  }
  return entries;
}

/**
 * Semantic aliases whose descriptive symbol is emitted and whose own name is
 * not a catalog symbol. Aliases that cannot get an identifier of their own
 * are reported and left out.
 */
function deriveSemanticAliases(
  catalog: SymbolCatalog,
  emitted: ReadonlySet<string>,
  taken: ReadonlySet<string>,
  diagnostics: GenerationDiagnostic[]
): SemanticAlias[] {
  const aliases: SemanticAlias[] = [];
  const used = new Set(taken);

  for (const semanticName of sortSymbolNames(Object.keys(catalog.semanticNames))) {
    const descriptiveName = ownEntry(catalog.semanticNames, semanticName);
    if (descriptiveName === undefined || !emitted.has(descriptiveName)) continue;
    if (ownEntry(catalog.symbols, semanticName) !== undefined) continue;

    const id = deriveIdentifier(semanticName);
    if (id.length === 0) {
      diagnostics.push({ symbolName: semanticName, message: 'skipped: empty identifier' });
      continue;
    }
    if (used.has(id)) {
      diagnostics.push({
        symbolName: semanticName,
        message: `skipped: identifier ${id} is already taken`,
      });
      continue;
    }
    used.add(id);
    aliases.push({ semanticName, entry: semanticAliasEntry(semanticName, descriptiveName, id) });
  }

  return aliases;
}

/**
 * Generate the Swift source for a catalog
 *
 * @throws {GenerationError} When the catalog cannot produce a valid file
 */
export function generateSymbolSource(
  catalog: SymbolCatalog,
  options: GenerateOptions = DEFAULT_GENERATE_OPTIONS,
  mutators: readonly DeclarationMutator[] = createDefaultMutators(catalog)
): GenerationResult {
  const diagnostics: GenerationDiagnostic[] = [];

  const selected = selectSymbols(catalog, options.localization);
  const available = resolveAvailability(catalog, selected, options.onMissingAvailability, diagnostics);
  const symbolEntries = deriveEntries(available);

  const aliases = options.exportSemanticSymbols
    ? deriveSemanticAliases(catalog, new Set(available), new Set(symbolEntries.keys()), diagnostics)
    : [];

  const entries = [...symbolEntries.values(), ...aliases.map(alias => alias.entry)];
  const file = buildSymbolFile(entries, options, mutators);

  return {
    source: renderFile(file),
    symbolNames: available,
    aliasNames: aliases.map(alias => alias.semanticName),
    diagnostics,
  };
}

/**
 * Individual stages, for tests and custom pipelines
 */
export const stages = {
  selectSymbols,
  resolveAvailability,
  deriveEntries,
  deriveSemanticAliases,
};
