/**
 * Availability lookup: symbol name → availability key → release record
 */

import type { ReleaseVersions, SymbolCatalog } from './types.js';
import { ownEntry } from './utils/records.js';

export type AvailabilityLookup =
  | { status: 'found'; key: string; release: ReleaseVersions }
  | { status: 'unknownSymbol' }
  /** The symbol names a key the release table does not hold */
  | { status: 'missingRelease'; key: string };

export function lookupAvailability(catalog: SymbolCatalog, symbolName: string): AvailabilityLookup {
  const key = ownEntry(catalog.symbols, symbolName);
  if (key === undefined) return { status: 'unknownSymbol' };

  const release = ownEntry(catalog.releases, key);
  return release ? { status: 'found', key, release } : { status: 'missingRelease', key };
}
