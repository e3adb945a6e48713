import { availableOn, platformVersionsOf } from '../ir/builders.js';
import { lookupAvailability } from '../availability.js';
import type { Declaration, SymbolCatalog } from '../types.js';
import { attachAttribute, type DeclarationMutator } from './types.js';

/**
 * Adds `@available(iOS …, macOS …, …, *)` from the symbol's release record
 */
export class AvailabilityMutator implements DeclarationMutator {
  constructor(private readonly catalog: SymbolCatalog) {}

  mutate(declaration: Declaration, symbolName: string): Declaration {
    const lookup = lookupAvailability(this.catalog, symbolName);
    if (lookup.status !== 'found') return declaration;
    return attachAttribute(declaration, availableOn(platformVersionsOf(lookup.release)));
  }
}
