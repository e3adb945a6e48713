import type { Declaration, SymbolCatalog } from '../types.js';
import { ownEntry } from '../utils/records.js';
import { deriveIdentifier } from '../naming/identifier.js';
import { attachAttribute, type DeclarationMutator } from './types.js';

export const DEPRECATION_MESSAGE =
  'This name has been deprecated. You should use a more modern name if your app does not need to support older platforms.';

/**
 * Marks renamed symbols deprecated, pointing at the accessor of the current name
 */
export class DeprecationMutator implements DeclarationMutator {
  constructor(private readonly catalog: SymbolCatalog) {}

  mutate(declaration: Declaration, symbolName: string): Declaration {
    const currentName = ownEntry(this.catalog.aliases, symbolName);
    if (currentName === undefined) return declaration;
    return attachAttribute(declaration, {
      kind: 'deprecated',
      message: DEPRECATION_MESSAGE,
      renamed: deriveIdentifier(currentName),
    });
  }
}
