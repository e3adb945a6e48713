/**
 * Declaration mutators - per-symbol annotation of accessor declarations
 */

import type { AvailabilityDescriptor, Declaration } from '../types.js';

/**
 * Pure transformation of one symbol's declaration. A mutator with nothing to
 * add for a symbol returns the declaration unchanged.
 */
export interface DeclarationMutator {
  mutate(declaration: Declaration, symbolName: string): Declaration;
}

/**
 * Run mutators left to right
 */
export function applyMutators(
  mutators: readonly DeclarationMutator[],
  declaration: Declaration,
  symbolName: string
): Declaration {
  return mutators.reduce((current, mutator) => mutator.mutate(current, symbolName), declaration);
}

/**
 * Insert an attribute directly under the leading comment, or at the top when
 * there is none, so the comment always renders first
 */
export function attachAttribute(declaration: Declaration, attribute: AvailabilityDescriptor): Declaration {
  if (declaration.kind === 'commentable' && declaration.comment) {
    return { ...declaration, declaration: attachAttribute(declaration.declaration, attribute) };
  }
  return { kind: 'withAttribute', attribute, declaration };
}
