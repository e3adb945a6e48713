/**
 * Mutator chain
 */

import type { SymbolCatalog } from '../types.js';
import { AvailabilityMutator } from './availability-mutator.js';
import { DeprecationMutator } from './deprecation-mutator.js';
import { RestrictionMutator } from './restriction-mutator.js';
import type { DeclarationMutator } from './types.js';

export { AvailabilityMutator } from './availability-mutator.js';
export { DeprecationMutator, DEPRECATION_MESSAGE } from './deprecation-mutator.js';
export { RestrictionMutator, appendImportantCallout } from './restriction-mutator.js';
export { applyMutators, attachAttribute } from './types.js';
export type { DeclarationMutator } from './types.js';

/**
 * Availability, then deprecation, then restriction. Attributes go directly
 * under the comment, so the deprecation attribute renders above availability.
 */
export function createDefaultMutators(catalog: SymbolCatalog): DeclarationMutator[] {
  return [
    new AvailabilityMutator(catalog),
    new DeprecationMutator(catalog),
    new RestrictionMutator(catalog),
  ];
}
