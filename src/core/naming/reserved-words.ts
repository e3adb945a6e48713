/**
 * Swift keywords, always-reserved and contextual, that cannot be used as bare
 * identifiers in generated accessors
 */

import { loadStringSet } from '../utils/data-files.js';

const RESERVED_WORDS = loadStringSet('reserved-words.json');

export function isReservedWord(word: string): boolean {
  return RESERVED_WORDS.has(word);
}

/**
 * Wrap an identifier in backticks, Swift's verbatim-identifier syntax
 */
export function escapeIdentifier(identifier: string): string {
  return `\`${identifier}\``;
}
