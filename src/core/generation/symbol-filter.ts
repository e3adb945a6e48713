/**
 * Symbol selection - ordering and localization-variant filtering
 */

import type { LocalizationOptions } from '../types.js';
import { loadStringSet } from '../utils/data-files.js';

const ISO_LANGUAGE_CODES = loadStringSet('iso-language-codes.json');

const RIGHT_TO_LEFT_SUFFIX = '.rtl';

/**
 * Whether the last dot segment is an ISO 639-1 language code
 *
 * @example
 * hasLanguageCodeSuffix('character.book.closed.ja') // => true
 * hasLanguageCodeSuffix('character.book.closed')    // => false
 */
export function hasLanguageCodeSuffix(symbolName: string): boolean {
  const segments = symbolName.split('.');
  const last = segments[segments.length - 1];
  return segments.length > 1 && last !== undefined && ISO_LANGUAGE_CODES.has(last);
}

export function hasRightToLeftSuffix(symbolName: string): boolean {
  return symbolName.endsWith(RIGHT_TO_LEFT_SUFFIX);
}

/**
 * Sort by UTF-16 code unit order, independent of locale
 */
export function sortSymbolNames(names: Iterable<string>): string[] {
  return Array.from(names).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Drop localized variants the options do not ask for; order is preserved
 */
export function filterSymbolNames(
  names: readonly string[],
  localization: LocalizationOptions
): string[] {
  return names.filter(name => {
    if (!localization.languageCode && hasLanguageCodeSuffix(name)) return false;
    if (!localization.rightToLeft && hasRightToLeftSuffix(name)) return false;
    return true;
  });
}
