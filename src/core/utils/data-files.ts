/**
 * Data file access for the word lists shipped in `data/`
 */

import { readFileSync } from 'fs';

/** `data/` at the package root, from both `src/core/utils` and `dist/core/utils` */
const DATA_DIR = new URL('../../../data/', import.meta.url);

/**
 * Read a JSON array of strings from `data/` into a set
 *
 * @throws {Error} If the file is not a JSON array of strings
 */
export function loadStringSet(fileName: string): ReadonlySet<string> {
  const raw: unknown = JSON.parse(readFileSync(new URL(fileName, DATA_DIR), 'utf-8'));

  if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === 'string')) {
    throw new Error(`data/${fileName} must be a JSON array of strings`);
  }

  return new Set(raw);
}
