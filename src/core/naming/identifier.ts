/**
 * Identifier derivation - dotted symbol names to Swift identifiers
 *
 * Distinct raw names are not guaranteed distinct identifiers; the pipeline
 * checks for collisions across the whole catalog.
 */

import { escapeIdentifier, isReservedWord } from './reserved-words.js';

/** Separators between the segments of a symbol name */
const SEPARATORS = /[.\-_\s]+/;

const NUMERIC_TOKEN = /^\d+$/;
const LEADING_DIGIT = /^\d/;

const wordSegmenter = new Intl.Segmenter('en', { granularity: 'word' });

/**
 * Split a raw symbol name into words
 *
 * Word segmentation runs on each separator-delimited piece: on its own, the
 * segmenter keeps `message.circle` together as one word.
 *
 * @example
 * tokenizeSymbolName('arrow.up.left.circle.fill') // => ['arrow', 'up', 'left', 'circle', 'fill']
 * tokenizeSymbolName('1.circle')                  // => ['1', 'circle']
 */
export function tokenizeSymbolName(rawName: string): string[] {
  return rawName
    .split(SEPARATORS)
    .filter(piece => piece.length > 0)
    .flatMap(piece =>
      Array.from(wordSegmenter.segment(piece))
        .filter(segment => segment.isWordLike === true)
        .map(segment => segment.segment)
    );
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Join words into lower camel case. Numeric words get a leading underscore
 * so they do not fuse with a neighbouring number, and so does a first word
 * starting with a digit.
 *
 * @example
 * toCamelCase(['person', '2', 'circle']) // => 'person_2Circle'
 * toCamelCase(['1', 'circle'])           // => '_1Circle'
 * toCamelCase(['4k', 'tv'])              // => '_4kTv'
 */
export function toCamelCase(words: readonly string[]): string {
  return words
    .map((word, index) => {
      if (NUMERIC_TOKEN.test(word)) return `_${word}`;
      if (index > 0) return capitalize(word);
      return LEADING_DIGIT.test(word) ? `_${word.toLowerCase()}` : word.toLowerCase();
    })
    .join('');
}

/**
 * Derive the accessor identifier for a raw symbol name
 *
 * Reserved words are escaped with backticks, never respelled. Returns an
 * empty string when the name holds no words at all.
 *
 * @example
 * deriveIdentifier('message.circle') // => 'messageCircle'
 * deriveIdentifier('return')         // => '`return`'
 */
export function deriveIdentifier(rawName: string): string {
  const identifier = toCamelCase(tokenizeSymbolName(rawName));
  return isReservedWord(identifier) ? escapeIdentifier(identifier) : identifier;
}
