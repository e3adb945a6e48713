import { describe, it, expect } from 'vitest';
import {
  filterSymbolNames,
  hasLanguageCodeSuffix,
  hasRightToLeftSuffix,
  sortSymbolNames,
} from '../../../src/core/generation/symbol-filter.js';
import { toLocalizationOptions } from '../../../src/core/generation/localization.js';

const names = ['record.circle.fill.ja', 'arrow.left.rtl', 'message.circle', 'character.he'];

describe('symbol filter', () => {
  it('should detect language code suffixes on the last segment only', () => {
    expect(hasLanguageCodeSuffix('record.circle.fill.ja')).toBe(true);
    expect(hasLanguageCodeSuffix('character.he')).toBe(true);
    expect(hasLanguageCodeSuffix('message.circle')).toBe(false);
    expect(hasLanguageCodeSuffix('ja')).toBe(false);
  });

  it('should detect right-to-left variants', () => {
    expect(hasRightToLeftSuffix('arrow.left.rtl')).toBe(true);
    expect(hasRightToLeftSuffix('rtl.circle')).toBe(false);
  });

  it('should sort by code unit, upper case before lower case', () => {
    expect(sortSymbolNames(['b', 'a.circle', 'B', 'a'])).toEqual(['B', 'a', 'a.circle', 'b']);
  });

  it('should drop localized variants by default', () => {
    expect(filterSymbolNames(names, toLocalizationOptions(undefined))).toEqual(['message.circle']);
  });

  it('should keep only the variants the flag asks for', () => {
    expect(filterSymbolNames(names, toLocalizationOptions('languageCode'))).toEqual([
      'record.circle.fill.ja',
      'message.circle',
      'character.he',
    ]);
    expect(filterSymbolNames(names, toLocalizationOptions('rightToLeft'))).toEqual([
      'arrow.left.rtl',
      'message.circle',
    ]);
    expect(filterSymbolNames(names, toLocalizationOptions('both'))).toEqual(names);
  });
});

describe('toLocalizationOptions', () => {
  it('should map each flag to its options', () => {
    expect(toLocalizationOptions('both')).toEqual({ languageCode: true, rightToLeft: true });
    expect(toLocalizationOptions('languageCode')).toEqual({ languageCode: true, rightToLeft: false });
    expect(toLocalizationOptions('rightToLeft')).toEqual({ languageCode: false, rightToLeft: true });
    expect(toLocalizationOptions(undefined)).toEqual({ languageCode: false, rightToLeft: false });
  });
});
