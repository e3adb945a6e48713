import type { LocalizationOptions } from '../types.js';

/**
 * Which localized variants to export in addition to the base symbols
 */
export type LocalizationFlag = 'both' | 'languageCode' | 'rightToLeft';

export const LOCALIZATION_FLAGS: readonly LocalizationFlag[] = [
  'both',
  'languageCode',
  'rightToLeft',
];

/**
 * @example
 * toLocalizationOptions('both')    // => { languageCode: true, rightToLeft: true }
 * toLocalizationOptions(undefined) // => { languageCode: false, rightToLeft: false }
 */
export function toLocalizationOptions(flag: LocalizationFlag | undefined): LocalizationOptions {
  return {
    languageCode: flag === 'both' || flag === 'languageCode',
    rightToLeft: flag === 'both' || flag === 'rightToLeft',
  };
}
