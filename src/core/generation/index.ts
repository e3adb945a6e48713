/**
 * Generation Layer - symbol catalog entries to a file description
 */

export {
  buildAccessor,
  buildImageAccessor,
  buildResourceAccessor,
  imageConstruction,
  resourceConstruction,
  semanticAliasEntry,
  symbolEntry,
  RESOURCE_TYPE_NAME,
} from './accessor-builder.js';
export type { AccessorEntry } from './accessor-builder.js';

export { buildSupportType } from './support-type.js';

export {
  buildImageExtensions,
  frameworkImport,
  orderedFrameworks,
  IMAGE_FRAMEWORK_SUPPORT,
} from './image-extensions.js';
export type { ImageFrameworkSupport } from './image-extensions.js';

export { buildSymbolFile, fileAccessModifier, FILE_HEADER } from './file-builder.js';
export type { FileBuildOptions } from './file-builder.js';

export {
  filterSymbolNames,
  hasLanguageCodeSuffix,
  hasRightToLeftSuffix,
  sortSymbolNames,
} from './symbol-filter.js';

export { toLocalizationOptions, LOCALIZATION_FLAGS } from './localization.js';
export type { LocalizationFlag } from './localization.js';
