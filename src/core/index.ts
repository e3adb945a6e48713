/**
 * Core module - entry point
 * Turns a symbol catalog into Swift source text
 */

// Main pipeline
export { generateSymbolSource, stages, DEFAULT_GENERATE_OPTIONS } from './pipeline.js';
export type { SemanticAlias } from './pipeline.js';

// Types
export type {
  // IR
  Comment,
  AccessModifier,
  TypeRef,
  PlatformName,
  PlatformVersion,
  AvailabilityDescriptor,
  Literal,
  Expression,
  CallExpression,
  ClosureExpression,
  Declaration,
  VariableDeclaration,
  FunctionDeclaration,
  CodeBlock,
  ImportDescription,
  FileDescription,

  // Catalog
  ReleaseVersions,
  SymbolCatalog,

  // Options and results
  ImageFramework,
  LocalizationOptions,
  MissingAvailabilityPolicy,
  GenerateOptions,
  GenerationDiagnostic,
  GenerationResult,
} from './types.js';
export { ACCESS_MODIFIERS, IMAGE_FRAMEWORKS, PLATFORM_ORDER } from './types.js';

// Errors
export { GenerationError, isGenerationError } from './errors.js';
export type { GenerationErrorCode } from './errors.js';

// Availability
export { lookupAvailability } from './availability.js';
export type { AvailabilityLookup } from './availability.js';

// Naming
export { deriveIdentifier, tokenizeSymbolName, toCamelCase } from './naming/identifier.js';
export { isReservedWord, escapeIdentifier } from './naming/reserved-words.js';

// Mutators
export {
  createDefaultMutators,
  applyMutators,
  attachAttribute,
  AvailabilityMutator,
  DeprecationMutator,
  RestrictionMutator,
  DEPRECATION_MESSAGE,
} from './mutators/index.js';
export type { DeclarationMutator } from './mutators/index.js';

// Rendering
export {
  TextRenderer,
  renderFile,
  renderDeclarationToString,
  renderExpressionToString,
  renderStringLiteral,
} from './rendering/text-renderer.js';
export { CodeWriter } from './rendering/code-writer.js';

// Generation
export {
  buildSymbolFile,
  filterSymbolNames,
  sortSymbolNames,
  toLocalizationOptions,
  LOCALIZATION_FLAGS,
} from './generation/index.js';
export type { AccessorEntry, LocalizationFlag } from './generation/index.js';
