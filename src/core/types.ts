/**
 * Core types for the symbol catalog → Swift source generation pipeline
 *
 * The declaration/expression trees below are the only channel between the
 * generation layer and the renderer: generation builds them, rendering
 * serializes them.
 */

// ============================================================================
// 1. Comments
// ============================================================================

/**
 * Comment attached to a declaration or a code block
 */
export type Comment =
  | { kind: 'inline'; text: string }
  | { kind: 'doc'; text: string }
  | { kind: 'mark'; text: string; sectionBreak: boolean };

// ============================================================================
// 2. Type references and modifiers
// ============================================================================

export type AccessModifier = 'public' | 'package' | 'internal' | 'fileprivate' | 'private';

export const ACCESS_MODIFIERS: readonly AccessModifier[] = [
  'public',
  'package',
  'internal',
  'fileprivate',
  'private',
];

/**
 * Reference to an existing type, e.g. `UIKit.UIImage`, `[String]`, `String?`
 */
export type TypeRef =
  | { kind: 'member'; components: string[] }
  | { kind: 'optional'; wrapped: TypeRef }
  | { kind: 'array'; element: TypeRef }
  | { kind: 'dictionaryValue'; value: TypeRef }
  | { kind: 'generic'; wrapper: TypeRef; wrapped: TypeRef }
  | { kind: 'any'; wrapped: TypeRef };

// ============================================================================
// 3. Attributes
// ============================================================================

/**
 * Platforms in the order they are always rendered
 */
export type PlatformName = 'iOS' | 'macOS' | 'macCatalyst' | 'tvOS' | 'visionOS' | 'watchOS';

export const PLATFORM_ORDER: readonly PlatformName[] = [
  'iOS',
  'macOS',
  'macCatalyst',
  'tvOS',
  'visionOS',
  'watchOS',
];

export interface PlatformVersion {
  platform: PlatformName;
  version: string;
}

/**
 * Payload of an `@available(...)` attribute
 */
export type AvailabilityDescriptor =
  | { kind: 'platformVersions'; platforms: PlatformVersion[] }
  | { kind: 'deprecated'; message?: string; renamed?: string }
  | { kind: 'unavailable'; platform: PlatformName };

// ============================================================================
// 4. Expressions
// ============================================================================

export type Literal =
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number; precision: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'nil' }
  | { kind: 'array'; items: Expression[] };

export interface CallArgument {
  label?: string;
  expression: Expression;
}

export type KeywordKind = 'return' | 'try' | 'try?' | 'await' | 'throw' | 'yield';

export type BindingKind = 'let' | 'var';

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '+='
  | '=='
  | '!='
  | '<'
  | '>'
  | '&&'
  | '||'
  | '??'
  | '...'
  | '..<';

export type SwitchCaseKind =
  | { kind: 'case'; expression: Expression; associatedValueNames: string[] }
  | { kind: 'multiCase'; expressions: Expression[] }
  | { kind: 'default' };

export interface SwitchCase {
  caseKind: SwitchCaseKind;
  body: CodeBlock[];
}

export interface ConditionalBranch {
  condition: Expression;
  body: CodeBlock[];
}

export interface ClosureExpression {
  kind: 'closure';
  argumentNames: string[];
  body?: CodeBlock[];
}

export interface CallExpression {
  kind: 'call';
  callee: Expression;
  arguments: CallArgument[];
  trailingClosure?: ClosureExpression;
}

export type Expression =
  | { kind: 'literal'; literal: Literal }
  | { kind: 'identifierRef'; name: string }
  | { kind: 'typeRef'; type: TypeRef }
  | { kind: 'memberAccess'; left?: Expression; right: string }
  | CallExpression
  | { kind: 'assignment'; left: Expression; right: Expression }
  | { kind: 'switchExpr'; subject: Expression; cases: SwitchCase[] }
  | { kind: 'ifExpr'; branches: ConditionalBranch[]; elseBody?: CodeBlock[] }
  | { kind: 'doBlock'; body: CodeBlock[]; catchBody?: CodeBlock[] }
  | { kind: 'valueBinding'; binding: BindingKind; value: CallExpression }
  | { kind: 'unaryKeyword'; keyword: KeywordKind; expression?: Expression }
  | ClosureExpression
  | { kind: 'binaryOp'; operator: BinaryOperator; left: Expression; right: Expression }
  | { kind: 'addressOf'; expression: Expression }
  | { kind: 'optionalChain'; expression: Expression }
  | { kind: 'forceUnwrap'; expression: Expression }
  | { kind: 'tuple'; members: Expression[] };

// ============================================================================
// 5. Declarations
// ============================================================================

export interface VariableDeclaration {
  kind: 'variable';
  accessModifier?: AccessModifier;
  isStatic: boolean;
  binding: BindingKind;
  name: string;
  type?: TypeRef;
  initializer?: Expression;
  getter?: CodeBlock[];
  getterEffects?: FunctionKeyword[];
  setter?: CodeBlock[];
}

export type FunctionKeyword = 'async' | 'throws';

export type FunctionKind =
  | { kind: 'initializer'; isFailable: boolean; isConvenience: boolean }
  | { kind: 'function'; name: string; isStatic: boolean };

export interface Parameter {
  /** External label; `undefined` renders `_` */
  label?: string;
  /** Internal name, omitted when equal to the label */
  name?: string;
  type: TypeRef;
  defaultValue?: Expression;
}

export interface FunctionDeclaration {
  kind: 'function';
  accessModifier?: AccessModifier;
  functionKind: FunctionKind;
  parameters: Parameter[];
  keywords: FunctionKeyword[];
  returnType?: TypeRef;
  /** `undefined` renders a bodyless requirement, as in a protocol */
  body?: CodeBlock[];
}

export type EnumCaseValue =
  | { kind: 'nameOnly' }
  | { kind: 'rawValue'; value: Literal }
  | { kind: 'associatedValues'; values: Array<{ label?: string; type: TypeRef }> };

export type Declaration =
  | { kind: 'commentable'; comment?: Comment; declaration: Declaration }
  | { kind: 'withAttribute'; attribute: AvailabilityDescriptor; declaration: Declaration }
  | VariableDeclaration
  | {
      kind: 'typeExtension';
      accessModifier?: AccessModifier;
      onType: string;
      conformances: string[];
      whereClause?: string[];
      declarations: Declaration[];
    }
  | {
      kind: 'structType';
      accessModifier?: AccessModifier;
      name: string;
      conformances: string[];
      members: Declaration[];
    }
  | {
      kind: 'protocolType';
      accessModifier?: AccessModifier;
      name: string;
      conformances: string[];
      members: Declaration[];
    }
  | {
      kind: 'enumType';
      accessModifier?: AccessModifier;
      isFrozen: boolean;
      isIndirect: boolean;
      name: string;
      conformances: string[];
      members: Declaration[];
    }
  | { kind: 'typeAlias'; accessModifier?: AccessModifier; name: string; existingType: TypeRef }
  | FunctionDeclaration
  | { kind: 'enumCase'; name: string; value: EnumCaseValue }
  | { kind: 'conditionalCompilation'; condition: string; declarations: Declaration[] };

// ============================================================================
// 6. Code blocks and files
// ============================================================================

export type CodeBlockItem =
  | { kind: 'declaration'; declaration: Declaration }
  | { kind: 'expression'; expression: Expression };

export interface CodeBlock {
  comment?: Comment;
  item: CodeBlockItem;
}

export interface ImportDescription {
  moduleName: string;
  /** Compilation condition guarding the import, e.g. `canImport(UIKit)` */
  condition?: string;
}

export interface FileDescription {
  topComment?: Comment;
  imports: ImportDescription[];
  codeBlocks: CodeBlock[];
}

// ============================================================================
// 7. Catalog model
// ============================================================================

/**
 * Minimum OS versions shared by every symbol of one release
 */
export interface ReleaseVersions {
  iOS: string;
  macOS: string;
  tvOS: string;
  watchOS: string;
  visionOS: string;
}

/**
 * Symbol catalog plus its auxiliary name-keyed tables
 */
export interface SymbolCatalog {
  /** Symbol name → availability key */
  symbols: Readonly<Record<string, string>>;
  /** Availability key → release versions */
  releases: Readonly<Record<string, ReleaseVersions>>;
  /** Deprecated name → current name */
  aliases: Readonly<Record<string, string>>;
  /** Outline name → fill variant (carried, not consumed) */
  fillVariants: Readonly<Record<string, string>>;
  /** Semantic name → descriptive symbol name */
  semanticNames: Readonly<Record<string, string>>;
  /** Symbol name → usage restriction prose */
  restrictions: Readonly<Record<string, string>>;
}

// ============================================================================
// 8. Generation options
// ============================================================================

export type ImageFramework = 'SwiftUI' | 'UIKit' | 'AppKit';

export const IMAGE_FRAMEWORKS: readonly ImageFramework[] = ['SwiftUI', 'UIKit', 'AppKit'];

export interface LocalizationOptions {
  languageCode: boolean;
  rightToLeft: boolean;
}

export type MissingAvailabilityPolicy = 'fail' | 'skip';

export interface GenerateOptions {
  accessModifier: AccessModifier;
  enabledExtensions: ImageFramework[];
  exportSemanticSymbols: boolean;
  localization: LocalizationOptions;
  onMissingAvailability: MissingAvailabilityPolicy;
}

/**
 * Non-fatal problem found while generating
 */
export interface GenerationDiagnostic {
  symbolName: string;
  message: string;
}

export interface GenerationResult {
  source: string;
  /** Symbols emitted, in output order */
  symbolNames: string[];
  /** Semantic aliases emitted, in output order */
  aliasNames: string[];
  diagnostics: GenerationDiagnostic[];
}
