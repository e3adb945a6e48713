/**
 * IR Builders - small factories for the declaration/expression tree
 *
 * Plain object literals work everywhere; these exist so generation code
 * reads like the Swift it produces.
 */

import type {
  AvailabilityDescriptor,
  CallArgument,
  CallExpression,
  ClosureExpression,
  CodeBlock,
  Comment,
  Declaration,
  Expression,
  Literal,
  PlatformVersion,
  ReleaseVersions,
  TypeRef,
} from '../types.js';

// ----------------------------------------------------------------------------
// Comments
// ----------------------------------------------------------------------------

export const inlineComment = (text: string): Comment => ({ kind: 'inline', text });

export const docComment = (text: string): Comment => ({ kind: 'doc', text });

export const markComment = (text: string, sectionBreak = true): Comment => ({
  kind: 'mark',
  text,
  sectionBreak,
});

// ----------------------------------------------------------------------------
// Types
// ----------------------------------------------------------------------------

/**
 * @example
 * memberType('UIKit.UIImage') // => { kind: 'member', components: ['UIKit', 'UIImage'] }
 */
export function memberType(dottedName: string): TypeRef {
  return { kind: 'member', components: dottedName.split('.') };
}

export const optionalType = (wrapped: TypeRef): TypeRef => ({ kind: 'optional', wrapped });

export const arrayType = (element: TypeRef): TypeRef => ({ kind: 'array', element });

// ----------------------------------------------------------------------------
// Expressions
// ----------------------------------------------------------------------------

export const literal = (value: Literal): Expression => ({ kind: 'literal', literal: value });

export const stringLiteral = (value: string): Expression => literal({ kind: 'string', value });

export const nilLiteral = (): Expression => literal({ kind: 'nil' });

export const identifier = (name: string): Expression => ({ kind: 'identifierRef', name });

/**
 * `left.right`, or the implicit-member form `.right` when `left` is omitted
 */
export function dot(right: string, left?: Expression): Expression {
  return left ? { kind: 'memberAccess', left, right } : { kind: 'memberAccess', right };
}

export const arg = (label: string | undefined, expression: Expression): CallArgument =>
  label === undefined ? { expression } : { label, expression };

export function call(
  callee: Expression,
  args: CallArgument[] = [],
  trailingClosure?: ClosureExpression
): CallExpression {
  return trailingClosure
    ? { kind: 'call', callee, arguments: args, trailingClosure }
    : { kind: 'call', callee, arguments: args };
}

export const forceUnwrap = (expression: Expression): Expression => ({
  kind: 'forceUnwrap',
  expression,
});

export const assign = (left: Expression, right: Expression): Expression => ({
  kind: 'assignment',
  left,
  right,
});

// ----------------------------------------------------------------------------
// Code blocks
// ----------------------------------------------------------------------------

export const expressionBlock = (expression: Expression, comment?: Comment): CodeBlock =>
  comment
    ? { comment, item: { kind: 'expression', expression } }
    : { item: { kind: 'expression', expression } };

export const declarationBlock = (declaration: Declaration, comment?: Comment): CodeBlock =>
  comment
    ? { comment, item: { kind: 'declaration', declaration } }
    : { item: { kind: 'declaration', declaration } };

// ----------------------------------------------------------------------------
// Declarations
// ----------------------------------------------------------------------------

export const commented = (comment: Comment, declaration: Declaration): Declaration => ({
  kind: 'commentable',
  comment,
  declaration,
});

export const attributed = (
  attribute: AvailabilityDescriptor,
  declaration: Declaration
): Declaration => ({ kind: 'withAttribute', attribute, declaration });

/**
 * Wrap declarations in successive attributes; the first attribute renders first
 */
export function withAttributes(
  attributes: AvailabilityDescriptor[],
  declaration: Declaration
): Declaration {
  return attributes.reduceRight<Declaration>(
    (inner, attribute) => attributed(attribute, inner),
    declaration
  );
}

// ----------------------------------------------------------------------------
// Availability
// ----------------------------------------------------------------------------

/**
 * Canonical platform list for a release; Mac Catalyst follows iOS
 */
export function platformVersionsOf(release: ReleaseVersions): PlatformVersion[] {
  return [
    { platform: 'iOS', version: release.iOS },
    { platform: 'macOS', version: release.macOS },
    { platform: 'macCatalyst', version: release.iOS },
    { platform: 'tvOS', version: release.tvOS },
    { platform: 'visionOS', version: release.visionOS },
    { platform: 'watchOS', version: release.watchOS },
  ];
}

export const availableOn = (platforms: PlatformVersion[]): AvailabilityDescriptor => ({
  kind: 'platformVersions',
  platforms,
});
