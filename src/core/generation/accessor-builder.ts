/**
 * Accessor Builder - one static property per symbol, for the resource type
 * and for each image type that mirrors it
 */

import {
  arg,
  call,
  commented,
  docComment,
  dot,
  expressionBlock,
  identifier,
  memberType,
  stringLiteral,
} from '../ir/builders.js';
import { applyMutators, type DeclarationMutator } from '../mutators/index.js';
import type { AccessModifier, Declaration, Expression, TypeRef } from '../types.js';

export const RESOURCE_TYPE_NAME = 'SFSymbolResource';

/**
 * One accessor to emit, independent of the type it is declared on
 */
export interface AccessorEntry {
  /** Swift identifier of the property */
  identifier: string;
  /** Name passed to the system API */
  systemName: string;
  /** Name whose availability, deprecation and restriction apply */
  metadataName: string;
  /** First line of the doc comment */
  summary: string;
}

export function symbolEntry(symbolName: string, identifierName: string): AccessorEntry {
  return {
    identifier: identifierName,
    systemName: symbolName,
    metadataName: symbolName,
    summary: `The "${symbolName}" SF Symbol.`,
  };
}

/**
 * Entry for a semantic name that resolves to a descriptive symbol
 */
export function semanticAliasEntry(
  semanticName: string,
  descriptiveName: string,
  identifierName: string
): AccessorEntry {
  return {
    identifier: identifierName,
    systemName: descriptiveName,
    metadataName: descriptiveName,
    summary: `The "${semanticName}" SF Symbol, a semantic name for "${descriptiveName}".`,
  };
}

/**
 * `static var <identifier>: <type> { <body> }` under the entry's doc comment,
 * before mutation. The doc comment ends with one empty line.
 */
export function buildAccessor(
  entry: AccessorEntry,
  type: TypeRef,
  body: Expression,
  accessModifier: AccessModifier
): Declaration {
  return commented(docComment(`${entry.summary}\n`), {
    kind: 'variable',
    accessModifier,
    isStatic: true,
    binding: 'var',
    name: entry.identifier,
    type,
    getter: [expressionBlock(body)],
  });
}

/**
 * `SFSymbolResource(systemName: "<name>")`
 */
export function resourceConstruction(entry: AccessorEntry): Expression {
  return call(identifier(RESOURCE_TYPE_NAME), [arg('systemName', stringLiteral(entry.systemName))]);
}

/**
 * `<ImageType>(systemSymbolResource: .<identifier>)`
 */
export function imageConstruction(imageType: TypeRef, entry: AccessorEntry): Expression {
  return call({ kind: 'typeRef', type: imageType }, [
    arg('systemSymbolResource', dot(entry.identifier)),
  ]);
}

/**
 * Resource accessor with every mutator applied
 */
export function buildResourceAccessor(
  entry: AccessorEntry,
  accessModifier: AccessModifier,
  mutators: readonly DeclarationMutator[]
): Declaration {
  const accessor = buildAccessor(
    entry,
    memberType(RESOURCE_TYPE_NAME),
    resourceConstruction(entry),
    accessModifier
  );
  return applyMutators(mutators, accessor, entry.metadataName);
}

/**
 * Image accessor mirroring a resource accessor, with every mutator applied
 */
export function buildImageAccessor(
  entry: AccessorEntry,
  imageType: TypeRef,
  accessModifier: AccessModifier,
  mutators: readonly DeclarationMutator[]
): Declaration {
  const accessor = buildAccessor(entry, imageType, imageConstruction(imageType, entry), accessModifier);
  return applyMutators(mutators, accessor, entry.metadataName);
}
