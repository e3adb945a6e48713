import { docComment } from '../ir/builders.js';
import type { Declaration, SymbolCatalog } from '../types.js';
import { ownEntry } from '../utils/records.js';
import type { DeclarationMutator } from './types.js';

/**
 * Append an `- Important:` callout to a doc comment body, one blank line
 * below the existing text
 */
export function appendImportantCallout(body: string, prose: string): string {
  const separator = body.endsWith('\n') ? '\n' : '\n\n';
  return `${body}${separator}- Important: ${prose}`;
}

/**
 * Documents usage restrictions on the symbol's doc comment
 */
export class RestrictionMutator implements DeclarationMutator {
  constructor(private readonly catalog: SymbolCatalog) {}

  mutate(declaration: Declaration, symbolName: string): Declaration {
    const prose = ownEntry(this.catalog.restrictions, symbolName);
    if (prose === undefined) return declaration;

    if (declaration.kind === 'commentable' && declaration.comment?.kind === 'doc') {
      return {
        ...declaration,
        comment: docComment(appendImportantCallout(declaration.comment.text, prose)),
      };
    }
    return {
      kind: 'commentable',
      comment: docComment(`- Important: ${prose}`),
      declaration,
    };
  }
}
