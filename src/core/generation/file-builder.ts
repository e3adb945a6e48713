/**
 * File Builder - assemble the complete source file description
 */

import { declarationBlock, inlineComment, markComment } from '../ir/builders.js';
import type { DeclarationMutator } from '../mutators/index.js';
import type { AccessModifier, CodeBlock, FileDescription, ImageFramework } from '../types.js';
import { buildResourceAccessor, RESOURCE_TYPE_NAME, type AccessorEntry } from './accessor-builder.js';
import { buildImageExtensions, frameworkImport, orderedFrameworks } from './image-extensions.js';
import { buildSupportType } from './support-type.js';

export const FILE_HEADER =
  'This file was generated by sfsymbols-codegen.\nDo not edit it by hand: regenerate it instead.';

export interface FileBuildOptions {
  accessModifier: AccessModifier;
  enabledExtensions: readonly ImageFramework[];
}

/**
 * Modifier for every generated declaration. Members are read across types in
 * the same file, so `private` widens to `fileprivate`.
 */
export function fileAccessModifier(modifier: AccessModifier): AccessModifier {
  return modifier === 'private' ? 'fileprivate' : modifier;
}

export function buildSymbolFile(
  entries: readonly AccessorEntry[],
  options: FileBuildOptions,
  mutators: readonly DeclarationMutator[]
): FileDescription {
  const frameworks = orderedFrameworks(options.enabledExtensions);
  const accessModifier = fileAccessModifier(options.accessModifier);

  const codeBlocks: CodeBlock[] = [
    declarationBlock(buildSupportType(accessModifier), markComment('Support Type')),
    declarationBlock(
      {
        kind: 'typeExtension',
        onType: RESOURCE_TYPE_NAME,
        conformances: [],
        declarations: entries.map(entry =>
          buildResourceAccessor(entry, accessModifier, mutators)
        ),
      },
      markComment('Symbols')
    ),
    ...frameworks.map(framework =>
      declarationBlock(
        buildImageExtensions(framework, entries, accessModifier, mutators),
        markComment(`${framework} Support`)
      )
    ),
  ];

  return {
    topComment: inlineComment(FILE_HEADER),
    imports: [{ moduleName: 'Foundation' }, ...frameworks.map(frameworkImport)],
    codeBlocks,
  };
}
