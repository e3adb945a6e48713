import {
  assign,
  commented,
  docComment,
  dot,
  expressionBlock,
  identifier,
  memberType,
} from '../ir/builders.js';
import type { AccessModifier, Declaration } from '../types.js';
import { RESOURCE_TYPE_NAME } from './accessor-builder.js';

/**
 * The `SFSymbolResource` value type every accessor returns
 */
export function buildSupportType(accessModifier: AccessModifier): Declaration {
  const storedName: Declaration = commented(docComment('A SF Symbol system name.'), {
    kind: 'variable',
    accessModifier: 'fileprivate',
    isStatic: false,
    binding: 'let',
    name: 'systemName',
    type: memberType('String'),
  });

  const initializer: Declaration = commented(
    docComment(`Initialize a \`${RESOURCE_TYPE_NAME}\` with \`systemName\`.`),
    {
      kind: 'function',
      accessModifier,
      functionKind: { kind: 'initializer', isFailable: false, isConvenience: false },
      parameters: [{ label: 'systemName', name: 'name', type: memberType('String') }],
      keywords: [],
      body: [expressionBlock(assign(dot('systemName', identifier('self')), identifier('name')))],
    }
  );

  return commented(docComment('A SF Symbol resource.'), {
    kind: 'structType',
    accessModifier,
    name: RESOURCE_TYPE_NAME,
    conformances: ['Hashable', 'Sendable'],
    members: [storedName, initializer],
  });
}
