import { describe, it, expect } from 'vitest';
import {
  TextRenderer,
  renderAvailabilityArguments,
  renderDeclarationToString,
  renderExpressionToString,
  renderFile,
  renderStringLiteral,
  renderTypeRef,
} from '../../../src/core/rendering/text-renderer.js';
import {
  arg,
  call,
  commented,
  declarationBlock,
  docComment,
  dot,
  expressionBlock,
  identifier,
  inlineComment,
  literal,
  markComment,
  memberType,
  optionalType,
  arrayType,
  stringLiteral,
} from '../../../src/core/ir/builders.js';
import type { Declaration, Expression } from '../../../src/core/types.js';

const int = (value: number): Expression => literal({ kind: 'int', value });

describe('text renderer', () => {
  describe('renderStringLiteral', () => {
    it('should use the plain form for ordinary text', () => {
      expect(renderStringLiteral('arrow.left')).toBe('"arrow.left"');
    });

    it('should use the raw form for quotes and backslashes', () => {
      expect(renderStringLiteral('say "hi"')).toBe('#"say "hi""#');
      expect(renderStringLiteral('a\\b')).toBe('#"a\\b"#');
    });

    it('should keep the content unchanged inside the delimiters', () => {
      for (const value of ['mixed "quote" and \\ slash', 'a"#b', 'x\\##y "##"', 'end"']) {
        expect(readRawLiteral(renderStringLiteral(value))).toBe(value);
      }
    });

    it('should lengthen the delimiter past hash runs in the content', () => {
      expect(renderStringLiteral('a"#b')).toBe('##"a"#b"##');
      expect(renderStringLiteral('a\\##b')).toBe('###"a\\##b"###');
    });
  });

  describe('renderTypeRef', () => {
    it('should render nested type references', () => {
      expect(renderTypeRef(memberType('UIKit.UIImage'))).toBe('UIKit.UIImage');
      expect(renderTypeRef(optionalType(arrayType(memberType('String'))))).toBe('[String]?');
      expect(renderTypeRef({ kind: 'dictionaryValue', value: memberType('Int') })).toBe(
        '[String: Int]'
      );
      expect(
        renderTypeRef({ kind: 'generic', wrapper: memberType('Set'), wrapped: memberType('Int') })
      ).toBe('Set<Int>');
      expect(renderTypeRef({ kind: 'any', wrapped: memberType('Error') })).toBe('any Error');
    });
  });

  describe('renderAvailabilityArguments', () => {
    it('should end platform lists with a wildcard', () => {
      expect(
        renderAvailabilityArguments({
          kind: 'platformVersions',
          platforms: [
            { platform: 'iOS', version: '13.0' },
            { platform: 'tvOS', version: '13.0' },
          ],
        })
      ).toBe('iOS 13.0, tvOS 13.0, *');
    });

    it('should include only the deprecation segments that are present', () => {
      expect(renderAvailabilityArguments({ kind: 'deprecated' })).toBe('*, deprecated');
      expect(renderAvailabilityArguments({ kind: 'deprecated', message: 'old' })).toBe(
        '*, deprecated, message: "old"'
      );
      expect(
        renderAvailabilityArguments({ kind: 'deprecated', message: 'old', renamed: 'newName' })
      ).toBe('*, deprecated, message: "old", renamed: "newName"');
    });

    it('should render unavailability', () => {
      expect(renderAvailabilityArguments({ kind: 'unavailable', platform: 'watchOS' })).toBe(
        'watchOS, unavailable'
      );
    });
  });

  describe('comments', () => {
    it('should prefix every line and leave empty lines bare', () => {
      const decl = commented(docComment('Line one\n\nLine three'), {
        kind: 'typeAlias',
        name: 'Name',
        existingType: memberType('String'),
      });

      expect(renderDeclarationToString(decl)).toBe(
        '/// Line one\n///\n/// Line three\ntypealias Name = String'
      );
    });

    it('should render mark comments with and without a section break', () => {
      const renderer = new TextRenderer();
      renderer.renderComment(markComment('Symbols'));
      renderer.renderComment(markComment('Helpers', false));
      renderer.renderComment(inlineComment('note'));

      expect(renderer.rendered()).toBe('// MARK: - Symbols\n// MARK: Helpers\n// note');
    });
  });

  describe('declarations', () => {
    it('should render a static computed property', () => {
      const decl: Declaration = {
        kind: 'variable',
        accessModifier: 'internal',
        isStatic: true,
        binding: 'var',
        name: 'messageCircle',
        type: memberType('SFSymbolResource'),
        getter: [
          expressionBlock(
            call(identifier('SFSymbolResource'), [arg('systemName', stringLiteral('message.circle'))])
          ),
        ],
      };

      expect(renderDeclarationToString(decl)).toBe(
        [
          'internal static var messageCircle: SFSymbolResource {',
          '    SFSymbolResource(systemName: "message.circle")',
          '}',
        ].join('\n')
      );
    });

    it('should render explicit accessors when there is a setter', () => {
      const decl: Declaration = {
        kind: 'variable',
        isStatic: false,
        binding: 'var',
        name: 'count',
        type: memberType('Int'),
        getter: [expressionBlock(identifier('storage'))],
        setter: [
          expressionBlock({
            kind: 'assignment',
            left: identifier('storage'),
            right: identifier('newValue'),
          }),
        ],
      };

      expect(renderDeclarationToString(decl)).toBe(
        [
          'var count: Int {',
          '    get {',
          '        storage',
          '    }',
          '    set {',
          '        storage = newValue',
          '    }',
          '}',
        ].join('\n')
      );
    });

    it('should render a struct with members separated by an empty line', () => {
      const decl: Declaration = {
        kind: 'structType',
        accessModifier: 'public',
        name: 'Point',
        conformances: ['Hashable', 'Sendable'],
        members: [
          { kind: 'variable', isStatic: false, binding: 'let', name: 'x', type: memberType('Int') },
          {
            kind: 'variable',
            isStatic: false,
            binding: 'let',
            name: 'y',
            type: memberType('Int'),
            initializer: int(0),
          },
        ],
      };

      expect(renderDeclarationToString(decl)).toBe(
        'public struct Point: Hashable, Sendable {\n    let x: Int\n\n    let y: Int = 0\n}'
      );
    });

    it('should render empty bodies as braces on one line', () => {
      expect(
        renderDeclarationToString({
          kind: 'protocolType',
          name: 'Marker',
          conformances: [],
          members: [],
        })
      ).toBe('protocol Marker {}');
    });

    it('should keep consecutive enum cases together', () => {
      const decl: Declaration = {
        kind: 'enumType',
        accessModifier: 'public',
        isFrozen: true,
        isIndirect: true,
        name: 'Tree',
        conformances: ['Equatable'],
        members: [
          { kind: 'enumCase', name: 'leaf', value: { kind: 'nameOnly' } },
          {
            kind: 'enumCase',
            name: 'node',
            value: {
              kind: 'associatedValues',
              values: [{ label: 'left', type: memberType('Tree') }, { type: memberType('Tree') }],
            },
          },
        ],
      };

      expect(renderDeclarationToString(decl)).toBe(
        '@frozen public indirect enum Tree: Equatable {\n    case leaf\n    case node(left: Tree, Tree)\n}'
      );
    });

    it('should not mark internal enums frozen', () => {
      const decl: Declaration = {
        kind: 'enumType',
        isFrozen: true,
        isIndirect: false,
        name: 'Size',
        conformances: ['String'],
        members: [
          { kind: 'enumCase', name: 'small', value: { kind: 'rawValue', value: { kind: 'string', value: 's' } } },
        ],
      };

      expect(renderDeclarationToString(decl)).toBe('enum Size: String {\n    case small = "s"\n}');
    });

    it('should render functions with effects and a return type', () => {
      const decl: Declaration = {
        kind: 'function',
        accessModifier: 'public',
        functionKind: { kind: 'function', name: 'load', isStatic: true },
        parameters: [{ label: 'from', name: 'url', type: memberType('URL') }],
        keywords: ['async', 'throws'],
        returnType: memberType('Data'),
        body: [
          expressionBlock({ kind: 'unaryKeyword', keyword: 'return', expression: identifier('data') }),
        ],
      };

      expect(renderDeclarationToString(decl)).toBe(
        'public static func load(from url: URL) async throws -> Data {\n    return data\n}'
      );
    });

    it('should render unlabeled and defaulted parameters one per line', () => {
      const decl: Declaration = {
        kind: 'function',
        functionKind: { kind: 'initializer', isFailable: true, isConvenience: false },
        parameters: [
          { name: 'value', type: memberType('String') },
          { label: 'count', type: memberType('Int'), defaultValue: int(1) },
        ],
        keywords: [],
        body: [],
      };

      expect(renderDeclarationToString(decl)).toBe(
        'init?(\n    _ value: String,\n    count: Int = 1\n) {}'
      );
    });

    it('should render bodyless requirements', () => {
      const decl: Declaration = {
        kind: 'function',
        functionKind: { kind: 'function', name: 'reset', isStatic: false },
        parameters: [],
        keywords: [],
      };

      expect(renderDeclarationToString(decl)).toBe('func reset()');
    });

    it('should render attributes in order above the declaration', () => {
      const decl: Declaration = {
        kind: 'withAttribute',
        attribute: { kind: 'platformVersions', platforms: [{ platform: 'macOS', version: '11.0' }] },
        declaration: {
          kind: 'typeExtension',
          onType: 'AppKit.NSImage',
          conformances: [],
          whereClause: [],
          declarations: [],
        },
      };

      expect(renderDeclarationToString(decl)).toBe(
        '@available(macOS 11.0, *)\nextension AppKit.NSImage {}'
      );
    });

    it('should render conditional compilation at the container depth', () => {
      const decl: Declaration = {
        kind: 'conditionalCompilation',
        condition: 'canImport(AppKit)',
        declarations: [
          { kind: 'typeAlias', name: 'A', existingType: memberType('String') },
          { kind: 'typeAlias', accessModifier: 'public', name: 'B', existingType: memberType('Int') },
        ],
      };

      expect(renderDeclarationToString(decl)).toBe(
        '#if canImport(AppKit)\ntypealias A = String\n\npublic typealias B = Int\n#endif'
      );
    });

    it('should render extensions with conformances and where clauses', () => {
      expect(
        renderDeclarationToString({
          kind: 'typeExtension',
          onType: 'Array',
          conformances: ['Resource'],
          whereClause: ['Element: Resource'],
          declarations: [],
        })
      ).toBe('extension Array: Resource where Element: Resource {}');
    });
  });

  describe('expressions', () => {
    it('should put each argument on its own line when there are several', () => {
      const expr = call(identifier('f'), [arg('a', int(1)), arg(undefined, stringLiteral('x'))]);

      expect(renderExpressionToString(expr)).toBe('f(\n    a: 1,\n    "x"\n)');
    });

    it('should keep a single argument on the call line', () => {
      const expr = call(dot('init', identifier('self')), [arg('systemName', dot('systemName', identifier('resource')))]);

      expect(renderExpressionToString({ kind: 'forceUnwrap', expression: expr })).toBe(
        'self.init(systemName: resource.systemName)!'
      );
    });

    it('should render implicit member access', () => {
      expect(
        renderExpressionToString(call(memberTypeExpr('UIKit.UIImage'), [arg('systemSymbolResource', dot('messageCircle'))]))
      ).toBe('UIKit.UIImage(systemSymbolResource: .messageCircle)');
    });

    it('should render a trailing closure', () => {
      const expr = call(identifier('run'), [], {
        kind: 'closure',
        argumentNames: ['x'],
        body: [expressionBlock(identifier('x'))],
      });

      expect(renderExpressionToString(expr)).toBe('run() { x in\n    x\n}');
    });

    it('should render array literals one element per line', () => {
      expect(
        renderExpressionToString(literal({ kind: 'array', items: [stringLiteral('a'), int(1)] }))
      ).toBe('[\n    "a",\n    1\n]');
      expect(renderExpressionToString(literal({ kind: 'array', items: [] }))).toBe('[]');
    });

    it('should render scalar literals', () => {
      expect(renderExpressionToString(literal({ kind: 'float', value: 1.5, precision: 2 }))).toBe('1.50');
      expect(renderExpressionToString(literal({ kind: 'bool', value: false }))).toBe('false');
      expect(renderExpressionToString(literal({ kind: 'nil' }))).toBe('nil');
    });

    it('should render switch statements with cases at the switch depth', () => {
      const expr: Expression = {
        kind: 'switchExpr',
        subject: identifier('x'),
        cases: [
          {
            caseKind: { kind: 'case', expression: dot('a'), associatedValueNames: [] },
            body: [expressionBlock({ kind: 'unaryKeyword', keyword: 'return', expression: int(1) })],
          },
          {
            caseKind: { kind: 'case', expression: dot('b'), associatedValueNames: ['value'] },
            body: [expressionBlock({ kind: 'unaryKeyword', keyword: 'return', expression: identifier('value') })],
          },
          {
            caseKind: { kind: 'default' },
            body: [expressionBlock({ kind: 'unaryKeyword', keyword: 'return', expression: int(0) })],
          },
        ],
      };

      expect(renderExpressionToString(expr)).toBe(
        [
          'switch x {',
          'case .a:',
          '    return 1',
          'case let .b(value):',
          '    return value',
          'default:',
          '    return 0',
          '}',
        ].join('\n')
      );
    });

    it('should chain if, else if and else branches', () => {
      const expr: Expression = {
        kind: 'ifExpr',
        branches: [
          { condition: identifier('a'), body: [expressionBlock(identifier('x'))] },
          { condition: identifier('b'), body: [expressionBlock(identifier('y'))] },
        ],
        elseBody: [expressionBlock(identifier('z'))],
      };

      expect(renderExpressionToString(expr)).toBe(
        'if a {\n    x\n} else if b {\n    y\n} else {\n    z\n}'
      );
    });

    it('should render do/catch blocks', () => {
      const expr: Expression = {
        kind: 'doBlock',
        body: [
          expressionBlock({ kind: 'unaryKeyword', keyword: 'try', expression: call(identifier('run')) }),
        ],
        catchBody: [expressionBlock(call(identifier('print'), [arg(undefined, identifier('error'))]))],
      };

      expect(renderExpressionToString(expr)).toBe(
        'do {\n    try run()\n} catch {\n    print(error)\n}'
      );
    });

    it('should render operators, tuples and bindings inline', () => {
      expect(
        renderExpressionToString({
          kind: 'binaryOp',
          operator: '??',
          left: { kind: 'optionalChain', expression: identifier('a') },
          right: identifier('b'),
        })
      ).toBe('a? ?? b');
      expect(
        renderExpressionToString({ kind: 'tuple', members: [identifier('a'), int(2)] })
      ).toBe('(a, 2)');
      expect(
        renderExpressionToString({ kind: 'addressOf', expression: identifier('value') })
      ).toBe('&value');
      expect(
        renderExpressionToString({
          kind: 'valueBinding',
          binding: 'let',
          value: call(identifier('make')),
        })
      ).toBe('let make()');
    });
  });

  describe('renderFile', () => {
    it('should separate the header, imports and blocks with empty lines', () => {
      const source = renderFile({
        topComment: inlineComment('Header'),
        imports: [{ moduleName: 'Foundation' }, { moduleName: 'UIKit', condition: 'canImport(UIKit)' }],
        codeBlocks: [
          declarationBlock(
            { kind: 'typeAlias', name: 'Name', existingType: memberType('String') },
            markComment('Aliases')
          ),
        ],
      });

      expect(source).toBe(
        [
          '// Header',
          '',
          'import Foundation',
          '#if canImport(UIKit)',
          'import UIKit',
          '#endif',
          '',
          '// MARK: - Aliases',
          'typealias Name = String',
          '',
        ].join('\n')
      );
    });

    it('should leave the indent level at zero after rendering', () => {
      const renderer = new TextRenderer();
      renderer.renderDeclaration({
        kind: 'structType',
        name: 'Outer',
        conformances: [],
        members: [
          {
            kind: 'structType',
            name: 'Inner',
            conformances: [],
            members: [{ kind: 'variable', isStatic: true, binding: 'let', name: 'x', type: memberType('Int') }],
          },
        ],
      });

      expect(renderer.indentLevel).toBe(0);
      expect(renderer.rendered()).toBe(
        'struct Outer {\n    struct Inner {\n        static let x: Int\n    }\n}'
      );
    });

    const nestedShapes: Array<[string, Expression]> = [
      [
        'a switch',
        {
          kind: 'switchExpr',
          subject: identifier('value'),
          cases: [
            {
              caseKind: { kind: 'case', expression: dot('some'), associatedValueNames: ['x'] },
              body: [expressionBlock(identifier('x'))],
            },
            { caseKind: { kind: 'default' }, body: [expressionBlock(int(0))] },
          ],
        },
      ],
      [
        'a do/catch',
        {
          kind: 'doBlock',
          body: [
            expressionBlock({ kind: 'unaryKeyword', keyword: 'try', expression: call(identifier('load')) }),
          ],
          catchBody: [expressionBlock({ kind: 'unaryKeyword', keyword: 'return' })],
        },
      ],
      [
        'a closure',
        { kind: 'closure', argumentNames: ['item'], body: [expressionBlock(identifier('item'))] },
      ],
      ['a multi-argument call', call(identifier('make'), [arg('a', int(1)), arg('b', int(2))])],
      ['a non-empty array', literal({ kind: 'array', items: [int(1), int(2)] })],
      [
        'an if/else',
        {
          kind: 'ifExpr',
          branches: [{ condition: identifier('flag'), body: [expressionBlock(int(1))] }],
          elseBody: [expressionBlock(int(2))],
        },
      ],
    ];

    it.each(nestedShapes)('should leave the indent level at zero after %s', (_shape, expression) => {
      const renderer = new TextRenderer();
      renderer.renderExpression(expression);

      expect(renderer.indentLevel).toBe(0);
      expect(renderer.rendered().length).toBeGreaterThan(0);
    });
  });
});

/**
 * Read a raw string literal back: the content ends at the first quote
 * followed by the opening delimiter
 */
function readRawLiteral(rendered: string): string {
  const delimiter = /^#*/.exec(rendered)?.[0] ?? '';
  const start = delimiter.length + 1;
  return rendered.slice(start, rendered.indexOf(`"${delimiter}`, start));
}

function memberTypeExpr(dottedName: string): Expression {
  return { kind: 'typeRef', type: memberType(dottedName) };
}
