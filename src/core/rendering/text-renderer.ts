/**
 * Text Renderer - serialize the declaration/expression IR into Swift source
 *
 * Every render method writes through the shared CodeWriter instead of
 * returning strings, so a call's callee, arguments and trailing closure can
 * each be rendered by their own routine and still end up on one line.
 */

import type {
  AccessModifier,
  AvailabilityDescriptor,
  CallArgument,
  CallExpression,
  ClosureExpression,
  CodeBlock,
  Comment,
  Declaration,
  EnumCaseValue,
  Expression,
  FileDescription,
  FunctionDeclaration,
  FunctionKind,
  ImportDescription,
  Literal,
  Parameter,
  SwitchCase,
  TypeRef,
  VariableDeclaration,
} from '../types.js';
import { CodeWriter } from './code-writer.js';

/**
 * Pair each item with whether it is the last one
 */
function withLastMarker<T>(items: readonly T[]): Array<[T, boolean]> {
  return items.map((item, index): [T, boolean] => [item, index === items.length - 1]);
}

/**
 * Swift string literal for `value`: the raw form when it holds a quote or a
 * backslash, the plain form otherwise. The raw delimiter has one `#` more than
 * the longest `#` run after any quote or backslash in the content.
 *
 * @example
 * renderStringLiteral('arrow.left') // => '"arrow.left"'
 * renderStringLiteral('say "hi"')   // => '#"say "hi""#'
 * renderStringLiteral('a"#b')       // => '##"a"#b"##'
 */
export function renderStringLiteral(value: string): string {
  if (!value.includes('"') && !value.includes('\\')) {
    return `"${value}"`;
  }
  const longestRun = Math.max(
    0,
    ...Array.from(value.matchAll(/["\\](#+)/g), match => match[1]?.length ?? 0)
  );
  const delimiter = '#'.repeat(longestRun + 1);
  return `${delimiter}"${value}"${delimiter}`;
}

export function renderTypeRef(type: TypeRef): string {
  switch (type.kind) {
    case 'member':
      return type.components.join('.');
    case 'optional':
      return `${renderTypeRef(type.wrapped)}?`;
    case 'array':
      return `[${renderTypeRef(type.element)}]`;
    case 'dictionaryValue':
      return `[String: ${renderTypeRef(type.value)}]`;
    case 'generic':
      return `${renderTypeRef(type.wrapper)}<${renderTypeRef(type.wrapped)}>`;
    case 'any':
      return `any ${renderTypeRef(type.wrapped)}`;
  }
}

/**
 * Contents of an `@available(...)` attribute, without the attribute name
 */
export function renderAvailabilityArguments(attribute: AvailabilityDescriptor): string {
  switch (attribute.kind) {
    case 'platformVersions':
      return [...attribute.platforms.map(p => `${p.platform} ${p.version}`), '*'].join(', ');
    case 'deprecated': {
      const parts = ['*', 'deprecated'];
      if (attribute.message !== undefined) parts.push(`message: "${attribute.message}"`);
      if (attribute.renamed !== undefined) parts.push(`renamed: "${attribute.renamed}"`);
      return parts.join(', ');
    }
    case 'unavailable':
      return `${attribute.platform}, unavailable`;
  }
}

function commentPrefix(comment: Comment): string {
  switch (comment.kind) {
    case 'inline':
      return '//';
    case 'doc':
      return '///';
    case 'mark':
      return comment.sectionBreak ? '// MARK: -' : '// MARK:';
  }
}

export class TextRenderer {
  private readonly writer = new CodeWriter();

  /** Nesting level of the underlying writer; 0 between top-level renders */
  get indentLevel(): number {
    return this.writer.depth;
  }

  rendered(): string {
    return this.writer.rendered();
  }

  // --------------------------------------------------------------------------
  // File level
  // --------------------------------------------------------------------------

  renderFile(file: FileDescription): void {
    if (file.topComment) {
      this.renderComment(file.topComment);
      this.writer.write('');
    }
    if (file.imports.length > 0) {
      file.imports.forEach(description => this.renderImport(description));
      this.writer.write('');
    }
    for (const block of file.codeBlocks) {
      this.renderCodeBlock(block);
      this.writer.write('');
    }
  }

  renderImport(description: ImportDescription): void {
    if (description.condition) {
      this.writer.write(`#if ${description.condition}`);
    }
    this.writer.write(`import ${description.moduleName}`);
    if (description.condition) {
      this.writer.write('#endif');
    }
  }

  renderComment(comment: Comment): void {
    const prefix = commentPrefix(comment);
    for (const line of comment.text.split(/\r\n|\n|\r/)) {
      this.writer.write(line.length === 0 ? prefix : `${prefix} ${line}`);
    }
  }

  renderCodeBlock(block: CodeBlock): void {
    if (block.comment) this.renderComment(block.comment);
    if (block.item.kind === 'declaration') {
      this.renderDeclaration(block.item.declaration);
    } else {
      this.renderExpression(block.item.expression);
    }
  }

  renderCodeBlocks(blocks: readonly CodeBlock[]): void {
    blocks.forEach(block => this.renderCodeBlock(block));
  }

  // --------------------------------------------------------------------------
  // Declarations
  // --------------------------------------------------------------------------

  renderDeclaration(declaration: Declaration): void {
    switch (declaration.kind) {
      case 'commentable':
        if (declaration.comment) this.renderComment(declaration.comment);
        this.renderDeclaration(declaration.declaration);
        break;
      case 'withAttribute':
        this.writer.write(`@available(${renderAvailabilityArguments(declaration.attribute)})`);
        this.renderDeclaration(declaration.declaration);
        break;
      case 'variable':
        this.renderVariable(declaration);
        break;
      case 'typeExtension':
        this.writeAccessModifier(declaration.accessModifier);
        this.writer.write(`extension ${declaration.onType}`);
        this.writeConformances(declaration.conformances);
        if (declaration.whereClause && declaration.whereClause.length > 0) {
          this.writer.continueLine();
          this.writer.write(` where ${declaration.whereClause.join(', ')}`);
        }
        this.renderMemberBlock(declaration.declarations);
        break;
      case 'structType':
        this.writeAccessModifier(declaration.accessModifier);
        this.writer.write(`struct ${declaration.name}`);
        this.writeConformances(declaration.conformances);
        this.renderMemberBlock(declaration.members);
        break;
      case 'protocolType':
        this.writeAccessModifier(declaration.accessModifier);
        this.writer.write(`protocol ${declaration.name}`);
        this.writeConformances(declaration.conformances);
        this.renderMemberBlock(declaration.members);
        break;
      case 'enumType': {
        const modifier = declaration.accessModifier;
        if (declaration.isFrozen && (modifier === 'public' || modifier === 'package')) {
          this.writer.write('@frozen ');
          this.writer.continueLine();
        }
        this.writeAccessModifier(modifier);
        if (declaration.isIndirect) {
          this.writer.write('indirect ');
          this.writer.continueLine();
        }
        this.writer.write(`enum ${declaration.name}`);
        this.writeConformances(declaration.conformances);
        this.renderMemberBlock(declaration.members);
        break;
      }
      case 'typeAlias': {
        const words: string[] = declaration.accessModifier ? [declaration.accessModifier] : [];
        words.push('typealias', declaration.name, '=', renderTypeRef(declaration.existingType));
        this.writer.write(words.join(' '));
        break;
      }
      case 'function':
        this.renderFunction(declaration);
        break;
      case 'enumCase':
        this.writer.write(`case ${declaration.name}`);
        this.renderEnumCaseValue(declaration.value);
        break;
      case 'conditionalCompilation':
        this.writer.write(`#if ${declaration.condition}`);
        for (const [index, nested] of declaration.declarations.entries()) {
          if (index > 0) this.writer.write('');
          this.renderDeclaration(nested);
        }
        this.writer.write('#endif');
        break;
    }
  }

  private writeAccessModifier(modifier: AccessModifier | undefined): void {
    if (!modifier) return;
    this.writer.write(`${modifier} `);
    this.writer.continueLine();
  }

  /** Continues the current line with `: A, B` when there are conformances */
  private writeConformances(conformances: readonly string[]): void {
    if (conformances.length === 0) return;
    this.writer.continueLine();
    this.writer.write(`: ${conformances.join(', ')}`);
  }

  /**
   * ` {`, members one level deeper, `}`; an empty body renders `{}`.
   * Members are separated by an empty line, except consecutive enum cases.
   */
  private renderMemberBlock(members: readonly Declaration[]): void {
    this.writer.continueLine();
    this.writer.write(' {');
    if (members.length > 0) {
      this.writer.withNestedLevel(() => {
        members.forEach((member, index) => {
          const previous = members[index - 1];
          if (previous && !(previous.kind === 'enumCase' && member.kind === 'enumCase')) {
            this.writer.write('');
          }
          this.renderDeclaration(member);
        });
      });
    } else {
      this.writer.continueLine();
    }
    this.writer.write('}');
  }

  private renderVariable(variable: VariableDeclaration): void {
    this.writeAccessModifier(variable.accessModifier);
    if (variable.isStatic) {
      this.writer.write('static ');
      this.writer.continueLine();
    }
    this.writer.write(`${variable.binding} ${variable.name}`);
    if (variable.type) {
      this.writer.continueLine();
      this.writer.write(`: ${renderTypeRef(variable.type)}`);
    }
    if (variable.initializer) {
      this.writer.continueLine();
      this.writer.write(' = ');
      this.writer.continueLine();
      this.renderExpression(variable.initializer);
    }
    const getter = variable.getter;
    if (!getter) return;

    this.writer.continueLine();
    this.writer.write(' {');
    this.writer.withNestedLevel(() => {
      const effects = variable.getterEffects ?? [];
      const hasExplicitGetter = effects.length > 0 || variable.setter !== undefined;
      if (hasExplicitGetter) {
        this.writer.write(['get', ...effects].join(' ') + ' {');
        this.writer.withNestedLevel(() => this.renderCodeBlocks(getter));
        this.writer.write('}');
      } else {
        this.renderCodeBlocks(getter);
      }
      const setter = variable.setter;
      if (setter) {
        this.writer.write('set {');
        this.writer.withNestedLevel(() => this.renderCodeBlocks(setter));
        this.writer.write('}');
      }
    });
    this.writer.write('}');
  }

  private renderFunction(fn: FunctionDeclaration): void {
    this.writeAccessModifier(fn.accessModifier);
    this.writer.write(`${renderFunctionKind(fn.functionKind)}(`);
    this.renderSeparated(fn.parameters, parameter => this.renderParameter(parameter));
    this.writer.write(')');
    for (const keyword of fn.keywords) {
      this.writer.continueLine();
      this.writer.write(` ${keyword}`);
    }
    if (fn.returnType) {
      this.writer.continueLine();
      this.writer.write(` -> ${renderTypeRef(fn.returnType)}`);
    }
    const body = fn.body;
    if (!body) return;

    this.writer.continueLine();
    this.writer.write(' {');
    if (body.length > 0) {
      this.writer.withNestedLevel(() => this.renderCodeBlocks(body));
    } else {
      this.writer.continueLine();
    }
    this.writer.write('}');
  }

  private renderParameter(parameter: Parameter): void {
    this.writer.write(parameter.label ?? '_');
    if (parameter.name !== undefined && parameter.name !== parameter.label) {
      this.writer.continueLine();
      this.writer.write(` ${parameter.name}`);
    }
    this.writer.continueLine();
    this.writer.write(`: ${renderTypeRef(parameter.type)}`);
    if (parameter.defaultValue) {
      this.writer.continueLine();
      this.writer.write(' = ');
      this.writer.continueLine();
      this.renderExpression(parameter.defaultValue);
    }
  }

  private renderEnumCaseValue(value: EnumCaseValue): void {
    switch (value.kind) {
      case 'nameOnly':
        return;
      case 'rawValue':
        this.writer.continueLine();
        this.writer.write(' = ');
        this.writer.continueLine();
        this.renderLiteral(value.value);
        return;
      case 'associatedValues': {
        if (value.values.length === 0) return;
        const rendered = value.values
          .map(v => (v.label ? `${v.label}: ` : '') + renderTypeRef(v.type))
          .join(', ');
        this.writer.continueLine();
        this.writer.write(`(${rendered})`);
        return;
      }
    }
  }

  /**
   * Items of an argument or parameter list, after an opening `(` that is
   * already written and before the closing one. One item stays on the open
   * line; several go one per line, one level deeper.
   */
  private renderSeparated<T>(items: readonly T[], renderItem: (item: T) => void): void {
    if (items.length > 1) {
      this.writer.withNestedLevel(() => {
        for (const [item, isLast] of withLastMarker(items)) {
          renderItem(item);
          if (!isLast) {
            this.writer.continueLine();
            this.writer.write(',');
          }
        }
      });
    } else {
      this.writer.continueLine();
      const [only] = items;
      if (only !== undefined) renderItem(only);
      this.writer.continueLine();
    }
  }

  // --------------------------------------------------------------------------
  // Expressions
  // --------------------------------------------------------------------------

  renderExpression(expression: Expression): void {
    switch (expression.kind) {
      case 'literal':
        this.renderLiteral(expression.literal);
        break;
      case 'identifierRef':
        this.writer.write(expression.name);
        break;
      case 'typeRef':
        this.writer.write(renderTypeRef(expression.type));
        break;
      case 'memberAccess':
        if (expression.left) {
          this.renderExpression(expression.left);
          this.writer.continueLine();
        }
        this.writer.write(`.${expression.right}`);
        break;
      case 'call':
        this.renderCall(expression);
        break;
      case 'assignment':
        this.renderInfix(expression.left, ' = ', expression.right);
        break;
      case 'switchExpr':
        this.writer.write('switch ');
        this.writer.continueLine();
        this.renderExpression(expression.subject);
        this.writer.continueLine();
        this.writer.write(' {');
        expression.cases.forEach(switchCase => this.renderSwitchCase(switchCase));
        this.writer.write('}');
        break;
      case 'ifExpr':
        for (const [index, branch] of expression.branches.entries()) {
          if (index > 0) this.writer.continueLine();
          this.writer.write(index === 0 ? 'if ' : ' else if ');
          this.writer.continueLine();
          this.renderExpression(branch.condition);
          this.renderBracedBody(branch.body);
        }
        if (expression.elseBody) {
          this.writer.continueLine();
          this.writer.write(' else');
          this.renderBracedBody(expression.elseBody);
        }
        break;
      case 'doBlock': {
        this.writer.write('do {');
        const body = expression.body;
        this.writer.withNestedLevel(() => this.renderCodeBlocks(body));
        const catchBody = expression.catchBody;
        if (catchBody) {
          this.writer.write('} catch {');
          if (catchBody.length > 0) {
            this.writer.withNestedLevel(() => this.renderCodeBlocks(catchBody));
          } else {
            this.writer.continueLine();
          }
        }
        this.writer.write('}');
        break;
      }
      case 'valueBinding':
        this.writer.write(`${expression.binding} `);
        this.writer.continueLine();
        this.renderCall(expression.value);
        break;
      case 'unaryKeyword':
        this.writer.write(expression.keyword);
        if (expression.expression) {
          this.writer.continueLine();
          this.writer.write(' ');
          this.writer.continueLine();
          this.renderExpression(expression.expression);
        }
        break;
      case 'closure':
        this.renderClosure(expression);
        break;
      case 'binaryOp':
        this.renderInfix(expression.left, ` ${expression.operator} `, expression.right);
        break;
      case 'addressOf':
        this.writer.write('&');
        this.writer.continueLine();
        this.renderExpression(expression.expression);
        break;
      case 'optionalChain':
        this.renderExpression(expression.expression);
        this.writer.continueLine();
        this.writer.write('?');
        break;
      case 'forceUnwrap':
        this.renderExpression(expression.expression);
        this.writer.continueLine();
        this.writer.write('!');
        break;
      case 'tuple':
        this.writer.write('(');
        for (const [member, isLast] of withLastMarker(expression.members)) {
          this.writer.continueLine();
          this.renderExpression(member);
          if (!isLast) {
            this.writer.continueLine();
            this.writer.write(', ');
          }
        }
        this.writer.continueLine();
        this.writer.write(')');
        break;
    }
  }

  renderLiteral(literal: Literal): void {
    switch (literal.kind) {
      case 'string':
        this.writer.write(renderStringLiteral(literal.value));
        break;
      case 'int':
        this.writer.write(String(literal.value));
        break;
      case 'float':
        this.writer.write(literal.value.toFixed(literal.precision));
        break;
      case 'bool':
        this.writer.write(literal.value ? 'true' : 'false');
        break;
      case 'nil':
        this.writer.write('nil');
        break;
      case 'array': {
        this.writer.write('[');
        const items = literal.items;
        if (items.length > 0) {
          this.writer.withNestedLevel(() => {
            for (const [item, isLast] of withLastMarker(items)) {
              this.renderExpression(item);
              if (!isLast) {
                this.writer.continueLine();
                this.writer.write(',');
              }
            }
          });
        } else {
          this.writer.continueLine();
        }
        this.writer.write(']');
        break;
      }
    }
  }

  private renderCall(call: CallExpression): void {
    this.renderExpression(call.callee);
    this.writer.continueLine();
    this.writer.write('(');
    this.renderSeparated(call.arguments, argument => this.renderArgument(argument));
    this.writer.write(')');
    if (call.trailingClosure) {
      this.writer.continueLine();
      this.writer.write(' ');
      this.writer.continueLine();
      this.renderClosure(call.trailingClosure);
    }
  }

  private renderArgument(argument: CallArgument): void {
    if (argument.label !== undefined) {
      this.writer.write(`${argument.label}: `);
      this.writer.continueLine();
    }
    this.renderExpression(argument.expression);
  }

  private renderClosure(closure: ClosureExpression): void {
    this.writer.write('{');
    if (closure.argumentNames.length > 0) {
      this.writer.continueLine();
      this.writer.write(` ${closure.argumentNames.join(', ')} in`);
    }
    const body = closure.body;
    if (body && body.length > 0) {
      this.writer.withNestedLevel(() => this.renderCodeBlocks(body));
    } else {
      this.writer.continueLine();
    }
    this.writer.write('}');
  }

  private renderSwitchCase(switchCase: SwitchCase): void {
    const caseKind = switchCase.caseKind;
    switch (caseKind.kind) {
      case 'case': {
        const names = caseKind.associatedValueNames;
        this.writer.write(names.length > 0 ? 'case let ' : 'case ');
        this.writer.continueLine();
        this.renderExpression(caseKind.expression);
        if (names.length > 0) {
          this.writer.continueLine();
          this.writer.write(`(${names.join(', ')})`);
        }
        break;
      }
      case 'multiCase':
        this.writer.write('case ');
        for (const [expression, isLast] of withLastMarker(caseKind.expressions)) {
          this.writer.continueLine();
          this.renderExpression(expression);
          if (!isLast) {
            this.writer.continueLine();
            this.writer.write(', ');
          }
        }
        break;
      case 'default':
        this.writer.write('default');
        break;
    }
    this.writer.continueLine();
    this.writer.write(':');
    this.writer.withNestedLevel(() => this.renderCodeBlocks(switchCase.body));
  }

  /** ` {`, body one level deeper, `}` */
  private renderBracedBody(body: readonly CodeBlock[]): void {
    this.writer.continueLine();
    this.writer.write(' {');
    this.writer.withNestedLevel(() => this.renderCodeBlocks(body));
    this.writer.write('}');
  }

  private renderInfix(left: Expression, operator: string, right: Expression): void {
    this.renderExpression(left);
    this.writer.continueLine();
    this.writer.write(operator);
    this.writer.continueLine();
    this.renderExpression(right);
  }
}

function renderFunctionKind(kind: FunctionKind): string {
  if (kind.kind === 'initializer') {
    return `${kind.isConvenience ? 'convenience ' : ''}init${kind.isFailable ? '?' : ''}`;
  }
  return `${kind.isStatic ? 'static ' : ''}func ${kind.name}`;
}

// ----------------------------------------------------------------------------
// One-shot helpers
// ----------------------------------------------------------------------------

/**
 * Render a whole file; the result ends with a newline
 */
export function renderFile(file: FileDescription): string {
  const renderer = new TextRenderer();
  renderer.renderFile(file);
  return renderer.rendered();
}

export function renderDeclarationToString(declaration: Declaration): string {
  const renderer = new TextRenderer();
  renderer.renderDeclaration(declaration);
  return renderer.rendered();
}

export function renderExpressionToString(expression: Expression): string {
  const renderer = new TextRenderer();
  renderer.renderExpression(expression);
  return renderer.rendered();
}
