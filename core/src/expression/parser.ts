/**
 * Recursive-descent parser for filter tests.
 *
 * ```
 * expression := or
 * or         := and ( '||' and )*
 * and        := not ( '&&' not )*
 * not        := '!' not | primary
 * primary    := '(' expression ')' | test
 * test       := ('-n' | '-z') operand
 *             | operand binop operand
 *             | operand
 * binop      := '==' | '=' | '!=' | '<' | '>' | '=~'
 *             | '-eq' | '-ne' | '-lt' | '-le' | '-gt' | '-ge'
 * ```
 */

import { ExpressionError } from '../errors.js';
import type { ColumnNumber } from '../types.js';
import type { Sign, Token } from './tokenizer.js';

// =============================================================================
// AST
// =============================================================================

export type Operand =
  | { readonly kind: 'column'; readonly column: ColumnNumber; readonly sign: Sign }
  | { readonly kind: 'literal'; readonly value: string; readonly quoted: boolean };

export type StringOperator = '==' | '!=' | '<' | '>' | '=~';
export type IntegerOperator = '-eq' | '-ne' | '-lt' | '-le' | '-gt' | '-ge';
export type BinaryOperator = StringOperator | IntegerOperator;
export type UnaryOperator = '-n' | '-z';

export type ExpressionNode =
  | { readonly kind: 'or'; readonly left: ExpressionNode; readonly right: ExpressionNode }
  | { readonly kind: 'and'; readonly left: ExpressionNode; readonly right: ExpressionNode }
  | { readonly kind: 'not'; readonly operand: ExpressionNode }
  | { readonly kind: 'unary'; readonly operator: UnaryOperator; readonly operand: Operand }
  | { readonly kind: 'binary'; readonly operator: BinaryOperator; readonly left: Operand; readonly right: Operand }
  | { readonly kind: 'nonEmpty'; readonly operand: Operand };

const INTEGER_OPERATORS: ReadonlySet<string> = new Set(['-eq', '-ne', '-lt', '-le', '-gt', '-ge']);

function isIntegerOperator(value: string): value is IntegerOperator {
  return INTEGER_OPERATORS.has(value);
}

function isUnaryOperator(value: string): value is UnaryOperator {
  return value === '-n' || value === '-z';
}

// =============================================================================
// Parser
// =============================================================================

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly expression: string
  ) {}

  parse(): ExpressionNode {
    if (this.peek().type === 'end') {
      throw this.error('empty expression', this.peek());
    }
    const node = this.parseOr();
    const trailing = this.peek();
    if (trailing.type !== 'end') {
      throw this.error(`unexpected ${describe(trailing)}`, trailing);
    }
    return node;
  }

  private peek(offset = 0): Token {
    const last = this.tokens[this.tokens.length - 1];
    const token = this.tokens[this.index + offset] ?? last;
    if (token === undefined) {
      return { type: 'end', position: this.expression.length };
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'end') this.index++;
    return token;
  }

  private isOperator(token: Token, value: string): boolean {
    return token.type === 'operator' && token.value === value;
  }

  private error(message: string, token: Token): ExpressionError {
    return ExpressionError.syntaxError(message, { expression: this.expression, position: token.position });
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.isOperator(this.peek(), '||')) {
      this.next();
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.isOperator(this.peek(), '&&')) {
      this.next();
      left = { kind: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.isOperator(this.peek(), '!')) {
      this.next();
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();
    if (this.isOperator(token, '(')) {
      this.next();
      const inner = this.parseOr();
      const close = this.next();
      if (!this.isOperator(close, ')')) {
        throw this.error(`expected ")" but found ${describe(close)}`, close);
      }
      return inner;
    }
    return this.parseTest();
  }

  private parseTest(): ExpressionNode {
    const first = this.peek();
    if (first.type === 'word' && isUnaryOperator(first.value) && isOperandToken(this.peek(1))) {
      this.next();
      return { kind: 'unary', operator: first.value, operand: this.parseOperand() };
    }

    const left = this.parseOperand();
    const operator = this.binaryOperator(this.peek());
    if (operator === undefined) {
      return { kind: 'nonEmpty', operand: left };
    }
    this.next();
    return { kind: 'binary', operator, left, right: this.parseOperand() };
  }

  private binaryOperator(token: Token): BinaryOperator | undefined {
    if (token.type === 'word' && isIntegerOperator(token.value)) {
      return token.value;
    }
    if (token.type !== 'operator') return undefined;
    switch (token.value) {
      case '==':
      case '=':
        return '==';
      case '!=':
      case '<':
      case '>':
      case '=~':
        return token.value;
      default:
        return undefined;
    }
  }

  private parseOperand(): Operand {
    const token = this.next();
    switch (token.type) {
      case 'column':
        return { kind: 'column', column: token.column, sign: token.sign };
      case 'word':
        return { kind: 'literal', value: token.value, quoted: false };
      case 'string':
        return { kind: 'literal', value: token.value, quoted: true };
      default:
        throw this.error(`expected an operand but found ${describe(token)}`, token);
    }
  }
}

function isOperandToken(token: Token): boolean {
  return token.type === 'column' || token.type === 'word' || token.type === 'string';
}

function describe(token: Token): string {
  switch (token.type) {
    case 'end':
      return 'end of expression';
    case 'operator':
      return `"${token.value}"`;
    case 'identifier':
      return `identifier "${token.name}"`;
    case 'column':
      return `column ${token.column}`;
    case 'word':
    case 'string':
      return `"${token.value}"`;
  }
}

/**
 * Parse substituted tokens into an expression tree.
 *
 * @throws ExpressionError on any syntax error, including identifier tokens
 *         that were never substituted
 */
export function parseExpression(tokens: readonly Token[], expression: string): ExpressionNode {
  return new Parser(tokens, expression).parse();
}
