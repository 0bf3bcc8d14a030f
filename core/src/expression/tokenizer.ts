/**
 * Filter expression tokenizer and identifier substitution.
 *
 * Tokenizing is one linear scan. Identifier words (optionally signed) become
 * `identifier` tokens; {@link substituteIdentifiers} then turns each of them
 * into a `column` token, one substitution per occurrence, under the budget.
 * `$N` and `${N}` are column references by number and cost nothing.
 */

import { ExpressionError, SubstitutionLimitExceeded } from '../errors.js';
import { matchIdentifierAt } from '../identifiers.js';
import { assertSubstitutionBudget } from '../range-list.js';
import type { ColumnRegistry } from '../registry.js';
import type { ColumnNumber } from '../types.js';

export type Sign = '' | '-' | '+';

export type SymbolOperator = '&&' | '||' | '!' | '(' | ')' | '==' | '=' | '!=' | '<' | '>' | '=~';

export type Token =
  | { readonly type: 'identifier'; readonly name: string; readonly sign: Sign; readonly position: number }
  | { readonly type: 'column'; readonly column: ColumnNumber; readonly sign: Sign; readonly position: number }
  | { readonly type: 'word'; readonly value: string; readonly position: number }
  | { readonly type: 'string'; readonly value: string; readonly position: number }
  | { readonly type: 'operator'; readonly value: SymbolOperator; readonly position: number }
  | { readonly type: 'end'; readonly position: number };

/** Words that are always test operators, never operands */
export const OPERATOR_WORDS: ReadonlySet<string> = new Set([
  '-n', '-z', '-eq', '-ne', '-lt', '-le', '-gt', '-ge',
]);

const WORD_STOP = new Set([' ', '\t', '\n', '\r', '(', ')', '&', '|', '<', '>', '=', '\'', '"']);

const TWO_CHAR_OPERATORS: readonly SymbolOperator[] = ['&&', '||', '!=', '==', '=~'];
const ONE_CHAR_OPERATORS: readonly SymbolOperator[] = ['!', '(', ')', '=', '<', '>'];

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

function syntaxError(message: string, expression: string, position: number): ExpressionError {
  return ExpressionError.syntaxError(message, { expression, position });
}

function readQuoted(expression: string, start: number): { value: string; end: number } {
  const quote = expression[start];
  let value = '';
  let pos = start + 1;
  while (pos < expression.length) {
    const char = expression[pos];
    if (char === quote) {
      return { value, end: pos + 1 };
    }
    if (quote === '"' && char === '\\' && pos + 1 < expression.length) {
      value += expression[pos + 1];
      pos += 2;
      continue;
    }
    value += char;
    pos++;
  }
  throw syntaxError(`unterminated ${quote === '"' ? 'double' : 'single'} quote`, expression, start);
}

function readColumnNumber(expression: string, start: number): { column: number; end: number } {
  const braced = /^\$\{(\d+)\}/.exec(expression.slice(start));
  const plain = braced ?? /^\$(\d+)/.exec(expression.slice(start));
  const digits = plain?.[1];
  if (plain === null || digits === undefined) {
    throw syntaxError('"$" must be followed by a column number', expression, start);
  }
  return { column: Number.parseInt(digits, 10), end: start + plain[0].length };
}

function readWord(expression: string, start: number): { value: string; end: number } {
  let pos = start;
  while (pos < expression.length) {
    const char = expression.charAt(pos);
    if (WORD_STOP.has(char)) break;
    if (char === '!' && expression[pos + 1] === '=') break;
    pos++;
  }
  return { value: expression.slice(start, pos), end: pos };
}

function classifyWord(
  value: string,
  position: number,
  registry: ColumnRegistry
): Token {
  if (OPERATOR_WORDS.has(value)) {
    return { type: 'word', value, position };
  }
  const first = value.charAt(0);
  const sign: Sign = first === '-' || first === '+' ? first : '';
  const body = value.slice(sign.length);
  const isIdentifier = body.length > 0 && matchIdentifierAt(body, 0, registry.sentinel) === body.length;

  // Without a sentinel any plain word looks like an identifier; only
  // registered names are column references then.
  if (isIdentifier && (registry.sentinel !== '' || registry.has(body))) {
    return { type: 'identifier', name: body, sign, position };
  }
  return { type: 'word', value, position };
}

/**
 * Split a filter expression into tokens. The last token is always `end`.
 *
 * @throws ExpressionError on unterminated quotes, a lone `&` or `|`, or a `$`
 *         not followed by a column number
 */
export function tokenize(expression: string, registry: ColumnRegistry): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < expression.length) {
    const char = expression.charAt(pos);

    if (isWhitespace(char)) {
      pos++;
      continue;
    }

    const pair = expression.slice(pos, pos + 2);
    const twoChar = TWO_CHAR_OPERATORS.find(op => op === pair);
    if (twoChar !== undefined) {
      tokens.push({ type: 'operator', value: twoChar, position: pos });
      pos += 2;
      continue;
    }

    const oneChar = ONE_CHAR_OPERATORS.find(op => op === char);
    if (oneChar !== undefined) {
      tokens.push({ type: 'operator', value: oneChar, position: pos });
      pos++;
      continue;
    }

    if (char === '&' || char === '|') {
      throw syntaxError(`unexpected "${char}", did you mean "${char}${char}"?`, expression, pos);
    }

    if (char === '\'' || char === '"') {
      const { value, end } = readQuoted(expression, pos);
      tokens.push({ type: 'string', value, position: pos });
      pos = end;
      continue;
    }

    if (char === '$') {
      const { column, end } = readColumnNumber(expression, pos);
      tokens.push({ type: 'column', column, sign: '', position: pos });
      pos = end;
      continue;
    }

    const { value, end } = readWord(expression, pos);
    tokens.push(classifyWord(value, pos, registry));
    pos = end;
  }

  tokens.push({ type: 'end', position: expression.length });
  return tokens;
}

export interface SubstitutionResult {
  readonly tokens: Token[];
  /** Identifier occurrences replaced by column references */
  readonly substitutions: number;
}

/**
 * Replace every identifier token with a column reference.
 *
 * @throws SubstitutionLimitExceeded when the identifiers outnumber
 *         `maxSubstitutions`; checked before any name is resolved
 * @throws ExpressionError when an identifier is not registered
 */
export function substituteIdentifiers(
  tokens: readonly Token[],
  registry: ColumnRegistry,
  maxSubstitutions: number
): SubstitutionResult {
  assertSubstitutionBudget(maxSubstitutions);

  const substitutions = tokens.filter(token => token.type === 'identifier').length;
  if (substitutions > maxSubstitutions) {
    throw new SubstitutionLimitExceeded('filter', maxSubstitutions, substitutions);
  }

  const substituted = tokens.map((token): Token => {
    if (token.type !== 'identifier') return token;
    const column = registry.numberOf(token.name);
    if (column === undefined) {
      throw ExpressionError.unknownColumn(token.name, 'filter');
    }
    return { type: 'column', column, sign: token.sign, position: token.position };
  });

  return { tokens: substituted, substitutions };
}
