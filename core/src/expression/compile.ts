/**
 * Compiles a parsed filter expression into a row predicate.
 *
 * Evaluation rules:
 * - Column operands read the row's value ('' when absent or inactive),
 *   prefixed by their sign.
 * - An unquoted word right of `==`/`!=` is a glob pattern; everything else
 *   compares literally.
 * - `=~` searches for a regular expression anywhere in the left value.
 * - Integer tests read a non-integer operand as 0.
 * - `<`/`>` compare UTF-16 code units.
 */

import { ExpressionError } from '../errors.js';
import type { ColumnRegistry } from '../registry.js';
import type { RowValues } from '../types.js';
import { parseExpression, type BinaryOperator, type ExpressionNode, type Operand } from './parser.js';
import { substituteIdentifiers, tokenize } from './tokenizer.js';

export type CompiledPredicate = (values: RowValues) => boolean;

export interface CompiledFilter {
  readonly predicate: CompiledPredicate;
  /** Identifier substitutions the expression needed */
  readonly substitutions: number;
}

type ValueReader = (values: RowValues) => string;

// =============================================================================
// Patterns
// =============================================================================

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

/**
 * Translate a glob (`*`, `?`, `[...]`, `[!...]`, backslash escapes) into an
 * anchored regular expression source.
 */
export function globToRegexSource(glob: string): string {
  let source = '';
  let pos = 0;
  while (pos < glob.length) {
    const char = glob.charAt(pos);
    if (char === '\\' && pos + 1 < glob.length) {
      source += escapeRegex(glob.charAt(pos + 1));
      pos += 2;
      continue;
    }
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const bracket = readBracket(glob, pos);
      if (bracket !== undefined) {
        source += bracket.source;
        pos = bracket.end;
        continue;
      }
      source += '\\[';
    } else {
      source += escapeRegex(char);
    }
    pos++;
  }
  return `^${source}$`;
}

function readBracket(glob: string, start: number): { source: string; end: number } | undefined {
  let pos = start + 1;
  let negated = false;
  if (glob[pos] === '!' || glob[pos] === '^') {
    negated = true;
    pos++;
  }
  // A ']' right after the opening bracket is a member, not the close.
  let members = '';
  if (glob[pos] === ']') {
    members += '\\]';
    pos++;
  }
  while (pos < glob.length && glob[pos] !== ']') {
    const char = glob.charAt(pos);
    members += char === '\\' || char === '^' || char === ']' ? `\\${char}` : char;
    pos++;
  }
  if (pos >= glob.length || members === '') {
    return undefined;
  }
  return { source: `[${negated ? '^' : ''}${members}]`, end: pos + 1 };
}

function globMatcher(glob: string, expression: string): (value: string) => boolean {
  let pattern: RegExp;
  try {
    pattern = new RegExp(globToRegexSource(glob), 's');
  } catch (error) {
    throw ExpressionError.syntaxError(`invalid pattern "${glob}": ${errorMessage(error)}`, {
      expression,
      position: Math.max(0, expression.indexOf(glob)),
    });
  }
  return value => pattern.test(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a base-10 integer, reading anything else as 0.
 */
export function toInteger(value: string): number {
  const trimmed = value.trim();
  return /^[-+]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
}

// =============================================================================
// Compilation
// =============================================================================

function compileOperand(operand: Operand): ValueReader {
  if (operand.kind === 'literal') {
    const { value } = operand;
    return () => value;
  }
  const { column, sign } = operand;
  return values => `${sign}${values.get(column) ?? ''}`;
}

function compileRegexTest(left: ValueReader, right: Operand, expression: string): CompiledPredicate {
  if (right.kind === 'literal') {
    let pattern: RegExp;
    try {
      pattern = new RegExp(right.value);
    } catch (error) {
      throw ExpressionError.syntaxError(`invalid regular expression "${right.value}": ${errorMessage(error)}`, {
        expression,
        position: Math.max(0, expression.indexOf(right.value)),
      });
    }
    return values => pattern.test(left(values));
  }

  const readPattern = compileOperand(right);
  return values => {
    try {
      return new RegExp(readPattern(values)).test(left(values));
    } catch {
      // An invalid pattern taken from a cell never matches.
      return false;
    }
  };
}

function compileEquality(left: ValueReader, right: Operand, expression: string): CompiledPredicate {
  if (right.kind === 'literal' && !right.quoted) {
    const matches = globMatcher(right.value, expression);
    return values => matches(left(values));
  }
  const readRight = compileOperand(right);
  return values => left(values) === readRight(values);
}

function compileNode(node: ExpressionNode, expression: string): CompiledPredicate {
  switch (node.kind) {
    case 'or': {
      const left = compileNode(node.left, expression);
      const right = compileNode(node.right, expression);
      return values => left(values) || right(values);
    }
    case 'and': {
      const left = compileNode(node.left, expression);
      const right = compileNode(node.right, expression);
      return values => left(values) && right(values);
    }
    case 'not': {
      const inner = compileNode(node.operand, expression);
      return values => !inner(values);
    }
    case 'nonEmpty': {
      const read = compileOperand(node.operand);
      return values => read(values) !== '';
    }
    case 'unary': {
      const read = compileOperand(node.operand);
      return node.operator === '-n'
        ? values => read(values) !== ''
        : values => read(values) === '';
    }
    case 'binary':
      return compileBinary(node.operator, node.left, node.right, expression);
  }
}

const INTEGER_COMPARATORS = {
  '-eq': (a: number, b: number) => a === b,
  '-ne': (a: number, b: number) => a !== b,
  '-lt': (a: number, b: number) => a < b,
  '-le': (a: number, b: number) => a <= b,
  '-gt': (a: number, b: number) => a > b,
  '-ge': (a: number, b: number) => a >= b,
} as const;

function compileBinary(
  operator: BinaryOperator,
  leftOperand: Operand,
  rightOperand: Operand,
  expression: string
): CompiledPredicate {
  const left = compileOperand(leftOperand);

  switch (operator) {
    case '==':
      return compileEquality(left, rightOperand, expression);
    case '!=': {
      const equal = compileEquality(left, rightOperand, expression);
      return values => !equal(values);
    }
    case '=~':
      return compileRegexTest(left, rightOperand, expression);
    case '<': {
      const right = compileOperand(rightOperand);
      return values => left(values) < right(values);
    }
    case '>': {
      const right = compileOperand(rightOperand);
      return values => left(values) > right(values);
    }
  }

  const right = compileOperand(rightOperand);
  const compare = INTEGER_COMPARATORS[operator];
  return values => compare(toInteger(left(values)), toInteger(right(values)));
}

/**
 * Tokenize, substitute, parse and compile a filter expression.
 *
 * @example
 * ```typescript
 * const { predicate } = compileFilterExpression('_A -gt 1 && _B == x*', registry, 100);
 * predicate(new Map([[1, '2'], [2, 'xy']])); // true
 * ```
 *
 * @throws SubstitutionLimitExceeded when the expression names more column
 *         identifiers than `maxSubstitutions`
 * @throws ExpressionError on unknown identifiers and syntax errors
 */
export function compileFilterExpression(
  expression: string,
  registry: ColumnRegistry,
  maxSubstitutions: number
): CompiledFilter {
  const { tokens, substitutions } = substituteIdentifiers(
    tokenize(expression, registry),
    registry,
    maxSubstitutions
  );
  const tree = parseExpression(tokens, expression);
  return { predicate: compileNode(tree, expression), substitutions };
}
