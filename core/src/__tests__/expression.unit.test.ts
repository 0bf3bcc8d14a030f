/**
 * Tests for filter expressions: tokenizer, parser and compiled predicates
 */

import { describe, it, expect } from 'vitest';
import {
  compileFilterExpression,
  globToRegexSource,
  parseExpression,
  substituteIdentifiers,
  toInteger,
  tokenize,
} from '../expression/index.js';
import { buildRegistry } from '../registry.js';
import { ErrorCode, ExpressionError, SubstitutionLimitExceeded } from '../errors.js';

const registry = buildRegistry(() => ['_A', '_B', '_C']);

function matches(expression: string, values: Record<number, string>): boolean {
  const row = new Map(Object.entries(values).map(([column, value]) => [Number(column), value]));
  return compileFilterExpression(expression, registry, 100).predicate(row);
}

function parse(expression: string) {
  const { tokens } = substituteIdentifiers(tokenize(expression, registry), registry, 100);
  return parseExpression(tokens, expression);
}

// =============================================================================
// Tokenizer
// =============================================================================

describe('tokenize', () => {
  it('should classify identifiers, operators and words with positions', () => {
    expect(tokenize('_A == x* && -_B -lt 3', registry)).toEqual([
      { type: 'identifier', name: '_A', sign: '', position: 0 },
      { type: 'operator', value: '==', position: 3 },
      { type: 'word', value: 'x*', position: 6 },
      { type: 'operator', value: '&&', position: 9 },
      { type: 'identifier', name: '_B', sign: '-', position: 12 },
      { type: 'word', value: '-lt', position: 16 },
      { type: 'word', value: '3', position: 20 },
      { type: 'end', position: 21 },
    ]);
  });

  it('should read quoted strings', () => {
    const tokens = tokenize(String.raw`"a\"b" 'c\d'`, registry);
    expect(tokens.slice(0, 2)).toEqual([
      { type: 'string', value: 'a"b', position: 0 },
      { type: 'string', value: 'c\\d', position: 7 },
    ]);
  });

  it('should read column numbers', () => {
    expect(tokenize('$2 ${3}', registry).slice(0, 2)).toEqual([
      { type: 'column', column: 2, sign: '', position: 0 },
      { type: 'column', column: 3, sign: '', position: 3 },
    ]);
  });

  it('should treat quoted identifiers as text', () => {
    expect(tokenize("'_A'", registry)[0]).toEqual({ type: 'string', value: '_A', position: 0 });
  });

  it('should reject lone ampersands and pipes', () => {
    expect(() => tokenize('_A & _B', registry)).toThrow(
      'Expression syntax error: unexpected "&", did you mean "&&"?'
    );
    expect(() => tokenize('_A | _B', registry)).toThrow(ExpressionError);
  });

  it('should reject unterminated quotes', () => {
    expect(() => tokenize("_A == 'abc", registry)).toThrow('unterminated single quote');
    expect(() => tokenize('_A == "abc', registry)).toThrow('unterminated double quote');
  });

  it('should reject a dollar without a number', () => {
    expect(() => tokenize('$x', registry)).toThrow('"$" must be followed by a column number');
  });

  it('should only take registered names under an empty sentinel', () => {
    const plain = buildRegistry(() => ['A', 'B'], undefined, { sentinel: '' });
    expect(tokenize('A == foo', plain).slice(0, 3)).toEqual([
      { type: 'identifier', name: 'A', sign: '', position: 0 },
      { type: 'operator', value: '==', position: 2 },
      { type: 'word', value: 'foo', position: 5 },
    ]);
  });
});

describe('substituteIdentifiers', () => {
  it('should count every occurrence', () => {
    const result = substituteIdentifiers(tokenize('_A == _A', registry), registry, 2);
    expect(result.substitutions).toBe(2);
    expect(result.tokens[2]).toEqual({ type: 'column', column: 1, sign: '', position: 6 });
  });

  it('should fail when the budget is exceeded', () => {
    try {
      substituteIdentifiers(tokenize('_A == _A', registry), registry, 1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SubstitutionLimitExceeded);
      expect(error).toMatchObject({ limit: 1, required: 2 });
      expect(error).toHaveProperty('message', 'filter needs 2 identifier substitutions, limit is 1');
    }
  });

  it('should reject unregistered identifiers', () => {
    try {
      substituteIdentifiers(tokenize('_Z == 1', registry), registry, 100);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExpressionError);
      expect(error).toMatchObject({ code: ErrorCode.UNKNOWN_COLUMN });
    }
  });

  it('should not charge for column numbers', () => {
    expect(substituteIdentifiers(tokenize('$1 == $2', registry), registry, 0).substitutions).toBe(0);
  });
});

// =============================================================================
// Parser
// =============================================================================

describe('parseExpression', () => {
  it('should bind && tighter than ||', () => {
    expect(parse('! _A || _B && -n _C')).toEqual({
      kind: 'or',
      left: { kind: 'not', operand: { kind: 'nonEmpty', operand: { kind: 'column', column: 1, sign: '' } } },
      right: {
        kind: 'and',
        left: { kind: 'nonEmpty', operand: { kind: 'column', column: 2, sign: '' } },
        right: { kind: 'unary', operator: '-n', operand: { kind: 'column', column: 3, sign: '' } },
      },
    });
  });

  it('should read a single = as equality', () => {
    expect(parse('$1 = x')).toEqual({
      kind: 'binary',
      operator: '==',
      left: { kind: 'column', column: 1, sign: '' },
      right: { kind: 'literal', value: 'x', quoted: false },
    });
  });

  it('should parse integer operators', () => {
    expect(parse('-_A -ge "2"')).toEqual({
      kind: 'binary',
      operator: '-ge',
      left: { kind: 'column', column: 1, sign: '-' },
      right: { kind: 'literal', value: '2', quoted: true },
    });
  });

  it('should report syntax errors', () => {
    expect(() => parse('')).toThrow('Expression syntax error: empty expression');
    expect(() => parse('( _A == 1')).toThrow('expected ")" but found end of expression');
    expect(() => parse('_A == 1 )')).toThrow('unexpected ")"');
    expect(() => parse('_A ==')).toThrow('expected an operand but found end of expression');
    expect(() => parse('_A 1')).toThrow('unexpected "1"');
    expect(() => parse('&& _A')).toThrow('expected an operand but found "&&"');
  });

  it('should reject identifiers that were not substituted', () => {
    expect(() => parseExpression(tokenize('_A', registry), '_A')).toThrow(
      'expected an operand but found identifier "_A"'
    );
  });

  it('should record the error position', () => {
    try {
      parse('_A == 1 )');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        code: ErrorCode.EXPRESSION_SYNTAX_ERROR,
        details: { operation: 'parse', expression: '_A == 1 )', position: 8 },
      });
    }
  });
});

// =============================================================================
// Patterns
// =============================================================================

describe('globToRegexSource', () => {
  it('should translate wildcards', () => {
    expect(globToRegexSource('a*b?')).toBe('^a.*b.$');
  });

  it('should escape regex characters', () => {
    expect(globToRegexSource('a.b')).toBe('^a\\.b$');
    expect(globToRegexSource('\\*')).toBe('^\\*$');
  });

  it('should translate bracket expressions', () => {
    expect(globToRegexSource('[!a-c]x')).toBe('^[^a-c]x$');
    expect(globToRegexSource('[]a]')).toBe('^[\\]a]$');
  });

  it('should take an unclosed bracket literally', () => {
    expect(globToRegexSource('[abc')).toBe('^\\[abc$');
  });
});

describe('toInteger', () => {
  it('should parse signed decimal integers', () => {
    expect(toInteger('12')).toBe(12);
    expect(toInteger('+3')).toBe(3);
    expect(toInteger('-4')).toBe(-4);
    expect(toInteger(' 8 ')).toBe(8);
  });

  it('should read anything else as 0', () => {
    expect(toInteger('1.5')).toBe(0);
    expect(toInteger('')).toBe(0);
    expect(toInteger('abc')).toBe(0);
  });
});

// =============================================================================
// Evaluation
// =============================================================================

describe('compiled predicates', () => {
  it('should match unquoted right-hand words as globs', () => {
    expect(matches('_A == x*', { 1: 'xyz' })).toBe(true);
    expect(matches('_A == x*', { 1: 'axy' })).toBe(false);
    expect(matches('_A == a?c', { 1: 'abc' })).toBe(true);
    expect(matches('_A == a?c', { 1: 'ac' })).toBe(false);
    expect(matches('_A == [!a]*', { 1: 'bcd' })).toBe(true);
    expect(matches('_A == [!a]*', { 1: 'abc' })).toBe(false);
    expect(matches('_A != x*', { 1: 'y' })).toBe(true);
  });

  it('should compare quoted words literally', () => {
    expect(matches('_A == "x*"', { 1: 'xyz' })).toBe(false);
    expect(matches('_A == "x*"', { 1: 'x*' })).toBe(true);
  });

  it('should compare two columns', () => {
    expect(matches('_A == _B', { 1: 'q', 2: 'q' })).toBe(true);
    expect(matches('_A != _B', { 1: 'q', 2: 'r' })).toBe(true);
  });

  it('should read absent cells as empty strings', () => {
    expect(matches('_B == ""', { 1: 'x' })).toBe(true);
    expect(matches('-z _B', { 1: 'x' })).toBe(true);
    expect(matches('-n _B', { 1: 'x' })).toBe(false);
    expect(matches('_B', { 1: 'x' })).toBe(false);
    expect(matches('_A', { 1: 'x' })).toBe(true);
  });

  it('should prefix signed column references', () => {
    expect(matches('-_A == -5', { 1: '5' })).toBe(true);
  });

  it('should read a lone -n as a non-empty word', () => {
    expect(matches('-n', {})).toBe(true);
  });

  it('should compare integers numerically', () => {
    expect(matches('_A -gt 9', { 1: '10' })).toBe(true);
    expect(matches('_A -lt _B', { 1: '-3', 2: '2' })).toBe(true);
    expect(matches('_A -eq 0', { 1: 'abc' })).toBe(true);
    expect(matches('_A -ne 7', { 1: ' 7 ' })).toBe(false);
    expect(matches('_A -le 1', { 1: '1' })).toBe(true);
    expect(matches('_A -ge 2', { 1: '1' })).toBe(false);
  });

  it('should order strings by code unit', () => {
    expect(matches('_A < a', { 1: 'B' })).toBe(true);
    expect(matches('_A > a', { 1: 'b' })).toBe(true);
    expect(matches('_A < 10', { 1: '9' })).toBe(false);
  });

  it('should search for regular expressions', () => {
    expect(matches('_A =~ ^ab', { 1: 'abc' })).toBe(true);
    expect(matches('_A =~ ^ab', { 1: 'cab' })).toBe(false);
    expect(matches('_A =~ b', { 1: 'abc' })).toBe(true);
    expect(matches('_A =~ "^(x|y)$"', { 1: 'y' })).toBe(true);
  });

  it('should take regular expressions from cells', () => {
    expect(matches('_A =~ _B', { 1: 'abc', 2: '^a' })).toBe(true);
    expect(matches('_A =~ _B', { 1: 'abc', 2: '(' })).toBe(false);
  });

  it('should reject invalid literal regular expressions at compile time', () => {
    expect(() => compileFilterExpression('_A =~ "("', registry, 100)).toThrow(
      'invalid regular expression "("'
    );
  });

  it('should honour precedence and parentheses', () => {
    const values = { 1: 'x', 2: '', 3: '' };
    expect(matches('_A || _B && _C', values)).toBe(true);
    expect(matches('( _A || _B ) && _C', values)).toBe(false);
    expect(matches('! ( _B || _C )', values)).toBe(true);
  });

  it('should read column numbers', () => {
    expect(matches('$2 == y', { 2: 'y' })).toBe(true);
    expect(matches('${9} == ""', { 1: 'x' })).toBe(true);
  });

  it('should report substitutions', () => {
    expect(compileFilterExpression('_A == _B || _A == x', registry, 3).substitutions).toBe(3);
  });

  it('should compare registered plain names under an empty sentinel', () => {
    const plain = buildRegistry(() => ['A', 'B'], undefined, { sentinel: '' });
    const compiled = compileFilterExpression('B == A', plain, 2);
    expect(compiled.substitutions).toBe(2);
    expect(compiled.predicate(new Map([[1, 'v'], [2, 'v']]))).toBe(true);
    expect(compileFilterExpression('A == foo', plain, 1).predicate(new Map([[1, 'foo']]))).toBe(true);
  });
});
