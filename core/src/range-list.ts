/**
 * @activetable/core - Row/column list algebra
 *
 * Slice and Select take a list of signed numbers and wildcards applied left
 * to right to the current active set:
 *
 * | Element | Effect |
 * |---|---|
 * | `7`, `+7` | add 7 |
 * | `-7` | remove 7 |
 * | `*` | working set := whole universe |
 * | `-*` | working set := empty |
 *
 * Numbers outside the universe are no-ops; `0` is a no-op. For columns,
 * signed identifiers (`_B`, `-_B`) are first replaced by column numbers.
 */

import { ConfigurationError, ErrorCode, ExpressionError, SubstitutionLimitExceeded } from './errors.js';
import type { ColumnRegistry } from './registry.js';

/**
 * A list as one whitespace-separated string or as separate elements.
 */
export type RangeList = string | readonly (string | number)[];

export type RangeListStep =
  | { readonly kind: 'all' }
  | { readonly kind: 'none' }
  | { readonly kind: 'add'; readonly value: number }
  | { readonly kind: 'remove'; readonly value: number };

const SIGNED_INTEGER = /^[-+]?\d+$/;
const SIGN_PREFIX = /^([-+]?)(.*)$/s;

/**
 * @throws ConfigurationError unless `maxSubstitutions` is a non-negative integer
 */
export function assertSubstitutionBudget(maxSubstitutions: number): void {
  if (!Number.isInteger(maxSubstitutions) || maxSubstitutions < 0) {
    throw new ConfigurationError(
      `Invalid substitution budget ${maxSubstitutions}`,
      ErrorCode.CONFIGURATION_ERROR,
      { maxSubstitutions },
      'maxSubstitutions must be a non-negative integer'
    );
  }
}

export function listTokens(list: RangeList): string[] {
  const raw = typeof list === 'string' ? list.split(/\s+/) : list.map(item => String(item).trim());
  return raw.filter(token => token !== '');
}

/**
 * @throws ExpressionError on anything but signed integers, `*` and `-*`
 */
export function parseRangeList(tokens: readonly string[], operation: string): RangeListStep[] {
  const steps: RangeListStep[] = [];
  for (const token of tokens) {
    if (token === '*') {
      steps.push({ kind: 'all' });
    } else if (token === '-*') {
      steps.push({ kind: 'none' });
    } else if (SIGNED_INTEGER.test(token)) {
      const value = Number.parseInt(token, 10);
      if (value > 0) {
        steps.push({ kind: 'add', value });
      } else if (value < 0) {
        steps.push({ kind: 'remove', value: -value });
      }
    } else {
      throw ExpressionError.invalidListToken(token, operation);
    }
  }
  return steps;
}

/**
 * Apply `steps` to `current` within the universe 1..universeSize and return
 * the resulting set in ascending order.
 */
export function applyRangeList(
  current: readonly number[],
  steps: readonly RangeListStep[],
  universeSize: number
): number[] {
  const working = new Set(current);
  const inUniverse = (n: number): boolean => n >= 1 && n <= universeSize;

  for (const step of steps) {
    switch (step.kind) {
      case 'all':
        working.clear();
        for (let n = 1; n <= universeSize; n++) working.add(n);
        break;
      case 'none':
        working.clear();
        break;
      case 'add':
        if (inUniverse(step.value)) working.add(step.value);
        break;
      case 'remove':
        working.delete(step.value);
        break;
    }
  }

  return Array.from(working).sort((a, b) => a - b);
}

/**
 * Replace every signed identifier in `tokens` by its signed column number.
 *
 * @throws SubstitutionLimitExceeded when more than `maxSubstitutions`
 *         identifiers appear; nothing is resolved in that case
 * @throws ExpressionError when an identifier is not registered
 */
export function substituteColumnIdentifiers(
  tokens: readonly string[],
  registry: ColumnRegistry,
  maxSubstitutions: number
): string[] {
  assertSubstitutionBudget(maxSubstitutions);

  const split = tokens.map(token => {
    const match = SIGN_PREFIX.exec(token);
    const sign = match?.[1] ?? '';
    const body = match?.[2] ?? token;
    return { token, sign, body, isIdentifier: registry.isIdentifier(body) };
  });

  const required = split.filter(part => part.isIdentifier).length;
  if (required > maxSubstitutions) {
    throw new SubstitutionLimitExceeded('select', maxSubstitutions, required);
  }

  return split.map(part => {
    if (!part.isIdentifier) return part.token;
    const column = registry.numberOf(part.body);
    if (column === undefined) {
      throw ExpressionError.unknownColumn(part.body, 'select');
    }
    return `${part.sign}${column}`;
  });
}
