/**
 * @activetable/core - Column identifier rules
 *
 * An identifier is the sentinel followed by one or more ASCII letters, digits
 * or underscores (`_A`, `_price_2`). With an empty sentinel it is any ASCII
 * letter or underscore followed by letters, digits or underscores.
 */

import { ConfigurationError } from './errors.js';

/**
 * Characters with a meaning in filter expressions or range lists.
 */
export const RESERVED_SENTINEL_CHARACTERS = '$\'"()!&|=<>-+*[]?\\~{}';

const CODE_0 = 48;
const CODE_9 = 57;
const CODE_A_UPPER = 65;
const CODE_Z_UPPER = 90;
const CODE_A_LOWER = 97;
const CODE_Z_LOWER = 122;
const CODE_UNDERSCORE = 95;

function isAsciiLetter(code: number): boolean {
  return (code >= CODE_A_UPPER && code <= CODE_Z_UPPER) || (code >= CODE_A_LOWER && code <= CODE_Z_LOWER);
}

function isAsciiDigit(code: number): boolean {
  return code >= CODE_0 && code <= CODE_9;
}

/**
 * True for ASCII letters, digits and underscore.
 */
export function isIdentifierChar(code: number): boolean {
  return isAsciiLetter(code) || isAsciiDigit(code) || code === CODE_UNDERSCORE;
}

export function isValidSentinel(sentinel: string): boolean {
  if (sentinel === '') return true;
  if (sentinel.length !== 1) return false;
  const code = sentinel.charCodeAt(0);
  if (isAsciiLetter(code) || isAsciiDigit(code)) return false;
  if (/\s/.test(sentinel)) return false;
  return !RESERVED_SENTINEL_CHARACTERS.includes(sentinel);
}

export function assertValidSentinel(sentinel: string): void {
  if (!isValidSentinel(sentinel)) {
    throw ConfigurationError.invalidSentinel(sentinel);
  }
}

/**
 * Length of the identifier starting at `index`, or 0 when none starts there.
 * The scan is greedy: it stops at the first non-identifier character.
 */
export function matchIdentifierAt(text: string, index: number, sentinel: string): number {
  let pos = index;
  if (sentinel === '') {
    const first = text.charCodeAt(pos);
    if (!(isAsciiLetter(first) || first === CODE_UNDERSCORE)) return 0;
    pos++;
  } else {
    if (!text.startsWith(sentinel, pos)) return 0;
    pos += sentinel.length;
    if (pos >= text.length || !isIdentifierChar(text.charCodeAt(pos))) return 0;
  }
  while (pos < text.length && isIdentifierChar(text.charCodeAt(pos))) {
    pos++;
  }
  return pos - index;
}

/**
 * True when the whole of `token` is one identifier.
 */
export function isColumnIdentifier(token: string, sentinel: string): boolean {
  return token.length > 0 && matchIdentifierAt(token, 0, sentinel) === token.length;
}

/**
 * Drop the `namespace:` prefix from a raw label.
 *
 * Everything up to and including the first colon goes; text without a colon
 * is kept whole; a missing label becomes the empty string.
 *
 * @example
 * ```typescript
 * stripLabelNamespace('ns:Role');     // 'Role'
 * stripLabelNamespace('a:b:c');       // 'b:c'
 * stripLabelNamespace(undefined);     // ''
 * ```
 */
export function stripLabelNamespace(raw: string | undefined): string {
  if (raw === undefined) return '';
  const colon = raw.indexOf(':');
  return colon === -1 ? raw : raw.slice(colon + 1);
}
