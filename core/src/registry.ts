/**
 * @activetable/core - Column Registry
 *
 * Maps column identifiers to immutable 1-based column numbers and header
 * labels. Built once from the application's name generator, before any load.
 *
 * @example
 * ```typescript
 * import { buildRegistry, createEnvLabelLookup } from '@activetable/core';
 *
 * const registry = buildRegistry(
 *   () => ['_NAME', '_JOB', '_CITY'],
 *   createEnvLabelLookup(process.env)   // reads i18n_col__NAME='ui:Name', ...
 * );
 * registry.numberOf('_JOB'); // 2
 * registry.labelOf('_NAME'); // 'Name'
 * ```
 */

import { ConfigurationError } from './errors.js';
import {
  assertValidSentinel,
  isColumnIdentifier,
  stripLabelNamespace,
} from './identifiers.js';
import {
  DEFAULT_IDENTIFIER_SENTINEL,
  DEFAULT_LABEL_ENV_PREFIX,
  type ColumnNumber,
  type ColumnRef,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Application-defined source of column identifiers: an iterable, or one
 * newline-separated string with one identifier per line.
 */
export type ColumnNameGenerator = () => Iterable<string> | string;

/**
 * Raw `namespace:label` text per identifier, as a function or a record.
 */
export type LabelLookup =
  | ((name: string) => string | undefined)
  | Readonly<Record<string, string | undefined>>;

export interface RegistryOptions {
  /** Leading character of identifiers; '' accepts plain names (default: '_') */
  sentinel?: string;
}

export interface ColumnEntry {
  readonly name: string;
  readonly number: ColumnNumber;
  readonly label: string;
}

// =============================================================================
// ColumnRegistry
// =============================================================================

export class ColumnRegistry {
  /** Identifier sentinel the registry was built with */
  public readonly sentinel: string;

  private readonly ordered: readonly ColumnEntry[];
  private readonly byName: ReadonlyMap<string, ColumnEntry>;

  /**
   * Entries must already be validated and numbered 1..n in order;
   * use {@link buildRegistry} instead of calling this directly.
   */
  constructor(entries: readonly ColumnEntry[], sentinel: string) {
    this.sentinel = sentinel;
    this.ordered = Object.freeze(entries.map(entry => Object.freeze({ ...entry })));
    this.byName = new Map(this.ordered.map(entry => [entry.name, entry]));
    Object.freeze(this);
  }

  /** Number of columns */
  get size(): number {
    return this.ordered.length;
  }

  names(): string[] {
    return this.ordered.map(entry => entry.name);
  }

  labels(): string[] {
    return this.ordered.map(entry => entry.label);
  }

  entries(): readonly ColumnEntry[] {
    return this.ordered;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  numberOf(name: string): ColumnNumber | undefined {
    return this.byName.get(name)?.number;
  }

  nameOf(column: ColumnNumber): string | undefined {
    return this.entry(column)?.name;
  }

  labelOf(name: string): string | undefined {
    return this.byName.get(name)?.label;
  }

  entry(column: ColumnNumber): ColumnEntry | undefined {
    if (!Number.isInteger(column) || column < 1) return undefined;
    return this.ordered[column - 1];
  }

  /**
   * Whether `token` has the shape of an identifier under this registry's
   * sentinel, whether or not it is registered.
   */
  isIdentifier(token: string): boolean {
    return isColumnIdentifier(token, this.sentinel);
  }

  /**
   * Column number of a numeric or named reference, or undefined when the
   * reference is outside the registry.
   */
  resolve(ref: ColumnRef): ColumnNumber | undefined {
    if (typeof ref === 'number') {
      return this.entry(ref)?.number;
    }
    return this.numberOf(ref);
  }

  /**
   * The identifier line and the label line, joined with `delimiter`.
   * Loading them ahead of the data gives header rows 1 and 2.
   */
  headerLines(delimiter: string): [string, string] {
    return [this.names().join(delimiter), this.labels().join(delimiter)];
  }
}

// =============================================================================
// Building
// =============================================================================

function collectNames(generator: ColumnNameGenerator): string[] {
  let output: Iterable<string> | string;
  try {
    output = generator();
  } catch (error) {
    throw ConfigurationError.generatorFailed(error);
  }

  const raw = typeof output === 'string' ? output.split('\n') : Array.from(output);
  return raw.map(name => name.trim()).filter(name => name !== '');
}

function lookupLabel(lookup: LabelLookup | undefined, name: string): string | undefined {
  if (lookup === undefined) return undefined;
  if (typeof lookup === 'function') return lookup(name);
  return Object.prototype.hasOwnProperty.call(lookup, name) ? lookup[name] : undefined;
}

/**
 * Build the column registry from the application's name generator.
 *
 * Column `i` is the i-th identifier produced. Labels come from
 * `labelLookup` with their namespace prefix stripped.
 *
 * @throws ConfigurationError when the generator is missing or fails, or when
 *         it yields no identifiers, a duplicate, or a malformed identifier
 */
export function buildRegistry(
  generator: ColumnNameGenerator | undefined,
  labelLookup?: LabelLookup,
  options: RegistryOptions = {}
): ColumnRegistry {
  const sentinel = options.sentinel ?? DEFAULT_IDENTIFIER_SENTINEL;
  assertValidSentinel(sentinel);

  if (typeof generator !== 'function') {
    throw ConfigurationError.missingGenerator();
  }

  const names = collectNames(generator);
  if (names.length === 0) {
    throw ConfigurationError.emptyColumnSet();
  }

  const seen = new Set<string>();
  const entries: ColumnEntry[] = names.map((name, index) => {
    const number = index + 1;
    if (!isColumnIdentifier(name, sentinel)) {
      throw ConfigurationError.malformedIdentifier(name, sentinel, number);
    }
    if (seen.has(name)) {
      throw ConfigurationError.duplicateIdentifier(name, number);
    }
    seen.add(name);
    return {
      name,
      number,
      label: stripLabelNamespace(lookupLabel(labelLookup, name)),
    };
  });

  return new ColumnRegistry(entries, sentinel);
}

/**
 * Label lookup over environment-style variables named `<prefix><identifier>`.
 *
 * @example
 * ```typescript
 * const lookup = createEnvLabelLookup({ i18n_col__JOB: 'hr:Role' });
 * buildRegistry(() => ['_JOB'], lookup).labelOf('_JOB'); // 'Role'
 * ```
 */
export function createEnvLabelLookup(
  env: Readonly<Record<string, string | undefined>> = process.env,
  prefix: string = DEFAULT_LABEL_ENV_PREFIX
): (name: string) => string | undefined {
  return (name: string) => env[`${prefix}${name}`];
}
