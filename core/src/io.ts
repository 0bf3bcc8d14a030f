/**
 * @activetable/core - Stream helpers
 *
 * Line-oriented adapters between Node.js streams and the synchronous table
 * API. Input is consumed completely before Load runs.
 */

import { once } from 'node:events';
import { createInterface } from 'node:readline';
import { Readable, type Writable } from 'node:stream';
import type { ColumnRegistry } from './registry.js';
import { Table } from './table.js';
import type { PrintOptions, TableOptions } from './types.js';

/** Readable stream, or any async iterable of text chunks */
export type LineSource = Readable | AsyncIterable<string | Buffer>;

/**
 * Collect the lines of `input`, without their terminators. `\r\n` endings
 * are accepted.
 *
 * @example
 * ```typescript
 * await readLines(Readable.from(['1|x\n2|', '\n|y\n'])); // ['1|x', '2|', '|y']
 * ```
 */
export async function readLines(input: LineSource): Promise<string[]> {
  const stream = input instanceof Readable ? input : Readable.from(input);
  const reader = createInterface({ input: stream, crlfDelay: Infinity });
  const lines: string[] = [];
  for await (const line of reader) {
    lines.push(line);
  }
  return lines;
}

/**
 * Read every line of `input`, then {@link Table.load} them.
 */
export async function loadTableFromStream(
  registry: ColumnRegistry,
  input: LineSource,
  options: TableOptions
): Promise<Table> {
  const lines = await readLines(input);
  return Table.load(registry, lines, options);
}

/**
 * Write each line followed by a newline, waiting for `drain` when the
 * stream buffers.
 */
export async function writeLines(output: Writable, lines: Iterable<string>): Promise<void> {
  for (const line of lines) {
    if (!output.write(`${line}\n`)) {
      await once(output, 'drain');
    }
  }
}

/**
 * Print `table` and write the lines to `output`.
 *
 * @example
 * ```typescript
 * await printTo(process.stdout, table, '|', { naFill: 'NA', showRowNumber: true });
 * ```
 */
export async function printTo(
  output: Writable,
  table: Table,
  outputDelimiter: string,
  options: PrintOptions = {}
): Promise<void> {
  await writeLines(output, table.print(outputDelimiter, options));
}
