/**
 * Tests for stream helpers
 */

import { describe, it, expect } from 'vitest';
import { Readable, Writable } from 'node:stream';
import { loadTableFromStream, printTo, readLines, writeLines } from '../io.js';
import { buildRegistry } from '../registry.js';

const registry = buildRegistry(() => ['_A', '_B']);

function collector(options: { highWaterMark?: number; async?: boolean } = {}): {
  output: Writable;
  chunks: string[];
} {
  const chunks: string[] = [];
  const output = new Writable({
    highWaterMark: options.highWaterMark,
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      if (options.async) {
        setImmediate(callback);
      } else {
        callback();
      }
    },
  });
  return { output, chunks };
}

describe('readLines', () => {
  it('should join lines split across chunks', async () => {
    expect(await readLines(Readable.from(['1|x\n2|', '\n|y\n']))).toEqual(['1|x', '2|', '|y']);
  });

  it('should accept CRLF endings and a missing final newline', async () => {
    expect(await readLines(Readable.from(['a\r\nb\r\n']))).toEqual(['a', 'b']);
    expect(await readLines(Readable.from(['a\nb']))).toEqual(['a', 'b']);
  });

  it('should read async iterables of buffers', async () => {
    async function* chunks(): AsyncGenerator<Buffer> {
      yield Buffer.from('p|q\n');
      yield Buffer.from('r|s\n');
    }
    expect(await readLines(chunks())).toEqual(['p|q', 'r|s']);
  });

  it('should read an empty stream', async () => {
    expect(await readLines(Readable.from([]))).toEqual([]);
  });
});

describe('loadTableFromStream', () => {
  it('should load every line', async () => {
    const table = await loadTableFromStream(registry, Readable.from(['1|x\n2|\n|y\n']), { fieldDelimiter: '|' });
    expect(table.rowCount).toBe(3);
    expect(table.print('|', { naFill: 'NA' })).toEqual(['1|x', '2|NA', 'NA|y']);
  });
});

describe('writeLines', () => {
  it('should terminate each line', async () => {
    const { output, chunks } = collector();
    await writeLines(output, ['a', 'b']);
    expect(chunks).toEqual(['a\n', 'b\n']);
  });

  it('should wait for drain on a full buffer', async () => {
    const { output, chunks } = collector({ highWaterMark: 1, async: true });
    await writeLines(output, ['a', 'b', 'c']);
    expect(chunks).toEqual(['a\n', 'b\n', 'c\n']);
  });
});

describe('printTo', () => {
  it('should write printed lines', async () => {
    const table = await loadTableFromStream(registry, Readable.from(['1|x\n2|\n|y\n']), { fieldDelimiter: '|' });
    table.slice('-1');

    const { output, chunks } = collector();
    await printTo(output, table, ';', { naFill: '-', showRowNumber: true });
    expect(chunks.join('')).toBe('2;2;-\n3;-;y\n');
  });
});
