/**
 * Tests for Table: load, active range, filter, slice, select and print
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Table } from '../table.js';
import { TableStore } from '../store.js';
import { buildRegistry } from '../registry.js';
import { createTestLogger } from '../logging.js';
import {
  ConfigurationError,
  CorruptedStateError,
  ErrorCode,
  ExpressionError,
  SubstitutionLimitExceeded,
} from '../errors.js';

const registry = buildRegistry(() => ['_A', '_B']);
const LINES = ['1|x', '2|', '|y'];

function loadTable(options: { maxSubstitutions?: number } = {}): Table {
  return Table.load(registry, LINES, { fieldDelimiter: '|', ...options });
}

describe('Table', () => {
  let table: Table;

  beforeEach(() => {
    table = loadTable();
  });

  describe('load', () => {
    it('should activate every row and column', () => {
      expect(table.rowCount).toBe(3);
      expect(table.columnCount).toBe(2);
      expect(table.registry).toBe(registry);
      expect(table.getActiveRange()).toEqual({ rows: [1, 2, 3], columns: [1, 2] });
      expect(table.getInactiveRange()).toEqual({ rows: [], columns: [] });
    });

    it('should reject an invalid budget', () => {
      expect(() => loadTable({ maxSubstitutions: -1 })).toThrow(ConfigurationError);
    });

    it('should log a load trace', () => {
      const logger = createTestLogger();
      Table.load(registry, LINES, { fieldDelimiter: '|', logger });

      const [entry] = logger.getLogs();
      expect(entry?.level).toBe('debug');
      expect(entry?.message).toBe('table loaded');
      expect(entry?.context).toMatchObject({
        operation: 'load',
        rowsProcessed: 3,
        activeRows: 3,
        activeColumns: 2,
      });
    });
  });

  describe('print', () => {
    it('should fill absent cells', () => {
      expect(table.print('|', { naFill: 'NA' })).toEqual(['1|x', '2|NA', 'NA|y']);
    });

    it('should leave absent cells empty by default', () => {
      expect(table.print(',')).toEqual(['1,x', '2,', ',y']);
    });

    it('should prefix row numbers', () => {
      expect(table.print('|', { showRowNumber: true })).toEqual(['1|1|x', '2|2|', '3||y']);
    });

    it('should reject an empty delimiter', () => {
      expect(() => table.print('')).toThrow('Invalid output delimiter ""');
    });

    it('should print nothing for an empty range', () => {
      table.slice('-*');
      expect(table.print('|')).toEqual([]);
    });
  });

  describe('slice and select', () => {
    it('should narrow rows and columns', () => {
      table.slice('-2');
      expect(table.print('|', { naFill: 'NA' })).toEqual(['1|x', 'NA|y']);

      table.select('-_A');
      expect(table.print('|')).toEqual(['x', 'y']);
      expect(table.getInactiveRange()).toEqual({ rows: [2], columns: [1] });
    });

    it('should apply wildcards left to right', () => {
      table.slice('-* 3 1');
      expect(table.getActiveRange().rows).toEqual([1, 3]);
      table.slice(['*']);
      expect(table.getActiveRange().rows).toEqual([1, 2, 3]);
    });

    it('should select by number and identifier', () => {
      table.select('-* 2');
      expect(table.getActiveRange().columns).toEqual([2]);
      table.select(['+_A']);
      expect(table.getActiveRange().columns).toEqual([1, 2]);
    });

    it('should leave the range unchanged on failure', () => {
      expect(() => table.slice('1 x')).toThrow(ExpressionError);
      expect(() => table.select('-_A _Z')).toThrow('Unknown column identifier "_Z"');
      expect(table.getActiveRange()).toEqual({ rows: [1, 2, 3], columns: [1, 2] });
    });

    it('should enforce the select budget and warn', () => {
      const logger = createTestLogger();
      const logged = Table.load(registry, LINES, { fieldDelimiter: '|', logger });

      expect(() => logged.select('-_A -_B', 1)).toThrow(SubstitutionLimitExceeded);
      expect(logged.getActiveRange().columns).toEqual([1, 2]);

      const warnings = logger.getLogsByLevel('warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.message).toBe('select needs 2 identifier substitutions, limit is 1');
      expect(warnings[0]?.context).toMatchObject({
        name: 'SubstitutionLimitExceeded',
        code: ErrorCode.SUBSTITUTION_LIMIT_EXCEEDED,
        errorCode: ErrorCode.SUBSTITUTION_LIMIT_EXCEEDED,
        details: { operation: 'select', limit: 1, required: 2 },
      });
    });

    it('should accept a budget equal to the identifier count', () => {
      table.select('-_A -_B', 2);
      expect(table.getActiveRange().columns).toEqual([]);
    });
  });

  describe('filter', () => {
    it('should keep rows that satisfy the expression', () => {
      table.filter('_A -gt 1');
      expect(table.getActiveRange()).toEqual({ rows: [2], columns: [1, 2] });
      expect(table.getInactiveRange()).toEqual({ rows: [1, 3], columns: [] });
    });

    it('should test non-empty cells', () => {
      table.filter('_B');
      expect(table.print('|')).toEqual(['1|x', '|y']);
    });

    it('should read inactive columns as empty', () => {
      table.select('-_B');
      table.filter('_B == y');
      expect(table.getActiveRange().rows).toEqual([]);
    });

    it('should only narrow the active rows', () => {
      table.slice('-1');
      table.filter('_A == 1 || _B == y');
      expect(table.getActiveRange().rows).toEqual([3]);
    });

    it('should use the table default budget', () => {
      const strict = loadTable({ maxSubstitutions: 1 });
      expect(() => strict.filter('_A == _B')).toThrow(SubstitutionLimitExceeded);
      strict.filter('_A == _B', 2);
      expect(strict.getActiveRange().rows).toEqual([]);
    });

    it('should leave the range unchanged on failure', () => {
      expect(() => table.filter('_A ==')).toThrow(ExpressionError);
      expect(() => table.filter('_Z')).toThrow('Unknown column identifier "_Z"');
      expect(table.getActiveRange().rows).toEqual([1, 2, 3]);
    });

    it('should not parse anything when the range is empty', () => {
      table.select('-*');
      expect(() => table.filter('_A &')).not.toThrow();
      expect(() => table.slice('nonsense')).not.toThrow();
      expect(() => table.select('_Z')).not.toThrow();
      expect(table.getActiveRange()).toEqual({ rows: [1, 2, 3], columns: [] });
    });

    it('should accept callback predicates', () => {
      table.filter(row => row.get('_B') === 'x' || row.rowNumber === 3);
      expect(table.getActiveRange().rows).toEqual([1, 3]);
    });

    it('should resolve callback references', () => {
      const seen: string[] = [];
      table.filter(row => {
        seen.push(`${row.get(1)}/${row.get(9)}`);
        return true;
      });
      expect(seen).toEqual(['1/', '2/', '/']);
      expect(() => table.filter(row => row.get('_Z') === '')).toThrow(ExpressionError);
    });

    it('should return rows in ascending order', () => {
      table.setActiveRange({ rows: [3, 1, 2], columns: [1, 2] });
      table.filter(() => true);
      expect(table.getActiveRange().rows).toEqual([1, 2, 3]);
    });

    it('should log a filter trace', () => {
      const logger = createTestLogger();
      const logged = Table.load(registry, LINES, { fieldDelimiter: '|', logger });
      logged.filter('_A');

      const entry = logger.getLogs().find(log => log.message === 'filter applied');
      expect(entry?.context).toMatchObject({
        operation: 'filter',
        rowsProcessed: 3,
        activeRows: 2,
        activeColumns: 2,
      });
    });
  });

  describe('active range', () => {
    it('should round-trip through get and set', () => {
      table.slice('-2');
      const token = table.getActiveRange();
      table.setActiveRange(token);
      expect(table.getActiveRange()).toEqual(token);
    });

    it('should restore an earlier snapshot', () => {
      const before = table.getActiveRange();
      table.filter('_A == 2');
      table.setActiveRange(before);
      expect(table.print('|')).toEqual(['1|x', '2|', '|y']);
    });

    it('should print rows outside the table as absent', () => {
      table.setActiveRange({ rows: [5], columns: [1, 2] });
      expect(table.print('|', { naFill: '-' })).toEqual(['-|-']);
    });

    it('should report unregistered columns as corrupted state', () => {
      table.setActiveRange({ rows: [1], columns: [3] });
      try {
        table.print('|');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CorruptedStateError);
        expect(error).toMatchObject({ code: ErrorCode.COLUMN_OUT_OF_RANGE });
      }
      expect(() => table.filter('$1')).toThrow(CorruptedStateError);
    });
  });

  describe('cell access', () => {
    it('should read cells regardless of the active range', () => {
      table.select('-*');
      expect(table.getCell(3, 2)).toBe('y');
      expect(table.getCell(1, '_A')).toBe('1');
      expect(table.getCell(2, '_B')).toBeUndefined();
      expect(table.getCell(4, 1)).toBeUndefined();
      expect(table.getCell(1, '_Z')).toBeUndefined();
    });

    it('should read whole columns and rows', () => {
      expect(table.getColumnValues('_A')).toEqual(['1', '2', undefined]);
      expect(table.getColumnValues('_Z')).toEqual([]);
      expect(table.getRowValues(3)).toEqual([undefined, 'y']);
      expect(table.getRowValues(0)).toEqual([]);
    });
  });

  describe('fromStore', () => {
    it('should detect storage that disagrees with the registry', () => {
      const store = new TableStore(
        registry,
        [
          { name: '_A', columnNumber: 1, cells: new Map([[1, 'a']]) },
          { name: '_B', columnNumber: 7, cells: new Map([[1, 'b']]) },
        ],
        1
      );
      const corrupted = Table.fromStore(store);
      expect(corrupted.getActiveRange()).toEqual({ rows: [1], columns: [1, 2] });
      expect(() => corrupted.print('|')).toThrow('Column "_B" is stored as number 7 but registered as 2');
    });
  });

  describe('empty sentinel', () => {
    it('should address registered plain names', () => {
      const plain = buildRegistry(() => ['NAME', 'JOB'], undefined, { sentinel: '' });
      const jobs = Table.load(plain, ['ann|dev', 'bob|ops'], { fieldDelimiter: '|' });

      jobs.filter('JOB == d*');
      expect(jobs.print('|')).toEqual(['ann|dev']);

      jobs.select('-NAME');
      expect(jobs.print('|')).toEqual(['dev']);
    });
  });
});
