import { jest, describe, it, expect } from '@jest/globals';
import type { Table } from '../../../src/ai/types.js';

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const { analyzeTable, inferColumnKinds, cellKey, qualityScore, rowKey } = await import('../../../src/ai/tabularAnalyzer.js');
const { AnalysisError } = await import('../../../src/utils/errors.js');

const sales: Table = {
  columns: ['region', 'amount', 'units'],
  rows: [
    ['North', 100, 1],
    ['South', 200, 2],
    ['North', 300, 3],
    ['East', null, 4],
  ],
};

function largeTable(rowCount: number): Table {
  return {
    columns: ['value', 'doubled', 'group'],
    rows: Array.from({ length: rowCount }, (_, i) => [i % 1000, (i % 1000) * 2 + 1, `g${i % 7}`]),
  };
}

describe('inferColumnKinds', () => {
  it('treats a column of finite numbers with nulls as numeric', () => {
    expect(inferColumnKinds(sales)).toEqual(['categorical', 'numeric', 'numeric']);
  });

  it('treats an all-null column as categorical', () => {
    expect(inferColumnKinds({ columns: ['empty'], rows: [[null], [null]] })).toEqual(['categorical']);
  });

  it('treats a column with any non-number as categorical', () => {
    expect(inferColumnKinds({ columns: ['mixed'], rows: [[1], ['2']] })).toEqual(['categorical']);
  });
});

describe('cellKey', () => {
  it('uses ISO strings for dates', () => {
    expect(cellKey(new Date('2024-03-01T00:00:00Z'))).toBe('2024-03-01T00:00:00.000Z');
    expect(cellKey(true)).toBe('true');
  });
});

describe('analyzeTable', () => {
  describe('direct path', () => {
    const stats = analyzeTable(sales);

    it('computes exact numeric statistics over present values', () => {
      expect(stats.numeric.amount).toEqual({
        count: 3,
        missing: 1,
        sum: 600,
        mean: 200,
        std: 100,
        min: 100,
        max: 300,
        q1: 150,
        median: 200,
        q3: 250,
      });
    });

    it('interpolates quartiles', () => {
      expect(stats.numeric.units?.q1).toBe(1.75);
      expect(stats.numeric.units?.median).toBe(2.5);
      expect(stats.numeric.units?.q3).toBe(3.25);
      expect(stats.numeric.units?.std).toBeCloseTo(Math.sqrt(5 / 3), 12);
    });

    it('ranks categorical values by count then value', () => {
      expect(stats.categorical.region).toEqual({
        count: 4,
        missing: 0,
        cardinality: 3,
        cardinalityEstimated: false,
        topValues: [
          { value: 'North', count: 2 },
          { value: 'East', count: 1 },
          { value: 'South', count: 1 },
        ],
      });
    });

    it('correlates numeric columns over rows where both are present', () => {
      expect(stats.correlation?.columns).toEqual(['amount', 'units']);
      expect(stats.correlation?.values[0]?.[0]).toBe(1);
      expect(stats.correlation?.values[0]?.[1]).toBeCloseTo(1, 12);
      expect(stats.correlation?.values[1]?.[0]).toBeCloseTo(1, 12);
    });

    it('reports shape and path', () => {
      expect(stats.rowCount).toBe(4);
      expect(stats.columnCount).toBe(3);
      expect(stats.chunked).toBe(false);
      expect(stats.chunkCount).toBe(1);
    });

    it('omits the correlation matrix with fewer than two numeric columns', () => {
      const single = analyzeTable({ columns: ['region', 'amount'], rows: [['North', 1], ['South', 2]] });
      expect(single.correlation).toBeUndefined();
    });

    it('reports null correlation for a constant column', () => {
      const flat = analyzeTable({ columns: ['a', 'b'], rows: [[1, 5], [2, 5], [3, 5]] });
      expect(flat.correlation?.values[0]?.[1]).toBeNull();
    });
  });

  describe('chunked path', () => {
    const stats = analyzeTable(sales, { chunkSize: 2 });

    it('processes the table in chunks', () => {
      expect(stats.chunked).toBe(true);
      expect(stats.chunkCount).toBe(2);
    });

    it('merges chunk moments into the same statistics', () => {
      const amount = stats.numeric.amount;
      expect(amount?.count).toBe(3);
      expect(amount?.missing).toBe(1);
      expect(amount?.sum).toBe(600);
      expect(amount?.mean).toBeCloseTo(200, 9);
      expect(amount?.std).toBeCloseTo(100, 9);
      expect(amount?.median).toBe(200);
    });

    it('estimates categorical cardinality and keeps exact top values for few distinct values', () => {
      expect(stats.categorical.region).toEqual({
        count: 4,
        missing: 0,
        cardinality: 3,
        cardinalityEstimated: true,
        topValues: [
          { value: 'North', count: 2 },
          { value: 'East', count: 1 },
          { value: 'South', count: 1 },
        ],
      });
    });

    it('treats a table of exactly one chunk as chunked', () => {
      const exact = analyzeTable(sales, { chunkSize: 4 });
      expect(exact.chunked).toBe(true);
      expect(exact.chunkCount).toBe(1);
    });

    it('agrees with the direct path on a larger table', () => {
      const table = largeTable(25_000);
      const direct = analyzeTable(table, { chunkSize: Number.POSITIVE_INFINITY });
      const chunked = analyzeTable(table, { chunkSize: 10_000 });

      expect(direct.chunked).toBe(false);
      expect(chunked.chunkCount).toBe(3);

      const d = direct.numeric.value;
      const c = chunked.numeric.value;
      expect(c?.count).toBe(d?.count);
      expect(c?.sum).toBe(d?.sum);
      expect(c?.mean).toBeCloseTo(d?.mean ?? Number.NaN, 6);
      expect(c?.std).toBeCloseTo(d?.std ?? Number.NaN, 6);
      expect(c?.min).toBe(0);
      expect(c?.max).toBe(999);
      expect(d?.median).toBe(499.5);
      expect(Math.abs((c?.median ?? 0) - 499.5)).toBeLessThan(25);

      expect(chunked.correlation?.values[0]?.[1]).toBeCloseTo(1, 9);
      expect(chunked.categorical.group?.cardinality).toBe(7);
      expect(chunked.categorical.group?.topValues).toEqual(direct.categorical.group?.topValues);
    });
  });

  describe('data quality', () => {
    const repeated: Table = {
      columns: ['region', 'amount'],
      rows: [
        ['North', 100],
        ['North', 100],
        ['South', null],
        ['South', null],
      ],
    };

    it('reports missing percentages and a score for a clean table', () => {
      expect(analyzeTable(sales).quality).toEqual({
        duplicateRows: 0,
        duplicatePercentage: 0,
        missingPercentage: { region: 0, amount: 25, units: 0 },
        score: 83,
      });
    });

    it('counts repeated rows and caps both penalties', () => {
      expect(analyzeTable(repeated).quality).toEqual({
        duplicateRows: 2,
        duplicatePercentage: 50,
        missingPercentage: { region: 0, amount: 50 },
        score: 20,
      });
    });

    it('counts duplicates across chunk boundaries', () => {
      const quality = analyzeTable(repeated, { chunkSize: 3 }).quality;
      expect(quality.duplicateRows).toBe(2);
      expect(quality.score).toBe(20);
    });

    it('does not treat a number and its string form as the same row', () => {
      const quality = analyzeTable({ columns: ['v'], rows: [[1], ['1'], [null], [null]] }).quality;
      expect(quality.duplicateRows).toBe(1);
      expect(rowKey([1])).not.toBe(rowKey(['1']));
    });

    it('truncates the score and caps each penalty', () => {
      expect(qualityScore(0, 0)).toBe(100);
      expect(qualityScore(100, 100)).toBe(20);
      expect(qualityScore(10, 5.5)).toBe(74);
    });
  });

  describe('errors', () => {
    it('rejects a table without columns', () => {
      expect(() => analyzeTable({ columns: [], rows: [] })).toThrow('The table has no columns to analyse.');
    });

    it('rejects a table without rows', () => {
      expect(() => analyzeTable({ columns: ['a'], rows: [] })).toThrow(AnalysisError);
    });

    it('rejects a non-positive chunk size', () => {
      expect(() => analyzeTable(sales, { chunkSize: 0 })).toThrow('Invalid chunk size: 0');
    });
  });
});
