import { describe, it, expect } from 'vitest';
import {
  createSeriesTable,
  fillGaps,
  pivotObservations,
  tableTimeRange,
} from '../../src/data/table.js';
import { InvalidTableError } from '../../src/utils/errors.js';
import type { SeriesTable } from '../../src/types/table.js';

function column(table: SeriesTable, series: string): (number | null | undefined)[] {
  return table.rows.map(row => row.values.get(series));
}

describe('createSeriesTable', () => {
  it('should sort rows by timestamp', () => {
    const table = createSeriesTable(
      ['A'],
      [
        { timestamp: 30, values: new Map([['A', 0.3]]) },
        { timestamp: 10, values: new Map([['A', 0.1]]) },
        { timestamp: 20, values: new Map([['A', 0.2]]) },
      ]
    );
    expect(table.rows.map(r => r.timestamp)).toEqual([10, 20, 30]);
    expect(column(table, 'A')).toEqual([0.1, 0.2, 0.3]);
  });

  it('should reject duplicate series names', () => {
    expect(() => createSeriesTable(['A', 'A'], [])).toThrow(InvalidTableError);
  });

  it('should reject cells for unknown series', () => {
    expect(() =>
      createSeriesTable(['A'], [{ timestamp: 0, values: new Map([['B', 0.1]]) }])
    ).toThrow('Row 0 references unknown series "B"');
  });

  it('should reject non-finite timestamps and values', () => {
    expect(() =>
      createSeriesTable(['A'], [{ timestamp: Number.NaN, values: new Map() }])
    ).toThrow(InvalidTableError);
    expect(() =>
      createSeriesTable(['A'], [{ timestamp: 0, values: new Map([['A', Infinity]]) }])
    ).toThrow(InvalidTableError);
  });

  it('should allow missing cells', () => {
    const table = createSeriesTable(['A', 'B'], [{ timestamp: 0, values: new Map([['A', null]]) }]);
    expect(table.rows[0].values.get('A')).toBeNull();
    expect(table.rows[0].values.has('B')).toBe(false);
  });
});

describe('pivotObservations', () => {
  it('should order series by first appearance and rows by time', () => {
    const table = pivotObservations([
      { timestamp: 200, series: 'Zed', value: 0.4 },
      { timestamp: 100, series: 'Amy', value: 0.6 },
      { timestamp: 100, series: 'Zed', value: 0.3 },
      { timestamp: 200, series: 'Amy', value: 0.5 },
    ]);
    expect(table.series).toEqual(['Zed', 'Amy']);
    expect(table.rows.map(r => r.timestamp)).toEqual([100, 200]);
    expect(column(table, 'Zed')).toEqual([0.3, 0.4]);
    expect(column(table, 'Amy')).toEqual([0.6, 0.5]);
  });

  it('should keep the last value for repeated timestamps', () => {
    const table = pivotObservations([
      { timestamp: 100, series: 'A', value: 0.1 },
      { timestamp: 100, series: 'A', value: 0.2 },
      { timestamp: 100, series: 'A', value: null },
    ]);
    expect(column(table, 'A')).toEqual([0.2]);
  });

  it('should forward fill then back fill gaps', () => {
    const table = pivotObservations([
      { timestamp: 1, series: 'A', value: 0.5 },
      { timestamp: 2, series: 'B', value: 0.2 },
      { timestamp: 3, series: 'A', value: 0.7 },
      { timestamp: 4, series: 'B', value: 0.1 },
    ]);
    expect(column(table, 'A')).toEqual([0.5, 0.5, 0.7, 0.7]);
    expect(column(table, 'B')).toEqual([0.2, 0.2, 0.2, 0.1]);
  });

  it('should leave a series with no values missing everywhere', () => {
    const table = pivotObservations([
      { timestamp: 1, series: 'A', value: 0.5 },
      { timestamp: 2, series: 'Ghost', value: null },
    ]);
    expect(column(table, 'Ghost')).toEqual([null, null]);
  });

  it('should return an empty table for no observations', () => {
    expect(pivotObservations([])).toEqual({ series: [], rows: [] });
  });

  it('should reject non-finite input', () => {
    expect(() => pivotObservations([{ timestamp: Infinity, series: 'A', value: 0.1 }])).toThrow(
      InvalidTableError
    );
    expect(() => pivotObservations([{ timestamp: 0, series: 'A', value: Number.NaN }])).toThrow(
      InvalidTableError
    );
  });
});

describe('fillGaps', () => {
  it('should fill interior and trailing gaps forward', () => {
    expect(fillGaps([0.1, null, 0.3, null])).toEqual([0.1, 0.1, 0.3, 0.3]);
  });

  it('should fill leading gaps backward', () => {
    expect(fillGaps([null, null, 0.4, null])).toEqual([0.4, 0.4, 0.4, 0.4]);
  });

  it('should not change the input', () => {
    const input = [null, 0.2];
    fillGaps(input);
    expect(input).toEqual([null, 0.2]);
  });
});

describe('tableTimeRange', () => {
  it('should return the first and last timestamps', () => {
    const table = pivotObservations([
      { timestamp: 50, series: 'A', value: 0.1 },
      { timestamp: 10, series: 'A', value: 0.2 },
    ]);
    expect(tableTimeRange(table)).toEqual({ start: 10, end: 50 });
  });

  it('should return null for an empty table', () => {
    expect(tableTimeRange({ series: [], rows: [] })).toBeNull();
  });
});
