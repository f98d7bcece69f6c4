/**
 * Series table construction.
 *
 * Builds the wide time × series table the animation engine consumes, either
 * from rows the caller already has or by pivoting long-format observations.
 */

import type { Observation, SeriesRow, SeriesTable } from '../types/table.js';
import { InvalidTableError } from '../utils/errors.js';

// ─── Wide Tables ─────────────────────────────────────────────────────

/**
 * Validate a wide table and return it with rows sorted by timestamp.
 * Equal timestamps keep their input order.
 */
export function createSeriesTable(
  series: readonly string[],
  rows: readonly SeriesRow[]
): SeriesTable {
  const known = new Set<string>();
  for (const name of series) {
    if (known.has(name)) {
      throw new InvalidTableError(`Duplicate series name "${name}"`);
    }
    known.add(name);
  }

  rows.forEach((row, index) => {
    if (!Number.isFinite(row.timestamp)) {
      throw new InvalidTableError(`Row ${index} has a non-finite timestamp`);
    }
    for (const [name, value] of row.values) {
      if (!known.has(name)) {
        throw new InvalidTableError(`Row ${index} references unknown series "${name}"`);
      }
      if (value !== null && !Number.isFinite(value)) {
        throw new InvalidTableError(`Row ${index} has a non-finite value for "${name}"`);
      }
    }
  });

  const sorted = [...rows].sort((a, b) => a.timestamp - b.timestamp);
  return { series: [...series], rows: sorted };
}

// ─── Long → Wide ─────────────────────────────────────────────────────

/**
 * Pivot long-format observations into a wide table.
 *
 * - one row per distinct timestamp, ascending
 * - series ordered by first appearance
 * - duplicate (timestamp, series) pairs: the last non-null value wins
 * - gaps are forward-filled per series, then leading gaps back-filled
 *
 * A series with no value anywhere stays missing in every row.
 */
export function pivotObservations(observations: readonly Observation[]): SeriesTable {
  const series: string[] = [];
  const seen = new Set<string>();
  const byTime = new Map<number, Map<string, number | null>>();

  for (const obs of observations) {
    if (!Number.isFinite(obs.timestamp)) {
      throw new InvalidTableError(`Observation for "${obs.series}" has a non-finite timestamp`);
    }
    if (obs.value !== null && !Number.isFinite(obs.value)) {
      throw new InvalidTableError(
        `Observation for "${obs.series}" at ${obs.timestamp} has a non-finite value`
      );
    }
    if (!seen.has(obs.series)) {
      seen.add(obs.series);
      series.push(obs.series);
    }
    let cells = byTime.get(obs.timestamp);
    if (!cells) {
      cells = new Map();
      byTime.set(obs.timestamp, cells);
    }
    const existing = cells.get(obs.series);
    if (obs.value !== null || existing === undefined) {
      cells.set(obs.series, obs.value);
    }
  }

  const timestamps = [...byTime.keys()].sort((a, b) => a - b);
  const columns = new Map<string, (number | null)[]>();
  for (const name of series) {
    const column = timestamps.map(ts => byTime.get(ts)?.get(name) ?? null);
    columns.set(name, fillGaps(column));
  }

  const rows: SeriesRow[] = timestamps.map((timestamp, rowIndex) => {
    const values = new Map<string, number | null>();
    for (const name of series) {
      values.set(name, columns.get(name)?.[rowIndex] ?? null);
    }
    return { timestamp, values };
  });

  return { series, rows };
}

/** Forward fill, then back fill the leading run. */
export function fillGaps(column: readonly (number | null)[]): (number | null)[] {
  const out = [...column];
  let last: number | null = null;
  for (let i = 0; i < out.length; i++) {
    const value = out[i];
    if (value === null || value === undefined) {
      out[i] = last;
    } else {
      last = value;
    }
  }
  let next: number | null = null;
  for (let i = out.length - 1; i >= 0; i--) {
    const value = out[i];
    if (value === null || value === undefined) {
      out[i] = next;
    } else {
      next = value;
    }
  }
  return out;
}

/** Earliest and latest timestamps, or null for an empty table. */
export function tableTimeRange(table: SeriesTable): { start: number; end: number } | null {
  if (table.rows.length === 0) return null;
  return {
    start: table.rows[0].timestamp,
    end: table.rows[table.rows.length - 1].timestamp,
  };
}
