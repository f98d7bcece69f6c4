/**
 * Temporal resampling of an irregular series table onto a uniform frame grid.
 */

import type { FrameValues, ResampleResult, SeriesTable } from '../types/table.js';
import { InvalidTableError } from '../utils/errors.js';
import { lerp, linspace } from '../utils/math.js';

function cell(table: SeriesTable, row: number, series: string): number {
  const value = table.rows[row].values.get(series);
  if (value === null || value === undefined) return 0;
  if (!Number.isFinite(value)) {
    throw new InvalidTableError(`Non-finite value for "${series}" in row ${row}`);
  }
  return value;
}

/**
 * Resample `table` into exactly `frameCount` frames by linear interpolation
 * between the two rows bracketing each evenly spaced fractional row index.
 *
 * Missing cells count as 0 on both sides of the interpolation; gaps are not
 * estimated. Tables with fewer than two rows produce no frames.
 *
 * @param series - Series to carry into every frame (defaults to all)
 */
export function resample(
  table: SeriesTable,
  frameCount: number,
  series: readonly string[] = table.series
): ResampleResult {
  const rowCount = table.rows.length;
  if (rowCount < 2 || frameCount < 1) {
    return { frames: [], timestamps: [] };
  }

  const frames: FrameValues[] = [];
  const timestamps: number[] = [];

  for (const idx of linspace(0, rowCount - 1, frameCount)) {
    const lower = Math.floor(idx);
    const upper = Math.min(Math.ceil(idx), rowCount - 1);
    const t = idx - lower;

    const values = new Map<string, number>();
    for (const name of series) {
      values.set(name, lerp(cell(table, lower, name), cell(table, upper, name), t));
    }

    const lowerTs = table.rows[lower].timestamp;
    const upperTs = table.rows[upper].timestamp;
    frames.push(values);
    timestamps.push(lower === upper ? lowerTs : lerp(lowerTs, upperTs, t));
  }

  return { frames, timestamps };
}
