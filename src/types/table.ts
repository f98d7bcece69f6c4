/**
 * Series table and frame types shared by the resampler, rank smoother and
 * layout engine.
 */

// ─── Input ───────────────────────────────────────────────────────────

/** One long-format observation: a series value at an instant. */
export interface Observation {
  /** Unix seconds */
  timestamp: number;
  series: string;
  /** Fraction in [0, 1], or null when the source had no value */
  value: number | null;
}

/** One row of the wide table. A series absent from `values` is missing. */
export interface SeriesRow {
  /** Unix seconds */
  timestamp: number;
  values: ReadonlyMap<string, number | null>;
}

/** Rectangular time × series table, rows in ascending timestamp order. */
export interface SeriesTable {
  /** Series names in display order; unique. */
  series: readonly string[];
  rows: readonly SeriesRow[];
}

// ─── Frames ──────────────────────────────────────────────────────────

/** Interpolated value for every requested series at one output frame. */
export type FrameValues = ReadonlyMap<string, number>;

export interface ResampleResult {
  frames: FrameValues[];
  /** Unix seconds, possibly fractional */
  timestamps: number[];
}

/** Fractional vertical slot per series; 0 is the top row. */
export type SlotPositions = ReadonlyMap<string, number>;

/** One output instant: the frame's values and its interpolated timestamp. */
export interface Frame {
  values: FrameValues;
  /** Unix seconds */
  timestamp: number;
}
