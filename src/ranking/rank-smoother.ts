/**
 * Rank smoothing.
 *
 * Each frame the displayed series are ranked by value; every series' vertical
 * slot then moves a fixed fraction of the way toward its new rank, so bars
 * slide instead of jumping. The slot state lives in one RankSmoother per
 * render; nothing here is shared between renders.
 */

import type { FrameValues, SlotPositions } from '../types/table.js';
import { lerp } from '../utils/math.js';

export const DEFAULT_SMOOTHING_FACTOR = 0.15;

/**
 * Target slot per series: order by value descending, ties keep the order of
 * `series`. Series absent from the frame rank as 0.
 */
export function rankTargets(
  frame: FrameValues,
  series: readonly string[]
): Map<string, number> {
  const ranked = series
    .map(name => ({ name, value: frame.get(name) ?? 0 }))
    .sort((a, b) => b.value - a.value);
  return new Map(ranked.map((entry, slot) => [entry.name, slot]));
}

export class RankSmoother {
  private readonly series: readonly string[];
  private readonly factor: number;
  private slots: Map<string, number>;

  /**
   * @param series - Displayed series; slot `i` is the i-th series' start position
   * @param factor - Share of the remaining distance covered per frame, in (0, 1]
   */
  constructor(series: readonly string[], factor = DEFAULT_SMOOTHING_FACTOR) {
    if (!(factor > 0 && factor <= 1)) {
      throw new RangeError(`Smoothing factor must be in (0, 1], got ${factor}`);
    }
    this.series = [...series];
    this.factor = factor;
    this.slots = new Map(this.series.map((name, index) => [name, index]));
  }

  /** Current slots without advancing. */
  positions(): SlotPositions {
    return new Map(this.slots);
  }

  /** Rank `frame`, ease every slot toward its target and return the new slots. */
  advance(frame: FrameValues): SlotPositions {
    const targets = rankTargets(frame, this.series);
    const next = new Map<string, number>();
    for (const name of this.series) {
      const target = targets.get(name) ?? 0;
      const current = this.slots.get(name) ?? target;
      next.set(name, lerp(current, target, this.factor));
    }
    this.slots = next;
    return new Map(next);
  }
}

/**
 * Run a fresh smoother over the whole frame sequence and return the slots
 * after each frame. Frames can be rendered independently afterwards.
 */
export function smoothRanks(
  frames: readonly FrameValues[],
  series: readonly string[],
  factor = DEFAULT_SMOOTHING_FACTOR
): SlotPositions[] {
  const smoother = new RankSmoother(series, factor);
  return frames.map(frame => smoother.advance(frame));
}
