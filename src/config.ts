/**
 * Configuration constants and render option resolution.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from './utils/errors.js';

// ─── Constants ───────────────────────────────────────────────────────

/** Canvas presets. Only the square social format is supported. */
export const CHART_FORMATS = {
  square: { width: 1080, height: 1080, dpi: 100 },
} as const;

export type ChartFormat = keyof typeof CHART_FORMATS;

export function isChartFormat(value: string): value is ChartFormat {
  return Object.hasOwn(CHART_FORMATS, value);
}

export const VIDEO_CONFIG = {
  codec: 'libx264',
  bitrateKbps: 8000,
  pixelFormat: 'yuv420p',
} as const;

export const DEFAULT_ATTRIBUTION = 'PER MARKET DATA';

/** Fraction of the sequence shown by a preview still. */
export const PREVIEW_FRAME_POSITION = 0.8;

const SERIES_TITLES: Readonly<Record<string, string>> = {
  KXMICHCOACH: "WHO WILL BE MICHIGAN'S NEXT HEAD COACH?",
  KXPRESWIN: 'WHO WILL WIN THE 2024 PRESIDENTIAL ELECTION?',
  KXFEDRATE: 'WHAT WILL THE FED DO WITH INTEREST RATES?',
  KXSUPERBOWL: 'WHO WILL WIN THE SUPER BOWL?',
  KXNFLMVP: 'WHO WILL WIN NFL MVP?',
};

/**
 * Title for a market series: the curated one when known, otherwise the
 * ticker without its `KX` prefix and underscores.
 */
export function getDefaultTitle(seriesTicker: string): string {
  const known = SERIES_TITLES[seriesTicker];
  if (known) return known;
  const cleaned = seriesTicker.replace(/KX/g, '').replace(/_/g, ' ');
  return `${cleaned.toUpperCase()} MARKET`;
}

// ─── Options ─────────────────────────────────────────────────────────

export const renderOptionsSchema = z.object({
  title: z.string(),
  /** Keep only the first N displayed series */
  maxCandidates: z.number().int().positive().default(8),
  fps: z.number().int().positive().default(30),
  /** Seconds */
  duration: z.number().positive().finite().default(8),
  format: z.enum(['square']).default('square'),
  showGridlines: z.boolean().default(true),
  /** Explicit display list; defaults to the table's series order */
  series: z.array(z.string().min(1)).min(1).optional(),
  attribution: z.string().default(DEFAULT_ATTRIBUTION),
});

/** Options as callers pass them; everything but `title` has a default. */
export type RenderOptions = z.input<typeof renderOptionsSchema>;

/** Fully resolved, immutable settings for one render. */
export interface RenderConfig {
  readonly width: number;
  readonly height: number;
  readonly dpi: number;
  readonly fps: number;
  /** Seconds */
  readonly duration: number;
  readonly frameCount: number;
  readonly showGridlines: boolean;
  readonly title: string;
  readonly attribution: string;
  /** Displayed series in their natural (slot 0..k-1) order */
  readonly series: readonly string[];
}

export function frameCountFor(fps: number, duration: number): number {
  return Math.round(fps * duration);
}

/**
 * Validate options against the table's series and resolve them into a
 * RenderConfig. Fails before any rendering starts.
 */
export function resolveRenderConfig(
  options: RenderOptions,
  tableSeries: readonly string[]
): RenderConfig {
  const parsed = renderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }
  const data = parsed.data;
  const issues: string[] = [];

  const frameCount = frameCountFor(data.fps, data.duration);
  if (frameCount < 1) {
    issues.push(`duration: ${data.fps} fps × ${data.duration}s yields no frames`);
  }

  let selected: readonly string[] = tableSeries;
  if (data.series) {
    const known = new Set(tableSeries);
    const seen = new Set<string>();
    for (const name of data.series) {
      if (!known.has(name)) {
        issues.push(`series: unknown series "${name}"`);
      } else if (seen.has(name)) {
        issues.push(`series: "${name}" is listed twice`);
      }
      seen.add(name);
    }
    selected = data.series;
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  const format = CHART_FORMATS[data.format];
  return {
    width: format.width,
    height: format.height,
    dpi: format.dpi,
    fps: data.fps,
    duration: data.duration,
    frameCount,
    showGridlines: data.showGridlines,
    title: data.title.toUpperCase(),
    attribution: data.attribution,
    series: selected.slice(0, data.maxCandidates),
  };
}
