/**
 * Frame Layout Engine
 *
 * Turns one frame's values and eased slots into a RenderPlan: axis range,
 * gridlines, bar rectangles and every text placement, in canvas pixels. Pure;
 * the same inputs always give the same plan.
 *
 * Geometry is defined in axes fractions with the origin at the bottom-left
 * and mapped to pixels (origin top-left) at the end.
 */

import { max } from 'd3-array';
import { scaleLinear } from 'd3-scale';
import type { RenderConfig } from '../config.js';
import type {
  BarPlacement,
  GridlinePlacement,
  RenderPlan,
  TextPlacement,
} from '../types/plan.js';
import type { Frame, FrameValues, SlotPositions } from '../types/table.js';
import { ptToPx } from '../utils/math.js';
import {
  ATTRIBUTION_ALPHA,
  COLORS,
  FONT_SIZES_PT,
  GRIDLINE_ALPHA,
  HIGHLIGHT_ALPHA,
} from '../render/theme.js';
import { formatGridLabel, formatPercent, formatSeriesName, formatTimestamp } from './format.js';

// ─── Constants ───────────────────────────────────────────────────────

export const LAYOUT = {
  nameEndX: 0.26,
  barStartX: 0.28,
  barEndX: 0.82,
  valueGapX: 0.02,
  chartTop: 0.8,
  chartBottom: 0.15,
  maxBarHeight: 0.06,
  barFill: 0.8,
  minBarWidth: 0.01,
  highlightMinWidth: 0.02,
  barRadius: 0.008,
  gridLabelGap: 0.02,
  titleY: 0.92,
  timestampY: 0.04,
  attributionY: 0.015,
  logoX: 0.04,
  logoY: 0.04,
} as const;

const AXIS_HEADROOM = 1.1;
const EMPTY_AXIS_MAX = 0.1;
const GRID_EPSILON = 1e-9;

// ─── Scale ───────────────────────────────────────────────────────────

/** Largest positive value plus 10% headroom; 0.1 before headroom when none is positive. */
export function computeAxisMax(values: FrameValues): number {
  const peak = max([...values.values()].filter(v => v > 0));
  return (peak ?? EMPTY_AXIS_MAX) * AXIS_HEADROOM;
}

/** Gridline spacing: finer steps for smaller axes. */
export function selectGridStep(axisMax: number): number {
  if (axisMax <= 0.1) return 0.02;
  if (axisMax <= 0.25) return 0.05;
  if (axisMax <= 0.5) return 0.1;
  return 0.2;
}

/** Multiples of `step` from `step` up to `axisMax`. */
export function gridValues(axisMax: number, step: number): number[] {
  const out: number[] = [];
  for (let k = 1; k * step <= axisMax + GRID_EPSILON; k++) {
    out.push(k * step);
  }
  return out;
}

// ─── Layout ──────────────────────────────────────────────────────────

export type LayoutConfig = Pick<
  RenderConfig,
  'width' | 'height' | 'dpi' | 'showGridlines' | 'title' | 'attribution' | 'series'
>;

export function layoutFrame(
  frame: Frame,
  positions: SlotPositions,
  config: LayoutConfig
): RenderPlan {
  const { width: W, height: H, dpi } = config;
  const px = (x: number) => x * W;
  const py = (y: number) => (1 - y) * H;
  const text = (
    value: string,
    x: number,
    y: number,
    opts: Pick<TextPlacement, 'align' | 'color' | 'weight'> &
      Partial<Pick<TextPlacement, 'baseline' | 'alpha'>> & { sizePt: number }
  ): TextPlacement => ({
    text: value,
    x: px(x),
    y: py(y),
    align: opts.align,
    baseline: opts.baseline ?? 'middle',
    color: opts.color,
    fontSize: ptToPx(opts.sizePt, dpi),
    weight: opts.weight,
    alpha: opts.alpha ?? 1,
  });

  const axisMax = computeAxisMax(frame.values);
  const gridStep = selectGridStep(axisMax);
  const barStart = px(LAYOUT.barStartX);
  const xScale = scaleLinear()
    .domain([0, axisMax])
    .range([barStart, px(LAYOUT.barEndX)]);

  // Gridlines
  const gridlines: GridlinePlacement[] = [];
  if (config.showGridlines) {
    for (const value of gridValues(axisMax, gridStep)) {
      const x = xScale(value);
      gridlines.push({
        value,
        x,
        top: py(LAYOUT.chartTop),
        bottom: py(LAYOUT.chartBottom),
        color: COLORS.gridline,
        alpha: GRIDLINE_ALPHA,
        label: {
          ...text(formatGridLabel(value), 0, LAYOUT.chartTop + LAYOUT.gridLabelGap, {
            align: 'center',
            baseline: 'bottom',
            color: COLORS.textGray,
            weight: 'normal',
            sizePt: FONT_SIZES_PT.gridLabel,
          }),
          x,
        },
      });
    }
  }

  // Bars
  const count = config.series.length;
  const chartHeight = LAYOUT.chartTop - LAYOUT.chartBottom;
  const spacing = chartHeight / Math.max(count, 1);
  const barHeight = Math.min(LAYOUT.maxBarHeight, spacing * LAYOUT.barFill);
  const minWidth = px(LAYOUT.minBarWidth);

  const bars: BarPlacement[] = config.series.map((series, index) => {
    const value = frame.values.get(series) ?? 0;
    const slot = positions.get(series) ?? index;
    const yCenter = LAYOUT.chartTop - (slot + 0.5) * spacing;
    const length = value > 0 ? xScale(value) - barStart : minWidth;

    return {
      series,
      value,
      slot,
      rect: {
        x: barStart,
        y: py(yCenter + barHeight / 2),
        width: Math.max(length, minWidth),
        height: barHeight * H,
      },
      radius: LAYOUT.barRadius * W,
      color: COLORS.bar,
      highlight:
        length > px(LAYOUT.highlightMinWidth)
          ? {
              x: barStart,
              y: py(yCenter + barHeight * 0.4),
              width: length,
              height: barHeight * 0.15 * H,
              color: COLORS.highlight,
              alpha: HIGHLIGHT_ALPHA,
            }
          : null,
      name: text(formatSeriesName(series), LAYOUT.nameEndX, yCenter, {
        align: 'right',
        color: COLORS.textWhite,
        weight: 'bold',
        sizePt: FONT_SIZES_PT.name,
      }),
      valueLabel: {
        ...text(formatPercent(value), 0, yCenter, {
          align: 'left',
          color: COLORS.textCyan,
          weight: 'bold',
          sizePt: FONT_SIZES_PT.value,
        }),
        x: barStart + length + px(LAYOUT.valueGapX),
      },
    };
  });

  return {
    width: W,
    height: H,
    background: COLORS.background,
    axisMax,
    gridStep,
    gridlines,
    bars,
    title: text(config.title, 0.5, LAYOUT.titleY, {
      align: 'center',
      color: COLORS.textWhite,
      weight: 'bold',
      sizePt: FONT_SIZES_PT.title,
    }),
    timestamp: text(formatTimestamp(frame.timestamp), 0.5, LAYOUT.timestampY, {
      align: 'center',
      color: COLORS.textGray,
      weight: 'bold',
      sizePt: FONT_SIZES_PT.timestamp,
    }),
    attribution: text(config.attribution, 0.5, LAYOUT.attributionY, {
      align: 'center',
      color: COLORS.textGray,
      weight: 'normal',
      alpha: ATTRIBUTION_ALPHA,
      sizePt: FONT_SIZES_PT.attribution,
    }),
    logo: { x: px(LAYOUT.logoX), bottom: py(LAYOUT.logoY) },
  };
}
