/**
 * Renderer
 *
 * Paints a RenderPlan onto a fresh canvas and returns its RGBA pixels. Each
 * call owns its canvas, so frames can be painted in any order.
 */

import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import type { RenderPlan, TextPlacement } from '../types/plan.js';
import { ptToPx } from '../utils/math.js';
import { NO_ASSETS, type RenderAssets } from './assets.js';
import { COLORS, FONT_SIZES_PT, fontString } from './theme.js';

/** Straight RGBA, 4 bytes per pixel, rows top to bottom. */
export interface PixelBuffer {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

// ─── Drawing helpers ─────────────────────────────────────────────────

function roundRect(
  ctx: SKRSContext2D,
  x: number,
  y: number,
  w: number,
  h: number,
  r: number
): void {
  if (w <= 0 || h <= 0) return;
  r = Math.min(r, w / 2, h / 2);
  if (r <= 0) {
    ctx.rect(x, y, w, h);
    return;
  }
  ctx.moveTo(x + r, y);
  ctx.arcTo(x + w, y, x + w, y + h, r);
  ctx.arcTo(x + w, y + h, x, y + h, r);
  ctx.arcTo(x, y + h, x, y, r);
  ctx.arcTo(x, y, x + w, y, r);
  ctx.closePath();
}

function drawText(ctx: SKRSContext2D, placement: TextPlacement, fontFamily: string): void {
  if (!placement.text) return;
  ctx.save();
  ctx.globalAlpha = placement.alpha;
  ctx.font = fontString(placement.fontSize, placement.weight, fontFamily);
  ctx.textAlign = placement.align;
  ctx.textBaseline = placement.baseline;
  ctx.fillStyle = placement.color;
  ctx.fillText(placement.text, placement.x, placement.y);
  ctx.restore();
}

function readPixels(ctx: SKRSContext2D, width: number, height: number): PixelBuffer {
  const image = ctx.getImageData(0, 0, width, height);
  return { width, height, data: image.data };
}

// ─── Frames ──────────────────────────────────────────────────────────

export function renderFrame(plan: RenderPlan, assets: RenderAssets = NO_ASSETS): PixelBuffer {
  const canvas = createCanvas(plan.width, plan.height);
  const ctx = canvas.getContext('2d');
  const font = assets.fontFamily;

  // ── Background ──
  ctx.fillStyle = plan.background;
  ctx.fillRect(0, 0, plan.width, plan.height);

  // ── Gridlines ──
  for (const line of plan.gridlines) {
    ctx.save();
    ctx.globalAlpha = line.alpha;
    ctx.strokeStyle = line.color;
    ctx.lineWidth = 1;
    ctx.beginPath();
    ctx.moveTo(line.x, line.bottom);
    ctx.lineTo(line.x, line.top);
    ctx.stroke();
    ctx.restore();
    drawText(ctx, line.label, font);
  }

  // ── Bars ──
  for (const bar of plan.bars) {
    ctx.fillStyle = bar.color;
    ctx.beginPath();
    roundRect(ctx, bar.rect.x, bar.rect.y, bar.rect.width, bar.rect.height, bar.radius);
    ctx.fill();
  }

  for (const bar of plan.bars) {
    if (!bar.highlight) continue;
    const strip = bar.highlight;
    ctx.save();
    ctx.globalAlpha = strip.alpha;
    ctx.fillStyle = strip.color;
    ctx.fillRect(strip.x, strip.y, strip.width, strip.height);
    ctx.restore();
  }

  // ── Labels ──
  for (const bar of plan.bars) {
    drawText(ctx, bar.name, font);
    drawText(ctx, bar.valueLabel, font);
  }

  drawText(ctx, plan.title, font);
  drawText(ctx, plan.timestamp, font);
  drawText(ctx, plan.attribution, font);

  // ── Logo ──
  if (assets.logo) {
    ctx.drawImage(assets.logo, plan.logo.x, plan.logo.bottom - assets.logo.height);
  }

  return readPixels(ctx, plan.width, plan.height);
}

/** Background-only still with a centred message, for inputs with no frames. */
export function renderPlaceholder(
  width: number,
  height: number,
  message: string,
  assets: RenderAssets = NO_ASSETS,
  dpi = 100
): PixelBuffer {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = COLORS.background;
  ctx.fillRect(0, 0, width, height);
  drawText(
    ctx,
    {
      text: message,
      x: width / 2,
      y: height / 2,
      align: 'center',
      baseline: 'middle',
      color: COLORS.textWhite,
      fontSize: ptToPx(FONT_SIZES_PT.placeholder, dpi),
      weight: 'bold',
      alpha: 1,
    },
    assets.fontFamily
  );
  return readPixels(ctx, width, height);
}

/** PNG bytes for a pixel buffer. */
export function encodePng(pixels: PixelBuffer): Buffer {
  const canvas = createCanvas(pixels.width, pixels.height);
  const ctx = canvas.getContext('2d');
  const image = ctx.createImageData(pixels.width, pixels.height);
  image.data.set(pixels.data);
  ctx.putImageData(image, 0, 0);
  return canvas.toBuffer('image/png');
}
