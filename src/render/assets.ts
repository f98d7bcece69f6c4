/**
 * Optional visual assets: a display font and a logo.
 *
 * Both are best-effort. A font that fails to register leaves frames on the
 * bold sans-serif fallback; a logo that fails to read or decode is left out.
 * Each failure is kept on `issues` so a caller can report it.
 */

import { readFile } from 'node:fs/promises';
import { type Canvas, createCanvas, GlobalFonts, loadImage } from '@napi-rs/canvas';
import { AssetUnavailableError, describeError } from '../utils/errors.js';
import { DISPLAY_FONT_FAMILY, FALLBACK_FONT_FAMILY } from './theme.js';

/** Share of the canvas height the logo is scaled to. */
export const LOGO_HEIGHT_RATIO = 0.12;
/** Source alpha above this becomes opaque; the rest transparent. */
export const LOGO_ALPHA_THRESHOLD = 100;

export interface RenderAssets {
  /** Family every text placement is drawn with */
  fontFamily: string;
  /** Pre-rasterized white logo, or null when none is available */
  logo: Canvas | null;
  issues: AssetUnavailableError[];
}

export interface AssetOptions {
  fontPath?: string;
  logoPath?: string;
  /** Logo height in pixels */
  logoHeight: number;
}

export const NO_ASSETS: RenderAssets = {
  fontFamily: FALLBACK_FONT_FAMILY,
  logo: null,
  issues: [],
};

export async function loadAssets(options: AssetOptions): Promise<RenderAssets> {
  const issues: AssetUnavailableError[] = [];

  let fontFamily = FALLBACK_FONT_FAMILY;
  if (options.fontPath) {
    if (GlobalFonts.registerFromPath(options.fontPath, DISPLAY_FONT_FAMILY)) {
      fontFamily = DISPLAY_FONT_FAMILY;
    } else {
      issues.push(
        new AssetUnavailableError('font', options.fontPath, 'not a readable font file')
      );
    }
  }

  let logo: Canvas | null = null;
  if (options.logoPath) {
    try {
      logo = await rasterizeLogo(await readFile(options.logoPath), options.logoHeight);
    } catch (err) {
      issues.push(new AssetUnavailableError('logo', options.logoPath, describeError(err)));
    }
  }

  return { fontFamily, logo, issues };
}

/**
 * Decode an image, scale it to `height` keeping its aspect ratio, and turn it
 * into a white silhouette with binary alpha.
 */
export async function rasterizeLogo(source: Buffer, height: number): Promise<Canvas> {
  const image = await loadImage(source);
  if (image.width <= 0 || image.height <= 0) {
    throw new Error('image has no pixels');
  }
  const targetHeight = Math.max(1, Math.floor(height));
  const targetWidth = Math.max(1, Math.round((image.width * targetHeight) / image.height));

  const canvas = createCanvas(targetWidth, targetHeight);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0, targetWidth, targetHeight);

  const pixels = ctx.getImageData(0, 0, targetWidth, targetHeight);
  const data = pixels.data;
  for (let i = 0; i < data.length; i += 4) {
    data[i] = 255;
    data[i + 1] = 255;
    data[i + 2] = 255;
    data[i + 3] = data[i + 3] > LOGO_ALPHA_THRESHOLD ? 255 : 0;
  }
  ctx.putImageData(pixels, 0, 0);
  return canvas;
}
