import { describe, it, expect } from 'vitest';
import { createCanvas } from '@napi-rs/canvas';
import { encodePng, renderFrame, renderPlaceholder, type PixelBuffer } from '../../src/render/renderer.js';
import { loadAssets, rasterizeLogo, NO_ASSETS } from '../../src/render/assets.js';
import { layoutFrame, type LayoutConfig } from '../../src/layout/frame-layout.js';
import { DISPLAY_FONT_FAMILY, FALLBACK_FONT_FAMILY } from '../../src/render/theme.js';
import { AssetUnavailableError } from '../../src/utils/errors.js';

const CONFIG: LayoutConfig = {
  width: 400,
  height: 400,
  dpi: 100,
  showGridlines: true,
  title: 'TEST RACE',
  attribution: 'TEST DATA',
  series: ['A', 'B'],
};

const PLAN = layoutFrame(
  { values: new Map([['A', 0.5], ['B', 0.25]]), timestamp: 1718000000 },
  new Map([
    ['A', 0],
    ['B', 1],
  ]),
  CONFIG
);

function pixel(buffer: PixelBuffer, x: number, y: number): number[] {
  const i = (y * buffer.width + x) * 4;
  return Array.from(buffer.data.slice(i, i + 4));
}

const BACKGROUND = [0x0a, 0x19, 0x29, 255];
const BAR = [0x5a, 0xc8, 0xfa, 255];

function logoPng(): Buffer {
  // left half opaque red, right half transparent
  const canvas = createCanvas(20, 10);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = '#ff0000';
  ctx.fillRect(0, 0, 10, 10);
  return canvas.toBuffer('image/png');
}

describe('renderFrame', () => {
  it('should return a full RGBA buffer', () => {
    const frame = renderFrame(PLAN);
    expect(frame.width).toBe(400);
    expect(frame.height).toBe(400);
    expect(frame.data.length).toBe(400 * 400 * 4);
  });

  it('should paint the background in the corners', () => {
    const frame = renderFrame(PLAN);
    expect(pixel(frame, 0, 0)).toEqual(BACKGROUND);
    expect(pixel(frame, 399, 399)).toEqual(BACKGROUND);
  });

  it('should paint bars in the bar colour', () => {
    const frame = renderFrame(PLAN);
    const bar = PLAN.bars[0];
    // below the highlight strip, left of any gridline
    const x = Math.round(bar.rect.x + 10);
    const y = Math.round(bar.rect.y + bar.rect.height * 0.75);
    expect(pixel(frame, x, y)).toEqual(BAR);
  });

  it('should paint the same pixels on every call', () => {
    expect(renderFrame(PLAN).data).toEqual(renderFrame(PLAN).data);
  });

  it('should draw the logo above its bottom-left anchor', async () => {
    const logo = await rasterizeLogo(logoPng(), 20);
    const frame = renderFrame(PLAN, { ...NO_ASSETS, logo });
    const x = Math.round(PLAN.logo.x) + 3;
    const y = Math.round(PLAN.logo.bottom) - 10;
    expect(pixel(frame, x, y)).toEqual([255, 255, 255, 255]);
    expect(pixel(renderFrame(PLAN), x, y)).toEqual(BACKGROUND);
  });
});

describe('renderPlaceholder', () => {
  it('should paint a background-only still of the requested size', () => {
    const still = renderPlaceholder(200, 100, 'NO DATA AVAILABLE');
    expect(still.data.length).toBe(200 * 100 * 4);
    expect(pixel(still, 0, 0)).toEqual(BACKGROUND);
    expect(pixel(still, 199, 99)).toEqual(BACKGROUND);
  });
});

describe('encodePng', () => {
  it('should produce PNG bytes that decode to the same size', () => {
    const png = encodePng(renderPlaceholder(64, 32, 'X'));
    expect(Array.from(png.subarray(0, 8))).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    // IHDR width and height
    expect(png.readUInt32BE(16)).toBe(64);
    expect(png.readUInt32BE(20)).toBe(32);
  });

  it('should be byte-identical for identical pixels', () => {
    const frame = renderFrame(PLAN);
    expect(encodePng(frame).equals(encodePng(frame))).toBe(true);
  });
});

describe('rasterizeLogo', () => {
  it('should scale to the requested height keeping the aspect ratio', async () => {
    const logo = await rasterizeLogo(logoPng(), 5);
    expect(logo.height).toBe(5);
    expect(logo.width).toBe(10);
  });

  it('should turn opaque pixels white and drop the rest', async () => {
    const logo = await rasterizeLogo(logoPng(), 10);
    const data = logo.getContext('2d').getImageData(0, 0, logo.width, logo.height).data;
    const at = (x: number, y: number) => Array.from(data.slice((y * logo.width + x) * 4, (y * logo.width + x) * 4 + 4));
    expect(at(2, 5)).toEqual([255, 255, 255, 255]);
    expect(at(17, 5)[3]).toBe(0);
  });

  it('should reject bytes that are not an image', async () => {
    await expect(rasterizeLogo(Buffer.from('not an image'), 10)).rejects.toThrow();
  });
});

describe('loadAssets', () => {
  it('should fall back quietly when nothing is requested', async () => {
    const assets = await loadAssets({ logoHeight: 100 });
    expect(assets.fontFamily).toBe(FALLBACK_FONT_FAMILY);
    expect(assets.logo).toBeNull();
    expect(assets.issues).toEqual([]);
  });

  it('should record a missing font and keep the fallback family', async () => {
    const assets = await loadAssets({ fontPath: '/nonexistent/display.ttf', logoHeight: 100 });
    expect(assets.fontFamily).toBe(FALLBACK_FONT_FAMILY);
    expect(assets.fontFamily).not.toBe(DISPLAY_FONT_FAMILY);
    expect(assets.issues).toHaveLength(1);
    expect(assets.issues[0]).toBeInstanceOf(AssetUnavailableError);
    expect(assets.issues[0].asset).toBe('font');
  });

  it('should record a missing logo and omit it', async () => {
    const assets = await loadAssets({ logoPath: '/nonexistent/logo.png', logoHeight: 100 });
    expect(assets.logo).toBeNull();
    expect(assets.issues.map(issue => issue.asset)).toEqual(['logo']);
    expect(assets.issues[0].path).toBe('/nonexistent/logo.png');
  });
});
