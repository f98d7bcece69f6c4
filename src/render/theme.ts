/**
 * Palette and type scale for bar race frames.
 */

export const COLORS = {
  background: '#0a1929',
  bar: '#5ac8fa',
  textWhite: '#ffffff',
  textCyan: '#5ac8fa',
  textGray: '#6b8299',
  gridline: '#1a3a5c',
  highlight: '#ffffff',
} as const;

/** Font sizes in points; the layout converts them with the format's dpi. */
export const FONT_SIZES_PT = {
  title: 32,
  gridLabel: 11,
  name: 16,
  value: 14,
  timestamp: 16,
  attribution: 10,
  placeholder: 20,
} as const;

export const GRIDLINE_ALPHA = 0.5;
export const HIGHLIGHT_ALPHA = 0.2;
export const ATTRIBUTION_ALPHA = 0.7;

/** Family name the display font is registered under. */
export const DISPLAY_FONT_FAMILY = 'BarRaceDisplay';
export const FALLBACK_FONT_FAMILY = 'sans-serif';

export function fontString(sizePx: number, weight: 'normal' | 'bold', family: string): string {
  const quoted = family === FALLBACK_FONT_FAMILY ? family : `"${family}", ${FALLBACK_FONT_FAMILY}`;
  return `${weight} ${sizePx}px ${quoted}`;
}
