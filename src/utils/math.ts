/** Linear interpolation; `t` outside [0, 1] extrapolates. */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * `count` evenly spaced samples over [start, stop], both ends included.
 * The last sample is exactly `stop`; a single sample is `start`.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  const out: number[] = new Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = start + step * i;
  }
  out[count - 1] = stop;
  return out;
}

/** Typographic points to canvas pixels at the given dpi. */
export function ptToPx(pt: number, dpi: number): number {
  return (pt * dpi) / 72;
}
