/**
 * Output file naming.
 */

import { extname, resolve } from 'node:path';

const VIDEO_EXTENSIONS = new Set(['.mp4', '.m4v', '.mov', '.mkv']);
const DEFAULT_STEM = 'bar_race';

export interface OutputPathOptions {
  /** Explicit file name or path */
  output?: string;
  /** Names the file when no explicit output is given */
  seriesTicker?: string;
  /** Base for relative and generated names */
  directory: string;
  now?: Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Absolute video path for a render. Explicit names without a video extension
 * get `.mp4`; otherwise the name is `<ticker>_<YYYYMMDD_HHMMSS>.mp4`.
 */
export function resolveOutputPath(options: OutputPathOptions): string {
  if (options.output) {
    const ext = extname(options.output).toLowerCase();
    const name = VIDEO_EXTENSIONS.has(ext) ? options.output : `${options.output}.mp4`;
    return resolve(options.directory, name);
  }
  const stem = options.seriesTicker || DEFAULT_STEM;
  const stamp = fileTimestamp(options.now ?? new Date());
  return resolve(options.directory, `${stem}_${stamp}.mp4`);
}
