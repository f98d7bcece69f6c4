/**
 * Video encoding through an ffmpeg child process.
 *
 * Frames are rendered in order and piped to ffmpeg's stdin as raw RGBA. ffmpeg
 * writes to a hidden sibling of the output path, which is renamed into place
 * only once ffmpeg exits cleanly. On any failure the sibling is removed, so the
 * output path never holds a partial video.
 */

import { execFileSync, spawn } from 'node:child_process';
import { rename, rm } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { Writable } from 'node:stream';
import { VIDEO_CONFIG } from '../config.js';
import type { PixelBuffer } from '../render/renderer.js';
import { describeError, EncodingFailureError } from '../utils/errors.js';

// ─── Types ───────────────────────────────────────────────────────────

/** Produces the pixels of frame `index`; may be async. */
export type FrameRenderer = (index: number) => PixelBuffer | Promise<PixelBuffer>;

export interface EncodeOptions {
  outputPath: string;
  width: number;
  height: number;
  fps: number;
  /** ffmpeg executable (default: `ffmpeg` on PATH) */
  ffmpegPath?: string;
  /** Called after each frame is handed to ffmpeg */
  onProgress?: (done: number, total: number) => void;
}

interface ExitStatus {
  code: number | null;
  spawnError: Error | null;
}

// ─── Availability check ──────────────────────────────────────────────

const availability = new Map<string, boolean>();

/**
 * Check whether `ffmpegPath` runs. Result is cached per path.
 */
export function isFfmpegAvailable(ffmpegPath = 'ffmpeg'): boolean {
  const cached = availability.get(ffmpegPath);
  if (cached !== undefined) return cached;

  let available: boolean;
  try {
    execFileSync(ffmpegPath, ['-version'], { stdio: 'pipe', timeout: 5000 });
    available = true;
  } catch {
    available = false;
  }
  availability.set(ffmpegPath, available);
  return available;
}

/**
 * Reset the cached availability checks. Useful for testing.
 */
export function resetFfmpegCache(): void {
  availability.clear();
}

// ─── Arguments ───────────────────────────────────────────────────────

export function buildFfmpegArgs(options: {
  width: number;
  height: number;
  fps: number;
  outputPath: string;
}): string[] {
  return [
    '-y',
    '-loglevel', 'error',
    '-f', 'rawvideo',
    '-pix_fmt', 'rgba',
    '-s', `${options.width}x${options.height}`,
    '-r', String(options.fps),
    '-i', '-',
    '-c:v', VIDEO_CONFIG.codec,
    '-b:v', `${VIDEO_CONFIG.bitrateKbps}k`,
    '-pix_fmt', VIDEO_CONFIG.pixelFormat,
    options.outputPath,
  ];
}

/** Hidden sibling of `outputPath`; keeps the extension so ffmpeg picks the container. */
export function tempPathFor(outputPath: string): string {
  const ext = extname(outputPath);
  const stem = basename(outputPath, ext);
  return join(dirname(outputPath), `.${stem}.partial-${process.pid}${ext}`);
}

// ─── Encoding ────────────────────────────────────────────────────────

/** Resolves with the write error, or null once the chunk is flushed. */
function writeChunk(stream: Writable, chunk: Buffer): Promise<Error | null> {
  return new Promise(resolve => {
    stream.write(chunk, err => resolve(err ?? null));
  });
}

function toBuffer(data: Uint8ClampedArray): Buffer {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Render `frameCount` frames and encode them to `options.outputPath`.
 * Resolves with the output path once the file is complete.
 *
 * @throws EncodingFailureError when ffmpeg cannot start or exits non-zero
 * @throws whatever `render` throws, after ffmpeg is stopped and cleaned up
 */
export async function encodeVideo(
  frameCount: number,
  render: FrameRenderer,
  options: EncodeOptions
): Promise<string> {
  const { outputPath, width, height, fps } = options;
  const command = options.ffmpegPath ?? 'ffmpeg';
  const tempPath = tempPathFor(outputPath);
  const args = buildFfmpegArgs({ width, height, fps, outputPath: tempPath });
  const frameBytes = width * height * 4;

  const child = spawn(command, args, { stdio: ['pipe', 'ignore', 'pipe'] });
  const stderrChunks: Buffer[] = [];
  child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

  const exited = new Promise<ExitStatus>(resolve => {
    child.once('error', err => resolve({ code: null, spawnError: err }));
    child.once('close', code => resolve({ code, spawnError: null }));
  });

  // EPIPE and friends; the exit status reports the cause.
  const pipe: { error: Error | null } = { error: null };
  child.stdin.on('error', err => {
    pipe.error = err;
  });

  const stderrText = () => Buffer.concat(stderrChunks).toString('utf8');
  const fail = async (message: string, code: number | null): Promise<never> => {
    await rm(tempPath, { force: true });
    throw new EncodingFailureError(message, code, stderrText());
  };

  try {
    for (let i = 0; i < frameCount; i++) {
      const frame = await render(i);
      if (frame.width !== width || frame.height !== height || frame.data.length !== frameBytes) {
        throw new EncodingFailureError(
          `Frame ${i} is ${frame.width}x${frame.height} (${frame.data.length} bytes), expected ${width}x${height}`
        );
      }
      const writeError = await Promise.race([
        writeChunk(child.stdin, toBuffer(frame.data)),
        exited.then(() => new Error('process exited before reading every frame')),
      ]);
      if (writeError) {
        pipe.error = writeError;
        break;
      }
      options.onProgress?.(i + 1, frameCount);
    }
    child.stdin.end();
  } catch (err) {
    child.stdin.destroy();
    child.kill('SIGKILL');
    await exited;
    await rm(tempPath, { force: true });
    throw err;
  }

  const status = await exited;
  if (status.spawnError) {
    return fail(`Could not start ${command}: ${status.spawnError.message}`, null);
  }
  if (status.code !== 0) {
    const stderr = stderrText().trim();
    return fail(
      `${command} exited with code ${status.code ?? 'null'}${stderr ? `: ${stderr}` : ''}`,
      status.code
    );
  }
  if (pipe.error) {
    return fail(`${command} stopped reading frames: ${pipe.error.message}`, status.code);
  }

  try {
    await rename(tempPath, outputPath);
  } catch (err) {
    return fail(`Could not move encoded video to ${outputPath}: ${describeError(err)}`, status.code);
  }
  return outputPath;
}
