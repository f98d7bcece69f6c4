/**
 * Bar race animator
 *
 * Wires the pipeline for one invocation: resolve options, resample the table,
 * run the rank smoother once over every frame, then lay out and paint frames
 * on demand for the video encoder or a preview still.
 *
 * @example
 * ```ts
 * import { createBarRaceVideo, loadInputFile } from 'market-bar-race';
 *
 * const table = await loadInputFile('history.json');
 * const result = await createBarRaceVideo(table, {
 *   title: 'Who will win the cup?',
 *   outputPath: 'race.mp4',
 * });
 * ```
 */

import { resolveRenderConfig } from './config.js';
import type { RenderConfig, RenderOptions } from './config.js';
import { encodeVideo } from './encoder/ffmpeg.js';
import { defaultPreviewIndex, snapshot } from './encoder/snapshot.js';
import { layoutFrame } from './layout/frame-layout.js';
import { LOGO_HEIGHT_RATIO, loadAssets, NO_ASSETS } from './render/assets.js';
import type { RenderAssets } from './render/assets.js';
import { encodePng, renderFrame, renderPlaceholder } from './render/renderer.js';
import type { PixelBuffer } from './render/renderer.js';
import { DEFAULT_SMOOTHING_FACTOR, smoothRanks } from './ranking/rank-smoother.js';
import { resample } from './resampler/resample.js';
import type { RenderPlan } from './types/plan.js';
import type { ResampleResult, SeriesTable, SlotPositions } from './types/table.js';
import type { AssetUnavailableError } from './utils/errors.js';
import { InsufficientDataError, InvalidConfigurationError } from './utils/errors.js';

export const NO_DATA_MESSAGE = 'NO DATA AVAILABLE';

// ─── Animator ────────────────────────────────────────────────────────

export class BarRaceAnimator {
  readonly config: RenderConfig;
  private readonly resampled: ResampleResult;
  private readonly positions: SlotPositions[];

  /**
   * @throws InvalidConfigurationError for bad options or unknown series
   * @throws InvalidTableError for non-finite cells
   */
  constructor(
    table: SeriesTable,
    options: RenderOptions,
    private readonly assets: RenderAssets = NO_ASSETS,
    smoothing = DEFAULT_SMOOTHING_FACTOR
  ) {
    this.config = resolveRenderConfig(options, table.series);
    this.resampled =
      this.config.series.length > 0
        ? resample(table, this.config.frameCount, this.config.series)
        : { frames: [], timestamps: [] };
    this.positions = smoothRanks(this.resampled.frames, this.config.series, smoothing);
  }

  /** Frames available; 0 when the table has fewer than two rows or no series. */
  get frameCount(): number {
    return this.resampled.frames.length;
  }

  positionsAt(index: number): SlotPositions {
    this.checkIndex(index);
    return this.positions[index];
  }

  planFrame(index: number): RenderPlan {
    this.checkIndex(index);
    return layoutFrame(
      { values: this.resampled.frames[index], timestamp: this.resampled.timestamps[index] },
      this.positions[index],
      this.config
    );
  }

  renderFrame(index: number): PixelBuffer {
    return renderFrame(this.planFrame(index), this.assets);
  }

  renderPlaceholder(message = NO_DATA_MESSAGE): PixelBuffer {
    return renderPlaceholder(
      this.config.width,
      this.config.height,
      message,
      this.assets,
      this.config.dpi
    );
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.frameCount) {
      throw new RangeError(`Frame index ${index} is outside 0..${this.frameCount - 1}`);
    }
  }
}

// ─── Entry points ────────────────────────────────────────────────────

export interface AssetPaths {
  /** TrueType/OpenType display font */
  fontPath?: string;
  /** PNG, JPEG or SVG logo */
  logoPath?: string;
}

export interface VideoRequest extends RenderOptions, AssetPaths {
  outputPath: string;
  ffmpegPath?: string;
  onProgress?: (done: number, total: number) => void;
}

export interface VideoResult {
  outputPath: string;
  frameCount: number;
  /** Series shown, in their initial slot order */
  series: readonly string[];
  assetIssues: AssetUnavailableError[];
}

export interface PreviewRequest extends RenderOptions, AssetPaths {
  /** Defaults to 80% of the way through */
  frameIndex?: number;
}

export interface PreviewResult {
  png: Buffer;
  /** Frame rendered, or null for the no-data placeholder */
  frameIndex: number | null;
  assetIssues: AssetUnavailableError[];
}

function loadAssetsFor(config: RenderConfig, paths: AssetPaths): Promise<RenderAssets> {
  return loadAssets({
    fontPath: paths.fontPath,
    logoPath: paths.logoPath,
    logoHeight: config.height * LOGO_HEIGHT_RATIO,
  });
}

function renderOptionsOf(request: RenderOptions): RenderOptions {
  return {
    title: request.title,
    maxCandidates: request.maxCandidates,
    fps: request.fps,
    duration: request.duration,
    format: request.format,
    showGridlines: request.showGridlines,
    series: request.series,
    attribution: request.attribution,
  };
}

/**
 * Render the whole animation and encode it to `request.outputPath`.
 *
 * @throws InsufficientDataError when the table has fewer than two rows or nothing to show
 * @throws EncodingFailureError when ffmpeg fails; no file is left at the output path
 */
export async function createBarRaceVideo(
  table: SeriesTable,
  request: VideoRequest
): Promise<VideoResult> {
  const options = renderOptionsOf(request);
  const config = resolveRenderConfig(options, table.series);
  if (table.rows.length < 2) {
    throw new InsufficientDataError(
      `Need at least 2 timestamps to animate, got ${table.rows.length}`
    );
  }
  if (config.series.length === 0) {
    throw new InsufficientDataError('No series to display');
  }

  const assets = await loadAssetsFor(config, request);
  const animator = new BarRaceAnimator(table, options, assets);

  const outputPath = await encodeVideo(animator.frameCount, i => animator.renderFrame(i), {
    outputPath: request.outputPath,
    width: config.width,
    height: config.height,
    fps: config.fps,
    ffmpegPath: request.ffmpegPath,
    onProgress: request.onProgress,
  });

  return {
    outputPath,
    frameCount: animator.frameCount,
    series: config.series,
    assetIssues: assets.issues,
  };
}

/**
 * Render one still as PNG. A table with nothing to animate yields the
 * "NO DATA AVAILABLE" placeholder instead of an error.
 */
export async function createPreviewImage(
  table: SeriesTable,
  request: PreviewRequest
): Promise<PreviewResult> {
  const options = renderOptionsOf(request);
  const config = resolveRenderConfig(options, table.series);
  const assets = await loadAssetsFor(config, request);
  const animator = new BarRaceAnimator(table, options, assets);

  if (animator.frameCount === 0) {
    return {
      png: encodePng(animator.renderPlaceholder()),
      frameIndex: null,
      assetIssues: assets.issues,
    };
  }

  const frameIndex = request.frameIndex ?? defaultPreviewIndex(animator.frameCount);
  if (!Number.isInteger(frameIndex) || frameIndex < 0 || frameIndex >= animator.frameCount) {
    throw new InvalidConfigurationError([
      `frameIndex: ${frameIndex} is outside 0..${animator.frameCount - 1}`,
    ]);
  }

  return {
    png: await snapshot(i => animator.renderFrame(i), frameIndex),
    frameIndex,
    assetIssues: assets.issues,
  };
}
