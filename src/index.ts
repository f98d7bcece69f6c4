/**
 * market-bar-race: animated bar race charts from probability time series
 *
 * Library entry point. For CLI, see cli.ts.
 */

// Animator (primary interface)
export {
  BarRaceAnimator,
  createBarRaceVideo,
  createPreviewImage,
  NO_DATA_MESSAGE,
} from './animator.js';
export type {
  AssetPaths,
  VideoRequest,
  VideoResult,
  PreviewRequest,
  PreviewResult,
} from './animator.js';

// Configuration
export {
  CHART_FORMATS,
  VIDEO_CONFIG,
  DEFAULT_ATTRIBUTION,
  getDefaultTitle,
  isChartFormat,
  renderOptionsSchema,
  resolveRenderConfig,
  frameCountFor,
} from './config.js';
export type { ChartFormat, RenderOptions, RenderConfig } from './config.js';
export { resolveOutputPath, fileTimestamp } from './output.js';
export type { OutputPathOptions } from './output.js';

// Input data
export { createSeriesTable, pivotObservations, fillGaps, tableTimeRange } from './data/table.js';
export { deriveSeriesName, extractClosePrice, marketsToObservations } from './data/market.js';
export type { MarketRecord, Candlestick, MarketHistory } from './data/market.js';
export { parseInputDocument, loadInputFile } from './data/loader.js';
export type {
  Observation,
  SeriesRow,
  SeriesTable,
  FrameValues,
  Frame,
  ResampleResult,
  SlotPositions,
} from './types/table.js';

// Engine stages
export { resample } from './resampler/resample.js';
export {
  RankSmoother,
  rankTargets,
  smoothRanks,
  DEFAULT_SMOOTHING_FACTOR,
} from './ranking/rank-smoother.js';
export {
  layoutFrame,
  computeAxisMax,
  selectGridStep,
  gridValues,
  LAYOUT,
} from './layout/frame-layout.js';
export type { LayoutConfig } from './layout/frame-layout.js';
export type {
  RenderPlan,
  BarPlacement,
  GridlinePlacement,
  TextPlacement,
  LogoPlacement,
  Rect,
} from './types/plan.js';
export { renderFrame, renderPlaceholder, encodePng } from './render/renderer.js';
export type { PixelBuffer } from './render/renderer.js';
export { loadAssets, rasterizeLogo, NO_ASSETS } from './render/assets.js';
export type { RenderAssets, AssetOptions } from './render/assets.js';

// Encoding (requires ffmpeg for video)
export {
  encodeVideo,
  isFfmpegAvailable,
  resetFfmpegCache,
  buildFfmpegArgs,
} from './encoder/ffmpeg.js';
export type { FrameRenderer, EncodeOptions } from './encoder/ffmpeg.js';
export { snapshot, defaultPreviewIndex } from './encoder/snapshot.js';

// Errors
export {
  BarRaceError,
  InsufficientDataError,
  AssetUnavailableError,
  EncodingFailureError,
  InvalidConfigurationError,
  InvalidTableError,
} from './utils/errors.js';
export type { BarRaceErrorCode } from './utils/errors.js';
