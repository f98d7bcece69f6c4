/**
 * Single-frame PNG output.
 */

import { PREVIEW_FRAME_POSITION } from '../config.js';
import { encodePng } from '../render/renderer.js';
import type { FrameRenderer } from './ffmpeg.js';

/**
 * Frame shown by a preview: 80% of the way through, clamped to the last frame.
 * `-1` when there are no frames.
 */
export function defaultPreviewIndex(frameCount: number): number {
  return Math.min(frameCount - 1, Math.floor(frameCount * PREVIEW_FRAME_POSITION));
}

/** Render one frame and return it as PNG bytes. Nothing is written to disk. */
export async function snapshot(render: FrameRenderer, frameIndex: number): Promise<Buffer> {
  return encodePng(await render(frameIndex));
}
