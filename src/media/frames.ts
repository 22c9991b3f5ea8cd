/**
 * Frame image helpers — materialise single frames of a video as JPEG / PNG.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { runFfmpeg } from './ffmpeg.js';

/**
 * Write the frame shown at `timestampS` to `outputPath`. The image format
 * follows the output extension. Seeking happens before `-i` (fast seek).
 */
export async function extractFrameAtTime(
  videoPath: string,
  timestampS: number,
  outputPath: string,
  signal?: AbortSignal,
): Promise<void> {
  logger.debug('Frames: extracting single frame', { videoPath, timestampS, outputPath });
  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

  await runFfmpeg(
    ['-ss', timestampS.toFixed(6), '-i', videoPath, '-frames:v', '1', '-q:v', '2', '-y', outputPath],
    'extractFrameAtTime',
    { signal },
  );

  if (!fs.existsSync(outputPath)) {
    throw new Error(`extractFrameAtTime: output frame not produced at t=${timestampS}`);
  }
}

/** `keyframe_0001_0000005000.jpg` — 1-based position, then the timestamp in ms. */
export function buildOutputFilename(position: number, timestampS: number, ext: string): string {
  const ms = Math.round(timestampS * 1000);
  return `keyframe_${String(position).padStart(4, '0')}_${String(ms).padStart(10, '0')}.${ext.toLowerCase().replace(/^\./, '')}`;
}
