import { execFile } from 'child_process';
import * as util from 'util';
import { FrameDecoder } from '@/types';
import { AppConfig } from './config';
import { errorMessage } from './errors';

const execFileAsync = util.promisify(execFile);

// A single decoded JPEG frame comfortably fits
const MAX_FRAME_BYTES = 32 * 1024 * 1024;

/**
 * Evenly spaced frame indices: every frame when the video is short enough,
 * otherwise floor(i * total / max) for i < max.
 */
export function selectFrameIndices(totalFrames: number, maxFrames: number): number[] {
  const total = Math.max(0, Math.floor(totalFrames));
  const max = Math.max(0, Math.floor(maxFrames));

  if (total <= max) {
    return Array.from({ length: total }, (_, i) => i);
  }
  return Array.from({ length: max }, (_, i) => Math.floor((i * total) / max));
}

/**
 * Frame decoder backed by the ffprobe and ffmpeg binaries.
 */
export function createFfmpegDecoder(config: Pick<AppConfig, 'ffmpegPath' | 'ffprobePath'>): FrameDecoder {
  return {
    async countFrames(videoPath: string): Promise<number> {
      const { stdout } = await execFileAsync(config.ffprobePath, [
        '-v', 'error',
        '-select_streams', 'v:0',
        '-count_packets',
        '-show_entries', 'stream=nb_read_packets',
        '-of', 'csv=p=0',
        videoPath,
      ]);

      const count = parseInt(stdout.trim(), 10);
      if (Number.isNaN(count)) {
        throw new Error(`Could not read frame count from video: ${videoPath}`);
      }
      return count;
    },

    async readFrame(videoPath: string, index: number): Promise<Buffer> {
      const { stdout } = await execFileAsync(
        config.ffmpegPath,
        [
          '-v', 'error',
          '-i', videoPath,
          '-vf', `select=eq(n\\,${index})`,
          '-vframes', '1',
          '-f', 'image2pipe',
          '-vcodec', 'mjpeg',
          'pipe:1',
        ],
        { encoding: 'buffer', maxBuffer: MAX_FRAME_BYTES }
      );

      if (stdout.length === 0) {
        throw new Error(`No frame decoded at index ${index}`);
      }
      return stdout;
    },
  };
}

/**
 * Decode up to maxFrames evenly spaced frames as JPEG bytes, in ascending order.
 * Frames that fail to decode are skipped.
 */
export async function extractFrames(
  videoPath: string,
  maxFrames: number,
  decoder: FrameDecoder
): Promise<Buffer[]> {
  const total = await decoder.countFrames(videoPath);
  const indices = selectFrameIndices(total, maxFrames);
  console.log(`Extracting ${indices.length} of ${total} frames from ${videoPath}`);

  const frames: Buffer[] = [];
  for (const index of indices) {
    try {
      frames.push(await decoder.readFrame(videoPath, index));
    } catch (error) {
      console.warn(`Skipping frame ${index}:`, errorMessage(error));
    }
  }
  return frames;
}
