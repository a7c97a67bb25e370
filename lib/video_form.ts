import { VideoAnalysisResult, VideoContentType } from '@/types';

/**
 * Browser-side helpers for the video form: turn raw inputs into the
 * /api/video body, and a result into post text for the social advice step.
 */

export const DEFAULT_FORM_MAX_FRAMES = 5;

export interface VideoFormValues {
  videoPath: string;
  contentType: VideoContentType;
  keywords: string;
  maxFrames: string;
  customInstructions: string;
}

export interface VideoRequestBody {
  video_path: string;
  content_type: VideoContentType;
  keywords: string[];
  max_frames: number;
  custom_instructions?: string;
}

export type VideoFormResult =
  | { ok: true; body: VideoRequestBody }
  | { ok: false; error: string };

export function buildVideoRequestBody(values: VideoFormValues): VideoFormResult {
  const videoPath = values.videoPath.trim();
  if (!videoPath) {
    return { ok: false, error: 'Please enter a video path' };
  }

  const rawFrames = values.maxFrames.trim();
  const maxFrames = rawFrames ? Number(rawFrames) : DEFAULT_FORM_MAX_FRAMES;
  if (!Number.isInteger(maxFrames) || maxFrames <= 0) {
    return { ok: false, error: 'Frames must be a positive whole number' };
  }

  const body: VideoRequestBody = {
    video_path: videoPath,
    content_type: values.contentType,
    keywords: values.keywords
      .split(',')
      .map((keyword) => keyword.trim())
      .filter((keyword) => keyword.length > 0),
    max_frames: maxFrames,
  };

  const instructions = values.customInstructions.trim();
  if (instructions) body.custom_instructions = instructions;

  return { ok: true, body };
}

// Title, description and caption, then the hashtag line
export function composeVideoPost(result: VideoAnalysisResult): string {
  const parts = [result.metadata.title, result.metadata.description, result.caption]
    .map((part) => part?.trim() ?? '')
    .filter((part) => part.length > 0);

  if (result.hashtags.length > 0) {
    parts.push(result.hashtags.join(' '));
  }
  return parts.join('\n\n');
}
