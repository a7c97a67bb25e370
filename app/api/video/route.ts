import * as fs from 'fs';
import { NextRequest, NextResponse } from 'next/server';
import { readStringList } from '@/lib/content_request';
import { badRequest, errorResponse, readJsonBody } from '@/lib/http';
import { getConfig, getDecoder, getModel } from '@/lib/services';
import { analyzeVideo } from '@/lib/video_analysis';
import { VIDEO_CONTENT_TYPES } from '@/types';

const DEFAULT_MAX_FRAMES = 5;

/**
 * API endpoint: /api/video
 * Captions, hashtags and recommendations for a short-form video on disk
 *
 * POST /api/video
 * Body: { video_path: string, content_type: VideoContentType, keywords?: string[] | string,
 *         max_frames?: number, custom_instructions?: string }
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { video_path, max_frames = DEFAULT_MAX_FRAMES, custom_instructions } = body;

    if (typeof video_path !== 'string' || !video_path) {
      return badRequest('video_path is required');
    }

    if (!fs.existsSync(video_path)) {
      return NextResponse.json({ error: `Video not found: ${video_path}` }, { status: 404 });
    }

    const contentType = VIDEO_CONTENT_TYPES.find((type) => type === body.content_type);
    if (!contentType) {
      return badRequest(`content_type must be one of: ${VIDEO_CONTENT_TYPES.join(', ')}`);
    }

    if (typeof max_frames !== 'number' || !Number.isInteger(max_frames) || max_frames <= 0) {
      return badRequest('max_frames must be a positive integer');
    }

    if (custom_instructions !== undefined && typeof custom_instructions !== 'string') {
      return badRequest('custom_instructions must be a string');
    }

    const result = await analyzeVideo(
      video_path,
      contentType,
      readStringList(body.keywords, 'keywords'),
      max_frames,
      { model: getModel(), decoder: getDecoder(), timeoutMs: getConfig().requestTimeoutMs },
      custom_instructions
    );

    return NextResponse.json(result);
  } catch (error) {
    console.error('Error analyzing video:', error);
    return errorResponse(error);
  }
}
