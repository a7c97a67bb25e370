import { describe, expect, it } from 'vitest';
import { VideoAnalysisResult } from '@/types';
import { buildVideoRequestBody, composeVideoPost, VideoFormValues } from './video_form';

const VALUES: VideoFormValues = {
  videoPath: '  /videos/surf.mp4 ',
  contentType: 'instagram_reel',
  keywords: 'surfing, , dogs ',
  maxFrames: '',
  customInstructions: '   ',
};

describe('buildVideoRequestBody', () => {
  it('trims inputs and defaults the frame count', () => {
    expect(buildVideoRequestBody(VALUES)).toEqual({
      ok: true,
      body: {
        video_path: '/videos/surf.mp4',
        content_type: 'instagram_reel',
        keywords: ['surfing', 'dogs'],
        max_frames: 5,
      },
    });
  });

  it('passes frame count and instructions through', () => {
    const result = buildVideoRequestBody({ ...VALUES, maxFrames: '8', customInstructions: 'Brand colours are teal' });

    expect(result).toEqual({
      ok: true,
      body: {
        video_path: '/videos/surf.mp4',
        content_type: 'instagram_reel',
        keywords: ['surfing', 'dogs'],
        max_frames: 8,
        custom_instructions: 'Brand colours are teal',
      },
    });
  });

  it('requires a video path', () => {
    expect(buildVideoRequestBody({ ...VALUES, videoPath: ' ' })).toEqual({
      ok: false,
      error: 'Please enter a video path',
    });
  });

  it('rejects fractional or non-positive frame counts', () => {
    for (const maxFrames of ['0', '-2', '2.5', 'many']) {
      expect(buildVideoRequestBody({ ...VALUES, maxFrames })).toEqual({
        ok: false,
        error: 'Frames must be a positive whole number',
      });
    }
  });
});

describe('composeVideoPost', () => {
  it('joins the caption with its hashtags', () => {
    const result: VideoAnalysisResult = {
      caption: 'Catch the wave',
      hashtags: ['#surfing', '#dogs'],
      recommendations: [],
      metadata: { platform: 'instagram', content_type: 'instagram_reel', frame_count: 3, keywords: [] },
    };

    expect(composeVideoPost(result)).toBe('Catch the wave\n\n#surfing #dogs');
  });

  it('leads with the YouTube title and description', () => {
    const result: VideoAnalysisResult = {
      caption: '',
      hashtags: [],
      recommendations: [],
      metadata: {
        platform: 'youtube',
        content_type: 'youtube_short',
        frame_count: 3,
        keywords: [],
        title: 'Big wave',
        description: 'Dog rides it',
      },
    };

    expect(composeVideoPost(result)).toBe('Big wave\n\nDog rides it');
  });
});
