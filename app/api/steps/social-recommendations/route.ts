import { NextRequest, NextResponse } from 'next/server';
import { readStringList } from '@/lib/content_request';
import { badRequest, errorResponse, readJsonBody } from '@/lib/http';
import { getSocialMediaRecommendations } from '@/lib/social_recommendations';
import { SOCIAL_PLATFORMS } from '@/types';

/**
 * API endpoint: /api/steps/social-recommendations
 * Platform-specific posting advice for social content
 *
 * POST /api/steps/social-recommendations
 * Body: { platform: SocialPlatform, content: string, keywords?: string[] | string }
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { content } = body;

    const platform = SOCIAL_PLATFORMS.find((name) => name === body.platform);
    if (!platform) {
      return badRequest(`platform must be one of: ${SOCIAL_PLATFORMS.join(', ')}`);
    }

    if (typeof content !== 'string' || !content.trim()) {
      return badRequest('Content is required');
    }

    const keywords = readStringList(body.keywords, 'keywords');
    const recommendations = getSocialMediaRecommendations(platform, content, keywords);
    return NextResponse.json({ platform, recommendations, count: recommendations.length });
  } catch (error) {
    console.error('Error building social recommendations:', error);
    return errorResponse(error);
  }
}
