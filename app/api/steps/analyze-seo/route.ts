import { NextRequest, NextResponse } from 'next/server';
import { isContentType, readStringList } from '@/lib/content_request';
import { scoreContent } from '@/lib/content_scorer';
import { badRequest, errorResponse, readJsonBody } from '@/lib/http';

/**
 * Step 5 API endpoint: /api/steps/analyze-seo
 * Scores existing content without generating anything
 *
 * POST /api/steps/analyze-seo
 * Body: { content: string, keywords?: string[] | string, content_type?: ContentType }
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { content, content_type = 'blog_post' } = body;

    if (typeof content !== 'string' || !content.trim()) {
      return badRequest('Content is required');
    }

    if (!isContentType(content_type)) {
      return badRequest(`Unknown content_type: ${String(content_type)}`);
    }

    const keywords = readStringList(body.keywords, 'keywords');
    const analysis = scoreContent(content, keywords, content_type);
    return NextResponse.json(analysis);
  } catch (error) {
    console.error('Error analyzing content:', error);
    return errorResponse(error);
  }
}
