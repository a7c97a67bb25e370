import { NextRequest, NextResponse } from 'next/server';
import { isContentType } from '@/lib/content_request';
import { exportContent } from '@/lib/export';
import { badRequest, errorResponse, readJsonBody } from '@/lib/http';
import { getConfig } from '@/lib/services';

/**
 * API endpoint: /api/export
 * Saves generated content as a markdown file in the export directory
 *
 * POST /api/export
 * Body: { content: string, content_type: ContentType }
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { content, content_type } = body;

    if (typeof content !== 'string' || !content) {
      return badRequest('Content is required');
    }

    if (!isContentType(content_type)) {
      return badRequest(`Unknown content_type: ${String(content_type)}`);
    }

    const filePath = exportContent(content, content_type, getConfig().exportDir);
    return NextResponse.json({ path: filePath });
  } catch (error) {
    console.error('Error exporting content:', error);
    return errorResponse(error);
  }
}
