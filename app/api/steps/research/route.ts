import { NextRequest, NextResponse } from 'next/server';
import { createContentRequest } from '@/lib/content_request';
import { errorResponse, readJsonBody } from '@/lib/http';
import { buildResearchQuery } from '@/lib/prompt_builder';
import { getConfig, getSearch } from '@/lib/services';
import { withTimeout } from '@/lib/timeout';
import { RESEARCH_RESULT_COUNT } from '@/lib/workflow';

/**
 * Step 1 API endpoint: /api/steps/research
 * Runs web research for a content request
 *
 * POST /api/steps/research
 * Body: same as /api/generate
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const contentRequest = createContentRequest(body);

    const search = getSearch();
    if (!search) {
      return NextResponse.json(
        { error: 'Research is not configured (BRAVE_SEARCH_API_KEY missing)' },
        { status: 503 }
      );
    }

    const query = buildResearchQuery(contentRequest);
    const results = await withTimeout(
      search.search(query, RESEARCH_RESULT_COUNT),
      getConfig().requestTimeoutMs,
      'Research'
    );

    return NextResponse.json({ query, results, count: results.length });
  } catch (error) {
    console.error('Error running research:', error);
    return errorResponse(error);
  }
}
