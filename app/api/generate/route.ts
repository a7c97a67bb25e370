import { NextRequest, NextResponse } from 'next/server';
import { createContentRequest } from '@/lib/content_request';
import { errorResponse, readJsonBody } from '@/lib/http';
import { getConfig, getModel, getSearch } from '@/lib/services';
import { runContentWorkflow } from '@/lib/workflow';

/**
 * Main API endpoint: /api/generate
 * Runs the full workflow from request to scored, optimized content
 *
 * POST /api/generate
 * Body: { content_type, topic, tone?, audience?, keywords?, word_count?,
 *         include_research?, custom_instructions?, references? }
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const contentRequest = createContentRequest(body);

    const config = getConfig();
    const response = await runContentWorkflow(
      contentRequest,
      { model: getModel(), search: getSearch() },
      {
        timeoutMs: config.requestTimeoutMs,
        refinement: config.refinement,
        signal: request.signal,
      }
    );

    return NextResponse.json(response);
  } catch (error) {
    console.error('Error in content workflow:', error);
    return errorResponse(error);
  }
}
