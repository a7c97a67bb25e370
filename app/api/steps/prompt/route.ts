import { NextRequest, NextResponse } from 'next/server';
import { createContentRequest, isRecord } from '@/lib/content_request';
import { badRequest, errorResponse, readJsonBody } from '@/lib/http';
import { buildCopywritingPrompt } from '@/lib/prompt_builder';
import { ResearchResult } from '@/types';

/**
 * Step 2 API endpoint: /api/steps/prompt
 * Assembles the copywriting prompt without calling the model
 *
 * POST /api/steps/prompt
 * Body: { ...content request, research_results?: ResearchResult[] }
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const contentRequest = createContentRequest(body);

    const research = readResearchResults(body.research_results);
    if (research === null) {
      return badRequest('research_results must be a list of { source, title, snippet, url }');
    }

    const prompt = buildCopywritingPrompt(contentRequest, research);
    return NextResponse.json({ prompt, length: prompt.length });
  } catch (error) {
    console.error('Error building prompt:', error);
    return errorResponse(error);
  }
}

function readResearchResults(value: unknown): ResearchResult[] | undefined | null {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) return null;

  const results: ResearchResult[] = [];
  for (const item of value) {
    if (!isRecord(item)) return null;
    const { source, title, snippet, url } = item;
    if (
      typeof source !== 'string' ||
      typeof title !== 'string' ||
      typeof snippet !== 'string' ||
      typeof url !== 'string'
    ) {
      return null;
    }
    results.push({ source, title, snippet, url });
  }
  return results;
}
