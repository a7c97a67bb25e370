import { NextRequest } from 'next/server';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { SHORT_DRAFT } from '@/lib/testing/fixtures';
import { POST } from './route';

function post(body: string): NextRequest {
  return new NextRequest('http://localhost/api/steps/analyze-seo', {
    method: 'POST',
    body,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('POST /api/steps/analyze-seo', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('scores the submitted content', async () => {
    const response = await POST(post(JSON.stringify({ content: SHORT_DRAFT, keywords: 'garden' })));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.overall_score).toBeCloseTo(36.41, 1);
    expect(Object.keys(body.keyword_metrics.keywords)).toEqual(['garden']);
  });

  it('requires content', async () => {
    const response = await POST(post(JSON.stringify({ content: '  ' })));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Content is required' });
  });

  it('rejects an unknown content type', async () => {
    const response = await POST(post(JSON.stringify({ content: 'Hi', content_type: 'novel' })));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Unknown content_type: novel' });
  });

  it('rejects a malformed body', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const response = await POST(post('{not json'));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid request',
      message: 'Request body must be valid JSON',
    });
  });
});
