import { NextRequest, NextResponse } from 'next/server';
import { isRecord } from './content_request';
import {
  ConfigurationError,
  ContentRequestError,
  TimeoutError,
  WorkflowCancelledError,
  WorkflowError,
} from './errors';

// Parse the request body, rejecting anything but a JSON object
export async function readJsonBody(request: NextRequest): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ContentRequestError('Request body must be valid JSON');
  }

  if (!isRecord(body)) {
    throw new ContentRequestError('Request body must be a JSON object');
  }
  return body;
}

export function badRequest(error: string): NextResponse {
  return NextResponse.json({ error }, { status: 400 });
}

/**
 * Maps a thrown error to the JSON error shape every route answers with.
 */
export function errorResponse(error: unknown): NextResponse {
  if (error instanceof ContentRequestError) {
    return NextResponse.json({ error: 'Invalid request', message: error.message }, { status: 400 });
  }

  if (error instanceof WorkflowError) {
    return NextResponse.json(
      { error: 'Content generation failed', message: error.message, stage: error.stage, status: error.status },
      { status: 502 }
    );
  }

  if (error instanceof WorkflowCancelledError) {
    return NextResponse.json({ error: 'Request cancelled', message: error.message }, { status: 499 });
  }

  if (error instanceof TimeoutError) {
    return NextResponse.json({ error: 'Upstream timeout', message: error.message }, { status: 504 });
  }

  if (error instanceof ConfigurationError) {
    return NextResponse.json({ error: 'Server misconfigured', message: error.message }, { status: 500 });
  }

  return NextResponse.json(
    {
      error: 'Internal server error',
      message: error instanceof Error ? error.message : 'Unknown error',
    },
    { status: 500 }
  );
}
