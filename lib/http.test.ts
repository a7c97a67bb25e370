import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  ContentRequestError,
  TimeoutError,
  WorkflowCancelledError,
  WorkflowError,
} from './errors';
import { errorResponse } from './http';

const CASES: Array<[Error, number]> = [
  [new ContentRequestError('topic is required'), 400],
  [new WorkflowError('generate_content', 'content_generation_failed', 'quota exceeded'), 502],
  [new WorkflowCancelledError('analyze_seo'), 499],
  [new TimeoutError('Research', 100), 504],
  [new ConfigurationError('OPENAI_API_KEY is required for content generation'), 500],
  [new Error('boom'), 500],
];

describe('errorResponse', () => {
  it.each(CASES)('maps %s to its status', (error, status) => {
    expect(errorResponse(error).status).toBe(status);
  });

  it('reports the failing stage of a workflow error', async () => {
    const response = errorResponse(new WorkflowError('generate_prompt', 'prompt_generation_failed', 'bad template'));

    expect(await response.json()).toEqual({
      error: 'Content generation failed',
      message: 'Workflow failed at stage "generate_prompt": bad template',
      stage: 'generate_prompt',
      status: 'prompt_generation_failed',
    });
  });

  it('describes non-Error values generically', async () => {
    expect(await errorResponse('nope').json()).toEqual({
      error: 'Internal server error',
      message: 'Unknown error',
    });
  });
});
