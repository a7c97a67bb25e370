import { AUDIENCES, CONTENT_TYPES, ContentRequest, ContentType, TONES } from '@/types';
import { ContentRequestError } from './errors';

/**
 * Validates raw input (a request body, CLI arguments) and builds an
 * immutable ContentRequest with defaults applied.
 */

export function isContentType(value: unknown): value is ContentType {
  return CONTENT_TYPES.some((type) => type === value);
}

export function createContentRequest(input: unknown): ContentRequest {
  if (!isRecord(input)) {
    throw new ContentRequestError('Content request must be an object');
  }

  const { topic, word_count, include_research } = input;

  const contentType = readOption(input.content_type, CONTENT_TYPES, 'content_type');

  if (typeof topic !== 'string' || topic.trim().length === 0) {
    throw new ContentRequestError('topic is required and must be a non-empty string');
  }

  if (
    word_count !== undefined &&
    word_count !== null &&
    (typeof word_count !== 'number' || !Number.isInteger(word_count) || word_count <= 0)
  ) {
    throw new ContentRequestError('word_count must be a positive integer');
  }

  if (include_research !== undefined && typeof include_research !== 'boolean') {
    throw new ContentRequestError('include_research must be a boolean');
  }

  const request: ContentRequest = {
    content_type: contentType,
    topic: topic.trim(),
    tone: readOption(input.tone, TONES, 'tone', 'conversational'),
    audience: readOption(input.audience, AUDIENCES, 'audience', 'general'),
    keywords: Object.freeze(readStringList(input.keywords, 'keywords')),
    word_count: typeof word_count === 'number' ? word_count : undefined,
    include_research: typeof include_research === 'boolean' ? include_research : true,
    custom_instructions: readOptionalString(input.custom_instructions, 'custom_instructions'),
    references: input.references === undefined || input.references === null
      ? undefined
      : Object.freeze(readStringList(input.references, 'references')),
  };

  return Object.freeze(request);
}

/**
 * Accepts an array of strings or a comma-separated string (form input).
 */
export function readStringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];

  const items = typeof value === 'string' ? value.split(',') : value;
  if (!Array.isArray(items)) {
    throw new ContentRequestError(`${field} must be a list of strings`);
  }

  const result: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string') {
      throw new ContentRequestError(`${field} must contain only strings`);
    }
    const trimmed = item.trim();
    if (trimmed) result.push(trimmed);
  }
  return result;
}

function readOption<T extends string>(
  value: unknown,
  options: readonly T[],
  field: string,
  fallback?: T
): T {
  if ((value === undefined || value === null) && fallback !== undefined) return fallback;

  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw new ContentRequestError(`${field} must be one of: ${options.join(', ')}`);
  }
  return match;
}

function readOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ContentRequestError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
