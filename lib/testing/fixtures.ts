import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { ContentModel, GenerateOptions, ResearchResult, SearchProvider } from '@/types';

/**
 * A ~1200-word blog post: 45-character title, meta description, two H2s,
 * one H3, an alt-text image, one internal and one external link, and
 * "garden" at about 1% density in the title and first paragraph.
 */
export function buildBlogPost(): string {
  const filler = 'Bold red cats run far.';
  const keywordSentence = 'Bold garden cats run far.';

  const paragraphs: string[] = [];
  for (let i = 0; i < 78; i++) {
    paragraphs.push(
      i % 8 === 0 ? `${keywordSentence} ${filler} ${filler}` : `${filler} ${filler} ${filler}`
    );
  }

  return [
    '# Garden Tips For Bold Red Plants In Tiny Yards',
    'Meta description: Bold garden tips for tiny yards.',
    '## Garden Basics',
    ...paragraphs.slice(0, 39),
    '### Soil',
    '![Red tulips in a pot](/images/tulips.png)',
    '## Next Steps',
    ...paragraphs.slice(39),
    'Read [our soil guide](/blog/soil) and the [plant database](https://example.org/plants).',
  ].join('\n\n');
}

export const SHORT_DRAFT = '# Short\n\nA tiny draft.';

export type ScriptedReply = string | Error | ((prompt: string) => string | Promise<string>);

export interface FakeModel extends ContentModel {
  prompts: string[];
  generate: Mock<(prompt: string, options?: GenerateOptions) => Promise<string>>;
}

/**
 * Model that answers from a script, one entry per call. Calls past the end
 * of the script reuse its last entry.
 */
export function createFakeModel(script: ScriptedReply[]): FakeModel {
  const prompts: string[] = [];
  const generate = vi.fn(async (prompt: string, _options?: GenerateOptions): Promise<string> => {
    prompts.push(prompt);
    const reply = script[Math.min(prompts.length - 1, script.length - 1)];
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(prompt);
    return reply;
  });

  return { name: 'fake-model', prompts, generate };
}

export const SAMPLE_RESULTS: ResearchResult[] = [
  {
    source: 'Garden Weekly',
    title: 'Balcony herbs that thrive',
    snippet: 'Basil and mint do well in pots.',
    url: 'https://example.org/herbs',
  },
  {
    source: 'example.com',
    title: 'Watering basics',
    snippet: 'Water early in the morning.',
    url: 'https://example.com/water',
  },
];

export interface FakeSearch extends SearchProvider {
  search: Mock<(query: string, count: number) => Promise<ResearchResult[]>>;
}

export function createFakeSearch(results: ResearchResult[] | Error = SAMPLE_RESULTS): FakeSearch {
  return {
    search: vi.fn(async (_query: string, count: number): Promise<ResearchResult[]> => {
      if (results instanceof Error) throw results;
      return results.slice(0, count);
    }),
  };
}
