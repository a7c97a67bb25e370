import { StructureMetrics } from '@/types';
import { normalizeLineEndings, splitParagraphs, tokenizeWords } from './text_utils';

/**
 * StructureAnalyzer
 * Title, heading, paragraph and link/image signals from a markdown body.
 */

const TITLE_PATTERN = /^#[ \t]+(\S.*)$/m;
const H2_PATTERN = /^##[ \t]+\S.*$/gm;
const H3_PATTERN = /^###[ \t]+\S.*$/gm;
const META_DESCRIPTION_PATTERN = /description:|meta description:/i;
const IMAGE_PATTERN = /!\[([^\]]*)\]\([^)]*\)/g;
// Links only; the lookbehind keeps images out
const LINK_PATTERN = /(?<!!)\[[^\]]*\]\(([^)]*)\)/g;
const EXTERNAL_URL_PATTERN = /^\s*https?:\/\//i;

export function analyzeStructure(input: string): StructureMetrics {
  const text = normalizeLineEndings(input);
  const titleMatch = text.match(TITLE_PATTERN);
  const title = titleMatch ? titleMatch[1].trim() : '';

  const paragraphCount = splitParagraphs(text).length;
  const wordCount = tokenizeWords(text).length;

  const linkUrls = Array.from(text.matchAll(LINK_PATTERN), (match) => match[1]);

  return {
    has_title: title.length > 0,
    title_length: title.length,
    h2_count: (text.match(H2_PATTERN) ?? []).length,
    h3_count: (text.match(H3_PATTERN) ?? []).length,
    paragraph_count: paragraphCount,
    avg_paragraph_length: paragraphCount > 0 ? wordCount / paragraphCount : 0,
    has_meta_description: META_DESCRIPTION_PATTERN.test(text),
    has_image_alt: Array.from(text.matchAll(IMAGE_PATTERN)).some((match) => match[1].trim().length > 0),
    has_internal_links: linkUrls.some((url) => !EXTERNAL_URL_PATTERN.test(url)),
    has_external_links: linkUrls.some((url) => EXTERNAL_URL_PATTERN.test(url)),
  };
}
