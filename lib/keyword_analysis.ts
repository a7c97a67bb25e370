import { KeywordAnalysis, KeywordMetric, TermFrequency } from '@/types';
import stopWordList from '@/data/stop_words.json';
import { countOccurrences, normalizeLineEndings, splitParagraphs, tokenizeWords } from './text_utils';

/**
 * KeywordAnalyzer
 * Per-keyword occurrence, density and placement signals, plus an aggregate 0-100 score.
 */

const STOP_WORDS = new Set<string>(stopWordList);

export const MIN_OPTIMAL_DENSITY = 0.5;
export const MAX_OPTIMAL_DENSITY = 2.5;

// count > 0, in title (x2), in headings, in first paragraph, optimal density
const MAX_POINTS_PER_KEYWORD = 6;

const TOP_TERMS_LIMIT = 10;

interface DocumentOutline {
  title: string;
  headings: string[];
  firstParagraph: string;
  lastParagraph: string;
}

export function analyzeKeywords(text: string, keywords: readonly string[]): KeywordAnalysis {
  const lowerText = normalizeLineEndings(text).toLowerCase();
  const filteredWords = tokenizeWords(lowerText).filter((word) => !STOP_WORDS.has(word));
  const frequencies = countFrequencies(filteredWords);
  const outline = extractOutline(lowerText);

  // Duplicate keywords collapse into a single entry
  const metrics = new Map<string, KeywordMetric>();
  for (const keyword of keywords) {
    if (metrics.has(keyword)) continue;
    metrics.set(keyword, measureKeyword(keyword, lowerText, frequencies, filteredWords.length, outline));
  }

  const entries = Array.from(metrics.values());
  const points = entries.reduce((sum, metric) => sum + scoreKeyword(metric), 0);
  const maxPoints = Math.max(entries.length, 1) * MAX_POINTS_PER_KEYWORD;

  return {
    keywords: Object.fromEntries(metrics),
    keyword_score: (points / maxPoints) * 100,
    top_terms: topTerms(frequencies),
  };
}

export function isOptimalDensity(density: number): boolean {
  return density >= MIN_OPTIMAL_DENSITY && density <= MAX_OPTIMAL_DENSITY;
}

function measureKeyword(
  keyword: string,
  lowerText: string,
  frequencies: Map<string, number>,
  totalWords: number,
  outline: DocumentOutline
): KeywordMetric {
  const needle = keyword.toLowerCase().trim();

  // Phrases (anything that is not one token) are matched literally; single words go through the filtered token counts
  const count = /[^a-z0-9]/.test(needle)
    ? countOccurrences(lowerText, needle)
    : frequencies.get(needle) ?? 0;
  const density = totalWords > 0 ? (count * 100) / totalWords : 0;

  return {
    keyword,
    count,
    density,
    in_title: needle.length > 0 && outline.title.includes(needle),
    in_headings: needle.length > 0 && outline.headings.some((heading) => heading.includes(needle)),
    in_first_paragraph: needle.length > 0 && outline.firstParagraph.includes(needle),
    in_last_paragraph: needle.length > 0 && outline.lastParagraph.includes(needle),
    optimal_density: isOptimalDensity(density),
  };
}

function scoreKeyword(metric: KeywordMetric): number {
  let points = 0;
  if (metric.count > 0) points += 1;
  if (metric.in_title) points += 2;
  if (metric.in_headings) points += 1;
  if (metric.in_first_paragraph) points += 1;
  if (metric.optimal_density) points += 1;
  return points;
}

function extractOutline(lowerText: string): DocumentOutline {
  const lines = lowerText.split('\n');
  const headingTitle = lines.find((line) => /^#[ \t]+\S/.test(line));
  const firstLine = lines.find((line) => line.trim().length > 0) ?? '';
  const title = (headingTitle ?? firstLine).replace(/^#[ \t]+/, '').trim();

  const headings = lines
    .filter((line) => /^#{2,3}[ \t]+\S/.test(line))
    .map((line) => line.replace(/^#{2,3}[ \t]+/, '').trim());

  const paragraphs = splitParagraphs(lowerText);

  return {
    title,
    headings,
    firstParagraph: paragraphs[0] ?? '',
    lastParagraph: paragraphs[paragraphs.length - 1] ?? '',
  };
}

function countFrequencies(words: string[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const word of words) {
    frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
  }
  return frequencies;
}

function topTerms(frequencies: Map<string, number>): TermFrequency[] {
  // Stable sort keeps first-seen order among equal counts
  return Array.from(frequencies, ([term, count]) => ({ term, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_TERMS_LIMIT);
}
