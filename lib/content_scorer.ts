import {
  ContentType,
  KeywordAnalysis,
  ReadabilityMetrics,
  SEOAnalysis,
  StructureMetrics,
} from '@/types';
import { analyzeKeywords, MAX_OPTIMAL_DENSITY, MIN_OPTIMAL_DENSITY } from './keyword_analysis';
import { scoreReadability } from './readability';
import { analyzeStructure } from './structure_analysis';
import { clamp, normalizeLineEndings, splitSentences, tokenizeWords } from './text_utils';

/**
 * ContentScorer
 * Combines keyword, readability and structure analysis into a single weighted
 * 0-100 score and a rule-ordered list of recommendations.
 */

export interface ScoreWeights {
  keyword: number;
  readability: number;
  structure: number;
}

const DEFAULT_WEIGHTS: ScoreWeights = { keyword: 0.33, readability: 0.33, structure: 0.34 };

const CONTENT_TYPE_WEIGHTS: Partial<Record<ContentType, ScoreWeights>> = {
  blog_post: { keyword: 0.3, readability: 0.3, structure: 0.4 },
  landing_page: { keyword: 0.4, readability: 0.2, structure: 0.4 },
  product_description: { keyword: 0.5, readability: 0.2, structure: 0.3 },
};

const MIN_WORD_COUNT: Partial<Record<ContentType, number>> = {
  blog_post: 1000,
  landing_page: 500,
};

const TITLE_MIN_LENGTH = 40;
const TITLE_MAX_LENGTH = 60;
const MIN_PARAGRAPHS = 3;
const MAX_SENTENCES_PER_PARAGRAPH = 5;
const MIN_READING_EASE = 60;
const MAX_AVG_SENTENCE_LENGTH = 20;
const MAX_COMPLEX_WORD_PERCENTAGE = 20;

export function getScoreWeights(contentType: ContentType): ScoreWeights {
  return CONTENT_TYPE_WEIGHTS[contentType] ?? DEFAULT_WEIGHTS;
}

export function scoreContent(
  input: string,
  keywords: readonly string[],
  contentType: ContentType
): SEOAnalysis {
  const content = normalizeLineEndings(input);
  const structure = analyzeStructure(content);
  const keywordAnalysis = analyzeKeywords(content, keywords);
  const readability = scoreReadability(content);

  const wordCount = tokenizeWords(content).length;
  const sentenceCount = splitSentences(content).length;

  const structureScore = calculateStructureScore(structure);
  const weights = getScoreWeights(contentType);
  const weighted =
    clamp(keywordAnalysis.keyword_score, 0, 100) * weights.keyword +
    clamp(readability.readability_score, 0, 100) * weights.readability +
    structureScore * weights.structure;

  return {
    overall_score: clamp(weighted, 0, 100),
    structure_score: structureScore,
    word_count: wordCount,
    sentence_count: sentenceCount,
    keyword_metrics: keywordAnalysis,
    readability_metrics: readability,
    structure_metrics: structure,
    recommendations: buildRecommendations({
      structure,
      keywordAnalysis,
      readability,
      keywords,
      contentType,
      wordCount,
      sentenceCount,
    }),
  };
}

export function calculateStructureScore(structure: StructureMetrics): number {
  let score = 0;

  if (structure.has_title) score += 15;

  if (structure.title_length >= TITLE_MIN_LENGTH && structure.title_length <= TITLE_MAX_LENGTH) {
    score += 10;
  } else if (structure.title_length > 0) {
    score += 5;
  }

  if (structure.h2_count >= 2) {
    score += 10;
  } else if (structure.h2_count > 0) {
    score += 5;
  }

  if (structure.h3_count >= 2) score += 5;
  if (structure.has_meta_description) score += 15;
  if (structure.has_image_alt) score += 10;
  if (structure.has_internal_links) score += 10;
  if (structure.has_external_links) score += 10;

  return Math.min(score, 100);
}

interface RecommendationInput {
  structure: StructureMetrics;
  keywordAnalysis: KeywordAnalysis;
  readability: ReadabilityMetrics;
  keywords: readonly string[];
  contentType: ContentType;
  wordCount: number;
  sentenceCount: number;
}

function buildRecommendations(input: RecommendationInput): string[] {
  const { structure, keywordAnalysis, readability, keywords, contentType, wordCount, sentenceCount } = input;
  const recommendations: string[] = [];

  // Title
  if (!structure.has_title) {
    recommendations.push('Add a clear title (H1) to the content.');
  } else if (structure.title_length < TITLE_MIN_LENGTH) {
    recommendations.push(
      `Your title is ${structure.title_length} characters. Make it longer (40-60 characters is optimal).`
    );
  } else if (structure.title_length > TITLE_MAX_LENGTH) {
    recommendations.push(
      `Your title is ${structure.title_length} characters. Shorten it (40-60 characters is optimal).`
    );
  }

  // Headings
  if (structure.h2_count < 2) {
    recommendations.push('Add more H2 headings to structure your content.');
  }
  if (structure.h3_count === 0 && structure.h2_count > 1) {
    recommendations.push('Consider adding H3 subheadings under your main sections.');
  }

  // On-page elements
  if (!structure.has_meta_description) {
    recommendations.push('Add a meta description to improve search engine visibility.');
  }
  if (!structure.has_image_alt) {
    recommendations.push('Add images with descriptive alt text.');
  }
  if (!structure.has_internal_links) {
    recommendations.push('Add internal links to other relevant content.');
  }
  if (!structure.has_external_links) {
    recommendations.push('Add external links to authoritative sources.');
  }

  // Keywords
  const lowDensity: string[] = [];
  const highDensity: string[] = [];
  const missingInTitle: string[] = [];
  const missingInHeadings: string[] = [];

  for (const metric of Object.values(keywordAnalysis.keywords)) {
    if (metric.count === 0) {
      recommendations.push(`Add the keyword '${metric.keyword}' to your content.`);
    } else if (metric.density < MIN_OPTIMAL_DENSITY) {
      lowDensity.push(metric.keyword);
    } else if (metric.density > MAX_OPTIMAL_DENSITY) {
      highDensity.push(metric.keyword);
    }

    if (!metric.in_title && structure.has_title) missingInTitle.push(metric.keyword);
    if (!metric.in_headings && structure.h2_count + structure.h3_count > 0) {
      missingInHeadings.push(metric.keyword);
    }
  }

  if (lowDensity.length > 0) {
    recommendations.push(`Increase the usage of these keywords: ${lowDensity.join(', ')}.`);
  }
  if (highDensity.length > 0) {
    recommendations.push(
      `Reduce the usage of these keywords to avoid keyword stuffing: ${highDensity.join(', ')}.`
    );
  }

  const primary = keywords.length > 0 ? keywordAnalysis.keywords[keywords[0]] : undefined;
  if (primary && primary.count > 0 && !primary.in_first_paragraph) {
    recommendations.push(`Include the primary keyword '${primary.keyword}' in the first paragraph.`);
  }

  if (missingInTitle.length > 0 && missingInTitle.length <= 2) {
    recommendations.push(`Include these keywords in your title: ${missingInTitle.join(', ')}.`);
  }
  if (missingInHeadings.length > 0 && missingInHeadings.length <= 3) {
    recommendations.push(`Include these keywords in your headings: ${missingInHeadings.join(', ')}.`);
  }

  // Readability
  if (readability.flesch_reading_ease < MIN_READING_EASE) {
    recommendations.push('Improve readability by using shorter sentences and simpler words.');
  }
  if (readability.avg_sentence_length > MAX_AVG_SENTENCE_LENGTH) {
    recommendations.push(
      `Reduce average sentence length (currently ${readability.avg_sentence_length.toFixed(1)} words).`
    );
  }
  if (readability.complex_word_percentage > MAX_COMPLEX_WORD_PERCENTAGE) {
    recommendations.push('Use simpler words to improve readability.');
  }

  // Length
  const minWords = MIN_WORD_COUNT[contentType];
  if (minWords !== undefined && wordCount < minWords) {
    recommendations.push(
      `Increase content length (currently ${wordCount} words, aim for ${minWords}+ words).`
    );
  }

  // Paragraphs
  if (structure.paragraph_count < MIN_PARAGRAPHS) {
    recommendations.push('Add more paragraphs to improve readability.');
  }
  if (
    structure.paragraph_count > 0 &&
    sentenceCount / structure.paragraph_count > MAX_SENTENCES_PER_PARAGRAPH
  ) {
    recommendations.push(
      'Your paragraphs are quite long. Break them into smaller paragraphs for better readability.'
    );
  }

  return recommendations;
}

/**
 * Prompt asking the model to rewrite content according to an analysis.
 */
export function buildSeoImprovementPrompt(analysis: SEOAnalysis, content: string): string {
  const recommendations = analysis.recommendations.length > 0
    ? analysis.recommendations.map((rec) => `- ${rec}`).join('\n')
    : '- No specific recommendations';

  const keywordLines = Object.values(analysis.keyword_metrics.keywords)
    .map((metric) =>
      [
        `- Keyword: ${metric.keyword}`,
        `  - Count: ${metric.count}`,
        `  - Density: ${metric.density.toFixed(2)}%`,
        `  - In Title: ${metric.in_title ? 'Yes' : 'No'}`,
        `  - In Headings: ${metric.in_headings ? 'Yes' : 'No'}`,
        `  - In First Paragraph: ${metric.in_first_paragraph ? 'Yes' : 'No'}`,
      ].join('\n')
    )
    .join('\n');

  return `# SEO Improvement Task

## Original Content:
${content}

## SEO Analysis Results:
- Overall SEO Score: ${analysis.overall_score.toFixed(1)}/100
- Word Count: ${analysis.word_count}
- Readability Score: ${analysis.readability_metrics.readability_score.toFixed(1)}/100

## Key Recommendations:
${recommendations}

## Keyword Analysis:
${keywordLines || '- No target keywords'}

## Task:
Rewrite the content to improve its SEO performance based on the analysis and recommendations above.
Maintain the original message and purpose while optimizing for search engines.

## Important:
- Implement all the recommendations listed above
- Maintain the original tone and style
- Ensure the content remains natural and reader-friendly
- Do not sacrifice quality for keyword density

## Output:
Provide only the improved content without explanations.`;
}
