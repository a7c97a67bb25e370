import { ContentRequest, ResearchResult, SEOAnalysis } from '@/types';
import { getHeadlineFormulas, renderDirectResponseGuide } from './direct_response';
import {
  AUDIENCE_INSTRUCTIONS,
  CONTENT_TYPE_INSTRUCTIONS,
  TONE_INSTRUCTIONS,
} from './prompt_instructions';

/**
 * Prompt assembly for the generation, enhancement and refinement stages.
 * Deterministic for a given request and research list.
 */

export const SYSTEM_PROMPT = `# Direct-Response Copywriting System

You are an elite copywriter with deep expertise in direct-response marketing, SEO and audience psychology.
You write irresistible headlines, hooks that create immediate engagement, compelling narratives and calls-to-action that drive conversions.
You balance creativity with strategic objectives, adapt voice and tone to the audience, and optimize for search engines without sacrificing readability.
You are committed to factual accuracy and avoid manipulative or deceptive tactics.`;

export function formatResearchSection(results: readonly ResearchResult[]): string {
  const sources = results
    .map(
      (result, index) => `### Source ${index + 1}: ${result.title}
- Source: ${result.source}
- URL: ${result.url}
- Summary: ${result.snippet}`
    )
    .join('\n\n');

  return `## Research Findings:
Use the following information to enhance your content with accurate and relevant details:

${sources}`;
}

export function buildCopywritingPrompt(
  request: ContentRequest,
  researchResults?: readonly ResearchResult[]
): string {
  const sections: string[] = [
    `# Content Creation Request`,
    `## Content Type:\n${request.content_type}`,
    `## Topic:\n${request.topic}`,
    `## Target Audience:\n${AUDIENCE_INSTRUCTIONS[request.audience]}`,
    `## Tone and Style:\n${TONE_INSTRUCTIONS[request.tone]}`,
    `## Content Structure and Approach:\n${CONTENT_TYPE_INSTRUCTIONS[request.content_type]}`,
    `## Keywords to Include:\n${
      request.keywords.length > 0 ? request.keywords.join(', ') : 'No specific keywords provided'
    }`,
    `## Target Length:\n${
      request.word_count ? `Approximately ${request.word_count} words` : 'No specific length requirement'
    }`,
  ];

  if (request.custom_instructions) {
    sections.push(`## Additional Instructions:\n${request.custom_instructions}`);
  }

  if (request.references && request.references.length > 0) {
    sections.push(
      `## References:\nCite or draw on these sources where relevant:\n${request.references
        .map((reference) => `- ${reference}`)
        .join('\n')}`
    );
  }

  if (researchResults && researchResults.length > 0) {
    sections.push(formatResearchSection(researchResults));
  }

  sections.push(renderDirectResponseGuide());

  sections.push(`## Output Format:
Provide the complete content as requested, formatted in markdown appropriate for the content type.

## Important Guidelines:
- Focus on providing value to the reader
- Be original and avoid generic content
- Use evidence and examples where appropriate
- Ensure factual accuracy
- Maintain a consistent tone throughout
- Include a compelling call-to-action`);

  return `${SYSTEM_PROMPT}\n\n${sections.join('\n\n')}`;
}

export function buildEnhancementPrompt(content: string, request: ContentRequest): string {
  const formulas = getHeadlineFormulas()
    .slice(0, 5)
    .map((formula) => `- ${formula}`)
    .join('\n');

  return `# Direct Response Enhancement

## Original Content:
${content}

## Content Type:
${request.content_type}

## Enhancement Task:
Enhance the above content using direct response marketing principles to maximize click-through rates.
Focus on:

1. Creating compelling headlines that drive clicks
2. Adding urgency and scarcity elements
3. Strengthening calls-to-action
4. Incorporating social proof
5. Using power words and emotional triggers
6. Implementing the AIDA framework (Attention, Interest, Desire, Action)
7. Creating information gaps that require clicking to resolve
8. Using specific numbers and data points to increase credibility

## Headline Formulas:
${formulas}

## Important:
- Maintain the original topic and purpose: ${request.topic}
- Keep the same general structure
- Preserve key information and facts
- Ensure the tone stays ${request.tone}
- Target the content for a ${request.audience} audience

## Output:
Provide only the enhanced content without explanations.`;
}

/**
 * Prompt for another generation round: the base prompt plus the previous
 * draft and what the analysis found wrong with it.
 */
export function buildRefinementPrompt(basePrompt: string, draft: string, analysis: SEOAnalysis): string {
  const issues = analysis.recommendations.length > 0
    ? analysis.recommendations.map((rec) => `- ${rec}`).join('\n')
    : '- Improve overall quality';

  return `${basePrompt}

## Revision Notes:
A previous draft scored ${analysis.overall_score.toFixed(1)}/100 in SEO analysis. Write a new version that fixes these issues:
${issues}

## Previous Draft:
${draft}`;
}

export function buildResearchQuery(request: ContentRequest): string {
  return [request.topic, ...request.keywords, `${request.content_type} writing tips`].join(' ');
}
