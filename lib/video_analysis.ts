import {
  ContentModel,
  FrameDecoder,
  VideoAnalysisResult,
  VIDEO_PLATFORMS,
  VideoContentType,
  VideoMetadata,
} from '@/types';
import { DEFAULT_TIMEOUT_MS } from './config';
import { extractFrames } from './frame_extraction';
import { withTimeout } from './timeout';

/**
 * Video path: sample frames, ask the vision model for a platform-specific
 * caption, hashtags and recommendations, then parse its sectioned answer.
 */

export interface VideoAnalysisDependencies {
  model: ContentModel;
  decoder: FrameDecoder;
  timeoutMs?: number;
}

export interface ParsedVideoResponse {
  caption: string;
  hashtags: string[];
  recommendations: string[];
  title?: string;
  description?: string;
}

// TikTok has no cap
export const HASHTAG_LIMITS: Record<VideoContentType, number | undefined> = {
  instagram_reel: 30,
  youtube_short: 15,
  tiktok: undefined,
};

const PERSONAS: Record<VideoContentType, string> = {
  instagram_reel: 'a social media strategist specializing in Instagram growth with 8+ years of experience',
  youtube_short: 'a YouTube optimization expert who has helped creators reach millions of views',
  tiktok: 'a TikTok content strategist who understands viral trends and audience engagement',
};

const PLATFORM_INSTRUCTIONS: Record<VideoContentType, string> = {
  instagram_reel: `- Create a caption that's engaging but concise (max 2200 characters)
- Focus on storytelling elements that create emotional connection
- Include a question or call-to-action to boost comments
- Suggest 20-30 hashtags organized by popularity (mix of broad, niche, and trending)
- Recommend optimal posting times based on content theme`,
  youtube_short: `- Create an attention-grabbing title (max 60 characters)
- Write a description that front-loads keywords (max 300 characters)
- Include 3-5 highly relevant hashtags
- Suggest end screens and cards to drive further engagement
- Recommend related video ideas to create a content series`,
  tiktok: `- Create a short, punchy caption with strong hook
- Include 3-5 trending hashtags plus 2-3 niche hashtags
- Suggest trending sounds that could complement the video
- Recommend follow-up content ideas to boost profile growth
- Include ideas for text overlay to improve retention`,
};

export function buildVideoPrompt(
  contentType: VideoContentType,
  keywords: readonly string[],
  customInstructions?: string
): string {
  const captionLength = contentType === 'instagram_reel' ? 2200 : 500;
  const specs = [
    `- **Platform:** ${contentType}`,
    `- **Keywords/Topics:** ${keywords.length > 0 ? keywords.join(', ') : 'No specific keywords provided'}`,
    `- **Target Caption Length:** ${captionLength} characters`,
  ];
  if (customInstructions) {
    specs.push(`- **Additional Context:** ${customInstructions}`);
  }

  const outputSections =
    contentType === 'youtube_short'
      ? `**TITLE:**
[An attention-grabbing title]

**DESCRIPTION:**
[The video description]`
      : `**CAPTION:**
[The complete caption, optimized for the platform]`;

  return `# Video Content Analysis Request

## Your Role:
You are ${PERSONAS[contentType]}. Analyze the provided video frames and create optimized content that will maximize engagement, reach and conversion for ${contentType}.

## Video Content Specifications:
${specs.join('\n')}

## Platform-Specific Requirements:
${PLATFORM_INSTRUCTIONS[contentType]}

## Analysis Process:
1. Analyze the video frames to understand the main subject, the action taking place, the mood and aesthetic, any visible text and the likely target audience.
2. Based on your analysis, create a strategic caption, relevant hashtags organized by reach potential and specific recommendations to improve performance.

## Output Format:
Structure your response in the following format:

**VIDEO ANALYSIS:**
[A brief analysis of what you observe in the video frames]

${outputSections}

**HASHTAGS:**
[List of recommended hashtags]

**PERFORMANCE RECOMMENDATIONS:**
[5 specific, actionable recommendations, one per numbered line]

## Important Guidelines:
- Be specific and actionable in your recommendations
- Avoid generic advice that could apply to any video
- Ensure all suggestions align with the actual video content`;
}

type Section = 'analysis' | 'caption' | 'title' | 'description' | 'hashtags' | 'recommendations';

const SECTION_HEADER = /^[#*\s]*(VIDEO ANALYSIS|CAPTION|TITLE|DESCRIPTION|HASHTAGS|PERFORMANCE RECOMMENDATIONS|RECOMMENDATIONS)\s*:\**\s*(.*)$/i;
const MARKDOWN_HEADING = /^#+\s/;
const LIST_ITEM = /^(?:\d+\.|[-*])\s+(.*)$/;

function toSection(header: string, contentType: VideoContentType): Section | undefined {
  switch (header.toUpperCase()) {
    case 'VIDEO ANALYSIS':
      return 'analysis';
    case 'CAPTION':
      return 'caption';
    case 'HASHTAGS':
      return 'hashtags';
    case 'PERFORMANCE RECOMMENDATIONS':
    case 'RECOMMENDATIONS':
      return 'recommendations';
    case 'TITLE':
      return contentType === 'youtube_short' ? 'title' : undefined;
    case 'DESCRIPTION':
      return contentType === 'youtube_short' ? 'description' : undefined;
    default:
      return undefined;
  }
}

export function parseVideoResponse(response: string, contentType: VideoContentType): ParsedVideoResponse {
  const captionLines: string[] = [];
  const descriptionLines: string[] = [];
  const hashtags: string[] = [];
  const recommendations: string[] = [];
  let title = '';
  let section: Section | undefined;

  for (const rawLine of response.split('\n')) {
    let line = rawLine.trim();

    const header = SECTION_HEADER.exec(line);
    if (header) {
      const next = toSection(header[1], contentType);
      if (next) {
        section = next;
        line = header[2].trim();
      }
    }

    if (!line || MARKDOWN_HEADING.test(line)) continue;

    switch (section) {
      case 'caption':
        captionLines.push(line);
        break;
      case 'title':
        title = line;
        break;
      case 'description':
        descriptionLines.push(line);
        break;
      case 'hashtags':
        for (const word of line.split(/\s+/)) {
          const tag = word.replace(/[,;.]+$/, '');
          if (tag.startsWith('#') && tag.length > 1) hashtags.push(tag);
        }
        break;
      case 'recommendations': {
        const item = LIST_ITEM.exec(line);
        if (item) {
          recommendations.push(item[1].trim());
        } else if (recommendations.length > 0) {
          recommendations[recommendations.length - 1] += ` ${line}`;
        }
        break;
      }
      default:
        break;
    }
  }

  const result: ParsedVideoResponse = {
    caption: captionLines.join('\n').trim(),
    hashtags,
    recommendations,
  };

  if (contentType === 'youtube_short') {
    result.title = title;
    result.description = descriptionLines.join('\n').trim();

    // Fall back to splitting the caption when the model skipped the title section
    if (!result.title && result.caption.includes('\n')) {
      const [first, ...rest] = result.caption.split('\n');
      result.title = first;
      result.description = rest.join('\n');
    }
  }

  return result;
}

export function keywordHashtags(keywords: readonly string[]): string[] {
  return keywords
    .slice(0, 3)
    .map((keyword) => keyword.replace(/[^\p{L}\p{N}_]/gu, ''))
    .filter((tag) => tag.length > 0)
    .map((tag) => `#${tag}`);
}

/**
 * Case-insensitive de-duplication in first-seen order, then the platform cap.
 */
export function mergeHashtags(tags: readonly string[], limit?: number): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];

  for (const tag of tags) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(tag);
  }

  return limit === undefined ? merged : merged.slice(0, limit);
}

export async function analyzeVideo(
  videoPath: string,
  contentType: VideoContentType,
  keywords: readonly string[],
  maxFrames: number,
  deps: VideoAnalysisDependencies,
  customInstructions?: string
): Promise<VideoAnalysisResult> {
  const timeoutMs = deps.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const platform = VIDEO_PLATFORMS[contentType];

  const frames = await extractFrames(videoPath, maxFrames, deps.decoder);
  if (frames.length === 0) {
    throw new Error(`Could not extract any frames from video: ${videoPath}`);
  }

  const prompt = buildVideoPrompt(contentType, keywords, customInstructions);
  const response = await withTimeout(
    deps.model.generate(prompt, { images: frames }),
    timeoutMs,
    'Video analysis'
  );
  const parsed = parseVideoResponse(response, contentType);

  const metadata: VideoMetadata = {
    platform,
    content_type: contentType,
    frame_count: frames.length,
    keywords: [...keywords],
  };
  if (contentType === 'youtube_short') {
    metadata.title = parsed.title;
    metadata.description = parsed.description;
  }

  return {
    caption: parsed.caption,
    hashtags: mergeHashtags(
      [...parsed.hashtags, ...keywordHashtags(keywords)],
      HASHTAG_LIMITS[contentType]
    ),
    recommendations: parsed.recommendations,
    metadata,
  };
}
