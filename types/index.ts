// Core data types for the content pipeline

export const CONTENT_TYPES = [
  'blog_post',
  'social_media',
  'email',
  'landing_page',
  'product_description',
  'ad_copy',
  'press_release',
  'custom',
] as const;

export const TONES = [
  'professional',
  'conversational',
  'enthusiastic',
  'informative',
  'persuasive',
  'humorous',
  'formal',
  'casual',
] as const;

export const AUDIENCES = [
  'general',
  'technical',
  'business',
  'consumer',
  'expert',
  'beginner',
  'youth',
  'senior',
] as const;

export const VIDEO_CONTENT_TYPES = ['instagram_reel', 'youtube_short', 'tiktok'] as const;

export const SOCIAL_PLATFORMS = ['linkedin', 'twitter', 'instagram', 'youtube', 'facebook', 'tiktok'] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];
export type ToneType = (typeof TONES)[number];
export type AudienceType = (typeof AUDIENCES)[number];
export type VideoContentType = (typeof VIDEO_CONTENT_TYPES)[number];
export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];
export type VideoPlatform = Extract<SocialPlatform, 'instagram' | 'youtube' | 'tiktok'>;

export const VIDEO_PLATFORMS: Record<VideoContentType, VideoPlatform> = {
  instagram_reel: 'instagram',
  youtube_short: 'youtube',
  tiktok: 'tiktok',
};

export interface ContentRequest {
  readonly content_type: ContentType;
  readonly topic: string;
  readonly tone: ToneType;
  readonly audience: AudienceType;
  readonly keywords: readonly string[];
  readonly word_count?: number;
  readonly include_research: boolean;
  readonly custom_instructions?: string;
  readonly references?: readonly string[];
}

export interface ResearchResult {
  source: string;
  title: string;
  snippet: string;
  url: string;
}

export interface KeywordMetric {
  keyword: string;
  count: number;
  density: number; // percent of stop-word-filtered words
  in_title: boolean;
  in_headings: boolean;
  in_first_paragraph: boolean;
  in_last_paragraph: boolean;
  optimal_density: boolean;
}

export interface TermFrequency {
  term: string;
  count: number;
}

export interface KeywordAnalysis {
  keywords: Record<string, KeywordMetric>;
  keyword_score: number;
  top_terms: TermFrequency[];
}

export interface ReadabilityMetrics {
  flesch_reading_ease: number;
  flesch_kincaid_grade: number;
  gunning_fog: number;
  smog_index: number;
  avg_sentence_length: number;
  complex_word_percentage: number;
  readability_score: number;
}

export interface StructureMetrics {
  has_title: boolean;
  title_length: number;
  h2_count: number;
  h3_count: number;
  paragraph_count: number;
  avg_paragraph_length: number;
  has_meta_description: boolean;
  has_image_alt: boolean;
  has_internal_links: boolean;
  has_external_links: boolean;
}

export interface SEOAnalysis {
  overall_score: number;
  structure_score: number;
  word_count: number;
  sentence_count: number;
  keyword_metrics: KeywordAnalysis;
  readability_metrics: ReadabilityMetrics;
  structure_metrics: StructureMetrics;
  recommendations: string[];
}

export type WorkflowStage =
  | 'research'
  | 'generate_prompt'
  | 'generate_content'
  | 'enhance_content'
  | 'analyze_seo'
  | 'optimize_seo';

export type WorkflowStatus =
  | 'initialized'
  | 'research_skipped'
  | 'research_completed'
  | 'research_failed'
  | 'prompt_generated'
  | 'prompt_generation_failed'
  | 'content_generated'
  | 'content_generation_failed'
  | 'content_enhanced'
  | 'enhancement_failed'
  | 'seo_analysis_completed'
  | 'seo_analysis_skipped'
  | 'seo_analysis_failed'
  | 'seo_optimization_completed'
  | 'seo_optimization_skipped'
  | 'seo_optimization_failed'
  | 'completed'
  | 'cancelled';

export interface StageRecord {
  stage: WorkflowStage;
  status: WorkflowStatus;
  error?: string;
}

export interface WorkflowMetadata {
  content_type: ContentType;
  topic: string;
  tone: ToneType;
  audience: AudienceType;
  word_count?: number;
  model_used: string;
  seo_score?: number;
  refinement_rounds: number;
  stage_history: StageRecord[];
}

export interface WorkflowState {
  content_request: ContentRequest;
  research_results?: ResearchResult[];
  // Prompt as first assembled; refinement rounds rebuild from it
  base_prompt?: string;
  prompt?: string;
  content?: string;
  enhanced_content?: string;
  seo_analysis?: SEOAnalysis;
  seo_optimized_content?: string;
  metadata: WorkflowMetadata;
  status: WorkflowStatus;
  error?: string;
  refinement_count: number;
}

// Partial update returned by a stage; the request itself never changes
export type WorkflowUpdate = Partial<Omit<WorkflowState, 'content_request'>>;

export interface ContentResponse {
  content: string;
  metadata: WorkflowMetadata;
  research_results?: ResearchResult[];
}

export interface VideoMetadata {
  platform: string;
  content_type: VideoContentType;
  frame_count: number;
  keywords: string[];
  title?: string;
  description?: string;
}

export interface VideoAnalysisResult {
  caption: string;
  hashtags: string[];
  recommendations: string[];
  metadata: VideoMetadata;
}

// External collaborators

export interface GenerateOptions {
  images?: Buffer[];
  temperature?: number;
}

export interface ContentModel {
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface SearchProvider {
  search(query: string, count: number): Promise<ResearchResult[]>;
}

export interface FrameDecoder {
  countFrames(videoPath: string): Promise<number>;
  readFrame(videoPath: string, index: number): Promise<Buffer>;
}
