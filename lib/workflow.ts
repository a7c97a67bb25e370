import {
  ContentModel,
  ContentRequest,
  ContentResponse,
  SearchProvider,
  StageRecord,
  WorkflowStage,
  WorkflowState,
  WorkflowStatus,
  WorkflowUpdate,
} from '@/types';
import { DEFAULT_REFINEMENT_POLICY, DEFAULT_TIMEOUT_MS, RefinementPolicy } from './config';
import { buildSeoImprovementPrompt, scoreContent } from './content_scorer';
import { errorMessage, WorkflowCancelledError, WorkflowError } from './errors';
import { DEFAULT_TEMPERATURE } from './model_client';
import {
  buildCopywritingPrompt,
  buildEnhancementPrompt,
  buildRefinementPrompt,
  buildResearchQuery,
} from './prompt_builder';
import { withTimeout } from './timeout';

/**
 * ContentWorkflow
 * research → generate_prompt → generate_content → enhance_content → analyze_seo → optimize_seo → {refine | complete}
 *
 * Each stage reads the state and returns a partial update that the runner merges.
 * Prompt and content generation failures abort the run; every other stage degrades
 * to a documented fallback and records its status in metadata.stage_history.
 */

export const RESEARCH_RESULT_COUNT = 5;
export const SEO_SCORE_THRESHOLD = 85;

export interface WorkflowDependencies {
  model: ContentModel;
  search?: SearchProvider;
}

export interface WorkflowOptions {
  timeoutMs?: number;
  refinement?: RefinementPolicy;
  signal?: AbortSignal;
  temperature?: number;
}

export interface StageContext {
  deps: WorkflowDependencies;
  timeoutMs: number;
  temperature: number;
}

export type Stage = (state: WorkflowState, context: StageContext) => Promise<WorkflowUpdate>;

export type NextStep = 'refine' | 'complete';

export function initializeState(request: ContentRequest, modelName: string): WorkflowState {
  return {
    content_request: request,
    metadata: {
      content_type: request.content_type,
      topic: request.topic,
      tone: request.tone,
      audience: request.audience,
      word_count: request.word_count,
      model_used: modelName,
      refinement_rounds: 0,
      stage_history: [],
    },
    status: 'initialized',
    refinement_count: 0,
  };
}

function currentDraft(state: WorkflowState): string | undefined {
  return state.enhanced_content || state.content || undefined;
}

export const performResearch: Stage = async (state, { deps, timeoutMs }) => {
  const request = state.content_request;

  if (!request.include_research) {
    return { research_results: undefined, status: 'research_skipped' };
  }

  if (!deps.search) {
    return {
      research_results: undefined,
      status: 'research_failed',
      error: 'No search provider configured',
    };
  }

  try {
    const query = buildResearchQuery(request);
    const results = await withTimeout(
      deps.search.search(query, RESEARCH_RESULT_COUNT),
      timeoutMs,
      'Research'
    );
    return { research_results: results, status: 'research_completed' };
  } catch (error) {
    console.warn('Research failed, continuing without it:', errorMessage(error));
    return { research_results: undefined, status: 'research_failed', error: errorMessage(error) };
  }
};

export const generatePrompt: Stage = async (state) => {
  try {
    const prompt = buildCopywritingPrompt(state.content_request, state.research_results);
    return { base_prompt: prompt, prompt, status: 'prompt_generated' };
  } catch (error) {
    return {
      base_prompt: undefined,
      prompt: undefined,
      status: 'prompt_generation_failed',
      error: errorMessage(error),
    };
  }
};

export const generateContent: Stage = async (state, { deps, timeoutMs, temperature }) => {
  if (!state.prompt) {
    return { content: undefined, status: 'content_generation_failed', error: 'No prompt available' };
  }

  try {
    const content = await withTimeout(
      deps.model.generate(state.prompt, { temperature }),
      timeoutMs,
      'Content generation'
    );
    if (!content.trim()) {
      return { content: undefined, status: 'content_generation_failed', error: 'Model returned empty content' };
    }
    return { content, status: 'content_generated' };
  } catch (error) {
    return { content: undefined, status: 'content_generation_failed', error: errorMessage(error) };
  }
};

export const enhanceContent: Stage = async (state, { deps, timeoutMs, temperature }) => {
  const content = state.content;
  if (!content) {
    return { enhanced_content: undefined, status: 'enhancement_failed', error: 'No content to enhance' };
  }

  try {
    const enhanced = await withTimeout(
      deps.model.generate(buildEnhancementPrompt(content, state.content_request), { temperature }),
      timeoutMs,
      'Enhancement'
    );
    if (!enhanced.trim()) {
      return { enhanced_content: content, status: 'enhancement_failed', error: 'Model returned empty content' };
    }
    return { enhanced_content: enhanced, status: 'content_enhanced' };
  } catch (error) {
    console.warn('Enhancement failed, keeping the original draft:', errorMessage(error));
    return { enhanced_content: content, status: 'enhancement_failed', error: errorMessage(error) };
  }
};

export const analyzeSeo: Stage = async (state) => {
  const content = currentDraft(state);
  if (!content) {
    return {
      seo_analysis: undefined,
      status: 'seo_analysis_skipped',
      error: 'No content available for SEO analysis',
    };
  }

  const request = state.content_request;
  try {
    const analysis = scoreContent(content, request.keywords, request.content_type);
    return { seo_analysis: analysis, status: 'seo_analysis_completed' };
  } catch (error) {
    console.error('SEO analysis failed:', error);
    return { seo_analysis: undefined, status: 'seo_analysis_failed', error: errorMessage(error) };
  }
};

export const optimizeSeo: Stage = async (state, { deps, timeoutMs, temperature }) => {
  const content = currentDraft(state);
  const analysis = state.seo_analysis;

  if (!content || !analysis) {
    return { seo_optimized_content: content, status: 'seo_optimization_skipped' };
  }

  const metadata = { ...state.metadata, seo_score: analysis.overall_score };

  // Good enough already
  if (analysis.overall_score >= SEO_SCORE_THRESHOLD) {
    return { seo_optimized_content: content, status: 'seo_optimization_skipped', metadata };
  }

  try {
    const optimized = await withTimeout(
      deps.model.generate(buildSeoImprovementPrompt(analysis, content), { temperature }),
      timeoutMs,
      'SEO optimization'
    );
    if (!optimized.trim()) {
      return {
        seo_optimized_content: content,
        status: 'seo_optimization_failed',
        error: 'Model returned empty content',
        metadata,
      };
    }
    return { seo_optimized_content: optimized, status: 'seo_optimization_completed', metadata };
  } catch (error) {
    console.warn('SEO optimization failed, keeping the prior content:', errorMessage(error));
    return {
      seo_optimized_content: content,
      status: 'seo_optimization_failed',
      error: errorMessage(error),
      metadata,
    };
  }
};

/**
 * Another round runs only while rounds remain and the draft scored below the policy minimum.
 */
export function decideNextStep(state: WorkflowState, policy: RefinementPolicy): NextStep {
  const analysis = state.seo_analysis;
  if (!analysis) return 'complete';
  if (state.refinement_count >= policy.maxRounds) return 'complete';
  return analysis.overall_score < policy.minScore ? 'refine' : 'complete';
}

export function resolveFinalContent(state: WorkflowState): string {
  return state.seo_optimized_content || state.enhanced_content || state.content || '';
}

const STAGES: ReadonlyArray<[WorkflowStage, Stage]> = [
  ['research', performResearch],
  ['generate_prompt', generatePrompt],
  ['generate_content', generateContent],
  ['enhance_content', enhanceContent],
  ['analyze_seo', analyzeSeo],
  ['optimize_seo', optimizeSeo],
];

const FATAL_STATUSES: ReadonlySet<WorkflowStatus> = new Set([
  'prompt_generation_failed',
  'content_generation_failed',
]);

const REFINE_ENTRY = STAGES.findIndex(([stage]) => stage === 'generate_content');

function applyUpdate(state: WorkflowState, stage: WorkflowStage, update: WorkflowUpdate): WorkflowState {
  const next: WorkflowState = { ...state, ...update };
  const record: StageRecord = { stage, status: next.status };
  if (update.error) record.error = update.error;

  next.metadata = {
    ...next.metadata,
    stage_history: [...next.metadata.stage_history, record],
  };
  return next;
}

export async function runContentWorkflow(
  request: ContentRequest,
  deps: WorkflowDependencies,
  options: WorkflowOptions = {}
): Promise<ContentResponse> {
  const context: StageContext = {
    deps,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    temperature: options.temperature ?? DEFAULT_TEMPERATURE,
  };
  const policy = options.refinement ?? DEFAULT_REFINEMENT_POLICY;

  console.log(`Starting content generation for topic: ${request.topic}`);
  console.log(`Content type: ${request.content_type}, model: ${deps.model.name}`);

  let state = initializeState(request, deps.model.name);
  let index = 0;

  while (index < STAGES.length) {
    const [stage, run] = STAGES[index];

    if (options.signal?.aborted) {
      console.warn(`Workflow cancelled before stage: ${stage}`);
      throw new WorkflowCancelledError(stage);
    }

    console.log(`Running stage: ${stage}`);
    state = applyUpdate(state, stage, await run(state, context));

    if (FATAL_STATUSES.has(state.status)) {
      console.error(`Stage ${stage} failed: ${state.error ?? 'unknown error'}`);
      throw new WorkflowError(stage, state.status, state.error ?? 'unknown error');
    }

    index++;

    if (index === STAGES.length && decideNextStep(state, policy) === 'refine') {
      state = startRefinementRound(state);
      index = REFINE_ENTRY;
    }
  }

  state = { ...state, status: 'completed' };
  const content = resolveFinalContent(state);
  const metadata = { ...state.metadata };
  if (state.seo_analysis) {
    metadata.seo_score = state.seo_analysis.overall_score;
  }

  console.log(`Workflow completed. Final content length: ${content.length}`);
  if (!content) {
    console.warn('No content was generated');
  }

  return {
    content,
    metadata,
    research_results: state.research_results,
  };
}

function startRefinementRound(state: WorkflowState): WorkflowState {
  const draft = resolveFinalContent(state);
  const round = state.refinement_count + 1;
  const basePrompt = state.base_prompt ?? state.prompt;
  console.log(`Score below threshold, starting refinement round ${round}`);

  return {
    ...state,
    prompt: basePrompt && state.seo_analysis
      ? buildRefinementPrompt(basePrompt, draft, state.seo_analysis)
      : basePrompt,
    content: undefined,
    enhanced_content: undefined,
    seo_analysis: undefined,
    seo_optimized_content: undefined,
    refinement_count: round,
    metadata: { ...state.metadata, refinement_rounds: round },
  };
}
