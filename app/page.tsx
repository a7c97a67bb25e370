'use client';

import { useEffect, useState } from 'react';
import type { FormEvent } from 'react';
import styles from './page.module.css';
import VideoForm from './VideoForm';
import {
  AUDIENCES,
  AudienceType,
  CONTENT_TYPES,
  ContentResponse,
  ContentType,
  SEOAnalysis,
  TONES,
  ToneType,
} from '@/types';

const PIPELINE_STEPS = [
  { id: 1, label: 'Researching', sublabel: 'Searching the web for sources', duration: 5000 },
  { id: 2, label: 'Building prompt', sublabel: 'Applying tone, audience and structure', duration: 1500 },
  { id: 3, label: 'Writing draft', sublabel: 'Generating the first version', duration: 20000 },
  { id: 4, label: 'Enhancing', sublabel: 'Applying direct response techniques', duration: 20000 },
  { id: 5, label: 'Scoring', sublabel: 'Analyzing readability, keywords and structure', duration: 1500 },
  { id: 6, label: 'Optimizing', sublabel: 'Rewriting for search visibility', duration: 20000 },
];

function formatLabel(value: string): string {
  return value
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

function scoreColor(score: number): string {
  if (score >= 80) return '#1B5E20';
  if (score >= 60) return '#B45309';
  return '#DC2626';
}

type Mode = 'content' | 'video';

export default function Home() {
  const [mode, setMode] = useState<Mode>('content');
  const [contentType, setContentType] = useState<ContentType>('blog_post');
  const [topic, setTopic] = useState('');
  const [tone, setTone] = useState<ToneType>('conversational');
  const [audience, setAudience] = useState<AudienceType>('general');
  const [keywords, setKeywords] = useState('');
  const [wordCount, setWordCount] = useState('');
  const [includeResearch, setIncludeResearch] = useState(true);
  const [customInstructions, setCustomInstructions] = useState('');

  const [isLoading, setIsLoading] = useState(false);
  const [currentStep, setCurrentStep] = useState(0);
  const [result, setResult] = useState<ContentResponse | null>(null);
  const [analysis, setAnalysis] = useState<SEOAnalysis | null>(null);
  const [exportPath, setExportPath] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  // Simulate step progress during loading
  useEffect(() => {
    if (!isLoading) return;

    let stepIndex = 0;
    let timer: ReturnType<typeof setTimeout>;
    setCurrentStep(1);

    const advanceStep = () => {
      stepIndex++;
      if (stepIndex < PIPELINE_STEPS.length) {
        setCurrentStep(stepIndex + 1);
        timer = setTimeout(advanceStep, PIPELINE_STEPS[stepIndex].duration);
      }
    };

    timer = setTimeout(advanceStep, PIPELINE_STEPS[0].duration);
    return () => clearTimeout(timer);
  }, [isLoading]);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();

    if (!topic.trim()) {
      setError('Please enter a topic');
      return;
    }

    setIsLoading(true);
    setError(null);
    setResult(null);
    setAnalysis(null);
    setExportPath(null);

    try {
      const response = await fetch('/api/generate', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          content_type: contentType,
          topic,
          tone,
          audience,
          keywords,
          word_count: wordCount ? Number(wordCount) : undefined,
          include_research: includeResearch,
          custom_instructions: customInstructions || undefined,
        }),
      });

      if (!response.ok) {
        const errorData = await response.json();
        throw new Error(errorData.message || errorData.error || 'Failed to generate content');
      }

      const data: ContentResponse = await response.json();
      setResult(data);

      if (data.content) {
        const analysisResponse = await fetch('/api/steps/analyze-seo', {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ content: data.content, keywords, content_type: contentType }),
        });
        if (analysisResponse.ok) {
          const seo: SEOAnalysis = await analysisResponse.json();
          setAnalysis(seo);
        }
      }
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Something went wrong');
    } finally {
      setIsLoading(false);
      setCurrentStep(0);
    }
  };

  const handleExport = async () => {
    if (!result?.content) return;

    try {
      const response = await fetch('/api/export', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ content: result.content, content_type: contentType }),
      });
      const data = await response.json();
      if (!response.ok) {
        throw new Error(data.message || data.error || 'Export failed');
      }
      setExportPath(data.path);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Export failed');
    }
  };

  const reset = () => {
    setResult(null);
    setAnalysis(null);
    setExportPath(null);
    setError(null);
  };

  return (
    <main className={styles.main}>
      {result && (
        <div className={styles.backBar}>
          <button onClick={reset} className={styles.resetButton}>
            <svg width="16" height="16" viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2">
              <path d="M19 12H5M12 19l-7-7 7-7" />
            </svg>
            New Content
          </button>
        </div>
      )}

      {!isLoading && !result && (
        <div className={styles.tabs}>
          {(['content', 'video'] as const).map((value) => (
            <button
              key={value}
              type="button"
              onClick={() => setMode(value)}
              className={value === mode ? `${styles.tab} ${styles.tabActive}` : styles.tab}
            >
              {value === 'content' ? 'Written Content' : 'Short Video'}
            </button>
          ))}
        </div>
      )}

      {mode === 'video' && !isLoading && !result && <VideoForm />}

      {mode === 'content' && !isLoading && !result && (
        <section className={styles.hero}>
          <div className={styles.heroContent}>
            <h1 className={styles.title}>
              Copy that ranks<br />
              <span className={styles.highlight}>and converts</span>
            </h1>
            <p className={styles.subtitle}>
              Describe what you need. The studio researches, writes, enhances and scores it for search.
            </p>

            <form onSubmit={handleSubmit} className={styles.form}>
              <div className={styles.inputGroup}>
                <label className={styles.label}>Topic</label>
                <input
                  type="text"
                  value={topic}
                  onChange={(e) => setTopic(e.target.value)}
                  placeholder="How to start a balcony herb garden"
                  className={styles.input}
                  autoFocus
                />
              </div>

              <div className={styles.row}>
                <div className={styles.inputGroup}>
                  <label className={styles.label}>Content Type</label>
                  <select
                    value={contentType}
                    onChange={(e) => setContentType(CONTENT_TYPES.find((t) => t === e.target.value) ?? 'blog_post')}
                    className={styles.input}
                  >
                    {CONTENT_TYPES.map((type) => (
                      <option key={type} value={type}>{formatLabel(type)}</option>
                    ))}
                  </select>
                </div>

                <div className={styles.inputGroup}>
                  <label className={styles.label}>Tone</label>
                  <select
                    value={tone}
                    onChange={(e) => setTone(TONES.find((t) => t === e.target.value) ?? 'conversational')}
                    className={styles.input}
                  >
                    {TONES.map((value) => (
                      <option key={value} value={value}>{formatLabel(value)}</option>
                    ))}
                  </select>
                </div>

                <div className={styles.inputGroup}>
                  <label className={styles.label}>Audience</label>
                  <select
                    value={audience}
                    onChange={(e) => setAudience(AUDIENCES.find((a) => a === e.target.value) ?? 'general')}
                    className={styles.input}
                  >
                    {AUDIENCES.map((value) => (
                      <option key={value} value={value}>{formatLabel(value)}</option>
                    ))}
                  </select>
                </div>
              </div>

              <div className={styles.row}>
                <div className={styles.inputGroup}>
                  <label className={styles.label}>
                    Keywords <span className={styles.optional}>(comma separated)</span>
                  </label>
                  <input
                    type="text"
                    value={keywords}
                    onChange={(e) => setKeywords(e.target.value)}
                    placeholder="herb garden, balcony plants"
                    className={styles.input}
                  />
                </div>

                <div className={styles.inputGroup}>
                  <label className={styles.label}>
                    Word Count <span className={styles.optional}>(optional)</span>
                  </label>
                  <input
                    type="number"
                    min={1}
                    value={wordCount}
                    onChange={(e) => setWordCount(e.target.value)}
                    placeholder="1200"
                    className={styles.input}
                  />
                </div>
              </div>

              <div className={styles.inputGroup}>
                <label className={styles.label}>
                  Additional Instructions <span className={styles.optional}>(optional)</span>
                </label>
                <textarea
                  value={customInstructions}
                  onChange={(e) => setCustomInstructions(e.target.value)}
                  rows={3}
                  className={styles.input}
                />
              </div>

              <label className={styles.checkbox}>
                <input
                  type="checkbox"
                  checked={includeResearch}
                  onChange={(e) => setIncludeResearch(e.target.checked)}
                />
                Research the topic on the web first
              </label>

              {error && <div className={styles.error}>{error}</div>}

              <button type="submit" className={styles.submitButton} disabled={!topic.trim()}>
                Generate Content
              </button>
            </form>
          </div>
        </section>
      )}

      {isLoading && (
        <section className={styles.loading}>
          <div className={styles.loadingContent}>
            <div className={styles.spinner} />
            <div className={styles.loadingText} key={currentStep}>
              <h2 className={styles.loadingTitle}>
                {PIPELINE_STEPS[currentStep - 1]?.label || 'Preparing'}
              </h2>
              <p className={styles.loadingSublabel}>
                {PIPELINE_STEPS[currentStep - 1]?.sublabel || 'Starting workflow'}
              </p>
            </div>
            <div className={styles.progressBar}>
              <div
                className={styles.progressFill}
                style={{ width: `${(currentStep / PIPELINE_STEPS.length) * 100}%` }}
              />
            </div>
            <span className={styles.progressText}>
              Step {currentStep} of {PIPELINE_STEPS.length}
            </span>
          </div>
        </section>
      )}

      {result && (
        <section className={styles.results}>
          <div className={styles.resultsHeader}>
            <div>
              <h2>{result.metadata.topic}</h2>
              <p className={styles.resultsMeta}>
                {formatLabel(result.metadata.content_type)} • {formatLabel(result.metadata.tone)} •{' '}
                {formatLabel(result.metadata.audience)} • {result.metadata.model_used}
              </p>
            </div>
            {result.metadata.seo_score !== undefined && (
              <div className={styles.scoreBadge} style={{ color: scoreColor(result.metadata.seo_score) }}>
                {result.metadata.seo_score.toFixed(0)}
                <span className={styles.scoreLabel}>SEO score</span>
              </div>
            )}
          </div>

          {error && <div className={styles.error}>{error}</div>}

          <div className={styles.actions}>
            <button onClick={handleExport} className={styles.submitButton} disabled={!result.content}>
              Export Markdown
            </button>
            {exportPath && <span className={styles.exportPath}>Saved to {exportPath}</span>}
          </div>

          <pre className={styles.content}>{result.content || 'No content was generated.'}</pre>

          {analysis && (
            <div className={styles.card}>
              <h3>Final draft analysis</h3>
              <div className={styles.stats}>
                <div className={styles.stat}>
                  <span className={styles.statLabel}>Overall</span>
                  <span className={styles.statValue}>{analysis.overall_score.toFixed(1)}</span>
                </div>
                <div className={styles.stat}>
                  <span className={styles.statLabel}>Keywords</span>
                  <span className={styles.statValue}>{analysis.keyword_metrics.keyword_score.toFixed(1)}</span>
                </div>
                <div className={styles.stat}>
                  <span className={styles.statLabel}>Readability</span>
                  <span className={styles.statValue}>
                    {analysis.readability_metrics.readability_score.toFixed(1)}
                  </span>
                </div>
                <div className={styles.stat}>
                  <span className={styles.statLabel}>Structure</span>
                  <span className={styles.statValue}>{analysis.structure_score.toFixed(0)}</span>
                </div>
                <div className={styles.stat}>
                  <span className={styles.statLabel}>Words</span>
                  <span className={styles.statValue}>{analysis.word_count}</span>
                </div>
              </div>

              {analysis.recommendations.length > 0 && (
                <ul className={styles.recommendations}>
                  {analysis.recommendations.map((rec) => (
                    <li key={rec}>{rec}</li>
                  ))}
                </ul>
              )}
            </div>
          )}

          {result.research_results && result.research_results.length > 0 && (
            <div className={styles.card}>
              <h3>Sources</h3>
              <ul className={styles.sources}>
                {result.research_results.map((source) => (
                  <li key={source.url}>
                    <a href={source.url} target="_blank" rel="noreferrer">{source.title}</a>
                    <span className={styles.sourceName}>{source.source}</span>
                  </li>
                ))}
              </ul>
            </div>
          )}

          <div className={styles.card}>
            <h4>Workflow Summary</h4>
            <ul className={styles.history}>
              {result.metadata.stage_history.map((record, index) => (
                <li key={`${record.stage}-${index}`}>
                  <span className={styles.stageName}>{formatLabel(record.stage)}</span>
                  <span>{formatLabel(record.status)}</span>
                  {record.error && <span className={styles.stageError}>{record.error}</span>}
                </li>
              ))}
            </ul>
          </div>
        </section>
      )}
    </main>
  );
}
