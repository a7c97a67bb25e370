'use client';

import { useState } from 'react';
import type { FormEvent } from 'react';
import styles from './page.module.css';
import { buildVideoRequestBody, composeVideoPost } from '@/lib/video_form';
import {
  VIDEO_CONTENT_TYPES,
  VIDEO_PLATFORMS,
  VideoAnalysisResult,
  VideoContentType,
} from '@/types';

function formatLabel(value: string): string {
  return value
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

export default function VideoForm() {
  const [videoPath, setVideoPath] = useState('');
  const [contentType, setContentType] = useState<VideoContentType>('instagram_reel');
  const [keywords, setKeywords] = useState('');
  const [maxFrames, setMaxFrames] = useState('');
  const [customInstructions, setCustomInstructions] = useState('');

  const [isLoading, setIsLoading] = useState(false);
  const [result, setResult] = useState<VideoAnalysisResult | null>(null);
  const [postAdvice, setPostAdvice] = useState<string[]>([]);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();

    const form = buildVideoRequestBody({ videoPath, contentType, keywords, maxFrames, customInstructions });
    if (!form.ok) {
      setError(form.error);
      return;
    }

    setIsLoading(true);
    setError(null);
    setResult(null);
    setPostAdvice([]);

    try {
      const response = await fetch('/api/video', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(form.body),
      });

      if (!response.ok) {
        const errorData = await response.json();
        throw new Error(errorData.message || errorData.error || 'Failed to analyze video');
      }

      const data: VideoAnalysisResult = await response.json();
      setResult(data);

      const adviceResponse = await fetch('/api/steps/social-recommendations', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          platform: VIDEO_PLATFORMS[form.body.content_type],
          content: composeVideoPost(data),
          keywords: form.body.keywords,
        }),
      });
      if (adviceResponse.ok) {
        const advice: { recommendations: string[] } = await adviceResponse.json();
        setPostAdvice(advice.recommendations);
      }
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Something went wrong');
    } finally {
      setIsLoading(false);
    }
  };

  return (
    <section className={styles.hero}>
      <form onSubmit={handleSubmit} className={styles.form}>
        <div className={styles.inputGroup}>
          <label className={styles.label}>Video Path</label>
          <input
            type="text"
            value={videoPath}
            onChange={(e) => setVideoPath(e.target.value)}
            placeholder="/videos/launch-teaser.mp4"
            className={styles.input}
          />
        </div>

        <div className={styles.row}>
          <div className={styles.inputGroup}>
            <label className={styles.label}>Platform</label>
            <select
              value={contentType}
              onChange={(e) =>
                setContentType(VIDEO_CONTENT_TYPES.find((t) => t === e.target.value) ?? 'instagram_reel')
              }
              className={styles.input}
            >
              {VIDEO_CONTENT_TYPES.map((type) => (
                <option key={type} value={type}>{formatLabel(type)}</option>
              ))}
            </select>
          </div>

          <div className={styles.inputGroup}>
            <label className={styles.label}>
              Keywords <span className={styles.optional}>(comma separated)</span>
            </label>
            <input
              type="text"
              value={keywords}
              onChange={(e) => setKeywords(e.target.value)}
              placeholder="product launch, behind the scenes"
              className={styles.input}
            />
          </div>

          <div className={styles.inputGroup}>
            <label className={styles.label}>
              Frames <span className={styles.optional}>(default 5)</span>
            </label>
            <input
              type="number"
              min={1}
              value={maxFrames}
              onChange={(e) => setMaxFrames(e.target.value)}
              placeholder="5"
              className={styles.input}
            />
          </div>
        </div>

        <div className={styles.inputGroup}>
          <label className={styles.label}>
            Additional Context <span className={styles.optional}>(optional)</span>
          </label>
          <textarea
            value={customInstructions}
            onChange={(e) => setCustomInstructions(e.target.value)}
            rows={2}
            className={styles.input}
          />
        </div>

        {error && <div className={styles.error}>{error}</div>}

        <button type="submit" className={styles.submitButton} disabled={isLoading || !videoPath.trim()}>
          {isLoading ? 'Analyzing frames...' : 'Analyze Video'}
        </button>
      </form>

      {result && (
        <div className={styles.results}>
          {result.metadata.title && <h2>{result.metadata.title}</h2>}
          <pre className={styles.content}>
            {[result.metadata.description, result.caption].filter(Boolean).join('\n\n') || 'No caption returned.'}
          </pre>

          {result.hashtags.length > 0 && (
            <div className={styles.card}>
              <h3>Hashtags</h3>
              <p>{result.hashtags.join(' ')}</p>
            </div>
          )}

          {result.recommendations.length > 0 && (
            <div className={styles.card}>
              <h3>Performance recommendations</h3>
              <ul className={styles.recommendations}>
                {result.recommendations.map((rec) => (
                  <li key={rec}>{rec}</li>
                ))}
              </ul>
            </div>
          )}

          {postAdvice.length > 0 && (
            <div className={styles.card}>
              <h3>{formatLabel(result.metadata.platform)} posting tips</h3>
              <ul className={styles.recommendations}>
                {postAdvice.map((tip) => (
                  <li key={tip}>{tip}</li>
                ))}
              </ul>
            </div>
          )}

          <p className={styles.resultsMeta}>
            {result.metadata.frame_count} frames analyzed
          </p>
        </div>
      )}
    </section>
  );
}
