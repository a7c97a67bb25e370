import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_MODEL, loadConfig } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  it('fills in defaults from an empty environment', () => {
    expect(loadConfig({}, '/srv/app')).toEqual({
      openaiApiKey: undefined,
      openaiModel: DEFAULT_MODEL,
      braveApiKey: undefined,
      cacheDir: path.join('/srv/app', '.cache'),
      exportDir: path.join('/srv/app', 'exports'),
      requestTimeoutMs: 60_000,
      refinement: { maxRounds: 0, minScore: 60 },
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
    });
  });

  it('reads every variable', () => {
    const config = loadConfig(
      {
        OPENAI_API_KEY: 'test-secret',
        OPENAI_MODEL: 'gpt-4o-mini',
        BRAVE_SEARCH_API_KEY: 'test-search-key',
        CONTENT_CACHE_DIR: '/tmp/cache',
        CONTENT_EXPORT_DIR: '/tmp/exports',
        REQUEST_TIMEOUT_MS: '5000',
        REFINEMENT_MAX_ROUNDS: '2',
        REFINEMENT_MIN_SCORE: '70',
        FFMPEG_PATH: '/usr/local/bin/ffmpeg',
        FFPROBE_PATH: '/usr/local/bin/ffprobe',
      },
      '/srv/app'
    );

    expect(config).toEqual({
      openaiApiKey: 'test-secret',
      openaiModel: 'gpt-4o-mini',
      braveApiKey: 'test-search-key',
      cacheDir: '/tmp/cache',
      exportDir: '/tmp/exports',
      requestTimeoutMs: 5000,
      refinement: { maxRounds: 2, minScore: 70 },
      ffmpegPath: '/usr/local/bin/ffmpeg',
      ffprobePath: '/usr/local/bin/ffprobe',
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ OPENAI_API_KEY: '   ', REQUEST_TIMEOUT_MS: '' }, '/srv/app');
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.requestTimeoutMs).toBe(60_000);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: 'soon' })).toThrow(
      new ConfigurationError('REQUEST_TIMEOUT_MS must be an integer >= 1 (got "soon")')
    );
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ REFINEMENT_MAX_ROUNDS: '-1' })).toThrow(
      new ConfigurationError('REFINEMENT_MAX_ROUNDS must be an integer >= 0 (got "-1")')
    );
    expect(() => loadConfig({ REFINEMENT_MIN_SCORE: '1.5' })).toThrow(ConfigurationError);
  });
});
