import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from './errors';

/**
 * Application configuration, built once from the environment and passed
 * explicitly to every collaborator factory.
 */

export interface RefinementPolicy {
  // Extra generate→optimize rounds allowed after the first pass
  maxRounds: number;
  // Scores below this trigger another round while rounds remain
  minScore: number;
}

export interface AppConfig {
  openaiApiKey?: string;
  openaiModel: string;
  braveApiKey?: string;
  cacheDir: string;
  exportDir: string;
  requestTimeoutMs: number;
  refinement: RefinementPolicy;
  ffmpegPath: string;
  ffprobePath: string;
}

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_REFINEMENT_POLICY: RefinementPolicy = { maxRounds: 0, minScore: 60 };

type Env = Record<string, string | undefined>;

// Load .env file from project root (scripts only; Next.js loads it itself)
export function loadEnvFile(cwd: string = process.cwd()): void {
  const envPath = path.join(cwd, '.env');
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  } else {
    dotenv.config();
  }
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  return {
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    openaiModel: nonEmpty(env.OPENAI_MODEL) ?? DEFAULT_MODEL,
    braveApiKey: nonEmpty(env.BRAVE_SEARCH_API_KEY),
    cacheDir: nonEmpty(env.CONTENT_CACHE_DIR) ?? path.join(cwd, '.cache'),
    exportDir: nonEmpty(env.CONTENT_EXPORT_DIR) ?? path.join(cwd, 'exports'),
    requestTimeoutMs: readInteger(env, 'REQUEST_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 1),
    refinement: {
      maxRounds: readInteger(env, 'REFINEMENT_MAX_ROUNDS', DEFAULT_REFINEMENT_POLICY.maxRounds, 0),
      minScore: readInteger(env, 'REFINEMENT_MIN_SCORE', DEFAULT_REFINEMENT_POLICY.minScore, 0),
    },
    ffmpegPath: nonEmpty(env.FFMPEG_PATH) ?? 'ffmpeg',
    ffprobePath: nonEmpty(env.FFPROBE_PATH) ?? 'ffprobe',
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}
