import { ContentModel, FrameDecoder, SearchProvider } from '@/types';
import { AppConfig, loadConfig } from './config';
import { createFfmpegDecoder } from './frame_extraction';
import { createOpenAIModel } from './model_client';
import { createSearchProvider } from './research';

/**
 * Collaborators shared by the API routes. Each is built on first use,
 * so a missing key only fails the routes that need it.
 */

let config: AppConfig | undefined;
let model: ContentModel | undefined;
let search: SearchProvider | undefined;
let searchResolved = false;
let decoder: FrameDecoder | undefined;

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

export function getModel(): ContentModel {
  if (!model) {
    model = createOpenAIModel(getConfig());
  }
  return model;
}

export function getSearch(): SearchProvider | undefined {
  if (!searchResolved) {
    search = createSearchProvider(getConfig());
    searchResolved = true;
  }
  return search;
}

export function getDecoder(): FrameDecoder {
  if (!decoder) {
    decoder = createFfmpegDecoder(getConfig());
  }
  return decoder;
}
