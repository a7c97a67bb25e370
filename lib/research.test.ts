import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import axios, { AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config';
import {
  BraveSearchResponse,
  createBraveSearch,
  createSearchProvider,
  parseBraveResults,
  stripHtml,
} from './research';

const BRAVE_RESPONSE: BraveSearchResponse = {
  web: {
    results: [
      {
        title: 'Growing <strong>herbs</strong> on a balcony',
        url: 'https://example.org/herbs',
        description: 'Basil   and <em>mint</em>\n do well.',
        profile: { name: 'Garden Weekly' },
      },
      {
        title: 'No URL here',
        description: 'dropped',
      },
      {
        title: 'Watering',
        url: 'https://example.com/water',
        meta_url: { hostname: 'example.com' },
      },
      {
        title: 'Bare result',
        url: 'https://plants.example.net/page',
      },
    ],
  },
};

function okResponse(data: BraveSearchResponse): AxiosResponse<BraveSearchResponse> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('parseBraveResults', () => {
  it('maps results and skips those without url or title', () => {
    expect(parseBraveResults(BRAVE_RESPONSE)).toEqual([
      {
        source: 'Garden Weekly',
        title: 'Growing herbs on a balcony',
        snippet: 'Basil and mint do well.',
        url: 'https://example.org/herbs',
      },
      { source: 'example.com', title: 'Watering', snippet: '', url: 'https://example.com/water' },
      { source: 'plants.example.net', title: 'Bare result', snippet: '', url: 'https://plants.example.net/page' },
    ]);
  });

  it('returns nothing for an empty payload', () => {
    expect(parseBraveResults(undefined)).toEqual([]);
    expect(parseBraveResults({})).toEqual([]);
  });
});

describe('stripHtml', () => {
  it('removes markup and collapses whitespace', () => {
    expect(stripHtml('  <b>Bold</b>\n\n<i>move</i>  ')).toBe('Bold move');
  });
});

describe('createBraveSearch', () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'research-cache-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('queries the API and caches the parsed results', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue(okResponse(BRAVE_RESPONSE));
    const search = createBraveSearch({ apiKey: 'test-secret', timeoutMs: 1234, cacheDir });

    const first = await search.search('Herbs', 2);
    expect(first.map((result) => result.url)).toEqual(['https://example.org/herbs', 'https://example.com/water']);
    expect(get).toHaveBeenCalledWith('https://api.search.brave.com/res/v1/web/search', {
      headers: { Accept: 'application/json', 'X-Subscription-Token': 'test-secret' },
      params: { q: 'Herbs', count: 2 },
      timeout: 1234,
    });

    // Same query in a different case is served from disk
    const second = await search.search('herbs', 2);
    expect(second).toEqual(first);
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('propagates transport errors', async () => {
    vi.spyOn(axios, 'get').mockRejectedValue(new Error('network down'));
    const search = createBraveSearch({ apiKey: 'test-secret', timeoutMs: 1000 });

    await expect(search.search('herbs', 5)).rejects.toThrow('network down');
  });
});

describe('createSearchProvider', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('is unavailable without an API key', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(createSearchProvider(loadConfig({}))).toBeUndefined();
    expect(warn).toHaveBeenCalledWith('BRAVE_SEARCH_API_KEY not found, research is disabled');
  });

  it('builds a provider when a key is set', () => {
    expect(createSearchProvider(loadConfig({ BRAVE_SEARCH_API_KEY: 'test-secret' }))).toBeDefined();
  });
});
