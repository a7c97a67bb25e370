import axios from 'axios';
import * as cheerio from 'cheerio';
import { ResearchResult, SearchProvider } from '@/types';
import { AppConfig } from './config';
import { generateCacheKey, getCache, setCache } from './cache';

/**
 * Web research via the Brave Search API
 * Results are cached on disk per query; transport errors propagate to the caller.
 */

const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search';

// Cache duration: 24 hours for search results
const CACHE_DURATION_MS = 24 * 60 * 60 * 1000;

interface BraveWebResult {
  title?: string;
  url?: string;
  description?: string;
  profile?: { name?: string };
  meta_url?: { hostname?: string };
}

export interface BraveSearchResponse {
  web?: {
    results?: BraveWebResult[];
  };
}

export interface BraveSearchOptions {
  apiKey: string;
  timeoutMs: number;
  cacheDir?: string;
}

export function createBraveSearch(options: BraveSearchOptions): SearchProvider {
  return {
    async search(query: string, count: number): Promise<ResearchResult[]> {
      const cacheOptions = options.cacheDir
        ? { dir: options.cacheDir, maxAgeMs: CACHE_DURATION_MS }
        : undefined;
      const cacheKey = generateCacheKey('research', query.toLowerCase(), count);

      if (cacheOptions) {
        const cached = getCache<ResearchResult[]>(cacheKey, cacheOptions);
        if (cached) return cached;
      }

      const response = await axios.get<BraveSearchResponse>(BRAVE_SEARCH_URL, {
        headers: {
          Accept: 'application/json',
          'X-Subscription-Token': options.apiKey,
        },
        params: { q: query, count },
        timeout: options.timeoutMs,
      });

      const results = parseBraveResults(response.data).slice(0, count);
      console.log(`Found ${results.length} research results for "${query}"`);

      if (cacheOptions) {
        setCache(cacheKey, results, cacheOptions);
      }
      return results;
    },
  };
}

/**
 * Returns undefined when no search key is configured; research is then unavailable.
 */
export function createSearchProvider(config: AppConfig): SearchProvider | undefined {
  if (!config.braveApiKey) {
    console.warn('BRAVE_SEARCH_API_KEY not found, research is disabled');
    return undefined;
  }

  return createBraveSearch({
    apiKey: config.braveApiKey,
    timeoutMs: config.requestTimeoutMs,
    cacheDir: config.cacheDir,
  });
}

export function parseBraveResults(data: BraveSearchResponse | undefined): ResearchResult[] {
  const items = data?.web?.results ?? [];

  return items
    .filter((item) => item.url && item.title)
    .map((item) => {
      const url = item.url ?? '';
      return {
        source: item.profile?.name || item.meta_url?.hostname || hostnameOf(url),
        title: stripHtml(item.title ?? ''),
        snippet: stripHtml(item.description ?? ''),
        url,
      };
    });
}

// Search snippets carry highlight markup such as <strong>
export function stripHtml(html: string): string {
  return cheerio.load(html, null, false).root().text().replace(/\s+/g, ' ').trim();
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return '';
  }
}
