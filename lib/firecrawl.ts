import FirecrawlApp from '@mendable/firecrawl-js';
import { z } from 'zod';

import { DISCOVERY_CONFIG } from './config';

export interface SearchHit {
  title: string;
  url: string;
  content: string;
}

/**
 * The web-search capability used by competitor discovery. Implementations
 * throw on failure; the caller decides whether a failed search is fatal.
 */
export interface SearchClient {
  search(query: string, maxResults: number): Promise<SearchHit[]>;
}

const SearchItemSchema = z.object({
  url: z.string().optional(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  markdown: z.string().nullish(),
  metadata: z
    .object({
      title: z.string().nullish(),
      description: z.string().nullish(),
      sourceURL: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
}).passthrough();

const SearchResponseSchema = z.object({
  success: z.boolean().optional(),
  error: z.string().optional(),
  data: z.array(SearchItemSchema).default([]),
}).passthrough();

type SearchItem = z.infer<typeof SearchItemSchema>;

export class FirecrawlClient implements SearchClient {
  private client: FirecrawlApp;
  private timeoutMs: number;

  constructor(providedApiKey?: string, options?: { timeoutMs?: number }) {
    const apiKey = providedApiKey || process.env.FIRECRAWL_API_KEY;
    if (!apiKey) {
      throw new Error('FIRECRAWL_API_KEY is required - either provide it or set it as an environment variable');
    }
    this.client = new FirecrawlApp({ apiKey });
    this.timeoutMs = options?.timeoutMs ?? DISCOVERY_CONFIG.SEARCH_TIMEOUT;
  }

  async search(query: string, maxResults: number): Promise<SearchHit[]> {
    const raw: unknown = await withTimeout(
      this.client.search(query, { limit: maxResults }),
      this.timeoutMs,
      'Search timeout'
    );

    const parsed = SearchResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('Search returned an unexpected response');
    }
    if (parsed.data.success === false) {
      throw new Error(parsed.data.error || 'Search failed');
    }

    return parsed.data.data.slice(0, maxResults).map(toSearchHit);
  }
}

function toSearchHit(item: SearchItem): SearchHit {
  return {
    title: item.title || item.metadata?.title || 'Unknown',
    url: item.url || item.metadata?.sourceURL || '',
    content: item.description || item.metadata?.description || item.markdown || '',
  };
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
