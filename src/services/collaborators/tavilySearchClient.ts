import { z } from 'zod';
import logger from '../../utils/logger';
import { SearchClient, SearchOptions, SearchResult } from './types';

const tavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(''),
      url: z.string(),
      content: z.string().default(''),
      score: z.number().optional(),
    }),
  ),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface TavilySearchClientOptions {
  apiKey?: string;
  baseUrl?: string;
  retries?: number;
}

export class TavilySearchClient implements SearchClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly retries: number;

  constructor(options: TavilySearchClientOptions = {}) {
    this.baseUrl = options.baseUrl || process.env.TAVILY_API_BASE || 'https://api.tavily.com';
    this.apiKey = options.apiKey || process.env.TAVILY_API_KEY || '';
    this.retries = options.retries ?? Number(process.env.SEARCH_API_RETRIES || 1);
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    if (!this.apiKey) throw new Error('Missing TAVILY_API_KEY');
    const limit = options.limit ?? 5;

    let lastErr: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        const res = await fetch(`${this.baseUrl}/search`, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ query, max_results: limit }),
          signal: options.signal,
        });
        if (!res.ok) {
          const text = await res.text();
          throw new Error(`Tavily API ${res.status}: ${text}`);
        }
        const data = tavilyResponseSchema.parse(await res.json());
        return data.results.slice(0, limit).map((item, index) => ({
          id: `tavily-${index + 1}`,
          title: item.title || item.url,
          url: item.url,
          snippet: item.content,
          source: 'tavily',
          score: item.score,
        }));
      } catch (error) {
        lastErr = error;
        logger.warn('Search attempt failed', { query, attempt, error: errorMessage(error) });
        if (options.signal?.aborted) break;
      }
    }
    logger.error('Search failed all retries', { query, error: errorMessage(lastErr) });
    throw new Error(`Search failed for "${query}"`);
  }
}
