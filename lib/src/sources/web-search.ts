/**
 * Web Search
 *
 * Fallback knowledge source backed by the Tavily search API.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import { AdapterErrorCode, AdapterKind, SearchError, toAdapterError } from './errors.js';
import {
  type CallOptions,
  type Document,
  type WebSearch,
  DocumentSource,
  createDocument,
} from './types.js';

export const TAVILY_API_URL = 'https://api.tavily.com';

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      url: z.string(),
      title: z.string().optional(),
      content: z.string(),
      score: z.number().optional(),
    })
  ),
});

export const TavilyWebSearchConfigSchema = z.object({
  apiKey: z.string().min(1),
  maxResults: z.number().int().positive().max(20).default(3),
  searchDepth: z.enum(['basic', 'advanced']).default('basic'),
  baseUrl: z.string().url().default(TAVILY_API_URL),
  timeoutMs: z.number().int().positive().default(30000),
});

export type TavilyWebSearchConfig = z.infer<typeof TavilyWebSearchConfigSchema>;
export type TavilyWebSearchConfigInput = z.input<typeof TavilyWebSearchConfigSchema>;

/**
 * @example
 * ```typescript
 * const web = new TavilyWebSearch({ apiKey: process.env.TAVILY_API_KEY ?? '' });
 * const docs = await web.search('latest Ollama release');
 * ```
 */
export class TavilyWebSearch implements WebSearch {
  private readonly config: TavilyWebSearchConfig;
  private readonly http: AxiosInstance;

  constructor(config: TavilyWebSearchConfigInput, http?: AxiosInstance) {
    this.config = TavilyWebSearchConfigSchema.parse(config);
    this.http =
      http ??
      axios.create({
        baseURL: this.config.baseUrl,
        timeout: this.config.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  /**
   * @throws {SearchError}
   */
  async search(query: string, options: CallOptions = {}): Promise<Document[]> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        '/search',
        {
          query,
          max_results: this.config.maxResults,
          search_depth: this.config.searchDepth,
          include_answer: false,
        },
        {
          headers: { Authorization: `Bearer ${this.config.apiKey}` },
          signal: options.signal,
        }
      );
      data = response.data;
    } catch (error) {
      throw toAdapterError(error, AdapterKind.SEARCH, 'Web search failed');
    }

    const parsed = TavilyResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SearchError(AdapterErrorCode.REQUEST_FAILED, 'Unexpected web search response', parsed.error);
    }

    return parsed.data.results
      .filter((result) => result.content.trim() !== '')
      .map((result) => {
        const metadata: Record<string, string> = { url: result.url, origin: 'web search' };
        if (result.title) metadata['title'] = result.title;
        if (result.score !== undefined) metadata['score'] = String(result.score);
        return createDocument(result.content, DocumentSource.WEB, metadata);
      });
  }
}

/**
 * Stand-in used when no search API key is configured; every search fails.
 */
export class UnavailableWebSearch implements WebSearch {
  private readonly reason: string;

  constructor(reason = 'Web search is not configured (set TAVILY_API_KEY)') {
    this.reason = reason;
  }

  async search(): Promise<Document[]> {
    throw new SearchError(AdapterErrorCode.UNAVAILABLE, this.reason);
  }
}
