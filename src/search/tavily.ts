/**
 * @fileoverview Web search through the Tavily REST API.
 *
 * @module campus-guide/search/tavily
 */

import { z } from 'zod';
import type { FetchFn, SearchOptions, WebSearch, WebSearchResponse } from '../types/capabilities.types.js';
import { CampusGuideError, ConfigError, TimeoutError } from '../errors.js';
import { createSilentLogger, type Logger } from '../observability/logger.js';

export const DEFAULT_TAVILY_API_URL = 'https://api.tavily.com';
export const MAX_SNIPPET_LENGTH = 300;

export interface TavilyOptions {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly maxResults?: number;
  readonly searchDepth?: 'basic' | 'advanced';
  readonly timeoutMs?: number;
  readonly fetchFn?: FetchFn;
  readonly logger?: Logger;
}

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(z.object({
    title: z.string().nullish(),
    url: z.string(),
    content: z.string().nullish(),
  })).default([]),
});

function capSnippet(text: string): string {
  return text.length > MAX_SNIPPET_LENGTH ? `${text.slice(0, MAX_SNIPPET_LENGTH)}...` : text;
}

/**
 * WebSearch capability backed by Tavily, with its generated answer as the summary.
 */
export class TavilyWebSearch implements WebSearch {
  private readonly endpoint: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(private readonly options: TavilyOptions) {
    if (options.apiKey.trim().length === 0) {
      throw new ConfigError('TAVILY_API_KEY is required for web search', ['TAVILY_API_KEY']);
    }
    this.endpoint = `${(options.baseUrl ?? DEFAULT_TAVILY_API_URL).replace(/\/+$/, '')}/search`;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'search.tavily' });
  }

  /**
   * Runs one search. The request is cancelled at this adapter's own timeout
   * or when `options.signal` aborts, whichever comes first.
   */
  async search(query: string, options: SearchOptions = {}): Promise<WebSearchResponse> {
    const timeoutMs = this.options.timeoutMs ?? 10_000;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort(options.signal?.reason);

    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    this.logger.debug('Searching the web', { query });

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: this.options.maxResults ?? 3,
          search_depth: this.options.searchDepth ?? 'advanced',
          include_answer: true,
          include_raw_content: false,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text();
        throw new CampusGuideError('SEARCH_HTTP_ERROR', `Tavily returned ${response.status}: ${detail.slice(0, 200)}`);
      }

      const parsed = TavilyResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new CampusGuideError('SEARCH_BAD_RESPONSE', `Unexpected Tavily response: ${parsed.error.message}`);
      }

      return {
        summary: parsed.data.answer ?? '',
        sources: parsed.data.results.map(result => ({
          title: result.title ?? result.url,
          url: result.url,
          snippet: capSnippet(result.content ?? ''),
        })),
      };
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError('Tavily search', timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
