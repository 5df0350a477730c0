/**
 * @fileoverview Unit tests for the web_search tool
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { ToolRegistry } from './tool-registry.js';
import { createWebSearchTool } from './web-search.js';
import { ToolSource, createUniqueId, type WebSearch, type WebSearchResponse } from '../types/index.js';

function stubSearch(response: WebSearchResponse): WebSearch {
  return { search: async () => response };
}

describe('web_search tool', () => {
  const sessionId = createUniqueId(uuidv4());
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  it('should cite each source URL once, in order', async () => {
    registry.register(createWebSearchTool(stubSearch({
      summary: '  CMPE 999 is not offered.  ',
      sources: [
        { title: 'Catalog', url: 'https://catalog.example.edu/cmpe', snippet: 'Courses' },
        { title: 'Schedule', url: 'https://schedule.example.edu/', snippet: 'Fall' },
        { title: 'Catalog again', url: 'https://catalog.example.edu/cmpe', snippet: 'Courses' },
      ],
    })));

    const execution = await registry.invoke({ toolId: 'web_search', input: 'CMPE 999', sessionId });

    expect(execution.result?.source).toBe(ToolSource.WEB_SEARCH);
    expect(execution.result?.found).toBe(true);
    expect(execution.result?.citations).toEqual([
      'https://catalog.example.edu/cmpe',
      'https://schedule.example.edu/',
    ]);
    expect(execution.result?.payload).toMatchObject({ kind: 'web', summary: 'CMPE 999 is not offered.' });
  });

  it('should report an empty response as not found', async () => {
    registry.register(createWebSearchTool(stubSearch({ summary: '', sources: [] })));

    const execution = await registry.invoke({ toolId: 'web_search', input: 'nothing here', sessionId });

    expect(execution.result).toEqual({
      source: ToolSource.WEB_SEARCH,
      found: false,
      payload: { kind: 'message', text: 'No web results found for "nothing here".' },
      citations: [],
    });
  });

  it('should reject sources without a valid URL', async () => {
    registry.register(createWebSearchTool(stubSearch({
      summary: 'text',
      sources: [{ title: 'Bad', url: 'not a url', snippet: '' }],
    })));

    const execution = await registry.invoke({ toolId: 'web_search', input: 'query', sessionId });

    expect(execution.error?.code).toBe('INVALID_OUTPUT');
  });

  it('should wrap provider failures', async () => {
    registry.register(createWebSearchTool({ search: () => Promise.reject(new Error('HTTP 429')) }));

    const execution = await registry.invoke({ toolId: 'web_search', input: 'query', sessionId });

    expect(execution.error?.message).toBe('Web search failed: HTTP 429');
  });

  it('should abort the search when the invocation times out', async () => {
    const signals: AbortSignal[] = [];
    registry.register(createWebSearchTool({
      search: (_query, options) => new Promise<WebSearchResponse>(() => {
        if (options?.signal) {
          signals.push(options.signal);
        }
      }),
    }));

    const execution = await registry.invoke({ toolId: 'web_search', input: 'query', sessionId, timeoutMs: 20 });

    expect(execution.error?.code).toBe('TIMEOUT');
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });
});
