/**
 * @fileoverview The `web_search` tool.
 *
 * @module campus-guide/tools/web-search
 */

import type { ToolResult, WebSearch, WebSearchResponse } from '../types/capabilities.types.js';
import { ToolSource, WebSearchResponseSchema } from '../types/capabilities.types.js';
import type { ToolDefinition, ToolExecutionContext } from '../types/tools.types.js';
import { WEB_SEARCH_TOOL } from '../types/core.types.js';
import { ToolExecutionError, errorMessage } from '../errors.js';

function toToolResult(response: WebSearchResponse, query: string): ToolResult {
  const citations = [...new Set(response.sources.map(source => source.url))];
  const found = response.summary.trim().length > 0 || response.sources.length > 0;

  if (!found) {
    return {
      source: ToolSource.WEB_SEARCH,
      found: false,
      payload: { kind: 'message', text: `No web results found for "${query}".` },
      citations: [],
    };
  }

  return {
    source: ToolSource.WEB_SEARCH,
    found: true,
    payload: { kind: 'web', summary: response.summary.trim(), sources: response.sources },
    citations,
  };
}

async function executeWebSearch(
  search: WebSearch,
  query: string,
  context: ToolExecutionContext,
): Promise<ToolResult> {
  context.logger.debug('Searching the web', { query });

  let raw: unknown;
  try {
    raw = await search.search(query, { signal: context.abortSignal });
  } catch (error) {
    throw new ToolExecutionError(WEB_SEARCH_TOOL, `Web search failed: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = WebSearchResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolExecutionError(
      WEB_SEARCH_TOOL,
      `Web search returned an invalid response: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
      { code: 'INVALID_OUTPUT' },
    );
  }

  return toToolResult(parsed.data, query);
}

export function createWebSearchTool(search: WebSearch): ToolDefinition {
  return {
    id: WEB_SEARCH_TOOL,
    name: 'Web Search',
    description: 'Search the web for current information that is not in the database, such as tuition, news, events or office locations.',
    exampleInput: 'SJSU financial aid office location',
    execute: (input, context) => executeWebSearch(search, input, context),
  };
}
