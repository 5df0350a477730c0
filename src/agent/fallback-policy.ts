/**
 * @fileoverview When the controller searches the web on its own, and with what query.
 *
 * @module campus-guide/agent/fallback-policy
 */

import type { AgentConfig } from '../types/core.types.js';
import { DATABASE_QUERY_TOOL, WEB_SEARCH_TOOL } from '../types/core.types.js';
import type { ToolResult } from '../types/capabilities.types.js';

/**
 * What the controller knows about the dispatch that just finished.
 */
export interface FallbackCheck {
  /** Tool the dispatch invoked */
  readonly toolName: string;
  /** Its normalized result, null when the tool failed */
  readonly result: ToolResult | null;
  /** Tools invoked before this dispatch in the same run */
  readonly priorInvocations: number;
  /** Whether the automatic search already ran in this run */
  readonly fallbackUsed: boolean;
}

/**
 * True when the first tool of the run was the structured lookup and it
 * reported no match. Fires at most once per run.
 */
export function shouldAutoFallback(
  config: Pick<AgentConfig, 'fallbackEnabled' | 'toolNames'>,
  check: FallbackCheck,
): boolean {
  return config.fallbackEnabled
    && config.toolNames.has(WEB_SEARCH_TOOL)
    && !check.fallbackUsed
    && check.priorInvocations === 0
    && check.toolName === DATABASE_QUERY_TOOL
    && check.result !== null
    && !check.result.found;
}

const LOCATION_WORDS: ReadonlyArray<string> = [
  'where', 'location', 'located', 'building', 'address', 'find', 'directions',
];

const FILLER_WORDS: ReadonlySet<string> = new Set([
  ...LOCATION_WORDS, 'the', 'is', 'are', 'what', 'can', 'i', 'a', 'an', 'of', 'to',
]);

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter(word => word.length > 0);
}

export function isLocationQuery(query: string): boolean {
  const words = new Set(tokenize(query));
  return LOCATION_WORDS.some(word => words.has(word));
}

/**
 * Reformulates the user query for the automatic web search.
 *
 * Location questions become "<subject> office location address building";
 * the search scope is prefixed when the query does not already name it.
 *
 * @example
 * buildFallbackQuery('Where is the financial aid office?', 'SJSU')
 * // => 'SJSU financial aid office location address building'
 */
export function buildFallbackQuery(userQuery: string, searchScope: string | null): string {
  const scope = searchScope?.trim() ?? '';
  const scopeWords = new Set(tokenize(scope));
  let query = userQuery.trim();

  if (isLocationQuery(query)) {
    const subject = tokenize(query)
      .filter(word => !FILLER_WORDS.has(word) && !scopeWords.has(word) && word !== 'office')
      .join(' ');

    if (subject.length > 0) {
      query = `${subject} office location address building`;
    }
  }

  if (scope.length === 0 || query.toLowerCase().includes(scope.toLowerCase())) {
    return query;
  }

  return `${scope} ${query}`;
}
