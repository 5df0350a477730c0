/**
 * @fileoverview The `database_query` tool.
 *
 * Wraps a StructuredLookup, validates what it returns and normalizes it into
 * a ToolResult. A miss is reported as a `found = false` message that names
 * the course code when the query had one.
 *
 * @module campus-guide/tools/database-query
 */

import type { LookupResponse, StructuredLookup, ToolResult } from '../types/capabilities.types.js';
import { LookupResponseSchema, ToolSource } from '../types/capabilities.types.js';
import type { ToolDefinition, ToolExecutionContext } from '../types/tools.types.js';
import { DATABASE_QUERY_TOOL } from '../types/core.types.js';
import { ToolExecutionError, errorMessage } from '../errors.js';
import { extractCourseCode } from '../catalog/course-code.js';

// ============ Helper Functions ============

/**
 * Message stating that the database has nothing for `query`.
 */
export function notFoundMessage(query: string): string {
  const courseCode = extractCourseCode(query);

  if (courseCode) {
    return `No information found for ${courseCode} in the database. This course may not be in our records.`;
  }
  return 'No relevant information found in the database.';
}

function toToolResult(response: LookupResponse, query: string): ToolResult {
  if (!response.found || response.records.length === 0) {
    return {
      source: ToolSource.STRUCTURED_LOOKUP,
      found: false,
      payload: { kind: 'message', text: notFoundMessage(query) },
      citations: [],
    };
  }

  return {
    source: ToolSource.STRUCTURED_LOOKUP,
    found: true,
    payload: { kind: 'records', records: response.records },
    citations: [],
  };
}

// ============ Tool Implementation ============

async function executeDatabaseQuery(
  lookup: StructuredLookup,
  query: string,
  context: ToolExecutionContext,
): Promise<ToolResult> {
  context.logger.debug('Querying structured lookup', { query });

  let raw: unknown;
  try {
    raw = await lookup.search(query);
  } catch (error) {
    throw new ToolExecutionError(DATABASE_QUERY_TOOL, `Database query failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = LookupResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolExecutionError(
      DATABASE_QUERY_TOOL,
      `Database returned an invalid response: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
      { code: 'INVALID_OUTPUT' },
    );
  }

  context.logger.debug('Structured lookup answered', {
    found: parsed.data.found,
    matchedCount: parsed.data.matchedCount,
  });
  return toToolResult(parsed.data, query);
}

// ============ Tool Definition ============

export function createDatabaseQueryTool(lookup: StructuredLookup): ToolDefinition {
  return {
    id: DATABASE_QUERY_TOOL,
    name: 'Database Query',
    description:
      'Query the official university database for courses, prerequisites, programs, deadlines, FAQs and campus resources. ALWAYS use this tool FIRST.',
    exampleInput: 'CMPE 259 prerequisites',
    execute: (input, context) => executeDatabaseQuery(lookup, input, context),
  };
}
