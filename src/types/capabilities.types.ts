/**
 * @fileoverview Contracts of the external capabilities the controller consumes.
 *
 * The structured lookup, the web search and the text-completion backend are
 * treated as black boxes. Their outputs are validated with zod at the tool
 * boundary, so an adapter that drifts from the contract surfaces as a tool
 * error instead of leaking into a prompt.
 *
 * @module campus-guide/types/capabilities
 */

import { z } from 'zod';

/**
 * A single structured record (course prerequisite, deadline, FAQ, resource).
 */
export interface LookupRecord {
  readonly fields: Readonly<Record<string, string>>;
}

export interface LookupResponse {
  readonly found: boolean;
  readonly records: ReadonlyArray<LookupRecord>;
  readonly matchedCount: number;
}

/**
 * Exact or full-text query against the curated dataset.
 */
export interface StructuredLookup {
  search(query: string): Promise<LookupResponse>;
}

export interface WebSource {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

export interface WebSearchResponse {
  readonly summary: string;
  readonly sources: ReadonlyArray<WebSource>;
}

/**
 * Open web search returning a generated summary and its sources.
 */
export interface WebSearch {
  search(query: string, options?: SearchOptions): Promise<WebSearchResponse>;
}

export interface SearchOptions {
  /** Aborted when the caller stops waiting on the search */
  readonly signal?: AbortSignal;
}

/**
 * Injected `fetch`, so HTTP adapters can be tested without a network.
 */
export type FetchFn = typeof fetch;

export interface CompletionOptions {
  /** Aborted when the controller gives up waiting on the call */
  readonly signal?: AbortSignal;
}

/**
 * Text-generation backend. May throw on auth, rate-limit or timeout errors.
 */
export interface TextCompletion {
  readonly name: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Which capability produced a tool result.
 */
export enum ToolSource {
  STRUCTURED_LOOKUP = 'structured_lookup',
  WEB_SEARCH = 'web_search',
}

export type ToolPayload =
  | { readonly kind: 'records'; readonly records: ReadonlyArray<LookupRecord> }
  | { readonly kind: 'web'; readonly summary: string; readonly sources: ReadonlyArray<WebSource> }
  | { readonly kind: 'message'; readonly text: string };

/**
 * Normalized output of invoking a capability.
 *
 * `found = false` means the payload is a message stating absence; it never
 * carries an answer.
 */
export interface ToolResult {
  readonly source: ToolSource;
  readonly found: boolean;
  readonly payload: ToolPayload;
  readonly citations: ReadonlyArray<string>;
}

/**
 * Zod schemas for runtime validation of capability outputs.
 */

export const LookupRecordSchema = z.object({
  fields: z.record(z.string()),
});

export const LookupResponseSchema = z.object({
  found: z.boolean(),
  records: z.array(LookupRecordSchema),
  matchedCount: z.number().int().nonnegative(),
});

export const WebSourceSchema = z.object({
  title: z.string(),
  url: z.string().url(),
  snippet: z.string(),
});

export const WebSearchResponseSchema = z.object({
  summary: z.string(),
  sources: z.array(WebSourceSchema),
});
