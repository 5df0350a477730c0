/**
 * @fileoverview Core type definitions for the Campus Guide agent runtime.
 *
 * These types form the shared vocabulary of the system: identifiers, the
 * controller's phases, the run configuration and the result of a run.
 * Transcript and capability types live in their own modules.
 *
 * @module campus-guide/types
 */

import { ConfigError } from '../errors.js';
import type { Transcript } from './transcript.types.js';

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Represents the current phase of a reasoning run.
 *
 * The controller follows a strict state machine:
 * START → REASONING → (TOOL_DISPATCH → REASONING)* → DONE | ABORTED | FAILED
 *
 * @remarks
 * - START: Transcript is being seeded with the user query
 * - REASONING: Waiting on the text-completion capability and parsing its step
 * - TOOL_DISPATCH: Invoking the tool named by the last Action
 * - DONE: A grounded final answer was accepted
 * - ABORTED: Iteration or time limit reached; a best-effort answer was produced
 * - FAILED: The completion capability failed after its retry
 */
export enum AgentPhase {
  START = 'START',
  REASONING = 'REASONING',
  TOOL_DISPATCH = 'TOOL_DISPATCH',
  DONE = 'DONE',
  ABORTED = 'ABORTED',
  FAILED = 'FAILED',
}

/**
 * Why a run stopped.
 */
export enum TerminationReason {
  DONE = 'done',
  ABORTED = 'aborted',
  ERROR = 'error',
}

/**
 * Which limit ended an aborted run.
 */
export enum AbortCause {
  ITERATION_LIMIT = 'iteration_limit',
  TIME_BUDGET = 'time_budget',
}

/**
 * Severity levels for logging and error reporting.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Identifiers of the two retrieval tools the controller knows how to reason about.
 */
export const DATABASE_QUERY_TOOL = 'database_query';
export const WEB_SEARCH_TOOL = 'web_search';

/**
 * Immutable per-run configuration for the reasoning controller.
 */
export interface AgentConfig {
  /** Completion calls allowed before the run is aborted */
  readonly maxIterations: number;

  /** Tool identifiers the parser accepts in an Action step */
  readonly toolNames: ReadonlySet<string>;

  /** Whether a structured-lookup miss triggers an automatic web search */
  readonly fallbackEnabled: boolean;

  /** Wall-clock budget for the whole run (ms), if any */
  readonly timeBudgetMs: number | null;

  /** Timeout for a single completion call (ms) */
  readonly completionTimeoutMs: number;

  /** Timeout for a single tool invocation (ms) */
  readonly toolTimeoutMs: number;

  /** Institution name added to fallback web queries that lack it */
  readonly searchScope: string | null;
}

/**
 * Serializable error attached to a failed run.
 */
export interface RunError {
  readonly code: string;
  readonly message: string;
}

/**
 * Outcome of one `runQuery` call.
 */
export interface RunResult {
  readonly sessionId: UniqueId;
  readonly answerText: string;
  readonly citations: ReadonlyArray<string>;
  readonly transcript: Transcript;
  readonly terminationReason: TerminationReason;
  readonly abortCause: AbortCause | null;
  readonly error: RunError | null;
  /** Completion calls made during the run */
  readonly iterations: number;
  /** Tool names in the order they were actually invoked */
  readonly toolInvocations: ReadonlyArray<string>;
  readonly durationMs: number;
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

/**
 * Default configuration for the reasoning controller.
 */
export const DEFAULT_AGENT_CONFIG: Readonly<AgentConfig> = {
  maxIterations: 5,
  toolNames: new Set([DATABASE_QUERY_TOOL, WEB_SEARCH_TOOL]),
  fallbackEnabled: true,
  timeBudgetMs: null,
  completionTimeoutMs: 30_000,
  toolTimeoutMs: 10_000,
  searchScope: null,
};

/**
 * Builds a frozen AgentConfig from defaults and overrides.
 */
export function createAgentConfig(overrides: Partial<AgentConfig> = {}): Readonly<AgentConfig> {
  const config: AgentConfig = {
    ...DEFAULT_AGENT_CONFIG,
    ...overrides,
    toolNames: new Set(overrides.toolNames ?? DEFAULT_AGENT_CONFIG.toolNames),
  };

  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    throw new ConfigError(`maxIterations must be a positive integer, got ${config.maxIterations}`);
  }

  requirePositive('completionTimeoutMs', config.completionTimeoutMs);
  requirePositive('toolTimeoutMs', config.toolTimeoutMs);
  if (config.timeBudgetMs !== null) {
    requirePositive('timeBudgetMs', config.timeBudgetMs);
  }

  return Object.freeze(config);
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${field} must be a positive number, got ${value}`);
  }
}
