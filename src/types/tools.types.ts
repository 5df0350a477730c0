/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the mechanism by which the agent consults its information
 * sources. Each tool wraps one capability, takes the free-text input the
 * model wrote after `Action Input:`, and returns a normalized ToolResult.
 *
 * @module campus-guide/types/tools
 */

import { z } from 'zod';
import type { UniqueId, Timestamp } from './core.types.js';
import type { ToolResult } from './capabilities.types.js';

/**
 * Complete definition of a tool available to the agent.
 */
export interface ToolDefinition {
  /** Identifier the model writes after `Action:` */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  /** Description rendered into the system prompt */
  readonly description: string;

  /** Example input rendered into the system prompt */
  readonly exampleInput: string;

  /** The actual execution function */
  readonly execute: ToolExecutor;
}

/**
 * Function signature for tool execution.
 */
export type ToolExecutor = (
  input: string,
  context: ToolExecutionContext,
) => Promise<ToolResult>;

/**
 * Structured error from tool execution.
 */
export interface ToolError {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Human-readable error message */
  readonly message: string;

  /** Whether the loop can continue after this error */
  readonly recoverable: boolean;
}

/**
 * Envelope returned by the registry for every invocation.
 */
export interface ToolExecution {
  readonly id: UniqueId;
  readonly toolId: string;
  readonly success: boolean;
  readonly result: ToolResult | null;
  readonly error: ToolError | null;
  readonly durationMs: number;
  readonly completedAt: Timestamp;
}

/**
 * Context provided to tool execution.
 */
export interface ToolExecutionContext {
  /** Fires when the invocation times out; pass it on to I/O */
  readonly abortSignal: AbortSignal;

  /** Logger for this execution */
  readonly logger: ExecutionLogger;
}

/**
 * Logger interface for tool execution.
 */
export interface ExecutionLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Registry entry for a registered tool.
 */
export interface ToolRegistryEntry {
  readonly definition: ToolDefinition;
  readonly registeredAt: Timestamp;
}

/**
 * Request to invoke a tool through the registry.
 */
export interface ToolInvocationRequest {
  /** Tool ID to invoke */
  readonly toolId: string;

  /** Free-text input written by the model (or the controller) */
  readonly input: string;

  /** Run requesting the invocation */
  readonly sessionId: UniqueId;

  /** Optional timeout override */
  readonly timeoutMs?: number;
}

/**
 * Zod schemas for runtime validation.
 */

export const MAX_TOOL_INPUT_LENGTH = 500;

export const ToolInputSchema = z
  .string()
  .trim()
  .min(1, 'Tool input must not be empty')
  .max(MAX_TOOL_INPUT_LENGTH, `Tool input must be at most ${MAX_TOOL_INPUT_LENGTH} characters`);
