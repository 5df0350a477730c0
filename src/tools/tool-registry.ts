/**
 * @fileoverview Tool Registry - Central registry for the agent's tools.
 *
 * The registry maintains the available tools, validates invocation input
 * and enforces per-call timeouts. Every invocation
 * resolves to a ToolExecution envelope; nothing a tool throws escapes it.
 *
 * @module campus-guide/tools/tool-registry
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { UniqueId } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';
import type { ToolResult } from '../types/capabilities.types.js';
import type {
  ToolDefinition,
  ToolError,
  ToolExecution,
  ToolExecutionContext,
  ToolInvocationRequest,
  ToolRegistryEntry,
} from '../types/tools.types.js';
import { ToolInputSchema } from '../types/tools.types.js';
import { CampusGuideError, TimeoutError, errorMessage } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';
import { createSilentLogger, type Logger } from '../observability/logger.js';

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:registered': (entry: ToolRegistryEntry) => void;
  'tool:invoked': (toolId: string, executionId: UniqueId, input: string) => void;
  'tool:completed': (toolId: string, executionId: UniqueId, result: ToolResult) => void;
  'tool:failed': (toolId: string, executionId: UniqueId, error: ToolError) => void;
}

/**
 * Configuration for the Tool Registry.
 */
export interface ToolRegistryConfig {
  /** Default timeout for tool execution */
  readonly defaultTimeoutMs: number;

  /** Logger used for dispatch diagnostics */
  readonly logger: Logger;
}

export const DEFAULT_REGISTRY_CONFIG: ToolRegistryConfig = {
  defaultTimeoutMs: 10_000,
  logger: createSilentLogger('tools.registry'),
};

/**
 * Central registry for tool management.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.register(createDatabaseQueryTool(catalog));
 * const execution = await registry.invoke({
 *   toolId: 'database_query',
 *   input: 'CMPE 259 prerequisites',
 *   sessionId,
 * });
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> {
  private readonly tools: Map<string, ToolRegistryEntry>;
  private readonly config: ToolRegistryConfig;

  constructor(config: Partial<ToolRegistryConfig> = {}) {
    super();
    this.tools = new Map();
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...config };
  }

  /**
   * Registers a new tool with the registry.
   *
   * @throws Error if tool ID is already registered
   */
  register(definition: ToolDefinition): void {
    if (this.tools.has(definition.id)) {
      throw new Error(`Tool with ID '${definition.id}' is already registered`);
    }

    const entry: ToolRegistryEntry = {
      definition,
      registeredAt: createTimestamp(),
    };

    this.tools.set(definition.id, entry);
    this.emit('tool:registered', entry);
  }

  has(toolId: string): boolean {
    return this.tools.has(toolId);
  }

  /**
   * Lists tools in registration order.
   */
  list(): ReadonlyArray<ToolDefinition> {
    return [...this.tools.values()].map(entry => entry.definition);
  }

  /**
   * Invokes a tool. Always resolves; failures come back as an error envelope.
   */
  async invoke(request: ToolInvocationRequest): Promise<ToolExecution> {
    const executionId = createUniqueId(uuidv4());
    const startTime = Date.now();
    const logger = this.config.logger.child({ sessionId: request.sessionId });

    const entry = this.tools.get(request.toolId);

    if (!entry) {
      return this.createErrorExecution(
        executionId,
        request.toolId,
        'TOOL_NOT_FOUND',
        `Tool '${request.toolId}' is not registered`,
        startTime,
      );
    }

    const parsed = ToolInputSchema.safeParse(request.input);
    if (!parsed.success) {
      return this.createErrorExecution(
        executionId,
        request.toolId,
        'VALIDATION_FAILED',
        `Input validation failed: ${parsed.error.issues.map(issue => issue.message).join(', ')}`,
        startTime,
      );
    }

    const definition = entry.definition;
    const input = parsed.data;

    this.emit('tool:invoked', request.toolId, executionId, input);
    logger.debug('Invoking tool', { toolId: request.toolId, executionId, input });

    const timeoutMs = request.timeoutMs ?? this.config.defaultTimeoutMs;

    try {
      const result = await withTimeout(`Tool '${request.toolId}'`, timeoutMs, signal => {
        const context: ToolExecutionContext = {
          abortSignal: signal,
          logger: logger.child({ module: `tools.${request.toolId}` }),
        };
        return definition.execute(input, context);
      });

      const durationMs = Date.now() - startTime;
      this.emit('tool:completed', request.toolId, executionId, result);

      return {
        id: executionId,
        toolId: request.toolId,
        success: true,
        result,
        error: null,
        durationMs,
        completedAt: createTimestamp(),
      };
    } catch (error) {
      const code = error instanceof TimeoutError
        ? 'TIMEOUT'
        : error instanceof CampusGuideError ? error.code : 'EXECUTION_ERROR';
      const execution = this.createErrorExecution(
        executionId,
        request.toolId,
        code,
        errorMessage(error),
        startTime,
      );

      if (execution.error) {
        this.emit('tool:failed', request.toolId, executionId, execution.error);
      }
      logger.warn('Tool failed', { toolId: request.toolId, code, message: errorMessage(error) });

      return execution;
    }
  }

  // ============ Private Methods ============

  private createErrorExecution(
    executionId: UniqueId,
    toolId: string,
    code: string,
    message: string,
    startTime: number,
  ): ToolExecution {
    return {
      id: executionId,
      toolId,
      success: false,
      result: null,
      error: {
        code,
        message,
        recoverable: true,
      },
      durationMs: Date.now() - startTime,
      completedAt: createTimestamp(),
    };
  }
}
