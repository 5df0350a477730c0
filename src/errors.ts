/**
 * @fileoverview Error classes shared across the runtime.
 *
 * Adapters throw these; the tool registry and the decision loop turn them
 * into observations or a run error. None of them cross `runQuery`.
 *
 * @module campus-guide/errors
 */

/**
 * Base class for every error raised by this package.
 */
export class CampusGuideError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toJSON(): { code: string; message: string } {
    return { code: this.code, message: this.message };
  }
}

/**
 * Raised by a text-completion provider (auth, rate limit, timeout, empty output).
 */
export class CompletionError extends CampusGuideError {
  readonly provider: string;
  readonly retryable: boolean;

  constructor(
    provider: string,
    message: string,
    options: { code?: string; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(options.code ?? 'COMPLETION_FAILED', message, { cause: options.cause });
    this.provider = provider;
    this.retryable = options.retryable ?? true;
  }
}

/**
 * Raised by a retrieval capability or its tool adapter.
 */
export class ToolExecutionError extends CampusGuideError {
  readonly toolId: string;

  constructor(toolId: string, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(options.code ?? 'TOOL_FAILED', message, { cause: options.cause });
    this.toolId = toolId;
  }
}

/**
 * Raised when settings or a run configuration are invalid.
 */
export class ConfigError extends CampusGuideError {
  readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string> = []) {
    super('INVALID_CONFIG', message);
    this.issues = issues;
  }
}

/**
 * Raised by `withTimeout` when the wrapped promise does not settle in time.
 */
export class TimeoutError extends CampusGuideError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Extracts a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
