/**
 * @fileoverview Structured Logger for the Campus Guide runtime.
 *
 * The logger provides structured, leveled logging with support for:
 * - Contextual metadata
 * - Session IDs so every line of a run can be grouped
 * - Multiple output transports
 * - Duration metrics
 *
 * All log entries are JSON-serializable. Console output goes to stderr so
 * the CLI can keep stdout for answers.
 *
 * @module campus-guide/observability/logger
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Run the entry belongs to, if any */
  readonly sessionId: UniqueId | null;

  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
  readonly metrics: LogMetrics | null;
}

/**
 * Error information in a log entry.
 */
export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

/**
 * Performance metrics in a log entry.
 */
export interface LogMetrics {
  readonly durationMs?: number;
  readonly custom?: Readonly<Record<string, number>>;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

/**
 * Configuration for the logger.
 */
export interface LoggerConfig {
  /** Minimum level to log */
  readonly minLevel: Severity;

  /** Module name for this logger instance */
  readonly module: string;

  /** Transports to write to */
  readonly transports: LogTransport[];

  /** Default session ID */
  readonly defaultSessionId?: UniqueId | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.DEBUG]: 0,
  [Severity.INFO]: 1,
  [Severity.WARN]: 2,
  [Severity.ERROR]: 3,
  [Severity.FATAL]: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'campus-guide',
  transports: [],
};

/**
 * Minimal writable surface, satisfied by `process.stderr`.
 */
export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * Console transport - human-readable lines with optional colors.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  private readonly useColors: boolean;
  private readonly sink: LineSink;

  constructor(options: { useColors?: boolean; sink?: LineSink } = {}) {
    this.sink = options.sink ?? process.stderr;
    this.useColors = options.useColors ?? process.stderr.isTTY === true;
  }

  write(entry: LogEntry): void {
    const prefix = this.formatPrefix(entry);
    const data = Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
    const duration = entry.metrics?.durationMs !== undefined ? ` (${entry.metrics.durationMs}ms)` : '';
    const error = entry.error ? ` :: ${entry.error.name}: ${entry.error.message}` : '';

    this.sink.write(`${prefix} ${entry.message}${duration}${data}${error}\n`);
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);

    if (this.useColors) {
      const color = this.getLevelColor(entry.level);
      return `\x1b[90m${timestamp}\x1b[0m ${color}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${entry.module}]`;
  }

  private getLevelColor(level: Severity): string {
    switch (level) {
      case Severity.DEBUG: return '\x1b[90m'; // Gray
      case Severity.INFO: return '\x1b[32m';  // Green
      case Severity.WARN: return '\x1b[33m';  // Yellow
      case Severity.ERROR: return '\x1b[31m'; // Red
      case Severity.FATAL: return '\x1b[35m'; // Magenta
    }
  }
}

/**
 * JSON-lines transport, one entry per line.
 */
export class JsonTransport implements LogTransport {
  readonly name = 'json';

  constructor(private readonly sink: LineSink = process.stderr) {}

  write(entry: LogEntry): void {
    this.sink.write(`${JSON.stringify(entry)}\n`);
  }
}

/**
 * Memory transport - stores logs in memory for testing/debugging.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findBySessionId(sessionId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.sessionId === sessionId);
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *   module: 'agent.decision-loop',
 *   minLevel: Severity.DEBUG,
 *   transports: [new ConsoleTransport()],
 * });
 *
 * logger.info('Run started', { query: 'CMPE 259 prerequisites' });
 * logger.error('Completion failed', { attempt: 2 }, error);
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;
  private sessionId: UniqueId | null;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged: LoggerConfig = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
    this.sessionId = config.defaultSessionId ?? null;
  }

  /**
   * Creates a child logger sharing transports and level.
   */
  child(context: { module?: string; sessionId?: UniqueId }): Logger {
    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      defaultSessionId: context.sessionId ?? this.sessionId ?? undefined,
    });
  }

  setSessionId(id: UniqueId): void {
    this.sessionId = id;
  }

  isLevelEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.WARN, message, data, error);
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.FATAL, message, data, error);
  }

  /**
   * Logs with performance metrics.
   */
  withMetrics(
    level: Severity,
    message: string,
    metrics: LogMetrics,
    data?: Record<string, unknown>,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    this.writeEntry(this.createEntry(level, message, data, undefined, metrics));
  }

  /**
   * Times a function and logs its duration.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.withMetrics(level, `${label} completed`, { durationMs: Date.now() - start });
      return result;
    } catch (error) {
      this.withMetrics(Severity.WARN, `${label} failed`, { durationMs: Date.now() - start });
      throw error;
    }
  }

  // ============ Private Methods ============

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    this.writeEntry(this.createEntry(level, message, data, error));
  }

  private createEntry(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
    metrics?: LogMetrics,
  ): LogEntry {
    return {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      sessionId: this.sessionId,
      data: data ?? {},
      error: error ? this.formatError(error) : null,
      metrics: metrics ?? null,
    };
  }

  private formatError(error: Error): LogError {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code,
    };
  }

  private writeEntry(entry: LogEntry): void {
    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        process.stderr.write(`Logger transport '${transport.name}' failed: ${String(transportError)}\n`);
      }
    }
  }
}

/**
 * Parses a level name such as "debug" or "WARN".
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  return Object.values(Severity).find(level => level === upper) ?? null;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}

/**
 * Logger that drops everything, for library callers that do not pass one.
 */
export function createSilentLogger(module: string = 'campus-guide'): Logger {
  return new Logger({ module, transports: [{ name: 'null', write: () => undefined }] });
}
