/**
 * @fileoverview Observability module public exports.
 *
 * @module campus-guide/observability
 */

export {
  Logger,
  ConsoleTransport,
  JsonTransport,
  MemoryTransport,
  createLogger,
  createSilentLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogMetrics,
  type LogTransport,
  type LoggerConfig,
  type LineSink,
} from './logger.js';

export {
  TranscriptLog,
  serializeRun,
  type TranscriptLogRecord,
} from './transcript-log.js';
