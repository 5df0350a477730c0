/**
 * @fileoverview Transcript log - persists finished runs for later review.
 *
 * Each run becomes one JSON line holding the answer, its citations, how the
 * run ended and the full Thought/Action/Observation transcript. Lines are
 * appended, so a log can be tailed while the CLI is running.
 *
 * @module campus-guide/observability/transcript-log
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { AbortCause, RunError, RunResult, TerminationReason, UniqueId } from '../types/core.types.js';
import type { TranscriptStep } from '../types/transcript.types.js';

export const TRANSCRIPT_LOG_VERSION = '1.0';

/**
 * One line of the transcript log.
 */
export interface TranscriptLogRecord {
  readonly version: typeof TRANSCRIPT_LOG_VERSION;
  readonly sessionId: UniqueId;
  readonly recordedAt: string;
  readonly query: string;
  readonly answerText: string;
  readonly citations: ReadonlyArray<string>;
  readonly terminationReason: TerminationReason;
  readonly abortCause: AbortCause | null;
  readonly error: RunError | null;
  readonly iterations: number;
  readonly toolInvocations: ReadonlyArray<string>;
  readonly durationMs: number;
  readonly steps: ReadonlyArray<TranscriptStep>;
}

/**
 * Converts a run result into its log record.
 */
export function serializeRun(result: RunResult, recordedAt: Date = new Date()): TranscriptLogRecord {
  const first = result.transcript[0];

  return {
    version: TRANSCRIPT_LOG_VERSION,
    sessionId: result.sessionId,
    recordedAt: recordedAt.toISOString(),
    query: first?.kind === 'user_query' ? first.text : '',
    answerText: result.answerText,
    citations: [...result.citations],
    terminationReason: result.terminationReason,
    abortCause: result.abortCause,
    error: result.error,
    iterations: result.iterations,
    toolInvocations: [...result.toolInvocations],
    durationMs: result.durationMs,
    steps: [...result.transcript],
  };
}

/**
 * Appends run records to a JSON Lines file.
 *
 * @example
 * ```typescript
 * const log = new TranscriptLog('./logs/transcripts.jsonl');
 * await log.append(await loop.runQuery(question, config));
 * ```
 */
export class TranscriptLog {
  private directoryReady = false;

  constructor(readonly path: string) {}

  async append(result: RunResult): Promise<TranscriptLogRecord> {
    const record = serializeRun(result);

    if (!this.directoryReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.directoryReady = true;
    }
    await appendFile(this.path, `${JSON.stringify(record)}\n`, 'utf8');

    return record;
  }
}
