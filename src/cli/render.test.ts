/**
 * @fileoverview Unit tests for terminal rendering
 */

import { describe, it, expect } from 'vitest';
import { renderAnswer, renderSummary, renderTranscript } from './render.js';
import { AbortCause, TerminationReason, createUniqueId, type RunResult } from '../types/core.types.js';
import { ObservationOrigin } from '../types/transcript.types.js';

const result: RunResult = {
  sessionId: createUniqueId('session-1'),
  answerText: 'CMPE 999 is not offered.',
  citations: ['https://example.edu/catalog', 'https://example.edu/faq'],
  transcript: [
    { kind: 'user_query', text: 'Prereqs for CMPE 999?' },
    { kind: 'action', toolName: 'database_query', toolInput: 'CMPE 999' },
    {
      kind: 'observation',
      origin: ObservationOrigin.TOOL,
      text: 'No results found',
      toolName: 'database_query',
      result: null,
    },
    {
      kind: 'observation',
      origin: ObservationOrigin.FALLBACK,
      text: 'Summary: not offered\nSources: 2',
      toolName: 'web_search',
      result: null,
    },
    { kind: 'final_answer', text: 'CMPE 999 is not offered.' },
  ],
  terminationReason: TerminationReason.DONE,
  abortCause: null,
  error: null,
  iterations: 2,
  toolInvocations: ['database_query', 'web_search'],
  durationMs: 850,
};

describe('renderTranscript()', () => {
  it('should label each step and indent observations', () => {
    expect(renderTranscript(result.transcript)).toBe([
      'Question: Prereqs for CMPE 999?',
      'Action: database_query\nAction Input: CMPE 999',
      'Observation:\n    No results found',
      'Observation (fallback):\n    Summary: not offered\n    Sources: 2',
      'Final Answer: CMPE 999 is not offered.',
    ].join('\n'));
  });
});

describe('renderAnswer()', () => {
  it('should number the sources', () => {
    expect(renderAnswer(result)).toBe(
      'CMPE 999 is not offered.\n\nSources:\n  [1] https://example.edu/catalog\n  [2] https://example.edu/faq',
    );
  });

  it('should print only the answer without citations', () => {
    expect(renderAnswer({ ...result, citations: [] })).toBe('CMPE 999 is not offered.');
  });
});

describe('renderSummary()', () => {
  it('should summarize a finished run', () => {
    expect(renderSummary(result)).toBe('[done] 2 iteration(s), tools: database_query, web_search, 850ms');
  });

  it('should name the abort cause', () => {
    const aborted = {
      ...result,
      terminationReason: TerminationReason.ABORTED,
      abortCause: AbortCause.ITERATION_LIMIT,
      toolInvocations: [],
    };

    expect(renderSummary(aborted)).toBe('[aborted (iteration_limit)] 2 iteration(s), tools: none, 850ms');
  });
});
