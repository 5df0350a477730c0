/**
 * @fileoverview Unit tests for observation and answer rendering
 */

import { describe, it, expect } from 'vitest';
import { buildAbortAnswer, formatObservation, formatResultAsAnswer } from './answer-formatter.js';
import { AbortCause, ObservationOrigin, ToolSource, type ToolResult } from '../types/index.js';

const faqHit: ToolResult = {
  source: ToolSource.STRUCTURED_LOOKUP,
  found: true,
  payload: {
    kind: 'records',
    records: [
      {
        fields: {
          source: 'faqs',
          category: 'registration',
          score: '0.92',
          question: 'When is the add/drop deadline?',
          answer: 'The add/drop deadline is the end of the second week of classes.',
          content: 'Q: When is the add/drop deadline?\nA: The add/drop deadline is the end of the second week of classes.',
        },
      },
      { fields: { category: 'deadlines', event: 'Late add', date: 'Week 3' } },
    ],
  },
  citations: [],
};

const webHit: ToolResult = {
  source: ToolSource.WEB_SEARCH,
  found: true,
  payload: {
    kind: 'web',
    summary: 'Tuition is charged per semester.',
    sources: [{ title: 'Tuition', url: 'https://bursar.example.edu/tuition', snippet: 'Rates for fall.' }],
  },
  citations: ['https://bursar.example.edu/tuition'],
};

describe('formatObservation()', () => {
  it('should mark the most relevant record', () => {
    expect(formatObservation(faqHit)).toBe(
      '>>> MOST RELEVANT ANSWER >>> Result 1 [registration] (relevance: 0.92):\n'
      + 'Q: When is the add/drop deadline?\nA: The add/drop deadline is the end of the second week of classes.\n\n'
      + 'Result 2 [deadlines]:\nevent: Late add\ndate: Week 3',
    );
  });

  it('should list web sources after the summary', () => {
    expect(formatObservation(webHit)).toBe(
      'Summary: Tuition is charged per semester.\n\n'
      + 'Result 1:\nTitle: Tuition\nURL: https://bursar.example.edu/tuition\nContent: Rates for fall.',
    );
  });

  it('should pass messages through', () => {
    expect(formatObservation({
      source: ToolSource.STRUCTURED_LOOKUP,
      found: false,
      payload: { kind: 'message', text: 'No relevant information found in the database.' },
      citations: [],
    })).toBe('No relevant information found in the database.');
  });
});

describe('formatResultAsAnswer()', () => {
  it('should list several records as bullets', () => {
    expect(formatResultAsAnswer(faqHit)).toBe(
      '• The add/drop deadline is the end of the second week of classes.\n'
      + '• event: Late add\ndate: Week 3',
    );
  });

  it('should cite the first web source', () => {
    expect(formatResultAsAnswer(webHit))
      .toBe('Tuition is charged per semester.\n\nSource: https://bursar.example.edu/tuition');
  });
});

describe('buildAbortAnswer()', () => {
  it('should fall back to the observation text for a miss', () => {
    const answer = buildAbortAnswer(AbortCause.TIME_BUDGET, {
      kind: 'observation',
      origin: ObservationOrigin.TOOL,
      text: 'No relevant information found in the database.',
      toolName: 'database_query',
      result: null,
    });

    expect(answer).toBe(
      'I reached my time limit before I could finish answering. '
      + 'The last thing I found was:\n\nNo relevant information found in the database.',
    );
  });
});
