/**
 * @fileoverview Unit tests for the response parser
 */

import { describe, it, expect } from 'vitest';
import { MAX_ACTION_INPUT_LENGTH, normalizeToolName, parseStep } from './response-parser.js';
import { TranscriptBuilder } from './transcript.js';
import {
  MalformedReason,
  ObservationOrigin,
  ToolSource,
  createAgentConfig,
  type Transcript,
} from '../types/index.js';

const config = createAgentConfig();

function freshTranscript(query: string = 'What are the prerequisites for CMPE 259?'): Transcript {
  return new TranscriptBuilder(query).snapshot();
}

function groundedTranscript(): Transcript {
  const builder = new TranscriptBuilder('What are the prerequisites for CMPE 259?');
  builder.append({ kind: 'action', toolName: 'database_query', toolInput: 'CMPE 259 prerequisites' });
  builder.append({
    kind: 'observation',
    origin: ObservationOrigin.TOOL,
    text: 'CMPE 259 - Natural Language Processing',
    toolName: 'database_query',
    result: {
      source: ToolSource.STRUCTURED_LOOKUP,
      found: true,
      payload: { kind: 'message', text: 'CMPE 259 - Natural Language Processing' },
      citations: [],
    },
  });
  return builder.snapshot();
}

describe('parseStep()', () => {
  describe('edge cases', () => {
    it('should reject whitespace-only text as empty', () => {
      expect(parseStep('  \n\t ', freshTranscript(), config)).toEqual({
        kind: 'malformed',
        rawText: '  \n\t ',
        reason: MalformedReason.EMPTY,
        detail: null,
        thought: null,
      });
    });

    it('should reject text without markers', () => {
      const step = parseStep('I think the answer is 42.', freshTranscript(), config);

      expect(step).toMatchObject({ kind: 'malformed', reason: MalformedReason.NO_MARKER });
    });

    it('should reject an empty final answer', () => {
      const step = parseStep('Thought: done\nFinal Answer:', groundedTranscript(), config);

      expect(step).toMatchObject({ kind: 'malformed', reason: MalformedReason.EMPTY_ANSWER });
    });
  });

  describe('Action precedence', () => {
    it('should parse an Action when a Final Answer follows it', () => {
      const raw = [
        "I'll search the database.",
        'Action: database_query',
        'Action Input: CMPE 259 prerequisites',
        'Observation: CMPE 259 requires CMPE 200.',
        'Final Answer: The prerequisite is CMPE 200.',
      ].join('\n');

      expect(parseStep(raw, groundedTranscript(), config)).toEqual({
        kind: 'action',
        name: 'database_query',
        input: 'CMPE 259 prerequisites',
        thought: "I'll search the database.",
      });
    });

    it('should parse a bare Action followed by a Final Answer', () => {
      const step = parseStep('Action: database_query\nFinal Answer: CMPE 200.', freshTranscript(), config);

      expect(step).toEqual({
        kind: 'action',
        name: 'database_query',
        input: 'What are the prerequisites for CMPE 259?',
        thought: null,
      });
    });

    it('should parse a bare Action written on one line with an answer', () => {
      const step = parseStep(
        "I'll search. Action: database_query. Final Answer: CMPE 200.",
        freshTranscript(),
        config,
      );

      expect(step).toEqual({
        kind: 'action',
        name: 'database_query',
        input: 'What are the prerequisites for CMPE 259?',
        thought: "I'll search.",
      });
    });

    it('should parse an Action when a Final Answer precedes it', () => {
      const raw = 'Final Answer: Probably CMPE 200.\nAction: web_search\nAction Input: CMPE 259 prerequisites';

      expect(parseStep(raw, freshTranscript(), config)).toMatchObject({
        kind: 'action',
        name: 'web_search',
        input: 'CMPE 259 prerequisites',
      });
    });
  });

  describe('Action extraction', () => {
    it('should read the thought after a Thought marker', () => {
      const step = parseStep(
        'Thought: I need the catalog.\nAction: database_query\nAction Input: CMPE 259',
        freshTranscript(),
        config,
      );

      expect(step).toMatchObject({ kind: 'action', thought: 'I need the catalog.' });
    });

    it('should normalize aliases and strip quotes', () => {
      const step = parseStep('Action: Search\nAction Input: "SJSU tuition fall"', freshTranscript(), config);

      expect(step).toMatchObject({ kind: 'action', name: 'web_search', input: 'SJSU tuition fall' });
    });

    it('should strip brackets around the tool name', () => {
      const step = parseStep('Action: [database]\nAction Input: add/drop deadline', freshTranscript(), config);

      expect(step).toMatchObject({ kind: 'action', name: 'database_query', input: 'add/drop deadline' });
    });

    it('should take the input from the action segment without an Action Input marker', () => {
      const step = parseStep('Action: database_query[CMPE 259 prerequisites]', freshTranscript(), config);

      expect(step).toMatchObject({ kind: 'action', name: 'database_query', input: 'CMPE 259 prerequisites' });
    });

    it('should stop the input at the next marker on the same line', () => {
      const step = parseStep(
        'Action: database_query\nAction Input: CMPE 259 Observation: invented',
        freshTranscript(),
        config,
      );

      expect(step).toMatchObject({ kind: 'action', input: 'CMPE 259' });
    });

    it('should cap the input length', () => {
      const step = parseStep(`Action: web_search\nAction Input: ${'x'.repeat(250)}`, freshTranscript(), config);

      expect(step.kind).toBe('action');
      if (step.kind === 'action') {
        expect(step.input).toHaveLength(MAX_ACTION_INPUT_LENGTH);
      }
    });

    it('should reject tools outside the configured set', () => {
      const step = parseStep('Action: calculator\nAction Input: 2+2', freshTranscript(), config);

      expect(step).toMatchObject({
        kind: 'malformed',
        reason: MalformedReason.UNKNOWN_TOOL,
        detail: 'calculator',
      });
    });

    it('should reject a configured tool missing from a narrowed config', () => {
      const dbOnly = createAgentConfig({ toolNames: new Set(['database_query']) });
      const step = parseStep('Action: web_search\nAction Input: tuition', freshTranscript(), dbOnly);

      expect(step).toMatchObject({ kind: 'malformed', reason: MalformedReason.UNKNOWN_TOOL });
    });

    it('should search for the question when the input is blank', () => {
      const step = parseStep('Action: web_search\nAction Input:   ', freshTranscript(), config);

      expect(step).toEqual({
        kind: 'action',
        name: 'web_search',
        input: 'What are the prerequisites for CMPE 259?',
        thought: null,
      });
    });

    it('should cap the question used as input', () => {
      const step = parseStep('Action: database_query', freshTranscript('q'.repeat(300)), config);

      expect(step).toMatchObject({ kind: 'action', input: 'q'.repeat(MAX_ACTION_INPUT_LENGTH) });
    });

    it('should reject an action without input when there is no question', () => {
      const step = parseStep('Action: web_search\nAction Input:   ', freshTranscript('  '), config);

      expect(step).toMatchObject({
        kind: 'malformed',
        reason: MalformedReason.MISSING_INPUT,
        detail: 'web_search',
      });
    });

    it('should be case-insensitive about markers', () => {
      const step = parseStep('action: database_query\naction input: housing', freshTranscript(), config);

      expect(step).toMatchObject({ kind: 'action', name: 'database_query', input: 'housing' });
    });
  });

  describe('grounding', () => {
    it('should downgrade an unsupported answer to a substantive question', () => {
      const step = parseStep('Final Answer: CMPE 200.', freshTranscript(), config);

      expect(step).toMatchObject({ kind: 'malformed', reason: MalformedReason.UNGROUNDED_ANSWER });
    });

    it('should not count corrective observations as grounding', () => {
      const builder = new TranscriptBuilder('What are the prerequisites for CMPE 259?');
      builder.append({
        kind: 'observation',
        origin: ObservationOrigin.CORRECTIVE,
        text: 'Use a tool first.',
        toolName: null,
        result: null,
      });

      const step = parseStep('Final Answer: CMPE 200.', builder.snapshot(), config);

      expect(step).toMatchObject({ kind: 'malformed', reason: MalformedReason.UNGROUNDED_ANSWER });
    });

    it('should accept an answer after a tool observation', () => {
      const step = parseStep(
        'Thought: I have it.\nFinal Answer: CMPE 252 or CMPE 255 or CMPE 257.\nObservation: extra',
        groundedTranscript(),
        config,
      );

      expect(step).toEqual({
        kind: 'final_answer',
        text: 'CMPE 252 or CMPE 255 or CMPE 257.',
        thought: 'I have it.',
      });
    });

    it('should accept a direct answer to small talk', () => {
      const step = parseStep('Final Answer: Hello! How can I help?', freshTranscript('Hello there!'), config);

      expect(step).toMatchObject({ kind: 'final_answer', text: 'Hello! How can I help?' });
    });
  });

  it('should be deterministic', () => {
    const raw = 'Action: db\nAction Input: parking';
    const transcript = freshTranscript();

    expect(parseStep(raw, transcript, config)).toEqual(parseStep(raw, transcript, config));
  });
});

describe('normalizeToolName()', () => {
  it('should map aliases and separators', () => {
    expect(normalizeToolName('WebSearch')).toBe('web_search');
    expect(normalizeToolName('web-search')).toBe('web_search');
    expect(normalizeToolName('"db"')).toBe('database_query');
    expect(normalizeToolName('database_query.')).toBe('database_query');
  });

  it('should leave unknown names lower-cased', () => {
    expect(normalizeToolName('Calculator')).toBe('calculator');
  });
});
