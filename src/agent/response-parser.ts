/**
 * @fileoverview Response parser and grounding validator.
 *
 * Turns one raw completion into exactly one ParsedStep. Three rules apply,
 * in order:
 *
 * 1. An `Action:` marker wins over a `Final Answer:` marker wherever the two
 *    appear. Models often write a plausible observation and an answer after
 *    their action; that continuation is discarded.
 * 2. The tool name is normalized through a small alias table and must be a
 *    configured tool. The input is capped; a bare action searches for the
 *    user's question.
 * 3. A final answer is accepted only when the transcript already holds a
 *    tool observation, or when the user was making small talk.
 *
 * The function is pure: same text, transcript and config give the same step.
 *
 * @module campus-guide/agent/response-parser
 */

import type { AgentConfig } from '../types/core.types.js';
import { DATABASE_QUERY_TOOL, WEB_SEARCH_TOOL } from '../types/core.types.js';
import type { ParsedStep, Transcript } from '../types/transcript.types.js';
import { MalformedReason } from '../types/transcript.types.js';
import { countGrounding } from './transcript.js';
import { classifyQuery } from './query-classifier.js';

export const MAX_ACTION_INPUT_LENGTH = 200;

/**
 * Names models write instead of the registered tool identifiers.
 */
export const TOOL_ALIASES: Readonly<Record<string, string>> = {
  websearch: WEB_SEARCH_TOOL,
  search: WEB_SEARCH_TOOL,
  web: WEB_SEARCH_TOOL,
  database: DATABASE_QUERY_TOOL,
  databasequery: DATABASE_QUERY_TOOL,
  query: DATABASE_QUERY_TOOL,
  db: DATABASE_QUERY_TOOL,
};

const MARKERS = {
  thought: /\bThought\s*:/gi,
  action: /\bAction(?!\s*Input)\s*:/gi,
  actionInput: /\bAction\s*Input\s*:/gi,
  observation: /\bObservation\s*:/gi,
  finalAnswer: /\bFinal\s*Answer\s*:/gi,
} as const;

type MarkerName = keyof typeof MARKERS;

interface MarkerMatch {
  readonly start: number;
  readonly end: number;
}

function findMarker(text: string, name: MarkerName, from: number = 0): MarkerMatch | null {
  const pattern = new RegExp(MARKERS[name].source, MARKERS[name].flags);
  pattern.lastIndex = from;
  const match = pattern.exec(text);
  return match ? { start: match.index, end: match.index + match[0].length } : null;
}

/**
 * Start of the first marker (among `names`) at or after `from`, or the end of text.
 */
function segmentEnd(text: string, from: number, names: ReadonlyArray<MarkerName>): number {
  let end = text.length;
  for (const name of names) {
    const match = findMarker(text, name, from);
    if (match && match.start < end) {
      end = match.start;
    }
  }
  return end;
}

const ALL_MARKERS: ReadonlyArray<MarkerName> = ['thought', 'action', 'actionInput', 'observation', 'finalAnswer'];

const BRACKET_PAIRS: ReadonlyArray<readonly [string, string]> = [['[', ']'], ['(', ')'], ['{', '}']];

function stripWrapping(value: string): string {
  let result = value.trim().replace(/^["'`*]+/, '').replace(/["'`*]+$/, '').trim();

  for (const [open, close] of BRACKET_PAIRS) {
    if (result.startsWith(open) && result.endsWith(close)) {
      result = stripWrapping(result.slice(1, -1));
    }
  }

  return result;
}

/**
 * Maps what the model wrote after `Action:` to a tool identifier.
 */
export function normalizeToolName(raw: string): string {
  const name = stripWrapping(raw).toLowerCase().replace(/-/g, '_').replace(/\.+$/, '');
  return TOOL_ALIASES[name] ?? name;
}

function extractThought(text: string): string | null {
  const marker = findMarker(text, 'thought');
  if (marker) {
    const body = text.slice(marker.end, segmentEnd(text, marker.end, ALL_MARKERS)).trim();
    return body.length > 0 ? body : null;
  }

  const preamble = text.slice(0, segmentEnd(text, 0, ALL_MARKERS)).trim();
  return preamble.length > 0 ? preamble : null;
}

function cleanInput(value: string): string {
  return stripWrapping(stripWrapping(value).slice(0, MAX_ACTION_INPUT_LENGTH));
}

function parseAction(
  text: string,
  action: MarkerMatch,
  transcript: Transcript,
  config: Pick<AgentConfig, 'toolNames'>,
  thought: string | null,
): ParsedStep {
  const segment = text.slice(action.end, segmentEnd(text, action.end, ALL_MARKERS));
  const tokenMatch = /^[\s"'`[(*]*([A-Za-z_][\w.-]*)[\]"'`)*]*/.exec(segment);

  if (!tokenMatch) {
    return { kind: 'malformed', rawText: text, reason: MalformedReason.UNKNOWN_TOOL, detail: '', thought };
  }

  const name = normalizeToolName(tokenMatch[1]);
  if (!config.toolNames.has(name)) {
    return { kind: 'malformed', rawText: text, reason: MalformedReason.UNKNOWN_TOOL, detail: tokenMatch[1], thought };
  }

  const inputMarker = findMarker(text, 'actionInput', action.end);
  const written = inputMarker
    ? cleanInput(text.slice(
        inputMarker.end,
        segmentEnd(text, inputMarker.end, ['thought', 'action', 'observation', 'finalAnswer']),
      ))
    : cleanInput(segment.slice(tokenMatch[0].length));
  const input = written.length > 0 ? written : cleanInput(userQueryOf(transcript));

  if (input.length === 0) {
    return { kind: 'malformed', rawText: text, reason: MalformedReason.MISSING_INPUT, detail: name, thought };
  }

  return { kind: 'action', name, input, thought };
}

function userQueryOf(transcript: Transcript): string {
  const first = transcript.find(step => step.kind === 'user_query');
  return first ? first.text : '';
}

/**
 * Parses one completion into an action, a final answer or a malformed step.
 */
export function parseStep(
  raw: string,
  transcript: Transcript,
  config: Pick<AgentConfig, 'toolNames'>,
): ParsedStep {
  const text = raw.trim();

  if (text.length === 0) {
    return { kind: 'malformed', rawText: raw, reason: MalformedReason.EMPTY, detail: null, thought: null };
  }

  const thought = extractThought(text);

  const action = findMarker(text, 'action');
  if (action) {
    return parseAction(text, action, transcript, config, thought);
  }

  const finalAnswer = findMarker(text, 'finalAnswer');
  if (!finalAnswer) {
    return { kind: 'malformed', rawText: text, reason: MalformedReason.NO_MARKER, detail: null, thought };
  }

  const answer = text
    .slice(finalAnswer.end, segmentEnd(text, finalAnswer.end, ['thought', 'observation']))
    .trim();
  if (answer.length === 0) {
    return { kind: 'malformed', rawText: text, reason: MalformedReason.EMPTY_ANSWER, detail: null, thought };
  }

  const grounded = countGrounding(transcript) > 0
    || classifyQuery(userQueryOf(transcript)) === 'small_talk';
  if (!grounded) {
    return { kind: 'malformed', rawText: text, reason: MalformedReason.UNGROUNDED_ANSWER, detail: null, thought };
  }

  return { kind: 'final_answer', text: answer, thought };
}
