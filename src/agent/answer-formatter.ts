/**
 * @fileoverview Rendering of tool results for the model and for the user.
 *
 * `formatObservation` produces the text appended to the transcript after a
 * dispatch. `formatResultAsAnswer` and `buildAbortAnswer` produce the
 * best-effort answer of a run that hit a limit: they only ever restate what
 * a tool returned.
 *
 * @module campus-guide/agent/answer-formatter
 */

import type { LookupRecord, ToolResult, WebSource } from '../types/capabilities.types.js';
import type { ObservationStep } from '../types/transcript.types.js';
import { AbortCause } from '../types/core.types.js';

const MOST_RELEVANT_MARKER = '>>> MOST RELEVANT ANSWER >>>';
const MAX_ANSWER_RECORDS = 3;
const MAX_FALLBACK_LENGTH = 500;

function recordContent(record: LookupRecord): string {
  const { content } = record.fields;
  if (content !== undefined && content.length > 0) {
    return content;
  }

  return Object.entries(record.fields)
    .filter(([key]) => key !== 'category' && key !== 'source' && key !== 'score')
    .map(([key, value]) => `${key}: ${value}`)
    .join('\n');
}

function formatRecords(records: ReadonlyArray<LookupRecord>): string {
  return records
    .map((record, index) => {
      const prefix = index === 0 ? `${MOST_RELEVANT_MARKER} ` : '';
      const category = record.fields.category ?? 'general';
      const score = record.fields.score !== undefined ? ` (relevance: ${record.fields.score})` : '';
      return `${prefix}Result ${index + 1} [${category}]${score}:\n${recordContent(record)}`;
    })
    .join('\n\n');
}

function formatSources(sources: ReadonlyArray<WebSource>): string {
  return sources
    .map((source, index) =>
      `Result ${index + 1}:\nTitle: ${source.title}\nURL: ${source.url}\nContent: ${source.snippet}`)
    .join('\n\n');
}

/**
 * Text of the observation the model sees after a tool ran.
 */
export function formatObservation(result: ToolResult): string {
  switch (result.payload.kind) {
    case 'records':
      return formatRecords(result.payload.records);
    case 'web': {
      const parts: string[] = [];
      if (result.payload.summary.length > 0) {
        parts.push(`Summary: ${result.payload.summary}`);
      }
      if (result.payload.sources.length > 0) {
        parts.push(formatSources(result.payload.sources));
      }
      return parts.length > 0 ? parts.join('\n\n') : 'The web search returned no results.';
    }
    case 'message':
      return result.payload.text;
  }
}

function recordAsSentence(record: LookupRecord): string {
  const { fields } = record;

  if (fields.source === 'prerequisites' && fields.course_code && fields.prerequisites) {
    const name = fields.course_name ? ` (${fields.course_name})` : '';
    return `The prerequisites for ${fields.course_code}${name} are: ${fields.prerequisites}`;
  }

  if (fields.source === 'faqs' && fields.answer) {
    return fields.answer;
  }

  return recordContent(record);
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength).trimEnd()}...` : text;
}

/**
 * Restates a tool result as a readable answer, without adding anything.
 */
export function formatResultAsAnswer(result: ToolResult): string {
  switch (result.payload.kind) {
    case 'records': {
      const sentences = result.payload.records.slice(0, MAX_ANSWER_RECORDS).map(recordAsSentence);
      return sentences.length === 1
        ? sentences[0]
        : sentences.map(sentence => `• ${sentence}`).join('\n');
    }
    case 'web': {
      const [first] = result.payload.sources;
      const body = result.payload.summary.length > 0
        ? result.payload.summary
        : truncate(first?.snippet ?? '', MAX_FALLBACK_LENGTH);
      return first ? `${body}\n\nSource: ${first.url}` : body;
    }
    case 'message':
      return result.payload.text;
  }
}

function limitDescription(cause: AbortCause): string {
  return cause === AbortCause.TIME_BUDGET ? 'time limit' : 'reasoning step limit';
}

/**
 * Answer of a run that reached its iteration or time limit.
 */
export function buildAbortAnswer(cause: AbortCause, best: ObservationStep | null): string {
  const disclosure = `I reached my ${limitDescription(cause)} before I could finish answering.`;

  if (best?.result && best.result.found) {
    return `${disclosure} Here is the most relevant information I found:\n\n${formatResultAsAnswer(best.result)}`;
  }

  if (best) {
    return `${disclosure} The last thing I found was:\n\n${truncate(best.text, MAX_FALLBACK_LENGTH)}`;
  }

  return `${disclosure} I could not find information to answer this question. `
    + 'Please check the university website or contact the relevant office.';
}

/**
 * Answer of a run whose text-completion backend failed.
 */
export const COMPLETION_FAILURE_ANSWER =
  'Sorry, I could not answer your question because the language model is unavailable right now. '
  + 'Please try again later.';

/**
 * Answer of a run that failed for any other reason.
 */
export const INTERNAL_FAILURE_ANSWER =
  'Sorry, I could not answer your question because of an internal error. Please try again later.';
