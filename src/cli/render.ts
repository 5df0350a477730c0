/**
 * @fileoverview Plain-text rendering of run results for the terminal.
 *
 * @module campus-guide/cli/render
 */

import type { RunResult } from '../types/core.types.js';
import { TerminationReason } from '../types/core.types.js';
import type { Transcript, TranscriptStep } from '../types/transcript.types.js';
import { ObservationOrigin } from '../types/transcript.types.js';

function indent(text: string): string {
  return text.split('\n').join('\n    ');
}

function renderStep(step: TranscriptStep): string {
  switch (step.kind) {
    case 'user_query':
      return `Question: ${step.text}`;
    case 'thought':
      return `Thought: ${step.text}`;
    case 'action':
      return `Action: ${step.toolName}\nAction Input: ${step.toolInput}`;
    case 'observation': {
      const label = step.origin === ObservationOrigin.TOOL ? 'Observation' : `Observation (${step.origin})`;
      return `${label}:\n    ${indent(step.text)}`;
    }
    case 'final_answer':
      return `Final Answer: ${step.text}`;
  }
}

/**
 * Renders every step, one block per step.
 */
export function renderTranscript(transcript: Transcript): string {
  return transcript.map(renderStep).join('\n');
}

/**
 * Answer text followed by its sources, if any.
 */
export function renderAnswer(result: RunResult): string {
  const lines = [result.answerText];

  if (result.citations.length > 0) {
    lines.push('', 'Sources:');
    result.citations.forEach((url, index) => lines.push(`  [${index + 1}] ${url}`));
  }

  return lines.join('\n');
}

/**
 * One-line run summary for `--show-steps`.
 */
export function renderSummary(result: RunResult): string {
  const outcome = result.terminationReason === TerminationReason.ABORTED && result.abortCause
    ? `${result.terminationReason} (${result.abortCause})`
    : result.terminationReason;
  const tools = result.toolInvocations.length > 0 ? result.toolInvocations.join(', ') : 'none';

  return `[${outcome}] ${result.iterations} iteration(s), tools: ${tools}, ${result.durationMs}ms`;
}
