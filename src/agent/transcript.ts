/**
 * @fileoverview Append-only transcript of a single run.
 *
 * @module campus-guide/agent/transcript
 */

import type {
  ObservationStep,
  Transcript,
  TranscriptStep,
} from '../types/transcript.types.js';
import { ObservationOrigin } from '../types/transcript.types.js';
import { ToolSource } from '../types/capabilities.types.js';

const GROUNDING_ORIGINS: ReadonlySet<ObservationOrigin> = new Set([
  ObservationOrigin.TOOL,
  ObservationOrigin.FALLBACK,
]);

/**
 * True for observations produced by a consulted tool.
 */
export function isGroundingObservation(step: TranscriptStep): step is ObservationStep {
  return step.kind === 'observation' && GROUNDING_ORIGINS.has(step.origin);
}

/**
 * Number of grounding observations in a transcript.
 */
export function countGrounding(transcript: Transcript): number {
  return transcript.filter(isGroundingObservation).length;
}

/**
 * Ordered, de-duplicated citations of every grounding observation.
 */
export function collectCitations(transcript: Transcript): ReadonlyArray<string> {
  const seen = new Set<string>();

  for (const step of transcript) {
    if (isGroundingObservation(step) && step.result) {
      for (const url of step.result.citations) {
        seen.add(url);
      }
    }
  }

  return [...seen];
}

/**
 * Owns the steps of one run. Steps can be added but never changed.
 */
export class TranscriptBuilder {
  private readonly steps: TranscriptStep[] = [];

  constructor(readonly userQuery: string) {
    this.steps.push({ kind: 'user_query', text: userQuery });
  }

  append(step: TranscriptStep): void {
    this.steps.push(step);
  }

  /**
   * Frozen copy of the steps so far.
   */
  snapshot(): Transcript {
    return Object.freeze([...this.steps]);
  }

  citations(): ReadonlyArray<string> {
    return collectCitations(this.steps);
  }

  /**
   * Whether a structured lookup in this run found records.
   */
  hasAuthoritativeLookup(): boolean {
    return this.steps.some(step =>
      isGroundingObservation(step)
      && step.result !== null
      && step.result.source === ToolSource.STRUCTURED_LOOKUP
      && step.result.found);
  }

  /**
   * The most useful grounding observation for a best-effort answer:
   * the latest one that found something, else the latest one at all.
   */
  bestObservation(): ObservationStep | null {
    const grounding = this.steps.filter(isGroundingObservation);
    const found = grounding.filter(step => step.result?.found === true);
    return found.at(-1) ?? grounding.at(-1) ?? null;
  }
}
