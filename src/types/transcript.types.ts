/**
 * @fileoverview Transcript and parsed-step types.
 *
 * A transcript is the ordered record of one query's reasoning: the user
 * query, the model's thoughts and actions, the observations fed back to it
 * and the final answer. It is append-only while a run is in progress.
 *
 * @module campus-guide/types/transcript
 */

import type { ToolResult } from './capabilities.types.js';

/**
 * Where an observation came from.
 *
 * Only `TOOL` and `FALLBACK` observations ground a final answer.
 */
export enum ObservationOrigin {
  /** Output of a tool the model asked for */
  TOOL = 'tool',

  /** Output of the web search the controller invoked after a lookup miss */
  FALLBACK = 'fallback',

  /** Instruction sent back after a malformed or ungrounded step */
  CORRECTIVE = 'corrective',

  /** Unknown tool, or a dispatch the controller refused */
  DISPATCH_ERROR = 'dispatch_error',
}

export interface UserQueryStep {
  readonly kind: 'user_query';
  readonly text: string;
}

export interface ThoughtStep {
  readonly kind: 'thought';
  readonly text: string;
}

export interface ActionStep {
  readonly kind: 'action';
  readonly toolName: string;
  readonly toolInput: string;
}

export interface ObservationStep {
  readonly kind: 'observation';
  readonly origin: ObservationOrigin;
  readonly text: string;
  /** Tool that produced this observation, for TOOL and FALLBACK origins */
  readonly toolName: string | null;
  /** Normalized tool output, when the tool succeeded */
  readonly result: ToolResult | null;
}

export interface FinalAnswerStep {
  readonly kind: 'final_answer';
  readonly text: string;
}

export type TranscriptStep =
  | UserQueryStep
  | ThoughtStep
  | ActionStep
  | ObservationStep
  | FinalAnswerStep;

export type Transcript = ReadonlyArray<TranscriptStep>;

/**
 * Why the parser rejected a completion.
 */
export enum MalformedReason {
  EMPTY = 'empty',
  NO_MARKER = 'no_marker',
  UNKNOWN_TOOL = 'unknown_tool',
  MISSING_INPUT = 'missing_input',
  EMPTY_ANSWER = 'empty_answer',
  UNGROUNDED_ANSWER = 'ungrounded_answer',
}

/**
 * Result of parsing one completion. Exactly one variant per completion.
 */
export type ParsedStep =
  | {
      readonly kind: 'action';
      readonly name: string;
      readonly input: string;
      readonly thought: string | null;
    }
  | {
      readonly kind: 'final_answer';
      readonly text: string;
      readonly thought: string | null;
    }
  | {
      readonly kind: 'malformed';
      readonly rawText: string;
      readonly reason: MalformedReason;
      /** Offending detail, e.g. the unrecognized tool name */
      readonly detail: string | null;
      readonly thought: string | null;
    };
