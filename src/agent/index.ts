/**
 * @fileoverview Agent module public exports.
 *
 * @module campus-guide/agent
 */

export {
  LifecycleController,
  type LifecycleEvents,
  type LifecycleError,
} from './lifecycle.js';

export {
  DecisionLoop,
  MAX_COMPLETION_ATTEMPTS,
  type DecisionLoopEvents,
  type DecisionLoopDependencies,
  type RunOptions,
} from './decision-loop.js';

export {
  TranscriptBuilder,
  collectCitations,
  countGrounding,
  isGroundingObservation,
} from './transcript.js';

export {
  parseStep,
  normalizeToolName,
  MAX_ACTION_INPUT_LENGTH,
  TOOL_ALIASES,
} from './response-parser.js';

export { classifyQuery, type QueryClass } from './query-classifier.js';
export { buildFallbackQuery, isLocationQuery, shouldAutoFallback, type FallbackCheck } from './fallback-policy.js';
export {
  buildPrompt,
  buildSystemPrompt,
  correctiveMessage,
  AUTHORITATIVE_LOOKUP_MESSAGE,
  MAX_CONTEXT_TURN_LENGTH,
  type ConversationTurn,
  type PromptInput,
} from './prompts.js';
export {
  formatObservation,
  formatResultAsAnswer,
  buildAbortAnswer,
  COMPLETION_FAILURE_ANSWER,
  INTERNAL_FAILURE_ANSWER,
} from './answer-formatter.js';
