/**
 * @fileoverview Decision Loop - Core execution engine of the assistant.
 *
 * The decision loop drives the Thought → Action → Observation cycle for one
 * user query. It coordinates the lifecycle controller, the text-completion
 * capability, the response parser and the tool registry, and it owns the two
 * retrieval policies:
 *
 * - A structured-lookup miss on the first tool call makes the loop run the
 *   web search itself, once, before the model gets another turn.
 * - After a structured-lookup hit, web searches requested by the model are
 *   refused and the model is told to answer from the database.
 *
 * Design Principles:
 * 1. Deterministic - Same collaborators produce the same transcript
 * 2. Observable - Every step is logged and emitted
 * 3. Bounded - One completion call per iteration, plus an optional time budget
 * 4. Contained - `runQuery` always resolves to a RunResult
 *
 * All state of a run lives in a run-local object, so one instance can serve
 * concurrent queries.
 *
 * @module campus-guide/agent/decision-loop
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { AgentConfig, RunResult, UniqueId } from '../types/core.types.js';
import {
  AbortCause,
  AgentPhase,
  Severity,
  TerminationReason,
  WEB_SEARCH_TOOL,
  createAgentConfig,
  createUniqueId,
} from '../types/core.types.js';
import type { TextCompletion, ToolResult } from '../types/capabilities.types.js';
import type { ParsedStep, TranscriptStep } from '../types/transcript.types.js';
import { ObservationOrigin } from '../types/transcript.types.js';
import { CampusGuideError, CompletionError, errorMessage } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';
import { createSilentLogger, type Logger } from '../observability/logger.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { LifecycleController } from './lifecycle.js';
import { TranscriptBuilder } from './transcript.js';
import { parseStep } from './response-parser.js';
import { buildFallbackQuery, shouldAutoFallback } from './fallback-policy.js';
import {
  AUTHORITATIVE_LOOKUP_MESSAGE,
  buildPrompt,
  correctiveMessage,
  type ConversationTurn,
} from './prompts.js';
import {
  COMPLETION_FAILURE_ANSWER,
  INTERNAL_FAILURE_ANSWER,
  buildAbortAnswer,
  formatObservation,
} from './answer-formatter.js';

/**
 * Events emitted by the decision loop.
 */
export interface DecisionLoopEvents {
  'loop:start': (sessionId: UniqueId, userText: string) => void;
  'loop:step': (sessionId: UniqueId, step: TranscriptStep) => void;
  'loop:complete': (result: RunResult) => void;
  'completion:retry': (sessionId: UniqueId, error: CompletionError) => void;
  'fallback:triggered': (sessionId: UniqueId, query: string) => void;
}

/**
 * Collaborators of the decision loop.
 */
export interface DecisionLoopDependencies {
  readonly completion: TextCompletion;
  readonly registry: ToolRegistry;
  readonly logger?: Logger;
  /** Clock used for the time budget and durations */
  readonly now?: () => number;
}

/**
 * Per-call options of `runQuery`.
 */
export interface RunOptions {
  /** Previous exchange, for follow-up questions */
  readonly context?: ReadonlyArray<ConversationTurn>;
  readonly sessionId?: UniqueId;
}

/**
 * Total completion attempts per iteration: the first call and one retry.
 */
export const MAX_COMPLETION_ATTEMPTS = 2;

interface RunState {
  readonly sessionId: UniqueId;
  readonly config: AgentConfig;
  readonly transcript: TranscriptBuilder;
  readonly lifecycle: LifecycleController;
  readonly logger: Logger;
  readonly context: ReadonlyArray<ConversationTurn>;
  readonly startedAt: number;
  iterations: number;
  fallbackUsed: boolean;
  readonly toolInvocations: string[];
}

/**
 * The reasoning controller.
 *
 * @example
 * ```typescript
 * const loop = new DecisionLoop({ completion: provider, registry });
 * const result = await loop.runQuery('What are the prerequisites for CMPE 259?', createAgentConfig());
 * console.log(result.answerText, result.citations);
 * ```
 */
export class DecisionLoop extends EventEmitter<DecisionLoopEvents> {
  private readonly completion: TextCompletion;
  private readonly registry: ToolRegistry;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(dependencies: DecisionLoopDependencies) {
    super();
    this.completion = dependencies.completion;
    this.registry = dependencies.registry;
    this.logger = (dependencies.logger ?? createSilentLogger()).child({ module: 'agent.decision-loop' });
    this.now = dependencies.now ?? Date.now;
  }

  /**
   * Answers one user query. Never rejects.
   */
  async runQuery(userText: string, config: AgentConfig, options: RunOptions = {}): Promise<RunResult> {
    const sessionId = options.sessionId ?? createUniqueId(uuidv4());
    const state: RunState = {
      sessionId,
      config,
      transcript: new TranscriptBuilder(userText),
      lifecycle: new LifecycleController(),
      logger: this.logger.child({ sessionId }),
      context: options.context ?? [],
      startedAt: this.now(),
      iterations: 0,
      fallbackUsed: false,
      toolInvocations: [],
    };

    state.lifecycle.on('transition', (from, to, reason) => {
      state.logger.debug('Phase transition', { from, to, reason });
    });

    this.emit('loop:start', sessionId, userText);
    this.emit('loop:step', sessionId, { kind: 'user_query', text: userText });
    state.logger.info('Run started', { query: userText, maxIterations: config.maxIterations });

    try {
      createAgentConfig(config);
      state.lifecycle.transition(AgentPhase.REASONING, 'User query recorded');

      for (;;) {
        const abortCause = this.checkLimits(state);
        if (abortCause) {
          return this.abort(state, abortCause);
        }

        state.iterations += 1;
        state.logger.debug('Iteration started', { iteration: state.iterations });

        let raw: string;
        try {
          raw = await this.complete(state);
        } catch (error) {
          return this.fail(state, error);
        }

        const parsed = parseStep(raw, state.transcript.snapshot(), state.config);
        state.logger.debug('Parsed step', { iteration: state.iterations, kind: parsed.kind });

        if (parsed.kind === 'final_answer') {
          return this.accept(state, parsed.text, parsed.thought);
        }

        if (parsed.kind === 'malformed') {
          this.correct(state, parsed);
          continue;
        }

        await this.dispatch(state, parsed.name, parsed.input, parsed.thought);
      }
    } catch (error) {
      return this.fail(state, error);
    }
  }

  // ============ Phase Execution Methods ============

  private checkLimits(state: RunState): AbortCause | null {
    if (state.iterations >= state.config.maxIterations) {
      return AbortCause.ITERATION_LIMIT;
    }

    const { timeBudgetMs } = state.config;
    if (timeBudgetMs !== null && this.now() - state.startedAt >= timeBudgetMs) {
      return AbortCause.TIME_BUDGET;
    }

    return null;
  }

  private async complete(state: RunState): Promise<string> {
    const prompt = buildPrompt({
      tools: this.registry.list(),
      transcript: state.transcript.snapshot(),
      context: state.context,
      institution: state.config.searchScope,
    });

    for (let attempt = 1; ; attempt++) {
      try {
        return await withTimeout(
          `Completion from ${this.completion.name}`,
          state.config.completionTimeoutMs,
          signal => this.completion.complete(prompt, { signal }),
        );
      } catch (error) {
        const completionError = toCompletionError(this.completion.name, error);

        if (attempt >= MAX_COMPLETION_ATTEMPTS || !completionError.retryable) {
          throw completionError;
        }

        state.logger.warn('Completion failed, retrying', { attempt }, completionError);
        this.emit('completion:retry', state.sessionId, completionError);
      }
    }
  }

  private correct(state: RunState, parsed: Extract<ParsedStep, { kind: 'malformed' }>): void {
    state.logger.info('Malformed step', { reason: parsed.reason, detail: parsed.detail });

    this.record(state, {
      kind: 'observation',
      origin: ObservationOrigin.CORRECTIVE,
      text: correctiveMessage(parsed.reason, parsed.detail, state.config.toolNames),
      toolName: null,
      result: null,
    });
    state.lifecycle.transition(AgentPhase.REASONING, `Malformed step: ${parsed.reason}`);
  }

  private async dispatch(state: RunState, toolName: string, input: string, thought: string | null): Promise<void> {
    if (thought) {
      this.record(state, { kind: 'thought', text: thought });
    }
    this.record(state, { kind: 'action', toolName, toolInput: input });
    state.lifecycle.transition(AgentPhase.TOOL_DISPATCH, `Action: ${toolName}`);

    if (!this.registry.has(toolName)) {
      this.record(state, {
        kind: 'observation',
        origin: ObservationOrigin.DISPATCH_ERROR,
        text: `Error: tool "${toolName}" is not available.`,
        toolName: null,
        result: null,
      });
    } else if (toolName === WEB_SEARCH_TOOL && state.transcript.hasAuthoritativeLookup()) {
      state.logger.info('Web search withheld after database hit');
      this.record(state, {
        kind: 'observation',
        origin: ObservationOrigin.DISPATCH_ERROR,
        text: AUTHORITATIVE_LOOKUP_MESSAGE,
        toolName: null,
        result: null,
      });
    } else {
      const priorInvocations = state.toolInvocations.length;
      const result = await this.invokeTool(state, toolName, input, ObservationOrigin.TOOL);

      const fallback = shouldAutoFallback(state.config, {
        toolName,
        result,
        priorInvocations,
        fallbackUsed: state.fallbackUsed,
      });
      if (fallback && this.registry.has(WEB_SEARCH_TOOL)) {
        await this.runFallback(state);
      }
    }

    state.lifecycle.transition(AgentPhase.REASONING, 'Observation recorded');
  }

  private async runFallback(state: RunState): Promise<void> {
    const query = buildFallbackQuery(state.transcript.userQuery, state.config.searchScope);
    state.fallbackUsed = true;

    state.logger.info('Structured lookup missed, searching the web', { query });
    this.emit('fallback:triggered', state.sessionId, query);

    this.record(state, {
      kind: 'thought',
      text: 'The database has no matching record, so I will search the web.',
    });
    this.record(state, { kind: 'action', toolName: WEB_SEARCH_TOOL, toolInput: query });
    await this.invokeTool(state, WEB_SEARCH_TOOL, query, ObservationOrigin.FALLBACK);
  }

  private async invokeTool(
    state: RunState,
    toolName: string,
    input: string,
    origin: ObservationOrigin.TOOL | ObservationOrigin.FALLBACK,
  ): Promise<ToolResult | null> {
    state.toolInvocations.push(toolName);

    const execution = await this.registry.invoke({
      toolId: toolName,
      input,
      sessionId: state.sessionId,
      timeoutMs: state.config.toolTimeoutMs,
    });

    if (execution.result) {
      state.logger.debug('Tool completed', {
        toolName,
        found: execution.result.found,
        durationMs: execution.durationMs,
      });
    }

    const text = execution.result
      ? formatObservation(execution.result)
      : `Error executing ${toolName}: ${execution.error?.message ?? 'unknown error'}`;

    this.record(state, {
      kind: 'observation',
      origin,
      text,
      toolName,
      result: execution.result,
    });

    return execution.result;
  }

  // ============ Termination ============

  private accept(state: RunState, answer: string, thought: string | null): RunResult {
    if (thought) {
      this.record(state, { kind: 'thought', text: thought });
    }
    this.record(state, { kind: 'final_answer', text: answer });
    state.lifecycle.complete('Grounded final answer accepted');

    return this.finish(state, {
      answerText: answer,
      terminationReason: TerminationReason.DONE,
      abortCause: null,
      error: null,
    });
  }

  private abort(state: RunState, cause: AbortCause): RunResult {
    state.logger.warn('Run aborted', { cause, iterations: state.iterations });
    state.lifecycle.abort(`Limit reached: ${cause}`);

    return this.finish(state, {
      answerText: buildAbortAnswer(cause, state.transcript.bestObservation()),
      terminationReason: TerminationReason.ABORTED,
      abortCause: cause,
      error: null,
    });
  }

  private fail(state: RunState, error: unknown): RunResult {
    const code = error instanceof CampusGuideError ? error.code : 'INTERNAL_ERROR';
    const message = errorMessage(error);

    state.logger.error(
      'Run failed',
      { code, phase: state.lifecycle.getCurrentPhase() },
      error instanceof Error ? error : undefined,
    );
    state.lifecycle.fail(message);

    return this.finish(state, {
      answerText: error instanceof CompletionError ? COMPLETION_FAILURE_ANSWER : INTERNAL_FAILURE_ANSWER,
      terminationReason: TerminationReason.ERROR,
      abortCause: null,
      error: { code, message },
    });
  }

  private finish(
    state: RunState,
    outcome: Pick<RunResult, 'answerText' | 'terminationReason' | 'abortCause' | 'error'>,
  ): RunResult {
    const result: RunResult = {
      sessionId: state.sessionId,
      ...outcome,
      citations: state.transcript.citations(),
      transcript: state.transcript.snapshot(),
      iterations: state.iterations,
      toolInvocations: [...state.toolInvocations],
      durationMs: this.now() - state.startedAt,
    };

    state.logger.withMetrics(
      outcome.terminationReason === TerminationReason.DONE ? Severity.INFO : Severity.WARN,
      'Run finished',
      { durationMs: result.durationMs, custom: { iterations: result.iterations } },
      {
        terminationReason: result.terminationReason,
        tools: result.toolInvocations,
        phases: state.lifecycle.phases(),
      },
    );
    this.emit('loop:complete', result);

    return result;
  }

  private record(state: RunState, step: TranscriptStep): void {
    state.transcript.append(step);
    this.emit('loop:step', state.sessionId, step);
  }
}

function toCompletionError(provider: string, error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }
  const code = error instanceof CampusGuideError ? error.code : 'COMPLETION_FAILED';
  return new CompletionError(provider, errorMessage(error), { code, cause: error });
}
