/**
 * @fileoverview Run Lifecycle Controller - Manages reasoning-run phase transitions.
 *
 * The lifecycle controller enforces the run state machine, ensuring
 * valid transitions and providing hooks for observability. It is the
 * authoritative source for "what phase is this run in?"
 *
 * State Machine:
 * ```
 *                 ┌──────────────┐
 *                 │              │ (malformed step)
 *                 ▼              │
 *   START ──► REASONING ─────────┘
 *               │   ▲
 *    (action)   ▼   │ (observation)
 *            TOOL_DISPATCH
 *
 *   REASONING ──► DONE      (grounded final answer)
 *   REASONING ──► ABORTED   (iteration or time limit)
 *   any non-terminal ──► FAILED (completion failed after retry)
 * ```
 *
 * One controller is created per run and never shared.
 *
 * @module campus-guide/agent/lifecycle
 */

import { EventEmitter } from 'eventemitter3';
import { AgentPhase } from '../types/core.types.js';
import { CampusGuideError } from '../errors.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'transition': (from: AgentPhase, to: AgentPhase, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

/**
 * Error during lifecycle operations.
 */
export interface LifecycleError {
  readonly code: 'TERMINAL_STATE' | 'INVALID_TRANSITION';
  readonly message: string;
  readonly phase: AgentPhase;
  readonly attemptedTransition: AgentPhase;
}

/**
 * Valid transitions from each phase.
 * This is the authoritative definition of the state machine.
 */
const VALID_TRANSITIONS: ReadonlyMap<AgentPhase, ReadonlyArray<AgentPhase>> = new Map([
  [AgentPhase.START, [AgentPhase.REASONING, AgentPhase.FAILED]],
  [AgentPhase.REASONING, [
    AgentPhase.TOOL_DISPATCH,
    AgentPhase.REASONING,
    AgentPhase.DONE,
    AgentPhase.ABORTED,
    AgentPhase.FAILED,
  ]],
  [AgentPhase.TOOL_DISPATCH, [AgentPhase.REASONING, AgentPhase.ABORTED, AgentPhase.FAILED]],
  [AgentPhase.DONE, []],
  [AgentPhase.ABORTED, []],
  [AgentPhase.FAILED, []],
]);

/**
 * Terminal phases that cannot transition to other phases.
 */
const TERMINAL_PHASES: ReadonlySet<AgentPhase> = new Set([
  AgentPhase.DONE,
  AgentPhase.ABORTED,
  AgentPhase.FAILED,
]);

/**
 * Manages run lifecycle and state transitions.
 *
 * The controller ensures:
 * 1. Only valid transitions occur
 * 2. Visited phases are recorded in order
 * 3. Terminal states are respected
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController();
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug('Phase change', { from, to, reason });
 * });
 *
 * lifecycle.transition(AgentPhase.REASONING, 'User query recorded');
 * lifecycle.transition(AgentPhase.TOOL_DISPATCH, 'Action: database_query');
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private currentPhase: AgentPhase;
  private readonly visited: AgentPhase[];

  constructor() {
    super();
    this.currentPhase = AgentPhase.START;
    this.visited = [AgentPhase.START];
  }

  getCurrentPhase(): AgentPhase {
    return this.currentPhase;
  }

  /**
   * Every phase entered so far, the current one last.
   */
  phases(): ReadonlyArray<AgentPhase> {
    return [...this.visited];
  }

  isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.currentPhase);
  }

  /**
   * Checks if a transition to the target phase is valid.
   */
  canTransition(targetPhase: AgentPhase): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase);
    return validTargets !== undefined && validTargets.includes(targetPhase);
  }

  /**
   * Transitions to a new phase.
   *
   * @throws CampusGuideError if the transition is invalid
   */
  transition(targetPhase: AgentPhase, reason: string): void {
    if (this.isTerminal()) {
      this.reject('TERMINAL_STATE', `Cannot transition from terminal state '${this.currentPhase}'`, targetPhase);
    }

    if (!this.canTransition(targetPhase)) {
      this.reject('INVALID_TRANSITION', `Invalid transition: '${this.currentPhase}' → '${targetPhase}'`, targetPhase);
    }

    this.moveTo(targetPhase, reason);
  }

  /**
   * Forces a transition to FAILED from any non-terminal state.
   */
  fail(reason: string): void {
    if (this.isTerminal()) {
      return;
    }
    this.moveTo(AgentPhase.FAILED, reason);
  }

  /**
   * Ends the run with an accepted final answer.
   */
  complete(reason: string): void {
    this.transition(AgentPhase.DONE, reason);
  }

  /**
   * Ends the run because a limit was reached.
   */
  abort(reason: string): void {
    this.transition(AgentPhase.ABORTED, reason);
  }

  // ============ Private Methods ============

  private reject(code: LifecycleError['code'], message: string, targetPhase: AgentPhase): never {
    const error: LifecycleError = {
      code,
      message,
      phase: this.currentPhase,
      attemptedTransition: targetPhase,
    };
    this.emit('error', error);
    throw new CampusGuideError(code, message);
  }

  private moveTo(targetPhase: AgentPhase, reason: string): void {
    const from = this.currentPhase;
    this.currentPhase = targetPhase;
    this.visited.push(targetPhase);

    this.emit('transition', from, targetPhase, reason);
  }
}
