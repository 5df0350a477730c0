/**
 * @fileoverview Conversation session for follow-up questions.
 *
 * The decision loop keeps nothing between queries. A session remembers the
 * last exchange and hands it to the next run as prompt context, so "what
 * about its prerequisites?" can resolve against the previous answer.
 *
 * @module campus-guide/session/conversation
 */

import { v4 as uuidv4 } from 'uuid';
import type { AgentConfig, RunResult, UniqueId } from '../types/core.types.js';
import { createUniqueId } from '../types/core.types.js';
import type { DecisionLoop } from '../agent/decision-loop.js';
import type { ConversationTurn } from '../agent/prompts.js';

export interface ConversationSessionOptions {
  /** Exchanges (question plus answer) passed as context; default 1 */
  readonly maxExchanges?: number;
}

/**
 * Runs queries against a decision loop with rolling conversation context.
 *
 * @example
 * ```typescript
 * const session = new ConversationSession(loop, config);
 * await session.ask('What are the prerequisites for CMPE 259?');
 * await session.ask('And how many units is it?');
 * ```
 */
export class ConversationSession {
  readonly id: UniqueId;
  private readonly maxTurns: number;
  private turns: ConversationTurn[] = [];
  private runCount = 0;

  constructor(
    private readonly loop: DecisionLoop,
    private readonly config: AgentConfig,
    options: ConversationSessionOptions = {},
  ) {
    this.id = createUniqueId(uuidv4());
    this.maxTurns = 2 * (options.maxExchanges ?? 1);
  }

  /**
   * Answers `userText` with the recent exchange as context and records it.
   */
  async ask(userText: string): Promise<RunResult> {
    const result = await this.loop.runQuery(userText, this.config, { context: this.context() });
    this.runCount += 1;

    this.turns.push({ role: 'user', content: userText }, { role: 'assistant', content: result.answerText });
    if (this.turns.length > this.maxTurns) {
      this.turns = this.turns.slice(-this.maxTurns);
    }

    return result;
  }

  context(): ReadonlyArray<ConversationTurn> {
    return [...this.turns];
  }

  get queriesAnswered(): number {
    return this.runCount;
  }

  reset(): void {
    this.turns = [];
  }
}
