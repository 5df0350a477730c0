/**
 * @fileoverview Unit tests for conversation sessions
 */

import { describe, it, expect } from 'vitest';
import { ConversationSession } from './conversation.js';
import { DecisionLoop } from '../agent/decision-loop.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { createAgentConfig, type TextCompletion } from '../types/index.js';

class EchoCompletion implements TextCompletion {
  readonly name = 'echo';
  readonly prompts: string[] = [];

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return `Final Answer: reply ${this.prompts.length}`;
  }
}

describe('ConversationSession', () => {
  function setup(maxExchanges?: number) {
    const completion = new EchoCompletion();
    const loop = new DecisionLoop({ completion, registry: new ToolRegistry() });
    const session = new ConversationSession(loop, createAgentConfig(), { maxExchanges });
    return { completion, session };
  }

  it('should start without context', async () => {
    const { completion, session } = setup();

    await session.ask('Hello');

    expect(completion.prompts[0]).not.toContain('Recent conversation for context');
  });

  it('should pass the previous exchange to the next query', async () => {
    const { completion, session } = setup();

    await session.ask('Hello');
    await session.ask('Thanks');

    expect(completion.prompts[1]).toContain('Recent conversation for context:\nUser: Hello\nAssistant: reply 1\n');
    expect(session.queriesAnswered).toBe(2);
  });

  it('should keep only the most recent exchanges', async () => {
    const { session } = setup();

    await session.ask('Hello');
    await session.ask('Thanks');

    expect(session.context()).toEqual([
      { role: 'user', content: 'Thanks' },
      { role: 'assistant', content: 'reply 2' },
    ]);
  });

  it('should forget context on reset', async () => {
    const { session } = setup(2);

    await session.ask('Hello');
    session.reset();

    expect(session.context()).toEqual([]);
  });
});
