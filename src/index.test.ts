/**
 * @fileoverview Unit tests for assistant wiring
 */

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { createAssistant, createTools } from './index.js';
import { loadSettings } from './config.js';
import { SqliteCatalogStore, seedCatalog } from './catalog/catalog-store.js';
import { parseCatalogData } from './catalog/catalog-data.js';
import { ConfigError } from './errors.js';
import { TerminationReason, type TextCompletion, type WebSearch } from './types/index.js';

function openStore(): SqliteCatalogStore {
  const db = new Database(':memory:');
  seedCatalog(db, parseCatalogData({
    courses: [{
      courseCode: 'CMPE 259',
      courseName: 'Natural Language Processing',
      prerequisites: 'CMPE 252 or CMPE 255 or CMPE 257, or instructor consent',
    }],
  }));
  return new SqliteCatalogStore(db);
}

class ScriptedCompletion implements TextCompletion {
  readonly name = 'scripted';
  private index = 0;

  constructor(private readonly replies: ReadonlyArray<string>) {}

  async complete(): Promise<string> {
    const reply = this.replies[Math.min(this.index, this.replies.length - 1)];
    this.index += 1;
    return reply;
  }
}

const webSearch: WebSearch = {
  search: async () => ({ summary: 'none', sources: [] }),
};

describe('createTools()', () => {
  it('should register only the catalog without a Tavily key', () => {
    const { registry, webSearchEnabled, store } = createTools(loadSettings({}), { store: openStore() });

    expect(registry.list().map(tool => tool.id)).toEqual(['database_query']);
    expect(webSearchEnabled).toBe(false);
    store.close();
  });

  it('should register web search when one is available', () => {
    const { registry, store } = createTools(loadSettings({}), { store: openStore(), webSearch });

    expect(registry.list().map(tool => tool.id)).toEqual(['database_query', 'web_search']);
    store.close();
  });

  it('should explain a missing catalog database', () => {
    const settings = loadSettings({ CATALOG_DB_PATH: '/nonexistent/campus-guide/catalog.db' });

    expect(() => createTools(settings)).toThrow(ConfigError);
  });
});

describe('createAssistant()', () => {
  it('should turn off the fallback without web search', () => {
    const assistant = createAssistant(loadSettings({}), {
      store: openStore(),
      completion: new ScriptedCompletion(['Final Answer: hi']),
    });

    expect(assistant.config.fallbackEnabled).toBe(false);
    expect([...assistant.config.toolNames]).toEqual(['database_query']);
    assistant.close();
  });

  it('should keep settings when web search is available', () => {
    const assistant = createAssistant(loadSettings({ MAX_ITERATIONS: '3' }), {
      store: openStore(),
      webSearch,
      completion: new ScriptedCompletion(['Final Answer: hi']),
    });

    expect(assistant.config.fallbackEnabled).toBe(true);
    expect(assistant.config.maxIterations).toBe(3);
    assistant.close();
  });

  it('should answer from the seeded catalog', async () => {
    const assistant = createAssistant(loadSettings({}), {
      store: openStore(),
      webSearch,
      completion: new ScriptedCompletion([
        'Thought: I should check the catalog.\nAction: database_query\nAction Input: CMPE 259 prerequisites',
        'Final Answer: CMPE 259 requires CMPE 252, CMPE 255 or CMPE 257, or instructor consent.',
      ]),
    });

    const result = await assistant.ask('What are the prerequisites for CMPE 259?');

    expect(result.terminationReason).toBe(TerminationReason.DONE);
    expect(result.toolInvocations).toEqual(['database_query']);
    expect(result.answerText)
      .toBe('CMPE 259 requires CMPE 252, CMPE 255 or CMPE 257, or instructor consent.');
    assistant.close();
  });

  it('should fail without an API key for a hosted provider', () => {
    expect(() => createAssistant(loadSettings({ LLM_PROVIDER: 'openai' }), { store: openStore() }))
      .toThrow('OPENAI_API_KEY is required for the openai provider');
  });
});
