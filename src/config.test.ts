/**
 * @fileoverview Unit tests for settings loading
 */

import { describe, it, expect } from 'vitest';
import { loadSettings, toAgentConfig, toProviderConfig } from './config.js';
import { ConfigError } from './errors.js';
import { LLMProvider } from './providers/base.js';
import { Severity } from './types/core.types.js';

describe('loadSettings()', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      provider: LLMProvider.GROQ,
      model: null,
      openaiApiKey: null,
      groqApiKey: null,
      ollamaBaseUrl: 'http://localhost:11434',
      tavilyApiKey: null,
      tavilyApiUrl: 'https://api.tavily.com',
      catalogDbPath: './data/catalog.db',
      maxIterations: 5,
      fallbackEnabled: true,
      timeBudgetMs: null,
      toolTimeoutMs: 10_000,
      completionTimeoutMs: 30_000,
      searchScope: null,
      logLevel: Severity.INFO,
      temperature: 0.7,
    });
  });

  it('should parse and coerce values', () => {
    const settings = loadSettings({
      LLM_PROVIDER: 'Ollama',
      LLM_MODEL: 'llama3.2',
      MAX_ITERATIONS: '8',
      FALLBACK_ENABLED: 'no',
      TIME_BUDGET_MS: '60000',
      SEARCH_SCOPE: ' SJSU ',
      LOG_LEVEL: 'debug',
    });

    expect(settings).toMatchObject({
      provider: LLMProvider.OLLAMA,
      model: 'llama3.2',
      maxIterations: 8,
      fallbackEnabled: false,
      timeBudgetMs: 60_000,
      completionTimeoutMs: 120_000,
      searchScope: 'SJSU',
      logLevel: Severity.DEBUG,
    });
  });

  it('should treat blank variables as unset', () => {
    expect(loadSettings({ GROQ_API_KEY: '', MAX_ITERATIONS: '  ' })).toMatchObject({
      groqApiKey: null,
      maxIterations: 5,
    });
  });

  it('should list every invalid variable', () => {
    const env = { LLM_PROVIDER: 'mistral', MAX_ITERATIONS: '0', LOG_LEVEL: 'loud' };

    expect(() => loadSettings(env)).toThrow(ConfigError);
    try {
      loadSettings(env);
    } catch (error) {
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map(issue => issue.split(':')[0])).toEqual(['LLM_PROVIDER', 'MAX_ITERATIONS', 'LOG_LEVEL']);
    }
  });
});

describe('toAgentConfig()', () => {
  it('should carry run limits into a frozen config', () => {
    const config = toAgentConfig(loadSettings({ MAX_ITERATIONS: '3', SEARCH_SCOPE: 'SJSU' }), {
      fallbackEnabled: false,
    });

    expect(config.maxIterations).toBe(3);
    expect(config.searchScope).toBe('SJSU');
    expect(config.fallbackEnabled).toBe(false);
    expect([...config.toolNames]).toEqual(['database_query', 'web_search']);
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('toProviderConfig()', () => {
  it('should pick the key of the selected provider', () => {
    const settings = loadSettings({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret', GROQ_API_KEY: 'other' });

    expect(toProviderConfig(settings)).toMatchObject({
      provider: LLMProvider.OPENAI,
      apiKey: 'test-secret',
      endpoint: undefined,
    });
  });

  it('should point Ollama at the configured server', () => {
    const settings = loadSettings({ LLM_PROVIDER: 'ollama', OLLAMA_BASE_URL: 'http://gpu-box:11434' });

    expect(toProviderConfig(settings)).toMatchObject({ endpoint: 'http://gpu-box:11434', apiKey: undefined });
  });
});
