/**
 * @fileoverview Process-level settings read from the environment.
 *
 * Settings are loaded once (CLI start-up or `createAssistant`) and turned into
 * the frozen per-run `AgentConfig` and the provider configuration. Blank
 * variables count as unset, so an `.env` copied from `.env.example` works
 * before every key is filled in.
 *
 * @module campus-guide/config
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { Severity, createAgentConfig, type AgentConfig } from './types/core.types.js';
import { LLMProvider, PROVIDER_DEFAULTS, type ProviderConfig } from './providers/base.js';
import { DEFAULT_TAVILY_API_URL } from './search/tavily.js';
import { parseSeverity, type Logger } from './observability/logger.js';

export type Environment = Readonly<Record<string, string | undefined>>;

const positiveInt = z.coerce.number().int().positive();

const booleanFlag = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform(value => ['true', '1', 'yes', 'on'].includes(value));

const severity = z.string().transform((value, ctx) => {
  const level = parseSeverity(value);
  if (level === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level "${value}"` });
    return z.NEVER;
  }
  return level;
});

const EnvironmentSchema = z.object({
  LLM_PROVIDER: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.nativeEnum(LLMProvider),
  ).default(LLMProvider.GROQ),
  LLM_MODEL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GROQ_API_KEY: z.string().optional(),
  OLLAMA_BASE_URL: z.string().url().default(PROVIDER_DEFAULTS[LLMProvider.OLLAMA].endpoint),
  TAVILY_API_KEY: z.string().optional(),
  TAVILY_API_URL: z.string().url().default(DEFAULT_TAVILY_API_URL),
  CATALOG_DB_PATH: z.string().default('./data/catalog.db'),
  MAX_ITERATIONS: positiveInt.default(5),
  FALLBACK_ENABLED: booleanFlag.default('true'),
  TIME_BUDGET_MS: positiveInt.optional(),
  TOOL_TIMEOUT_MS: positiveInt.default(10_000),
  COMPLETION_TIMEOUT_MS: positiveInt.optional(),
  SEARCH_SCOPE: z.string().optional(),
  LOG_LEVEL: severity.default('INFO'),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
});

/**
 * Typed, validated settings.
 */
export interface Settings {
  readonly provider: LLMProvider;
  readonly model: string | null;
  readonly openaiApiKey: string | null;
  readonly groqApiKey: string | null;
  readonly ollamaBaseUrl: string;
  readonly tavilyApiKey: string | null;
  readonly tavilyApiUrl: string;
  readonly catalogDbPath: string;
  readonly maxIterations: number;
  readonly fallbackEnabled: boolean;
  readonly timeBudgetMs: number | null;
  readonly toolTimeoutMs: number;
  readonly completionTimeoutMs: number;
  readonly searchScope: string | null;
  readonly logLevel: Severity;
  readonly temperature: number;
}

function withoutBlanks(env: Environment): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Loads `.env` into `process.env` without overriding variables already set.
 */
export function loadEnvironmentFile(path?: string): void {
  dotenv.config(path === undefined ? {} : { path });
}

/**
 * Validates environment variables into Settings.
 *
 * @throws {ConfigError} listing every offending variable
 */
export function loadSettings(env: Environment = process.env): Settings {
  const parsed = EnvironmentSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid settings: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return Object.freeze({
    provider: values.LLM_PROVIDER,
    model: values.LLM_MODEL ?? null,
    openaiApiKey: values.OPENAI_API_KEY ?? null,
    groqApiKey: values.GROQ_API_KEY ?? null,
    ollamaBaseUrl: values.OLLAMA_BASE_URL,
    tavilyApiKey: values.TAVILY_API_KEY ?? null,
    tavilyApiUrl: values.TAVILY_API_URL,
    catalogDbPath: values.CATALOG_DB_PATH,
    maxIterations: values.MAX_ITERATIONS,
    fallbackEnabled: values.FALLBACK_ENABLED,
    timeBudgetMs: values.TIME_BUDGET_MS ?? null,
    toolTimeoutMs: values.TOOL_TIMEOUT_MS,
    completionTimeoutMs: values.COMPLETION_TIMEOUT_MS
      ?? PROVIDER_DEFAULTS[values.LLM_PROVIDER].completionTimeoutMs,
    searchScope: values.SEARCH_SCOPE ?? null,
    logLevel: values.LOG_LEVEL,
    temperature: values.TEMPERATURE,
  });
}

/**
 * Per-run controller configuration derived from settings.
 */
export function toAgentConfig(settings: Settings, overrides: Partial<AgentConfig> = {}): Readonly<AgentConfig> {
  return createAgentConfig({
    maxIterations: settings.maxIterations,
    fallbackEnabled: settings.fallbackEnabled,
    timeBudgetMs: settings.timeBudgetMs,
    toolTimeoutMs: settings.toolTimeoutMs,
    completionTimeoutMs: settings.completionTimeoutMs,
    searchScope: settings.searchScope,
    ...overrides,
  });
}

/**
 * Provider configuration for the selected LLM backend.
 */
export function toProviderConfig(settings: Settings, logger?: Logger): ProviderConfig {
  const apiKeys: Record<LLMProvider, string | null> = {
    [LLMProvider.OPENAI]: settings.openaiApiKey,
    [LLMProvider.GROQ]: settings.groqApiKey,
    [LLMProvider.OLLAMA]: null,
  };

  return {
    provider: settings.provider,
    model: settings.model ?? undefined,
    apiKey: apiKeys[settings.provider] ?? undefined,
    endpoint: settings.provider === LLMProvider.OLLAMA ? settings.ollamaBaseUrl : undefined,
    temperature: settings.temperature,
    logger,
  };
}
