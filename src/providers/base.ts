/**
 * @fileoverview Base provider for text-completion backends.
 *
 * Every backend turns a rendered ReAct prompt into the model's next step.
 * Providers stop generation at the first "Observation:" so the model cannot
 * write tool output itself; the parser guards against it either way.
 *
 * @module campus-guide/providers
 */

import type { CompletionOptions, TextCompletion } from '../types/capabilities.types.js';
import { CompletionError } from '../errors.js';
import { createSilentLogger, type Logger } from '../observability/logger.js';

/**
 * Supported LLM providers.
 */
export enum LLMProvider {
  /** OpenAI chat completions */
  OPENAI = 'openai',

  /** Groq, through its OpenAI-compatible API */
  GROQ = 'groq',

  /** A local Ollama server */
  OLLAMA = 'ollama',
}

/**
 * Provider configuration.
 */
export interface ProviderConfig {
  provider: LLMProvider;

  /** Model name; defaults per provider */
  model?: string;

  /** API key, required by hosted providers */
  apiKey?: string;

  /** Custom endpoint URL */
  endpoint?: string;

  temperature?: number;

  maxTokens?: number;

  logger?: Logger;
}

export interface ProviderDefaults {
  readonly model: string;
  readonly endpoint: string;
  /** Suggested per-call timeout; local models are slower */
  readonly completionTimeoutMs: number;
}

export const PROVIDER_DEFAULTS: Readonly<Record<LLMProvider, ProviderDefaults>> = {
  [LLMProvider.OPENAI]: {
    model: 'gpt-4o-mini',
    endpoint: 'https://api.openai.com/v1',
    completionTimeoutMs: 30_000,
  },
  [LLMProvider.GROQ]: {
    model: 'llama-3.3-70b-versatile',
    endpoint: 'https://api.groq.com/openai/v1',
    completionTimeoutMs: 30_000,
  },
  [LLMProvider.OLLAMA]: {
    model: 'llama3.1',
    endpoint: 'http://localhost:11434',
    completionTimeoutMs: 120_000,
  },
};

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1024;

/**
 * Sequences at which generation stops.
 */
export const STOP_SEQUENCES: ReadonlyArray<string> = ['\nObservation:'];

/**
 * Maps an HTTP status from a backend to an error code and whether a retry can help.
 */
export function classifyStatus(status: number): { code: string; retryable: boolean } {
  if (status === 401 || status === 403) {
    return { code: 'AUTH_FAILED', retryable: false };
  }
  if (status === 429) {
    return { code: 'RATE_LIMITED', retryable: true };
  }
  if (status >= 400 && status < 500) {
    return { code: 'BAD_REQUEST', retryable: false };
  }
  return { code: 'BACKEND_ERROR', retryable: true };
}

/**
 * Abstract base class for text-completion adapters.
 *
 * Subclasses implement `request`; the base class rejects empty output so
 * that the controller sees a CompletionError instead of a blank step.
 */
export abstract class BaseProvider implements TextCompletion {
  readonly provider: LLMProvider;
  readonly name: string;
  protected readonly config: ProviderConfig;
  protected readonly logger: Logger;

  constructor(config: ProviderConfig) {
    this.provider = config.provider;
    this.config = config;
    this.name = `${config.provider}:${this.model}`;
    this.logger = (config.logger ?? createSilentLogger()).child({ module: `providers.${config.provider}` });
  }

  get model(): string {
    return this.config.model ?? PROVIDER_DEFAULTS[this.provider].model;
  }

  get endpoint(): string {
    return (this.config.endpoint ?? PROVIDER_DEFAULTS[this.provider].endpoint).replace(/\/+$/, '');
  }

  get temperature(): number {
    return this.config.temperature ?? DEFAULT_TEMPERATURE;
  }

  get maxTokens(): number {
    return this.config.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  /**
   * Get provider name.
   */
  abstract getName(): string;

  /**
   * Validate that the provider is properly configured.
   */
  abstract validate(): boolean;

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    this.logger.debug('Requesting completion', { model: this.model, promptLength: prompt.length });
    const text = await this.logger.time('Completion', () => this.request(prompt, options.signal));

    if (text.trim().length === 0) {
      throw new CompletionError(this.name, `${this.getName()} returned an empty completion`, {
        code: 'EMPTY_COMPLETION',
      });
    }
    return text;
  }

  protected abstract request(prompt: string, signal: AbortSignal | undefined): Promise<string>;
}
