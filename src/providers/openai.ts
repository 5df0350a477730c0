/**
 * @fileoverview OpenAI-compatible chat completion provider.
 *
 * Serves both OpenAI and Groq; Groq exposes the same API under its own base URL.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */

import OpenAI from 'openai';
import { BaseProvider, LLMProvider, STOP_SEQUENCES, classifyStatus, type ProviderConfig } from './base.js';
import { CompletionError, ConfigError, errorMessage } from '../errors.js';

/**
 * The part of the OpenAI client this provider calls.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

/**
 * Chat completion provider for OpenAI and Groq.
 */
export class OpenAICompatibleProvider extends BaseProvider {
  private readonly client: ChatCompletionsClient;

  constructor(config: ProviderConfig, client?: ChatCompletionsClient) {
    if (config.provider === LLMProvider.OLLAMA) {
      throw new ConfigError('Ollama is served by OllamaProvider');
    }
    super(config);

    if (client) {
      this.client = client;
    } else {
      if (!this.validate()) {
        const key = this.provider === LLMProvider.GROQ ? 'GROQ_API_KEY' : 'OPENAI_API_KEY';
        throw new ConfigError(`${key} is required for the ${this.provider} provider`, [key]);
      }
      // The decision loop owns the single retry.
      this.client = new OpenAI({ apiKey: config.apiKey, baseURL: this.endpoint, maxRetries: 0 });
    }
  }

  getName(): string {
    return this.provider === LLMProvider.GROQ ? `Groq (${this.model})` : `OpenAI (${this.model})`;
  }

  validate(): boolean {
    return (this.config.apiKey ?? '').trim().length > 0;
  }

  protected async request(prompt: string, signal: AbortSignal | undefined): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
          stop: [...STOP_SEQUENCES],
        },
        { signal },
      );

      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      throw this.toCompletionError(error);
    }
  }

  private toCompletionError(error: unknown): CompletionError {
    if (error instanceof CompletionError) {
      return error;
    }
    if (error instanceof OpenAI.APIError && error.status !== undefined) {
      const { code, retryable } = classifyStatus(error.status);
      return new CompletionError(this.name, `${this.getName()} request failed: ${error.message}`, {
        code,
        retryable,
        cause: error,
      });
    }
    return new CompletionError(this.name, `${this.getName()} request failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
