/**
 * @fileoverview Ollama provider for locally hosted models.
 *
 * @see https://github.com/ollama/ollama/blob/main/docs/api.md#generate-a-chat-completion
 */

import { z } from 'zod';
import { BaseProvider, LLMProvider, STOP_SEQUENCES, classifyStatus, type ProviderConfig } from './base.js';
import type { FetchFn } from '../types/capabilities.types.js';
import { CompletionError, ConfigError, errorMessage } from '../errors.js';

const OllamaChatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

/**
 * Chat completion against a local Ollama server (`/api/chat`, non-streaming).
 */
export class OllamaProvider extends BaseProvider {
  private readonly fetchFn: FetchFn;

  constructor(config: Omit<ProviderConfig, 'provider'>, fetchFn: FetchFn = fetch) {
    super({ ...config, provider: LLMProvider.OLLAMA });
    if (!this.validate()) {
      throw new ConfigError(`Invalid Ollama endpoint: ${this.endpoint}`, ['OLLAMA_BASE_URL']);
    }
    this.fetchFn = fetchFn;
  }

  getName(): string {
    return `Ollama (${this.model})`;
  }

  validate(): boolean {
    return URL.canParse(this.endpoint);
  }

  protected async request(prompt: string, signal: AbortSignal | undefined): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.endpoint}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          stream: false,
          options: {
            temperature: this.temperature,
            num_predict: this.maxTokens,
            stop: STOP_SEQUENCES,
          },
        }),
        signal,
      });
    } catch (error) {
      throw new CompletionError(
        this.name,
        `Could not connect to Ollama at ${this.endpoint}: ${errorMessage(error)}`,
        { code: 'CONNECTION_FAILED', cause: error },
      );
    }

    if (!response.ok) {
      const { code, retryable } = classifyStatus(response.status);
      const detail = await response.text();
      throw new CompletionError(this.name, `Ollama returned ${response.status}: ${detail.slice(0, 200)}`, {
        code,
        retryable,
      });
    }

    const parsed = OllamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CompletionError(this.name, 'Unexpected response from Ollama', {
        code: 'BAD_RESPONSE',
        retryable: false,
      });
    }
    return parsed.data.message.content;
  }
}
