/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './openai.js';
export { OllamaProvider } from './ollama.js';

import { LLMProvider, type BaseProvider, type ProviderConfig } from './base.js';
import { OpenAICompatibleProvider } from './openai.js';
import { OllamaProvider } from './ollama.js';

/**
 * Create a provider instance based on type.
 */
export function createProvider(config: ProviderConfig): BaseProvider {
  switch (config.provider) {
    case LLMProvider.OPENAI:
    case LLMProvider.GROQ:
      return new OpenAICompatibleProvider(config);

    case LLMProvider.OLLAMA:
      return new OllamaProvider(config);
  }
}

/**
 * Get all supported providers.
 */
export function getSupportedProviders(): LLMProvider[] {
  return [
    LLMProvider.GROQ,
    LLMProvider.OPENAI,
    LLMProvider.OLLAMA,
  ];
}
