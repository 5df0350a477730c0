/**
 * @fileoverview Campus Guide - question answering over a university catalog.
 *
 * A ReAct-style reasoning controller answers questions about programs,
 * courses, deadlines and campus resources. It consults a structured catalog
 * first and falls back to web search when the catalog has no answer.
 *
 * @example
 * ```typescript
 * import { createAssistant, loadSettings } from 'campus-guide';
 *
 * const assistant = createAssistant(loadSettings());
 * const result = await assistant.ask('What are the prerequisites for CMPE 259?');
 * console.log(result.answerText);
 * assistant.close();
 * ```
 *
 * @module campus-guide
 */

import type { AgentConfig, RunResult } from './types/core.types.js';
import { DATABASE_QUERY_TOOL } from './types/core.types.js';
import type { TextCompletion, WebSearch } from './types/capabilities.types.js';
import { DecisionLoop } from './agent/decision-loop.js';
import { ToolRegistry } from './tools/tool-registry.js';
import { createDatabaseQueryTool } from './tools/database-query.js';
import { createWebSearchTool } from './tools/web-search.js';
import { SqliteCatalogStore } from './catalog/catalog-store.js';
import { TavilyWebSearch } from './search/tavily.js';
import { createProvider } from './providers/index.js';
import { createSilentLogger, type Logger } from './observability/logger.js';
import { ConfigError, errorMessage } from './errors.js';
import { ConversationSession } from './session/conversation.js';
import { toAgentConfig, toProviderConfig, type Settings } from './config.js';

export * from './types/index.js';
export * from './errors.js';
export * from './agent/index.js';
export * from './tools/index.js';
export * from './catalog/index.js';
export * from './observability/index.js';
export { ConversationSession, type ConversationSessionOptions } from './session/conversation.js';
export {
  TavilyWebSearch,
  DEFAULT_TAVILY_API_URL,
  MAX_SNIPPET_LENGTH,
  type TavilyOptions,
} from './search/tavily.js';
export {
  BaseProvider,
  LLMProvider,
  OpenAICompatibleProvider,
  OllamaProvider,
  PROVIDER_DEFAULTS,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
  STOP_SEQUENCES,
  classifyStatus,
  createProvider,
  getSupportedProviders,
  type ChatCompletionsClient,
  type ProviderConfig,
  type ProviderDefaults,
} from './providers/index.js';
export {
  loadEnvironmentFile,
  loadSettings,
  toAgentConfig,
  toProviderConfig,
  type Environment,
  type Settings,
} from './config.js';

/**
 * Overrides for `createAssistant`; tests and the CLI swap collaborators here.
 */
export interface AssistantOptions {
  readonly logger?: Logger;
  readonly completion?: TextCompletion;
  readonly webSearch?: WebSearch;
  readonly store?: SqliteCatalogStore;
  readonly config?: Partial<AgentConfig>;
}

/**
 * Registered tools plus the catalog connection behind them.
 */
export interface AssistantTools {
  readonly registry: ToolRegistry;
  readonly store: SqliteCatalogStore;
  readonly webSearchEnabled: boolean;
}

/**
 * A wired decision loop with its catalog connection.
 */
export interface Assistant {
  readonly loop: DecisionLoop;
  readonly registry: ToolRegistry;
  readonly config: Readonly<AgentConfig>;
  ask(question: string): Promise<RunResult>;
  session(): ConversationSession;
  close(): void;
}

function openCatalog(path: string, logger: Logger): SqliteCatalogStore {
  try {
    return SqliteCatalogStore.open(path, { logger });
  } catch (error) {
    throw new ConfigError(
      `Cannot open catalog database at ${path}: ${errorMessage(error)}. Run "campus-guide seed" first.`,
      ['CATALOG_DB_PATH'],
    );
  }
}

/**
 * Opens the catalog and registers `database_query`, plus `web_search` when
 * a Tavily key (or a replacement search) is available.
 */
export function createTools(settings: Settings, options: AssistantOptions = {}): AssistantTools {
  const logger = options.logger ?? createSilentLogger();
  const store = options.store ?? openCatalog(settings.catalogDbPath, logger);

  const webSearch = options.webSearch ?? (settings.tavilyApiKey !== null
    ? new TavilyWebSearch({
        apiKey: settings.tavilyApiKey,
        baseUrl: settings.tavilyApiUrl,
        timeoutMs: settings.toolTimeoutMs,
        logger,
      })
    : null);

  const registry = new ToolRegistry({ defaultTimeoutMs: settings.toolTimeoutMs, logger });
  registry.register(createDatabaseQueryTool(store));
  if (webSearch) {
    registry.register(createWebSearchTool(webSearch));
  }

  return { registry, store, webSearchEnabled: webSearch !== null };
}

/**
 * Wires the catalog, web search, provider and registry into a decision loop.
 *
 * Without web search the automatic fallback is off and the model is only
 * offered `database_query`.
 *
 * @throws {ConfigError} when the catalog or provider cannot be set up
 */
export function createAssistant(settings: Settings, options: AssistantOptions = {}): Assistant {
  const logger = options.logger ?? createSilentLogger();
  const { registry, store, webSearchEnabled } = createTools(settings, { ...options, logger });

  let completion: TextCompletion;
  try {
    completion = options.completion ?? createProvider(toProviderConfig(settings, logger));
  } catch (error) {
    if (!options.store) {
      store.close();
    }
    throw error;
  }

  let config = toAgentConfig(settings, options.config);
  if (!webSearchEnabled) {
    logger.warn('TAVILY_API_KEY is not set; web search is disabled');
    config = toAgentConfig(settings, {
      ...options.config,
      toolNames: new Set([DATABASE_QUERY_TOOL]),
      fallbackEnabled: false,
    });
  }

  const loop = new DecisionLoop({ completion, registry, logger });

  return {
    loop,
    registry,
    config,
    ask: question => loop.runQuery(question, config),
    session: () => new ConversationSession(loop, config),
    close: () => store.close(),
  };
}
