#!/usr/bin/env node
/**
 * @fileoverview Campus Guide CLI
 *
 * Usage:
 *   campus-guide ask "<question>" [options]
 *   campus-guide chat [options]
 *   campus-guide seed [--db <path>]
 *   campus-guide --help
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createInterface } from 'node:readline';
import Database from 'better-sqlite3';
import { createAssistant, createTools, type Assistant } from '../index.js';
import { loadEnvironmentFile, loadSettings, type Settings } from '../config.js';
import { loadCatalogData } from '../catalog/catalog-data.js';
import { seedCatalog } from '../catalog/catalog-store.js';
import { ConsoleTransport, createLogger, type Logger } from '../observability/logger.js';
import { TranscriptLog } from '../observability/transcript-log.js';
import { CampusGuideError, ConfigError, errorMessage } from '../errors.js';
import { TerminationReason, type RunResult } from '../types/core.types.js';
import { HELP_TEXT, parseArgs, toEnvironment, type CLIOptions } from './args.js';
import { renderAnswer, renderSummary, renderTranscript } from './render.js';

const VERSION = '0.3.0';

const EXIT_WORDS = new Set(['exit', 'quit', 'bye']);

/**
 * Prints a finished run and appends it to the transcript log, if any.
 */
async function report(result: RunResult, options: CLIOptions, transcriptLog: TranscriptLog | null): Promise<void> {
  if (options.showSteps) {
    console.log(renderTranscript(result.transcript));
    console.log(renderSummary(result));
    console.log('');
  }
  console.log(renderAnswer(result));

  if (transcriptLog) {
    await transcriptLog.append(result);
  }
}

async function ask(assistant: Assistant, options: CLIOptions, transcriptLog: TranscriptLog | null): Promise<number> {
  if (options.question.length === 0) {
    throw new ConfigError('Nothing to ask. Usage: campus-guide ask "<question>"');
  }

  const result = await assistant.ask(options.question);
  await report(result, options, transcriptLog);
  return result.terminationReason === TerminationReason.ERROR ? 1 : 0;
}

async function chat(assistant: Assistant, options: CLIOptions, transcriptLog: TranscriptLog | null): Promise<number> {
  const session = assistant.session();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  console.log('Ask about programs, courses, deadlines or campus resources.');
  console.log('Type "reset" to forget the conversation, "exit" to quit.\n');

  rl.setPrompt('you> ');
  rl.prompt();

  try {
    for await (const input of rl) {
      const line = input.trim();
      if (EXIT_WORDS.has(line.toLowerCase())) break;

      if (line.toLowerCase() === 'reset') {
        session.reset();
        console.log('Conversation cleared.\n');
      } else if (line.length > 0) {
        const result = await session.ask(line);
        await report(result, options, transcriptLog);
        console.log('');
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }

  return 0;
}

function listTools(settings: Settings, logger: Logger): number {
  const { registry, store, webSearchEnabled } = createTools(settings, { logger });

  try {
    console.log('\nAvailable tools:\n');
    for (const tool of registry.list()) {
      console.log(`  ${tool.id} (${tool.name})`);
      console.log(`     ${tool.description}`);
      console.log(`     Example input: ${tool.exampleInput}`);
      console.log('');
    }
    if (!webSearchEnabled) {
      console.log('  (web_search is disabled: set TAVILY_API_KEY to enable it)\n');
    }
  } finally {
    store.close();
  }

  return 0;
}

async function seed(settings: Settings, logger: Logger): Promise<number> {
  const data = await loadCatalogData();
  await mkdir(dirname(settings.catalogDbPath), { recursive: true });

  const db = new Database(settings.catalogDbPath);
  try {
    const counts = await logger.time('Seed catalog', async () => seedCatalog(db, data));
    console.log(`Seeded ${settings.catalogDbPath}`);
    for (const [table, count] of Object.entries(counts)) {
      console.log(`  ${table.padEnd(18)} ${count}`);
    }
  } finally {
    db.close();
  }

  return 0;
}

function loadCliSettings(options: CLIOptions): { settings: Settings; logger: Logger } {
  loadEnvironmentFile();
  const settings = loadSettings(toEnvironment(options, process.env));
  const logger = createLogger('campus-guide', {
    minLevel: settings.logLevel,
    transports: [new ConsoleTransport()],
  });
  return { settings, logger };
}

async function answer(options: CLIOptions): Promise<number> {
  const { settings, logger } = loadCliSettings(options);
  const assistant = createAssistant(settings, { logger });
  const transcriptLog = options.logTranscripts !== undefined ? new TranscriptLog(options.logTranscripts) : null;

  try {
    return options.command === 'chat'
      ? await chat(assistant, options, transcriptLog)
      : await ask(assistant, options, transcriptLog);
  } finally {
    assistant.close();
  }
}

async function run(options: CLIOptions): Promise<number> {
  switch (options.command) {
    case 'help':
      console.log(HELP_TEXT);
      return 0;

    case 'version':
      console.log(`campus-guide v${VERSION}`);
      return 0;

    case 'seed': {
      const { settings, logger } = loadCliSettings(options);
      return seed(settings, logger);
    }

    case 'tools': {
      const { settings, logger } = loadCliSettings(options);
      return listTools(settings, logger);
    }

    case 'ask':
    case 'chat':
      return answer(options);
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  process.exitCode = await run(options);
}

main().catch((error: unknown) => {
  if (error instanceof CampusGuideError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Fatal error:', errorMessage(error));
  }
  process.exitCode = 1;
});
