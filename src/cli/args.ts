/**
 * @fileoverview Command-line argument parsing for the campus-guide CLI.
 *
 * @module campus-guide/cli/args
 */

import { ConfigError } from '../errors.js';
import type { Environment } from '../config.js';

export type Command = 'ask' | 'chat' | 'tools' | 'seed' | 'help' | 'version';

/**
 * Parsed command line.
 */
export interface CLIOptions {
  command: Command;
  question: string;
  showSteps: boolean;
  provider: string | undefined;
  model: string | undefined;
  maxIterations: string | undefined;
  fallback: boolean | undefined;
  dbPath: string | undefined;
  logTranscripts: string | undefined;
  verbose: boolean;
}

const COMMANDS: Readonly<Record<string, Command>> = {
  ask: 'ask',
  chat: 'chat',
  tools: 'tools',
  seed: 'seed',
  help: 'help',
  version: 'version',
};

/**
 * Parse command line arguments.
 *
 * @throws {ConfigError} on unknown options or a missing option value
 */
export function parseArgs(args: ReadonlyArray<string>): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    question: '',
    showSteps: false,
    provider: undefined,
    model: undefined,
    maxIterations: undefined,
    fallback: undefined,
    dbPath: undefined,
    logTranscripts: undefined,
    verbose: false,
  };

  const words: string[] = [];
  let commandSeen = false;

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Option ${flag} needs a value`);
    }
    return value;
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        options.command = 'help';
        commandSeen = true;
        break;

      case '-v':
      case '--version':
        options.command = 'version';
        commandSeen = true;
        break;

      case '--show-steps':
        options.showSteps = true;
        break;

      case '--provider':
        options.provider = valueOf(arg, ++i);
        break;

      case '--model':
        options.model = valueOf(arg, ++i);
        break;

      case '--max-iterations':
        options.maxIterations = valueOf(arg, ++i);
        break;

      case '--no-fallback':
        options.fallback = false;
        break;

      case '--db':
        options.dbPath = valueOf(arg, ++i);
        break;

      case '--log-transcripts':
        options.logTranscripts = valueOf(arg, ++i);
        break;

      case '--verbose':
        options.verbose = true;
        break;

      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (!commandSeen && COMMANDS[arg] !== undefined) {
          options.command = COMMANDS[arg];
          commandSeen = true;
        } else {
          words.push(arg);
        }
    }

    i++;
  }

  options.question = words.join(' ').trim();
  if (!commandSeen && options.question.length > 0) {
    options.command = 'ask';
  }
  return options;
}

/**
 * Overlays command-line options on the environment, so flags go through
 * the same validation as variables.
 */
export function toEnvironment(options: CLIOptions, env: Environment): Environment {
  const overlay: Record<string, string> = {};

  if (options.provider !== undefined) overlay['LLM_PROVIDER'] = options.provider;
  if (options.model !== undefined) overlay['LLM_MODEL'] = options.model;
  if (options.maxIterations !== undefined) overlay['MAX_ITERATIONS'] = options.maxIterations;
  if (options.fallback === false) overlay['FALLBACK_ENABLED'] = 'false';
  if (options.dbPath !== undefined) overlay['CATALOG_DB_PATH'] = options.dbPath;
  if (options.verbose) overlay['LOG_LEVEL'] = 'DEBUG';

  return { ...env, ...overlay };
}

export const HELP_TEXT = `
campus-guide - answers questions about programs, courses, deadlines and campus resources

USAGE:
  campus-guide <command> [options]

COMMANDS:
  ask "<question>"    Answer one question
  chat                Interactive session with follow-up questions
  tools               List available tools
  seed                Build the catalog database from data/catalog.json
  help                Show this help message
  version             Show version

OPTIONS:
  --provider <name>           openai, groq or ollama (env: LLM_PROVIDER)
  --model <name>              Model name (env: LLM_MODEL)
  --max-iterations <n>        Completion calls per question (env: MAX_ITERATIONS)
  --no-fallback               Do not search the web after a catalog miss
  --db <path>                 Catalog database (env: CATALOG_DB_PATH)
  --log-transcripts <file>    Append each run to a JSON Lines file
  --show-steps                Print the reasoning transcript with the answer
  --verbose                   Debug logging on stderr

EXAMPLES:
  campus-guide seed
  campus-guide ask "What are the prerequisites for CMPE 259?"
  campus-guide ask --show-steps "Where is the financial aid office?"
  campus-guide chat --provider ollama --model llama3.1
`;
