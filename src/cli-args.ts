/**
 * Command line argument parser
 */

import { LLM_PROVIDERS, type LLMProvider } from './config/schema.js';
import type { PlainObject } from './utils.js';

export type CliCommand = 'run' | 'check-install' | 'check-api';

export interface ParsedArgs {
  command: CliCommand;
  /** Positional words joined into the task */
  task: string | null;
  help: boolean;
  version: boolean;
  configPath?: string;
  provider?: LLMProvider;
  model?: string;
  maxSteps?: number;
  vision?: boolean;
  headless?: boolean;
  logDir?: string;
  jsonLog?: boolean;
  quiet: boolean;
}

export type ParseResult =
  | { success: true; args: ParsedArgs }
  | { success: false; error: string };

export const USAGE = `Usage:
  task-runner [run] [task...] [options]
  task-runner check-install [--config <path>]
  task-runner check-api [--model <name>]

Options:
  --config <path>      JSON config file (default: ./task-runner.config.json)
  --provider <name>    LLM provider: ${LLM_PROVIDERS.join(', ')}
  --model <name>       Model name
  --max-steps <n>      Maximum agent steps
  --vision, --no-vision
  --headless           Run the local browser headless
  --log-dir <dir>      Directory for run logs
  --no-json-log        Skip the structured JSON log
  --quiet              Only warnings and errors on the terminal
  -h, --help           Show this help
  -v, --version        Show the version`;

const COMMANDS: CliCommand[] = ['run', 'check-install', 'check-api'];

const isCommand = (value: string): value is CliCommand =>
  COMMANDS.some((command) => command === value);

const isProvider = (value: string): value is LLMProvider =>
  LLM_PROVIDERS.some((provider) => provider === value);

/**
 * Value of `--name value` or `--name=value`
 */
function readValue(
  args: string[],
  index: number,
  name: string
): { value: string; skip: number } | { error: string } {
  const arg = args[index] ?? '';
  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    return value ? { value, skip: 0 } : { error: `${name}= requires a value` };
  }
  const next = args[index + 1];
  if (next === undefined || next.startsWith('--')) {
    return { error: `${name} requires a value` };
  }
  return { value: next, skip: 1 };
}

/**
 * Parse the arguments that follow the script path
 */
export function parseArgs(args: string[]): ParseResult {
  const result: ParsedArgs = {
    command: 'run',
    task: null,
    help: false,
    version: false,
    quiet: false,
  };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const name = arg.split('=')[0] ?? arg;

    if (i === 0 && isCommand(arg)) {
      result.command = arg;
      continue;
    }

    switch (name) {
      case '--help':
      case '-h':
        result.help = true;
        break;

      case '--version':
      case '-v':
        result.version = true;
        break;

      case '--vision':
        result.vision = true;
        break;

      case '--no-vision':
        result.vision = false;
        break;

      case '--headless':
        result.headless = true;
        break;

      case '--no-json-log':
        result.jsonLog = false;
        break;

      case '--quiet':
        result.quiet = true;
        break;

      case '--config':
      case '--provider':
      case '--model':
      case '--max-steps':
      case '--log-dir': {
        const read = readValue(args, i, name);
        if ('error' in read) {
          return { success: false, error: read.error };
        }
        i += read.skip;
        const applied = applyValue(result, name, read.value);
        if (applied) {
          return { success: false, error: applied };
        }
        break;
      }

      default:
        if (arg.startsWith('-')) {
          return { success: false, error: `Unknown option: ${arg}` };
        }
        words.push(arg);
    }
  }

  if (words.length > 0) {
    if (result.command !== 'run') {
      return {
        success: false,
        error: `${result.command} takes no positional arguments`,
      };
    }
    result.task = words.join(' ');
  }
  return { success: true, args: result };
}

/**
 * Stores an option value; returns an error message for an invalid one.
 */
function applyValue(
  result: ParsedArgs,
  name: string,
  value: string
): string | null {
  switch (name) {
    case '--config':
      result.configPath = value;
      return null;
    case '--provider': {
      const provider = value.toLowerCase();
      if (!isProvider(provider)) {
        return `--provider must be one of: ${LLM_PROVIDERS.join(', ')}`;
      }
      result.provider = provider;
      return null;
    }
    case '--model':
      result.model = value;
      return null;
    case '--max-steps': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1) {
        return '--max-steps must be a positive integer';
      }
      result.maxSteps = parsed;
      return null;
    }
    case '--log-dir':
      result.logDir = value;
      return null;
    default:
      return `Unknown option: ${name}`;
  }
}

/**
 * Command line values as a partial raw config, the highest-priority source
 */
export function toConfigOverrides(args: ParsedArgs): PlainObject {
  const llm: PlainObject = {};
  const agent: PlainObject = {};
  const browser: PlainObject = {};
  const logging: PlainObject = {};

  if (args.provider) {
    llm.provider = args.provider;
  }
  if (args.model) {
    llm.model = args.model;
  }
  if (args.task) {
    agent.task = args.task;
  }
  if (args.maxSteps !== undefined) {
    agent.maxSteps = args.maxSteps;
  }
  if (args.vision !== undefined) {
    agent.useVision = args.vision;
  }
  if (args.headless) {
    browser.headless = true;
  }
  if (args.logDir) {
    logging.logDir = args.logDir;
  }
  if (args.jsonLog === false) {
    logging.json = false;
  }
  if (args.quiet) {
    logging.console = false;
  }

  const sections: PlainObject = { llm, agent, browser, logging };
  return Object.fromEntries(
    Object.entries(sections).filter(
      ([, section]) =>
        typeof section === 'object' &&
        section !== null &&
        Object.keys(section).length > 0
    )
  );
}
