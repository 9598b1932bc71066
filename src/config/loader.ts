/**
 * Configuration loader that handles multiple sources with priority order:
 * 1. Explicit overrides (command line flags, highest priority)
 * 2. Environment variables (`.env` is loaded through dotenv)
 * 3. JSON config file
 * 4. Default values (lowest priority)
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import { isPlainObject, merge_dicts, type PlainObject } from '../utils.js';
import {
  AppConfigSchema,
  LLMConfigSchema,
  PROVIDER_API_KEY_ENV,
  type AppConfig,
  type LLMConfig,
} from './schema.js';

const logger = createLogger('task_runner.config');

export const DEFAULT_CONFIG_FILE = 'task-runner.config.json';

export interface LoadConfigOptions {
  /** Explicit config file; otherwise TASK_RUNNER_CONFIG or ./task-runner.config.json */
  configPath?: string;
  /** Defaults to process.env, in which case `.env` is loaded first */
  env?: NodeJS.ProcessEnv;
  /** Values that win over every other source */
  overrides?: PlainObject;
  cwd?: string;
}

export interface LoadedConfig {
  config: AppConfig;
  /** Config file that was read, if any */
  source: string | null;
}

const describeIssues = (error: ZodError) =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');

const parseBoolean = (value: string): boolean | string => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return false;
  }
  return value;
};

const fileExists = async (filePath: string) => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

async function resolveConfigPath(
  options: LoadConfigOptions,
  env: NodeJS.ProcessEnv,
  cwd: string
): Promise<string | null> {
  const explicit = options.configPath ?? env.TASK_RUNNER_CONFIG;
  if (explicit) {
    return path.resolve(cwd, explicit);
  }
  const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
  return (await fileExists(fallback)) ? fallback : null;
}

/**
 * Load configuration from file
 */
async function loadConfigFromFile(configPath: string): Promise<PlainObject> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      'config',
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'config',
      { cause: error }
    );
  }

  if (!isPlainObject(raw)) {
    throw new ConfigurationError(
      `Config file ${configPath} must contain a JSON object`,
      'config'
    );
  }
  return raw;
}

/**
 * Environment variable overrides, as a partial raw config
 */
export function environmentOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const llm: PlainObject = {};
  const browser: PlainObject = {};
  const agent: PlainObject = {};
  const logging: PlainObject = {};
  const telemetry: PlainObject = {};

  if (env.LLM_PROVIDER) {
    llm.provider = env.LLM_PROVIDER.trim().toLowerCase();
  }
  if (env.LLM_MODEL) {
    llm.model = env.LLM_MODEL;
  }
  if (env.LLM_TEMPERATURE) {
    llm.temperature = Number(env.LLM_TEMPERATURE);
  }
  if (env.LLM_MAX_TOKENS) {
    llm.maxTokens = Number(env.LLM_MAX_TOKENS);
  }
  if (env.LLM_BASE_URL) {
    llm.baseUrl = env.LLM_BASE_URL;
  }

  if (env.TASK_RUNNER_HEADLESS !== undefined) {
    browser.headless = parseBoolean(env.TASK_RUNNER_HEADLESS);
  }
  if (env.TASK_RUNNER_CDP_URL) {
    browser.cdpUrl = env.TASK_RUNNER_CDP_URL;
    browser.useExistingBrowser = true;
  }

  if (env.TASK_RUNNER_TASK) {
    agent.task = env.TASK_RUNNER_TASK;
  }
  if (env.TASK_RUNNER_MAX_STEPS) {
    agent.maxSteps = Number(env.TASK_RUNNER_MAX_STEPS);
  }
  if (env.TASK_RUNNER_AGENT_MODULE) {
    agent.module = env.TASK_RUNNER_AGENT_MODULE;
  }

  if (env.TASK_RUNNER_LOG_DIR) {
    logging.logDir = env.TASK_RUNNER_LOG_DIR;
  }
  if (env.TASK_RUNNER_LOGGING_LEVEL) {
    logging.level = env.TASK_RUNNER_LOGGING_LEVEL;
  }

  if (env.ANONYMIZED_TELEMETRY !== undefined) {
    telemetry.anonymizedTelemetry = parseBoolean(env.ANONYMIZED_TELEMETRY);
  }

  const sections: PlainObject = { llm, browser, agent, logging, telemetry };
  return Object.fromEntries(
    Object.entries(sections).filter(
      ([, value]) => isPlainObject(value) && Object.keys(value).length > 0
    )
  );
}

/**
 * Fills credentials and endpoints of the selected provider from the
 * environment. A value from the environment wins over the config file.
 */
export function resolveCredentials(
  llm: LLMConfig,
  env: NodeJS.ProcessEnv
): LLMConfig {
  const resolved: LLMConfig = { ...llm };
  const envKey =
    llm.provider === 'ollama'
      ? undefined
      : env[PROVIDER_API_KEY_ENV[llm.provider]];
  if (envKey) {
    resolved.apiKey = envKey;
  }

  if (llm.provider === 'openai' && env.OPENAI_ENDPOINT) {
    resolved.baseUrl = env.OPENAI_ENDPOINT;
  }
  if (llm.provider === 'azure' && env.AZURE_OPENAI_ENDPOINT) {
    resolved.azureEndpoint = env.AZURE_OPENAI_ENDPOINT;
  }
  if (llm.provider === 'azure' && env.AZURE_OPENAI_API_VERSION) {
    resolved.apiVersion = env.AZURE_OPENAI_API_VERSION;
  }
  if (llm.provider === 'ollama' && env.OLLAMA_HOST) {
    resolved.ollamaHost = env.OLLAMA_HOST;
  }

  const checked = LLMConfigSchema.safeParse(resolved);
  if (!checked.success) {
    throw new ConfigurationError(
      `Invalid LLM configuration: ${describeIssues(checked.error)}`,
      'llm'
    );
  }
  return checked.data;
}

async function readTaskFile(taskFile: string, baseDir: string) {
  const taskPath = path.resolve(baseDir, taskFile);
  try {
    return await fs.readFile(taskPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read task file ${taskPath}: ${error instanceof Error ? error.message : String(error)}`,
      'agent.taskFile',
      { cause: error }
    );
  }
}

/**
 * Main configuration loader function
 *
 * @throws ConfigurationError when a source cannot be read or a value is invalid
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const usingProcessEnv = options.env === undefined;
  if (usingProcessEnv) {
    loadEnv();
  }
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const source = await resolveConfigPath(options, env, cwd);
  const fromFile = source ? await loadConfigFromFile(source) : {};
  if (source) {
    logger.debug(`Loaded configuration from ${source}`);
  }

  const merged = merge_dicts(
    merge_dicts(fromFile, environmentOverrides(env)),
    options.overrides ?? {}
  );

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid configuration: ${describeIssues(parsed.error)}`,
      first ? first.path.join('.') : null
    );
  }

  const config = parsed.data;
  config.llm = resolveCredentials(config.llm, env);

  const task = config.agent.task?.trim();
  if (!task && config.agent.taskFile) {
    const baseDir = source ? path.dirname(source) : cwd;
    config.agent.task = await readTaskFile(config.agent.taskFile, baseDir);
  }

  return { config, source };
}
