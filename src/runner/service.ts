/**
 * Runs one agent task inside a logged session
 */

import { buildBrowserProfile, resolveBrowserTarget } from '../browser/target.js';
import { loadAgentFactory } from '../agent/loader.js';
import type { AgentFactory, AgentOptions } from '../agent/views.js';
import type { AppConfig, LLMConfig } from '../config/schema.js';
import { ConfigurationError } from '../exceptions.js';
import type { BaseChatModel } from '../llm/base.js';
import { createChatModel, getDefaultModels } from '../llm/factory.js';
import { createLogger, interceptConsole } from '../logging-config.js';
import { RunLogger } from '../services/run-logger.js';
import {
  installShutdownHooks,
  type ProcessLike,
  type SignalHandler,
} from '../services/signal-handler.js';
import { log_pretty_path, toJsonSafe, truncate } from '../utils.js';

const logger = createLogger('task_runner.runner');

/** Channel handed to the agent implementation */
export const AGENT_LOGGER_NAME = 'browser_use';

const TASK_PREVIEW_LENGTH = 200;
const OPTION_PREVIEW_LENGTH = 100;
const RESULT_PREVIEW_LENGTH = 500;
const MASK = '***';

export interface RunTaskDependencies {
  /** Overrides `config.agent.module` */
  agentFactory?: AgentFactory;
  createChatModel?: (config: LLMConfig) => BaseChatModel;
  /** Used instead of opening a new one from `config.logging` */
  runLogger?: RunLogger;
  /** Register the signal and exit hooks (default: true) */
  installShutdownHooks?: boolean;
  process?: ProcessLike;
  env?: NodeJS.ProcessEnv;
}

const describeError = (error: unknown) => ({
  error_type: error instanceof Error ? error.name : typeof error,
  error_message: error instanceof Error ? error.message : String(error),
  stack: error instanceof Error ? (error.stack ?? null) : null,
});

const renderValue = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(toJsonSafe(value));
  }
  return String(value);
};

/**
 * Option values rendered for the `agent_created` event. Secrets never reach
 * the log: sensitive data keeps only its placeholder names and the model is
 * shown by provider and name.
 */
export function describeAgentOptions(
  options: AgentOptions
): Record<string, string> {
  const described: Record<string, string> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value === undefined) {
      continue;
    }
    let rendered: string;
    if (key === 'sensitive_data' && options.sensitive_data) {
      rendered = renderValue(
        Object.fromEntries(
          Object.keys(options.sensitive_data).map((name) => [name, MASK])
        )
      );
    } else if (key === 'llm') {
      rendered = `${options.llm.provider}:${options.llm.model}`;
    } else if (key === 'logger') {
      rendered = options.logger.channel;
    } else {
      rendered = renderValue(value);
    }
    described[key] = truncate(rendered, OPTION_PREVIEW_LENGTH);
  }
  return described;
}

/**
 * First characters of the agent's result, or null for an empty result
 */
export function previewResult(result: unknown): string | null {
  if (result === null || result === undefined || result === '' || result === false) {
    return null;
  }
  let text: string;
  try {
    text =
      typeof result === 'object' &&
      (Object.getPrototypeOf(result) === null ||
        result.toString === Object.prototype.toString)
        ? JSON.stringify(toJsonSafe(result))
        : String(result);
  } catch {
    text = Object.prototype.toString.call(result);
  }
  return truncate(text, RESULT_PREVIEW_LENGTH);
}

function buildAgentOptions(
  config: AppConfig,
  task: string,
  llm: BaseChatModel
): AgentOptions {
  const { agent, browser } = config;
  const options: AgentOptions = {
    task,
    llm,
    use_vision: agent.useVision,
    step_timeout: agent.stepTimeout,
    flash_mode: agent.flashMode,
    browser: resolveBrowserTarget(browser),
    logger: createLogger(AGENT_LOGGER_NAME),
  };

  const profile = buildBrowserProfile(browser);
  if (profile) {
    options.browser_profile = profile;
  }
  if (browser.initialUrl) {
    options.initial_url = browser.initialUrl;
  }
  if (agent.extendSystemMessage) {
    options.extend_system_message = agent.extendSystemMessage;
  }
  if (agent.overrideSystemMessage) {
    options.override_system_message = agent.overrideSystemMessage;
  }
  if (agent.sensitiveData && Object.keys(agent.sensitiveData).length > 0) {
    options.sensitive_data = { ...agent.sensitiveData };
  }
  if (agent.fileSystemPath) {
    options.file_system_path = agent.fileSystemPath;
  }
  return options;
}

async function resolveAgentFactory(
  config: AppConfig,
  deps: RunTaskDependencies
): Promise<AgentFactory> {
  if (deps.agentFactory) {
    return deps.agentFactory;
  }
  if (!config.agent.module) {
    throw new ConfigurationError(
      'No agent module configured; set agent.module or TASK_RUNNER_AGENT_MODULE',
      'agent.module'
    );
  }
  return loadAgentFactory(config.agent.module);
}

/**
 * Runs the configured task.
 *
 * Events are bracketed around the agent run: `config`, `agent_created`,
 * `task_started`, then `task_completed` or `task_failed`. On success the run
 * log is exported here; after a failure the error is re-thrown unchanged and
 * the exit hook performs the export.
 *
 * @throws ConfigurationError for a missing task, credential or agent module
 */
export async function runTask(
  config: AppConfig,
  deps: RunTaskDependencies = {}
): Promise<unknown> {
  const task = config.agent.task?.trim();
  if (!task) {
    throw new ConfigurationError(
      'No task configured; pass one on the command line or set agent.task or agent.taskFile',
      'agent.task'
    );
  }

  const env = deps.env ?? process.env;
  let runLogger: RunLogger | null = null;
  let hooks: SignalHandler | null = null;
  let restoreConsole: (() => void) | null = null;

  if (config.logging.enabled) {
    runLogger =
      deps.runLogger ??
      RunLogger.open({
        logDir: config.logging.logDir,
        enableJson: config.logging.json,
        enableConsole: config.logging.console,
        channelLevels: config.logging.channelLevels,
      });
    if (config.logging.captureConsole) {
      restoreConsole = interceptConsole();
    }
    if (deps.installShutdownHooks ?? true) {
      hooks = installShutdownHooks(runLogger, { process: deps.process });
    }

    runLogger.emitEvent('config', {
      llm_provider: config.llm.provider,
      model: config.llm.model ?? getDefaultModels()[config.llm.provider],
      use_vision: config.agent.useVision,
      max_steps: config.agent.maxSteps,
      step_timeout: config.agent.stepTimeout,
      task_preview: truncate(task, TASK_PREVIEW_LENGTH, '...'),
    });
  }

  try {
    if (!config.telemetry.anonymizedTelemetry) {
      env.ANONYMIZED_TELEMETRY = 'false';
    }

    logger.info(`🤖 Initializing LLM provider: ${config.llm.provider}`);
    const llm = (deps.createChatModel ?? createChatModel)(config.llm);

    logger.info('🌐 Preparing browser...');
    const options = buildAgentOptions(config, task, llm);
    const createAgent = await resolveAgentFactory(config, deps);

    logger.info('🚀 Creating agent...');
    if (options.file_system_path) {
      logger.info(`📁 Agent files: ${log_pretty_path(options.file_system_path)}`);
    }
    if (options.browser_profile?.downloads_path) {
      logger.info(
        `💾 Downloads: ${log_pretty_path(options.browser_profile.downloads_path)}`
      );
    }
    logger.info(`📝 Task: ${truncate(task, 100, '...')}`);
    runLogger?.emitEvent('agent_created', {
      agent_options: describeAgentOptions(options),
    });

    const agent = await createAgent(options);

    logger.info('▶️  Starting task');
    runLogger?.emitEvent('task_started', {
      timestamp: new Date().toISOString(),
    });

    let result: unknown;
    try {
      result = await agent.run(config.agent.maxSteps);
    } catch (error) {
      runLogger?.emitEvent('task_failed', describeError(error));
      throw error;
    }

    runLogger?.emitEvent('task_completed', {
      success: true,
      result_preview: previewResult(result),
    });
    logger.info('✅ Task completed');

    if (runLogger) {
      runLogger.export();
      hooks?.unregister();
      runLogger.close();
    }
    return result;
  } finally {
    restoreConsole?.();
  }
}
