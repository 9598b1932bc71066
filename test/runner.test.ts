import fs from 'node:fs';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { AgentFactory, AgentOptions } from '../src/agent/index.js';
import { AppConfigSchema, type AppConfigInput } from '../src/config/index.js';
import { ConfigurationError } from '../src/exceptions.js';
import { ChatOpenAI } from '../src/llm/index.js';
import { createLogger, resetLogging } from '../src/logging-config.js';
import {
  describeAgentOptions,
  previewResult,
  runTask,
} from '../src/runner/service.js';
import { RunLogger, type EventLogEntry } from '../src/services/run-logger.js';
import { makeTempDir, MemoryWritable, removeTempDirs } from './support/memory-writable.js';

const buildConfig = (input: AppConfigInput = {}) =>
  AppConfigSchema.parse({
    ...input,
    llm: { apiKey: 'test-secret', ...input.llm },
    agent: { task: 'Open the reports page and export March', ...input.agent },
  });

const openRunLogger = () =>
  RunLogger.open({
    logDir: makeTempDir(),
    enableConsole: false,
    consoleStream: new MemoryWritable(),
  });

const eventsOf = (runLogger: RunLogger) =>
  runLogger.entries.filter((entry): entry is EventLogEntry => entry.level === 'EVENT');

const staticAgent = (run: (maxSteps: number) => Promise<unknown>): AgentFactory =>
  () => ({ run });

describe('runTask', () => {
  let runLogger: RunLogger | null = null;

  afterEach(() => {
    runLogger?.close();
    runLogger = null;
    resetLogging();
    removeTempDirs();
  });

  it('brackets a successful run with events and exports the log', async () => {
    runLogger = openRunLogger();
    const run = vi.fn(async () => ({ downloaded: 'march.csv' }));

    const result = await runTask(buildConfig({ agent: { maxSteps: 7 } }), {
      agentFactory: staticAgent(run),
      runLogger,
      installShutdownHooks: false,
      env: {},
    });

    expect(result).toEqual({ downloaded: 'march.csv' });
    expect(run).toHaveBeenCalledWith(7);
    const events = eventsOf(runLogger);
    expect(events.map((event) => event.event_type)).toEqual([
      'config',
      'agent_created',
      'task_started',
      'task_completed',
    ]);
    expect(events[0].data).toEqual({
      llm_provider: 'openai',
      model: 'o3',
      use_vision: false,
      max_steps: 7,
      step_timeout: 130,
      task_preview: 'Open the reports page and export March',
    });
    expect(events[3].data).toEqual({
      success: true,
      result_preview: '{"downloaded":"march.csv"}',
    });
    expect(runLogger.flushed).toBe(true);
    expect(fs.existsSync(runLogger.jsonLogFile)).toBe(true);
  });

  it('records completion for a result without a prototype', async () => {
    runLogger = openRunLogger();

    await runTask(buildConfig(), {
      agentFactory: staticAgent(async () => Object.create(null)),
      runLogger,
      installShutdownHooks: false,
      env: {},
    });

    const events = eventsOf(runLogger);
    expect(events.map((event) => event.event_type)).toContain('task_completed');
    expect(events[events.length - 1].data).toEqual({
      success: true,
      result_preview: '{}',
    });
    expect(runLogger.flushed).toBe(true);
  });

  it('records progress messages from the runner channel', async () => {
    runLogger = openRunLogger();

    await runTask(buildConfig(), {
      agentFactory: staticAgent(async () => null),
      runLogger,
      installShutdownHooks: false,
      env: {},
    });

    const messages = runLogger.entries
      .filter((entry) => entry.logger === 'task_runner.runner')
      .map((entry) => entry.message);
    expect(messages[0]).toBe('🤖 Initializing LLM provider: openai');
    expect(messages).toContain('✅ Task completed');
  });

  it('records the failure, re-throws it and leaves the export to the exit hook', async () => {
    runLogger = openRunLogger();
    const failure = new Error('agent crashed');

    await expect(
      runTask(buildConfig(), {
        agentFactory: staticAgent(async () => {
          throw failure;
        }),
        runLogger,
        installShutdownHooks: false,
        env: {},
      })
    ).rejects.toBe(failure);

    const last = eventsOf(runLogger).at(-1);
    expect(last?.event_type).toBe('task_failed');
    expect(last?.data).toMatchObject({
      error_type: 'Error',
      error_message: 'agent crashed',
    });
    expect(runLogger.flushed).toBe(false);
  });

  it('hands the agent its options and a logger channel', async () => {
    let received: AgentOptions | null = null;
    const agentFactory: AgentFactory = (options) => {
      received = options;
      return { run: async () => 'ok' };
    };

    await runTask(
      buildConfig({
        logging: { enabled: false },
        browser: { headless: true, initialUrl: 'http://oa.example.internal:8080/' },
        agent: { sensitiveData: { x_password: 'test-secret' } },
      }),
      { agentFactory, env: {} }
    );

    expect(received).toMatchObject({
      task: 'Open the reports page and export March',
      use_vision: false,
      step_timeout: 130,
      flash_mode: false,
      browser: { kind: 'local', headless: true },
      initial_url: 'http://oa.example.internal:8080/',
      sensitive_data: { x_password: 'test-secret' },
      file_system_path: './agent_output',
    });
    expect(received).not.toHaveProperty('browser_profile');
  });

  it('uses the injected chat model factory', async () => {
    const createChatModel = vi.fn(
      () => new ChatOpenAI({ model: 'local-model', apiKey: 'test-secret' })
    );
    let model: string | null = null;

    await runTask(buildConfig({ logging: { enabled: false } }), {
      createChatModel,
      agentFactory: (options) => {
        model = options.llm.model;
        return { run: async () => null };
      },
      env: {},
    });

    expect(createChatModel).toHaveBeenCalledTimes(1);
    expect(model).toBe('local-model');
  });

  it('turns anonymized telemetry off unless enabled', async () => {
    const env: NodeJS.ProcessEnv = {};

    await runTask(buildConfig({ logging: { enabled: false } }), {
      agentFactory: staticAgent(async () => null),
      env,
    });

    expect(env.ANONYMIZED_TELEMETRY).toBe('false');
  });

  it('requires a task', async () => {
    await expect(
      runTask(buildConfig({ agent: { task: '   ' }, logging: { enabled: false } }), {
        agentFactory: staticAgent(async () => null),
        env: {},
      })
    ).rejects.toMatchObject({ field: 'agent.task' });
  });

  it('requires an agent implementation', async () => {
    await expect(
      runTask(buildConfig({ logging: { enabled: false } }), { env: {} })
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('describeAgentOptions', () => {
  it('masks secrets and summarizes the model and logger', () => {
    const described = describeAgentOptions({
      task: 'x'.repeat(150),
      llm: new ChatOpenAI({ model: 'o3', apiKey: 'test-secret' }),
      use_vision: true,
      step_timeout: 60,
      flash_mode: false,
      browser: { kind: 'cdp', cdp_url: 'http://127.0.0.1:9222', is_local: true },
      sensitive_data: { x_username: 'alice', x_password: 'test-secret' },
      logger: createLogger('browser_use'),
    });

    expect(described).toEqual({
      task: 'x'.repeat(100),
      llm: 'openai:o3',
      use_vision: 'true',
      step_timeout: '60',
      flash_mode: 'false',
      browser: '{"kind":"cdp","cdp_url":"http://127.0.0.1:9222","is_local":true}',
      sensitive_data: '{"x_username":"***","x_password":"***"}',
      logger: 'browser_use',
    });
  });
});

describe('previewResult', () => {
  it('treats empty results as absent', () => {
    expect(previewResult(undefined)).toBeNull();
    expect(previewResult('')).toBeNull();
    expect(previewResult(false)).toBeNull();
  });

  it('renders plain objects as JSON and truncates long text', () => {
    expect(previewResult({ rows: 3 })).toBe('{"rows":3}');
    expect(previewResult('y'.repeat(600))).toBe('y'.repeat(500));
    expect(previewResult(42)).toBe('42');
  });

  it('falls back to the object tag when a result cannot be rendered', () => {
    const result = {
      toString(): string {
        throw new Error('no text form');
      },
    };

    expect(previewResult(Object.create(null))).toBe('{}');
    expect(previewResult(result)).toBe('[object Object]');
  });
});
