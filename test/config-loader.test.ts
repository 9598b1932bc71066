import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG,
  environmentOverrides,
  loadConfig,
  resolveCredentials,
} from '../src/config/index.js';
import { ConfigurationError } from '../src/exceptions.js';
import { makeTempDir, removeTempDirs } from './support/memory-writable.js';

const writeJson = (dir: string, name: string, value: unknown) => {
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(value));
  return file;
};

const captureError = async (promise: Promise<unknown>) => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
};

describe('loadConfig', () => {
  afterEach(removeTempDirs);

  it('falls back to defaults when there is no config file', async () => {
    const cwd = makeTempDir();

    const { config, source } = await loadConfig({ env: {}, cwd });

    expect(source).toBeNull();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.agent.maxSteps).toBe(70);
    expect(config.logging.channelLevels).toEqual({
      browser_use: 'info',
      playwright: 'warning',
    });
  });

  it('reads the default config file from the working directory', async () => {
    const cwd = makeTempDir();
    const file = writeJson(cwd, 'task-runner.config.json', {
      agent: { task: 'Open the dashboard', maxSteps: 12 },
    });

    const { config, source } = await loadConfig({ env: {}, cwd });

    expect(source).toBe(file);
    expect(config.agent.task).toBe('Open the dashboard');
    expect(config.agent.maxSteps).toBe(12);
  });

  it('lets the environment override the file and explicit overrides win', async () => {
    const cwd = makeTempDir();
    const configPath = writeJson(cwd, 'custom.json', {
      llm: { provider: 'anthropic', model: 'from-file' },
      agent: { maxSteps: 5 },
    });

    const { config } = await loadConfig({
      cwd,
      configPath,
      env: {
        LLM_MODEL: 'from-env',
        TASK_RUNNER_MAX_STEPS: '9',
        ANTHROPIC_API_KEY: 'test-secret',
      },
      overrides: { agent: { maxSteps: 3 } },
    });

    expect(config.llm.provider).toBe('anthropic');
    expect(config.llm.model).toBe('from-env');
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.agent.maxSteps).toBe(3);
  });

  it('locates the config file through TASK_RUNNER_CONFIG', async () => {
    const cwd = makeTempDir();
    writeJson(cwd, 'elsewhere.json', { browser: { headless: true } });

    const { config } = await loadConfig({
      cwd,
      env: { TASK_RUNNER_CONFIG: 'elsewhere.json' },
    });

    expect(config.browser.headless).toBe(true);
  });

  it('reads the task from a task file next to the config file', async () => {
    const cwd = makeTempDir();
    const configDir = path.join(cwd, 'config');
    fs.mkdirSync(configDir);
    fs.writeFileSync(path.join(configDir, 'task.md'), '# Task\nLog in and export the report');
    const configPath = writeJson(configDir, 'runner.json', {
      agent: { taskFile: 'task.md' },
    });

    const { config } = await loadConfig({ cwd, configPath, env: {} });

    expect(config.agent.task).toBe('# Task\nLog in and export the report');
  });

  it('keeps an inline task over the task file', async () => {
    const cwd = makeTempDir();
    const configPath = writeJson(cwd, 'runner.json', {
      agent: { task: 'Inline task', taskFile: 'missing.md' },
    });

    const { config } = await loadConfig({ cwd, configPath, env: {} });

    expect(config.agent.task).toBe('Inline task');
  });

  it('rejects a missing task file', async () => {
    const cwd = makeTempDir();
    const configPath = writeJson(cwd, 'runner.json', {
      agent: { taskFile: 'missing.md' },
    });

    const error = await captureError(loadConfig({ cwd, configPath, env: {} }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: 'agent.taskFile' });
  });

  it('rejects a config file that is not valid JSON', async () => {
    const cwd = makeTempDir();
    const configPath = path.join(cwd, 'broken.json');
    fs.writeFileSync(configPath, '{ "llm": ');

    const error = await captureError(loadConfig({ cwd, configPath, env: {} }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: 'config' });
  });

  it('rejects a config file holding something other than an object', async () => {
    const cwd = makeTempDir();
    const configPath = writeJson(cwd, 'list.json', ['openai']);

    await expect(loadConfig({ cwd, configPath, env: {} })).rejects.toThrow(
      `Config file ${configPath} must contain a JSON object`
    );
  });

  it('names the first invalid field', async () => {
    const cwd = makeTempDir();

    const error = await captureError(
      loadConfig({ cwd, env: {}, overrides: { agent: { maxSteps: 0 } } })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: 'agent.maxSteps' });
  });

  it('rejects an unknown provider from the environment', async () => {
    const cwd = makeTempDir();

    const error = await captureError(
      loadConfig({ cwd, env: { LLM_PROVIDER: 'Mystery' } })
    );

    expect(error).toMatchObject({ field: 'llm.provider' });
  });
});

describe('environmentOverrides', () => {
  it('maps variables onto config sections and drops empty sections', () => {
    expect(
      environmentOverrides({
        LLM_PROVIDER: ' Groq ',
        LLM_TEMPERATURE: '0.5',
        TASK_RUNNER_HEADLESS: 'yes',
        TASK_RUNNER_CDP_URL: 'http://127.0.0.1:9333',
        ANONYMIZED_TELEMETRY: 'false',
      })
    ).toEqual({
      llm: { provider: 'groq', temperature: 0.5 },
      browser: {
        headless: true,
        cdpUrl: 'http://127.0.0.1:9333',
        useExistingBrowser: true,
      },
      telemetry: { anonymizedTelemetry: false },
    });
  });

  it('returns nothing for an empty environment', () => {
    expect(environmentOverrides({})).toEqual({});
  });
});

describe('resolveCredentials', () => {
  it('takes the OpenAI key and endpoint from the environment', () => {
    const llm = resolveCredentials(
      { ...DEFAULT_CONFIG.llm, apiKey: 'from-file' },
      {
        OPENAI_API_KEY: 'test-secret',
        OPENAI_ENDPOINT: 'http://llm.example.internal:8000/v1',
      }
    );

    expect(llm.apiKey).toBe('test-secret');
    expect(llm.baseUrl).toBe('http://llm.example.internal:8000/v1');
  });

  it('keeps the configured key when the environment has none', () => {
    const llm = resolveCredentials({ ...DEFAULT_CONFIG.llm, apiKey: 'from-file' }, {});

    expect(llm.apiKey).toBe('from-file');
  });

  it('fills the Azure endpoint and API version', () => {
    const llm = resolveCredentials(
      { ...DEFAULT_CONFIG.llm, provider: 'azure' },
      {
        AZURE_OPENAI_KEY: 'test-secret',
        AZURE_OPENAI_ENDPOINT: 'https://example-resource.openai.azure.com',
        AZURE_OPENAI_API_VERSION: '2024-06-01',
      }
    );

    expect(llm).toMatchObject({
      apiKey: 'test-secret',
      azureEndpoint: 'https://example-resource.openai.azure.com',
      apiVersion: '2024-06-01',
    });
  });

  it('rejects a malformed endpoint from the environment', () => {
    expect(() =>
      resolveCredentials(
        { ...DEFAULT_CONFIG.llm, provider: 'ollama' },
        { OLLAMA_HOST: 'not a url' }
      )
    ).toThrow(ConfigurationError);
  });
});
