import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { loadAgentFactory, toImportSpecifier } from '../src/agent/index.js';
import { ConfigurationError } from '../src/exceptions.js';
import { ChatBrowserUse } from '../src/llm/index.js';
import { createLogger } from '../src/logging-config.js';
import { makeTempDir, removeTempDirs } from './support/memory-writable.js';

const writeModule = (source: string) => {
  const dir = makeTempDir('task-runner-agent-');
  const file = path.join(dir, 'agent.mjs');
  fs.writeFileSync(file, source);
  return { dir, file };
};

afterEach(removeTempDirs);

describe('toImportSpecifier', () => {
  it('turns relative paths into file URLs and keeps package names', () => {
    expect(toImportSpecifier('./agents/main.mjs', '/srv/runner')).toBe(
      pathToFileURL('/srv/runner/agents/main.mjs').href
    );
    expect(toImportSpecifier('some-agent-package', '/srv/runner')).toBe(
      'some-agent-package'
    );
  });
});

describe('loadAgentFactory', () => {
  it('returns the createAgent export', async () => {
    const { dir } = writeModule(
      'export function createAgent(options) { return { run: async () => options.task }; }\n'
    );

    const factory = await loadAgentFactory('./agent.mjs', dir);

    expect(factory.name).toBe('createAgent');
  });

  it('falls back to a default export function', async () => {
    const { file } = writeModule(
      'export default function buildAgent() { return { run: async () => null }; }\n'
    );

    const factory = await loadAgentFactory(file);

    expect(factory.name).toBe('buildAgent');
  });

  it('rejects a module without a factory', async () => {
    const { file } = writeModule('export const createAgent = 42;\n');

    await expect(loadAgentFactory(file)).rejects.toThrow(
      `Agent module '${file}' exports neither createAgent nor a default factory function`
    );
  });

  it('rejects a module that cannot be imported', async () => {
    const dir = makeTempDir('task-runner-agent-');

    await expect(loadAgentFactory('./missing.mjs', dir)).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});

describe('plan-only example agent', () => {
  it('returns the plan the model writes', async () => {
    const createAgent = await loadAgentFactory('./examples/plan-only-agent.ts');
    const llm = new ChatBrowserUse({
      apiKey: 'test-secret',
      fetchImplementation: async () =>
        new Response(JSON.stringify({ completion: '1. Open the to-do list' }), {
          status: 200,
        }),
    });

    const agent = await createAgent({
      task: 'Collect the open to-do items',
      llm,
      use_vision: false,
      step_timeout: 130,
      flash_mode: false,
      browser: { kind: 'local', headless: true },
      logger: createLogger('browser_use'),
    });

    await expect(agent.run(5)).resolves.toBe('1. Open the to-do list');
  });
});
