import { afterEach, describe, expect, it, vi } from 'vitest';
import { USAGE } from '../src/cli-args.js';
import { main } from '../src/cli.js';
import { resetLogging } from '../src/logging-config.js';
import { get_task_runner_version } from '../src/utils.js';

const captureOutput = () => ({
  stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
  stderr: vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
});

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogging();
  });

  it('prints the usage for --help', async () => {
    const { stdout } = captureOutput();

    await expect(main(['--help'])).resolves.toBe(0);
    expect(stdout).toHaveBeenCalledWith(`${USAGE}\n`);
  });

  it('prints the package version', async () => {
    const { stdout } = captureOutput();

    await expect(main(['--version'])).resolves.toBe(0);
    expect(stdout).toHaveBeenCalledWith(`${get_task_runner_version()}\n`);
  });

  it('rejects unknown options with the usage', async () => {
    const { stderr } = captureOutput();

    await expect(main(['--bogus'])).resolves.toBe(1);
    expect(stderr).toHaveBeenCalledWith(`Error: Unknown option: --bogus\n\n${USAGE}\n`);
  });

  it('fails a run without a task before anything is logged', async () => {
    const { stderr } = captureOutput();

    await expect(main(['run', '--config', 'test/fixtures/no-task.config.json'])).resolves.toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      'Error: No task configured; pass one on the command line or set agent.task or agent.taskFile\n'
    );
  });
});
