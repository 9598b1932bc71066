import { describe, expect, it } from 'vitest';
import { parseArgs, toConfigOverrides, type ParsedArgs } from '../src/cli-args.js';

const parsed = (args: string[]): ParsedArgs => {
  const result = parseArgs(args);
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.args;
};

const parseError = (args: string[]) => {
  const result = parseArgs(args);
  return result.success ? null : result.error;
};

describe('parseArgs', () => {
  it('defaults to the run command and joins positional words into the task', () => {
    expect(parsed(['Open', 'the', 'dashboard'])).toEqual({
      command: 'run',
      task: 'Open the dashboard',
      help: false,
      version: false,
      quiet: false,
    });
  });

  it('reads options in both spellings', () => {
    const args = parsed([
      'run',
      '--provider=Anthropic',
      '--model',
      'claude-sonnet-4-0',
      '--max-steps=25',
      '--no-vision',
      '--headless',
      '--log-dir',
      './run-logs',
      '--no-json-log',
      '--quiet',
      'check',
      'mail',
    ]);

    expect(args).toMatchObject({
      command: 'run',
      task: 'check mail',
      provider: 'anthropic',
      model: 'claude-sonnet-4-0',
      maxSteps: 25,
      vision: false,
      headless: true,
      logDir: './run-logs',
      jsonLog: false,
      quiet: true,
    });
  });

  it('recognizes the diagnostic commands', () => {
    expect(parsed(['check-api', '--model', 'gpt-4.1-mini'])).toMatchObject({
      command: 'check-api',
      model: 'gpt-4.1-mini',
    });
    expect(parsed(['check-install', '--config', 'runner.json'])).toMatchObject({
      command: 'check-install',
      configPath: 'runner.json',
    });
  });

  it('rejects bad input with a message', () => {
    expect(parseError(['--bogus'])).toBe('Unknown option: --bogus');
    expect(parseError(['--model'])).toBe('--model requires a value');
    expect(parseError(['--max-steps', '0'])).toBe('--max-steps must be a positive integer');
    expect(parseError(['--provider', 'acme'])).toBe(
      '--provider must be one of: openai, anthropic, google, groq, ollama, azure, browser_use'
    );
    expect(parseError(['check-install', 'extra'])).toBe(
      'check-install takes no positional arguments'
    );
  });

  it('only treats the first word as a command', () => {
    expect(parsed(['summarize', 'check-api', 'docs']).task).toBe(
      'summarize check-api docs'
    );
  });
});

describe('toConfigOverrides', () => {
  it('maps flags onto config sections', () => {
    expect(
      toConfigOverrides(
        parsed(['Find invoices', '--provider', 'groq', '--max-steps', '3', '--quiet'])
      )
    ).toEqual({
      llm: { provider: 'groq' },
      agent: { task: 'Find invoices', maxSteps: 3 },
      logging: { console: false },
    });
  });

  it('leaves everything to other sources when no flags are given', () => {
    expect(toConfigOverrides(parsed([]))).toEqual({});
  });
});
