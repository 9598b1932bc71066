#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { parseArgs, toConfigOverrides, USAGE, type ParsedArgs } from './cli-args.js';
import { loadConfig } from './config/loader.js';
import { checkApi, apiCheckPassed, formatApiReport } from './diagnostics/check-api.js';
import { checkInstall, formatInstallReport } from './diagnostics/check-install.js';
import { ConfigurationError, FilesystemError } from './exceptions.js';
import { createLogger, setupLogging } from './logging-config.js';
import { runTask } from './runner/service.js';
import { get_task_runner_version } from './utils.js';

const logger = createLogger('task_runner.cli');

const print = (lines: string[]) => {
  process.stdout.write(`${lines.join('\n')}\n`);
};

async function runCommand(args: ParsedArgs): Promise<number> {
  const { config } = await loadConfig({
    configPath: args.configPath,
    overrides: toConfigOverrides(args),
  });

  // With console echo on, the run log already mirrors every record
  const echoed = config.logging.enabled && config.logging.console;
  if (!echoed) {
    setupLogging({ logLevel: args.quiet ? 'warning' : config.logging.level });
  }

  try {
    await runTask(config);
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof FilesystemError) {
      throw error;
    }
    logger.error('Task failed', error);
    return 1;
  }
}

async function checkInstallCommand(args: ParsedArgs): Promise<number> {
  const { config } = await loadConfig({ configPath: args.configPath });
  const report = await checkInstall({ agentModule: config.agent.module });
  print(formatInstallReport(report));
  return report.ok ? 0 : 1;
}

async function checkApiCommand(args: ParsedArgs): Promise<number> {
  loadEnv();
  const report = await checkApi({ model: args.model });
  print(formatApiReport(report));
  return apiCheckPassed(report) ? 0 : 1;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.success) {
    process.stderr.write(`Error: ${parsed.error}\n\n${USAGE}\n`);
    return 1;
  }

  const { args } = parsed;
  if (args.help) {
    print([USAGE]);
    return 0;
  }
  if (args.version) {
    print([get_task_runner_version()]);
    return 0;
  }

  try {
    switch (args.command) {
      case 'check-install':
        return await checkInstallCommand(args);
      case 'check-api':
        return await checkApiCommand(args);
      default:
        return await runCommand(args);
    }
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof FilesystemError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

const invokedPath = process.argv[1] ? realpathSync(process.argv[1]) : null;

if (invokedPath === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      logger.critical('Unexpected failure', error);
      process.exit(1);
    }
  );
}
