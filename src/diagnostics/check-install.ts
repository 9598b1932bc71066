/**
 * Verifies that the runtime libraries resolve and reports their versions
 */

import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';
import { loadAgentFactory } from '../agent/loader.js';
import { get_task_runner_version } from '../utils.js';

const requireFromHere = createRequire(import.meta.url);

export const REQUIRED_LIBRARIES = ['openai', 'zod', 'dotenv', 'axios'];

export interface LibraryStatus {
  name: string;
  installed: boolean;
  version: string | null;
  error: string | null;
}

export interface InstallReport {
  ok: boolean;
  node: string;
  runner: string;
  libraries: LibraryStatus[];
  agentModule: LibraryStatus | null;
}

export interface CheckInstallOptions {
  libraries?: string[];
  /** Agent implementation to import as well */
  agentModule?: string;
}

const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

/**
 * Version from the nearest package.json above the resolved entry point that
 * carries the package's name.
 */
function findInstalledVersion(name: string): string | null {
  let dir = path.dirname(requireFromHere.resolve(name));
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'name' in parsed &&
        parsed.name === name &&
        'version' in parsed &&
        typeof parsed.version === 'string'
      ) {
        return parsed.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

async function checkLibrary(name: string): Promise<LibraryStatus> {
  try {
    await import(name);
  } catch (error) {
    return { name, installed: false, version: null, error: describeError(error) };
  }
  try {
    return { name, installed: true, version: findInstalledVersion(name), error: null };
  } catch (error) {
    return { name, installed: true, version: null, error: describeError(error) };
  }
}

async function checkAgentModule(specifier: string): Promise<LibraryStatus> {
  try {
    await loadAgentFactory(specifier);
    return { name: specifier, installed: true, version: null, error: null };
  } catch (error) {
    return { name: specifier, installed: false, version: null, error: describeError(error) };
  }
}

export async function checkInstall(
  options: CheckInstallOptions = {}
): Promise<InstallReport> {
  const libraries = await Promise.all(
    (options.libraries ?? REQUIRED_LIBRARIES).map(checkLibrary)
  );
  const agentModule = options.agentModule
    ? await checkAgentModule(options.agentModule)
    : null;

  return {
    ok:
      libraries.every((library) => library.installed) &&
      (agentModule?.installed ?? true),
    node: process.version,
    runner: get_task_runner_version(),
    libraries,
    agentModule,
  };
}

const formatStatus = (status: LibraryStatus) =>
  status.installed
    ? `✓ ${status.name} ${status.version ?? '(version unknown)'}`
    : `✗ ${status.name} is not available: ${status.error ?? 'unknown error'}`;

export function formatInstallReport(report: InstallReport): string[] {
  const lines = report.libraries.map(formatStatus);
  if (report.agentModule) {
    lines.push(formatStatus(report.agentModule));
  }
  lines.push(`✓ Node.js version: ${report.node}`);
  lines.push(`✓ task-runner version: ${report.runner}`);
  lines.push(
    '',
    report.ok ? '✅ Environment is ready!' : '❌ Environment is incomplete'
  );
  return lines;
}
