import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigurationError } from '../exceptions.js';
import type { AgentFactory } from './views.js';

const isFactory = (value: unknown): value is AgentFactory => typeof value === 'function';

/**
 * Module specifiers starting with `.` or `/` are files, resolved from `cwd`;
 * anything else is a package name.
 */
export function toImportSpecifier(specifier: string, cwd: string = process.cwd()): string {
	if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
		return pathToFileURL(path.resolve(cwd, specifier)).href;
	}
	return specifier;
}

/**
 * Imports an agent implementation and returns its `createAgent` export, or the
 * default export when that is a function.
 *
 * @throws ConfigurationError when the module or a factory export is missing
 */
export async function loadAgentFactory(specifier: string, cwd?: string): Promise<AgentFactory> {
	let loaded: unknown;
	try {
		loaded = await import(toImportSpecifier(specifier, cwd));
	} catch (error) {
		throw new ConfigurationError(
			`Cannot load agent module '${specifier}': ${error instanceof Error ? error.message : String(error)}`,
			'agent.module',
			{ cause: error },
		);
	}

	if (typeof loaded === 'object' && loaded !== null) {
		if ('createAgent' in loaded && isFactory(loaded.createAgent)) {
			return loaded.createAgent;
		}
		if ('default' in loaded && isFactory(loaded.default)) {
			return loaded.default;
		}
	}

	throw new ConfigurationError(
		`Agent module '${specifier}' exports neither createAgent nor a default factory function`,
		'agent.module',
	);
}
