import path from 'node:path';
import type { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warning: 30,
	error: 40,
	critical: 50,
};

export const ROOT_LOGGER_NAME = 'task_runner';

export const isLogLevel = (value: unknown): value is LogLevel =>
	typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);

/**
 * One logging statement as handed to every installed handler.
 */
export interface LogRecord {
	created: Date;
	level: LogLevel;
	name: string;
	message: string;
	module: string;
	functionName: string | null;
	line: number | null;
	error?: Error;
}

export interface LogHandler {
	handle(record: LogRecord): void;
}

interface SetupLoggingOptions {
	stream?: Writable;
	logLevel?: LogLevel;
	forceSetup?: boolean;
	channelLevels?: Record<string, LogLevel>;
}

const levelFromEnv = (): LogLevel => {
	const value = process.env.TASK_RUNNER_LOGGING_LEVEL;
	return isLogLevel(value) ? value : 'info';
};

let configured = false;
let rootLevel: LogLevel = levelFromEnv();
const channelLevels = new Map<string, LogLevel>();
let handlers: LogHandler[] = [];
const failedHandlers = new WeakSet<LogHandler>();
let streamHandler: StreamHandler | null = null;

const THIS_FILE = fileURLToPath(import.meta.url);

export const formatLevel = (level: LogLevel) => level.toUpperCase();

const formatMessage = (level: LogLevel, name: string, message: string) => {
	const paddedLevel = formatLevel(level).padEnd(8, ' ');
	return `${paddedLevel} [${name}] ${message}`;
};

const renderArg = (arg: unknown): string => {
	if (typeof arg === 'string') {
		return arg;
	}
	if (arg instanceof Error) {
		return String(arg);
	}
	try {
		return JSON.stringify(arg) ?? String(arg);
	} catch {
		return String(arg);
	}
};

interface CallSite {
	module: string;
	functionName: string | null;
	line: number | null;
}

const FRAME_PATTERN = /^\s*at (?:async )?(?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

const normalizeFramePath = (file: string) => {
	const withoutQuery = file.split('?')[0] ?? file;
	if (withoutQuery.startsWith('file://')) {
		try {
			return fileURLToPath(withoutQuery);
		} catch {
			return withoutQuery;
		}
	}
	return withoutQuery;
};

const captureCallSite = (): CallSite => {
	const stack = new Error().stack ?? '';
	for (const frame of stack.split('\n').slice(1)) {
		const match = FRAME_PATTERN.exec(frame);
		if (!match) {
			continue;
		}
		const [, rawFunction, rawFile, rawLine] = match;
		const file = normalizeFramePath(rawFile);
		if (file === THIS_FILE || file.startsWith('node:')) {
			continue;
		}
		const functionName = rawFunction ? (rawFunction.split('.').pop() ?? rawFunction) : null;
		return {
			module: path.basename(file, path.extname(file)),
			functionName,
			line: Number.parseInt(rawLine, 10),
		};
	}
	return { module: '<unknown>', functionName: null, line: null };
};

/**
 * The level a channel logs at: the closest configured level among the channel
 * and its dotted ancestors, otherwise the root level.
 */
export const getEffectiveLevel = (name: string): LogLevel => {
	let current = name;
	while (current) {
		const level = channelLevels.get(current);
		if (level) {
			return level;
		}
		const dot = current.lastIndexOf('.');
		current = dot === -1 ? '' : current.slice(0, dot);
	}
	return rootLevel;
};

const dispatch = (record: LogRecord) => {
	for (const handler of handlers) {
		try {
			handler.handle(record);
		} catch (error) {
			if (!failedHandlers.has(handler)) {
				failedHandlers.add(handler);
				process.stderr.write(`--- Logging error in ${handler.constructor.name}: ${renderArg(error)}\n`);
			}
		}
	}
};

export class Logger {
	constructor(private readonly name: string) { }

	public get level(): LogLevel {
		return getEffectiveLevel(this.name);
	}

	public get channel(): string {
		return this.name;
	}

	isEnabledFor(level: LogLevel) {
		return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getEffectiveLevel(this.name)];
	}

	private emit(level: LogLevel, message: string, args: unknown[]) {
		if (!this.isEnabledFor(level)) {
			return;
		}

		const payload = args.length ? `${message} ${args.map(renderArg).join(' ')}` : message;
		const error = args.find((arg): arg is Error => arg instanceof Error);
		const record: LogRecord = {
			created: new Date(),
			level,
			name: this.name,
			message: payload,
			...captureCallSite(),
		};
		if (error) {
			record.error = error;
		}
		dispatch(record);
	}

	debug(message: string, ...args: unknown[]) {
		this.emit('debug', message, args);
	}

	info(message: string, ...args: unknown[]) {
		this.emit('info', message, args);
	}

	warning(message: string, ...args: unknown[]) {
		this.emit('warning', message, args);
	}

	// Alias for compatibility
	warn(message: string, ...args: unknown[]) {
		this.emit('warning', message, args);
	}

	error(message: string, ...args: unknown[]) {
		this.emit('error', message, args);
	}

	critical(message: string, ...args: unknown[]) {
		this.emit('critical', message, args);
	}

	child(suffix: string) {
		return new Logger(`${this.name}.${suffix}`);
	}
}

/**
 * Writes `LEVEL    [name] message` lines to a stream.
 */
export class StreamHandler implements LogHandler {
	constructor(
		private readonly stream: Writable,
		private readonly level: LogLevel | null = null,
	) { }

	handle(record: LogRecord) {
		if (this.level && LEVEL_PRIORITY[record.level] < LEVEL_PRIORITY[this.level]) {
			return;
		}
		let line = formatMessage(record.level, record.name, record.message);
		if (record.error?.stack) {
			line += `\n${record.error.stack}`;
		}
		this.stream.write(`${line}\n`);
	}
}

export const createLogger = (name: string) => new Logger(name);

export const addHandler = (handler: LogHandler) => {
	if (!handlers.includes(handler)) {
		handlers = [...handlers, handler];
	}
};

export const removeHandler = (handler: LogHandler) => {
	handlers = handlers.filter((existing) => existing !== handler);
};

export const setRootLevel = (level: LogLevel) => {
	rootLevel = level;
};

export const getRootLevel = () => rootLevel;

export const setLevel = (name: string, level: LogLevel) => {
	channelLevels.set(name, level);
};

export const getLevel = (name: string): LogLevel | undefined => channelLevels.get(name);

export const clearLevel = (name: string) => {
	channelLevels.delete(name);
};

export const setChannelLevels = (levels: Record<string, LogLevel>) => {
	for (const [name, level] of Object.entries(levels)) {
		channelLevels.set(name, level);
	}
};

export const setupLogging = (options: SetupLoggingOptions = {}) => {
	if (configured && !options.forceSetup) {
		return createLogger(ROOT_LOGGER_NAME);
	}

	const level = options.logLevel ?? levelFromEnv();
	rootLevel = level;
	if (options.channelLevels) {
		setChannelLevels(options.channelLevels);
	}
	if (streamHandler) {
		removeHandler(streamHandler);
	}
	streamHandler = new StreamHandler(options.stream ?? process.stderr, level);
	addHandler(streamHandler);
	configured = true;

	return createLogger(ROOT_LOGGER_NAME);
};

type ConsoleMethod = 'log' | 'info' | 'debug' | 'warn' | 'error';

const CONSOLE_LEVELS: Record<ConsoleMethod, LogLevel> = {
	log: 'info',
	info: 'info',
	debug: 'debug',
	warn: 'warning',
	error: 'error',
};

const CONSOLE_METHODS: ConsoleMethod[] = ['log', 'info', 'debug', 'warn', 'error'];

let restoreConsole: (() => void) | null = null;

/**
 * Routes console output through a channel so that it reaches the installed
 * handlers. Returns a function that puts the original methods back.
 */
export const interceptConsole = (name = 'console') => {
	if (restoreConsole) {
		return restoreConsole;
	}

	const logger = createLogger(name);
	const originals = {
		log: console.log,
		info: console.info,
		debug: console.debug,
		warn: console.warn,
		error: console.error,
	};

	for (const method of CONSOLE_METHODS) {
		const level = CONSOLE_LEVELS[method];
		console[method] = (...args: unknown[]) => {
			const error = args.find((arg): arg is Error => arg instanceof Error);
			if (level === 'debug') {
				logger.debug(format(...args));
			} else if (level === 'info') {
				logger.info(format(...args));
			} else if (level === 'warning') {
				logger.warning(format(...args));
			} else if (error) {
				logger.error(format(...args.filter((arg) => arg !== error)), error);
			} else {
				logger.error(format(...args));
			}
		};
	}

	const restore = () => {
		Object.assign(console, originals);
		restoreConsole = null;
	};
	restoreConsole = restore;
	return restore;
};

/**
 * Drops every handler, level and console interception.
 */
export const resetLogging = () => {
	restoreConsole?.();
	handlers = [];
	channelLevels.clear();
	streamHandler = null;
	configured = false;
	rootLevel = levelFromEnv();
};

export const logger = createLogger(ROOT_LOGGER_NAME);
