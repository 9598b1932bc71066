/**
 * Run-scoped structured event recorder.
 *
 * A RunLogger attaches itself to the channel hierarchy of `logging-config`,
 * keeps every record of the run in memory in arrival order, mirrors each one to
 * a plain-text transcript (and optionally the console), and writes the whole run
 * to one JSON document exactly once.
 *
 * Every side effect (transcript write, console write, capture) sits in its own
 * failure boundary: a failing sink never blocks another sink or the run.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Writable } from 'node:stream';
import { ExportError, FilesystemError } from '../exceptions.js';
import {
  addHandler,
  clearLevel,
  formatLevel,
  getLevel,
  getRootLevel,
  removeHandler,
  setChannelLevels,
  setLevel,
  setRootLevel,
  type LogHandler,
  type LogLevel,
  type LogRecord,
} from '../logging-config.js';
import {
  formatFileTimestamp,
  formatLogTimestamp,
  toJsonSafe,
  type JsonValue,
} from '../utils.js';

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export type RecordLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';
export type EntryLevel = RecordLevel | 'EVENT';

export interface RecordLogEntry {
  timestamp: string;
  level: RecordLevel;
  logger: string;
  message: string;
  module: string;
  function: string | null;
  line: number | null;
  exception?: string;
}

export interface EventLogEntry {
  timestamp: string;
  level: 'EVENT';
  logger: string;
  event_type: string;
  message: string;
  data: JsonValue;
}

export type LogEntry = RecordLogEntry | EventLogEntry;

export type CountTable = Record<string, number>;

export interface RunStatistics {
  by_level: CountTable;
  by_event_type: CountTable;
  by_logger: CountTable;
}

export interface RunLogDocument {
  metadata: {
    start_time: string;
    end_time: string;
    duration_seconds: number;
    total_entries: number;
    log_file: string;
    json_log_file: string;
  };
  statistics: RunStatistics;
  logs: LogEntry[];
}

export interface RunSummary {
  total_entries: number;
  duration_seconds: number;
  by_level: CountTable;
  by_event: CountTable;
  by_logger: CountTable;
  log_file: string;
  json_log_file: string | null;
}

export interface RunLoggerOptions {
  logDir?: string;
  /** Write the structured JSON document on export (default: true) */
  enableJson?: boolean;
  /** Echo every entry to the console stream (default: true) */
  enableConsole?: boolean;
  /** Level caps for noisy channels, merged over DEFAULT_CHANNEL_LEVELS */
  channelLevels?: Record<string, LogLevel>;
  consoleStream?: Writable;
  now?: () => Date;
}

export const EVENT_LOGGER_NAME = 'AgentLogger';

export const DEFAULT_CHANNEL_LEVELS: Record<string, LogLevel> = {
  browser_use: 'info',
  playwright: 'warning',
};

const SUMMARY_RULE = '='.repeat(60);

const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const roundSeconds = (milliseconds: number) =>
  Math.round(milliseconds / 10) / 100;

const increment = (table: CountTable, key: string) => {
  table[key] = (table[key] ?? 0) + 1;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

interface OpenedTranscript {
  fd: number;
  logFile: string;
  jsonLogFile: string;
}

/**
 * Creates the transcript under a name derived from the start time. A name that
 * is already taken (another run in the same second) gets a `_1`, `_2`, ...
 * suffix; the exclusive open makes the claim atomic.
 */
const openTranscript = (logDir: string, startTime: Date): OpenedTranscript => {
  const base = `agent_run_${formatFileTimestamp(startTime)}`;
  for (let attempt = 0; ; attempt++) {
    const stem = attempt === 0 ? base : `${base}_${attempt}`;
    const logFile = path.join(logDir, `${stem}.log`);
    const jsonLogFile = path.join(logDir, `${stem}.json`);
    if (fs.existsSync(jsonLogFile)) {
      continue;
    }
    try {
      const fd = fs.openSync(logFile, 'wx');
      return { fd, logFile, jsonLogFile };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        continue;
      }
      throw new FilesystemError(
        `Log directory is not writable: ${logDir} (${describeError(error)})`,
        logDir,
        { cause: error }
      );
    }
  }
};

export class RunLogger implements LogHandler {
  readonly startTime: Date;
  readonly logDir: string;
  readonly logFile: string;
  readonly jsonLogFile: string;
  readonly enableJson: boolean;
  readonly enableConsole: boolean;

  private readonly logs: LogEntry[] = [];
  private readonly consoleStream: Writable;
  private readonly now: () => Date;
  private transcriptFd: number | null;
  private isFlushed = false;
  private installed = false;
  private previousRootLevel: LogLevel | null = null;
  private readonly previousChannelLevels = new Map<string, LogLevel | undefined>();

  private constructor(
    options: Required<Omit<RunLoggerOptions, 'channelLevels'>>,
    transcript: OpenedTranscript,
    startTime: Date
  ) {
    this.logDir = options.logDir;
    this.enableJson = options.enableJson;
    this.enableConsole = options.enableConsole;
    this.consoleStream = options.consoleStream;
    this.now = options.now;
    this.startTime = startTime;
    this.logFile = transcript.logFile;
    this.jsonLogFile = transcript.jsonLogFile;
    this.transcriptFd = transcript.fd;
  }

  /**
   * Creates the log directory, claims the artifact names and attaches the
   * logger to every channel at the most permissive level.
   *
   * @throws FilesystemError when the directory cannot be created or written
   */
  static open(options: RunLoggerOptions = {}): RunLogger {
    const resolved = {
      logDir: options.logDir ?? './logs',
      enableJson: options.enableJson ?? true,
      enableConsole: options.enableConsole ?? true,
      consoleStream: options.consoleStream ?? process.stdout,
      now: options.now ?? (() => new Date()),
    };

    try {
      fs.mkdirSync(resolved.logDir, { recursive: true });
    } catch (error) {
      throw new FilesystemError(
        `Cannot create log directory ${resolved.logDir}: ${describeError(error)}`,
        resolved.logDir,
        { cause: error }
      );
    }

    const startTime = resolved.now();
    const transcript = openTranscript(resolved.logDir, startTime);
    const runLogger = new RunLogger(resolved, transcript, startTime);
    runLogger.install({ ...DEFAULT_CHANNEL_LEVELS, ...options.channelLevels });

    runLogger.writeConsole('📝 Run logging enabled');
    runLogger.writeConsole(`   - Text log: ${runLogger.logFile}`);
    if (runLogger.enableJson) {
      runLogger.writeConsole(`   - JSON log: ${runLogger.jsonLogFile}`);
    }
    return runLogger;
  }

  get flushed(): boolean {
    return this.isFlushed;
  }

  /** Copy of the captured entries in arrival order */
  get entries(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Handler entry point for the channel hierarchy.
   */
  handle(record: LogRecord): void {
    let entry: RecordLogEntry;
    try {
      entry = {
        timestamp: record.created.toISOString(),
        level: this.toRecordLevel(record.level),
        logger: record.name,
        message: record.message,
        module: record.module,
        function: record.functionName,
        line: record.line,
      };
      if (record.error) {
        entry.exception = record.error.stack ?? String(record.error);
      }
    } catch {
      return;
    }
    this.record(entry);
  }

  /**
   * Appends an entry and mirrors it to the transcript and, when enabled, the
   * console. Never throws.
   */
  record(entry: LogEntry): void {
    try {
      const stored: LogEntry =
        entry.level === 'EVENT'
          ? { ...entry, data: toJsonSafe(entry.data) }
          : { ...entry };
      this.logs.push(deepFreeze(stored));
    } catch {
      return;
    }

    let line: string;
    try {
      line = `${formatLogTimestamp(new Date(entry.timestamp))} - ${entry.logger} - ${entry.level} - ${entry.message}`;
    } catch {
      return;
    }

    this.writeTranscript(line);
    if (this.enableConsole) {
      this.writeConsole(line);
    }
  }

  /**
   * Records an application milestone such as `task_started`. The payload is
   * copied into a JSON-safe form at capture time.
   */
  emitEvent(eventType: string, data: Record<string, unknown> = {}): void {
    try {
      this.record({
        timestamp: this.now().toISOString(),
        level: 'EVENT',
        logger: EVENT_LOGGER_NAME,
        event_type: eventType,
        message: `Event: ${eventType}`,
        data: toJsonSafe(data),
      });
    } catch {
      // a broken clock must not abort the run
    }
    if (!this.enableConsole) {
      this.writeConsole(`📌 Event: ${eventType}`);
    }
  }

  statistics(): RunStatistics {
    const by_level: CountTable = {};
    const by_event_type: CountTable = {};
    const by_logger: CountTable = {};
    for (const entry of this.logs) {
      increment(by_level, entry.level);
      if (entry.level === 'EVENT') {
        increment(by_event_type, entry.event_type);
      }
      increment(by_logger, entry.logger);
    }
    return { by_level, by_event_type, by_logger };
  }

  summary(): RunSummary {
    const { by_level, by_event_type, by_logger } = this.statistics();
    return {
      total_entries: this.logs.length,
      duration_seconds: roundSeconds(this.now().getTime() - this.startTime.getTime()),
      by_level,
      by_event: by_event_type,
      by_logger,
      log_file: this.logFile,
      json_log_file: this.enableJson ? this.jsonLogFile : null,
    };
  }

  buildDocument(endTime: Date = this.now()): RunLogDocument {
    return {
      metadata: {
        start_time: this.startTime.toISOString(),
        end_time: endTime.toISOString(),
        duration_seconds: roundSeconds(endTime.getTime() - this.startTime.getTime()),
        total_entries: this.logs.length,
        log_file: this.logFile,
        json_log_file: this.jsonLogFile,
      },
      statistics: this.statistics(),
      logs: [...this.logs],
    };
  }

  /**
   * Writes the structured document and prints the run summary. Runs at most
   * once per session: later calls return `false` without touching any file.
   * Failures are reported on the console stream, never thrown.
   */
  export(): boolean {
    if (this.isFlushed) {
      return false;
    }
    this.isFlushed = true;

    try {
      const document = this.buildDocument();
      if (this.enableJson) {
        fs.writeFileSync(this.jsonLogFile, JSON.stringify(document, null, 2), 'utf-8');
        this.writeConsole(`\n✅ JSON log saved: ${this.jsonLogFile}`);
      }
      this.printSummary(document);
    } catch (error) {
      this.writeConsole(`\n❌ ${new ExportError(this.jsonLogFile, error).message}`);
    }
    return true;
  }

  /**
   * Detaches from the channel hierarchy and closes the transcript. Entries
   * recorded afterwards are still kept in memory.
   */
  close(): void {
    if (this.installed) {
      removeHandler(this);
      if (this.previousRootLevel) {
        setRootLevel(this.previousRootLevel);
      }
      for (const [name, level] of this.previousChannelLevels) {
        if (level === undefined) {
          clearLevel(name);
        } else {
          setLevel(name, level);
        }
      }
      this.previousChannelLevels.clear();
      this.installed = false;
    }
    if (this.transcriptFd !== null) {
      try {
        fs.closeSync(this.transcriptFd);
      } catch {
        // already closed
      }
      this.transcriptFd = null;
    }
  }

  private install(channelLevels: Record<string, LogLevel>) {
    this.previousRootLevel = getRootLevel();
    for (const name of Object.keys(channelLevels)) {
      this.previousChannelLevels.set(name, getLevel(name));
    }
    setRootLevel('debug');
    setChannelLevels(channelLevels);
    addHandler(this);
    this.installed = true;
  }

  private toRecordLevel(level: LogLevel): RecordLevel {
    switch (level) {
      case 'debug':
        return 'DEBUG';
      case 'info':
        return 'INFO';
      case 'warning':
        return 'WARNING';
      case 'error':
        return 'ERROR';
      case 'critical':
        return 'CRITICAL';
      default:
        throw new Error(`Unknown level ${formatLevel(level)}`);
    }
  }

  private printSummary(document: RunLogDocument) {
    const { metadata, statistics } = document;
    const lines = [
      '',
      SUMMARY_RULE,
      '📊 Run summary:',
      `   ⏱️  Duration: ${metadata.duration_seconds.toFixed(1)} s`,
      `   📝 Entries: ${metadata.total_entries}`,
      `   📊 Levels: ${JSON.stringify(statistics.by_level)}`,
    ];
    if (Object.keys(statistics.by_event_type).length > 0) {
      lines.push(`   🎯 Events: ${JSON.stringify(statistics.by_event_type)}`);
    }
    lines.push(`   📄 Text log: ${metadata.log_file}`);
    if (this.enableJson) {
      lines.push(`   📋 JSON log: ${metadata.json_log_file}`);
    }
    lines.push(SUMMARY_RULE);
    this.writeConsole(lines.join('\n'));
  }

  private writeTranscript(line: string) {
    if (this.transcriptFd === null) {
      return;
    }
    try {
      fs.writeSync(this.transcriptFd, `${line}\n`);
    } catch {
      // transcript is best-effort
    }
  }

  private writeConsole(line: string) {
    try {
      this.consoleStream.write(`${line}\n`);
    } catch {
      // console echo is best-effort
    }
  }
}
