import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLogger } from './logging-config.js';

const logger = createLogger('task_runner.utils');

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

const describeFailure = (error: unknown) =>
  `[Unserializable: ${error instanceof Error ? error.message : String(error)}]`;

/**
 * Copies a value into something `JSON.stringify` always accepts. Cycles become
 * `"[Circular]"`, values JSON has no form for are rendered as strings, and a
 * property that throws when read is replaced by a marker string.
 */
export const toJsonSafe = (value: unknown): JsonValue => {
  const seen = new WeakSet<object>();

  const visit = (current: unknown): JsonValue => {
    if (current === null || current === undefined) {
      return null;
    }
    switch (typeof current) {
      case 'string':
      case 'boolean':
        return current;
      case 'number':
        return Number.isFinite(current) ? current : String(current);
      case 'bigint':
        return current.toString();
      case 'symbol':
      case 'function':
        return String(current);
      default:
        break;
    }

    if (typeof current !== 'object') {
      return String(current);
    }
    if (current instanceof Date) {
      return Number.isNaN(current.getTime()) ? String(current) : current.toISOString();
    }
    if (current instanceof Error) {
      return { name: current.name, message: current.message };
    }
    if (seen.has(current)) {
      return '[Circular]';
    }
    seen.add(current);

    try {
      if (Array.isArray(current)) {
        return current.map((item) => visit(item));
      }
      if (current instanceof Map) {
        const result: { [key: string]: JsonValue } = {};
        for (const [key, item] of current) {
          result[String(key)] = visit(item);
        }
        return result;
      }
      if (current instanceof Set) {
        return Array.from(current, (item) => visit(item));
      }

      const result: { [key: string]: JsonValue } = {};
      for (const key of Object.keys(current)) {
        try {
          result[key] = visit(Reflect.get(current, key));
        } catch (error) {
          result[key] = describeFailure(error);
        }
      }
      return result;
    } finally {
      seen.delete(current);
    }
  };

  try {
    return visit(value);
  } catch (error) {
    return describeFailure(error);
  }
};

export type PlainObject = { [key: string]: unknown };

export const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Deep-merges `b` over `a` without mutating either. Nested objects merge,
 * everything else (arrays included) is replaced; `undefined` never overrides.
 */
export const merge_dicts = (a: PlainObject, b: PlainObject): PlainObject => {
  const result: PlainObject = { ...a };
  for (const [key, value] of Object.entries(b)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value)
        ? merge_dicts(existing, value)
        : value;
  }
  return result;
};

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * Local wall-clock time at second resolution, `YYYYMMDD_HHMMSS`.
 */
export const formatFileTimestamp = (date: Date) =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/**
 * Local wall-clock time as `YYYY-MM-DD HH:mm:ss,SSS`.
 */
export const formatLogTimestamp = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())},${pad(date.getMilliseconds(), 3)}`;

export const truncate = (text: string, maxLength: number, suffix = '') =>
  text.length > maxLength ? `${text.slice(0, maxLength)}${suffix}` : text;

/**
 * Path for log output: home directory as `~`, working directory as `.`,
 * quoted when it contains spaces.
 */
export const log_pretty_path = (input: unknown) => {
  if (!input) {
    return '';
  }

  if (typeof input !== 'string') {
    return `<${typeof input}>`;
  }

  const normalized = input.trim();
  if (!normalized) {
    return '';
  }

  let pretty_path = normalized.replace(os.homedir(), '~');
  pretty_path = pretty_path.replace(process.cwd(), '.');

  return pretty_path.includes(' ') ? `"${pretty_path}"` : pretty_path;
};

const package_root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

let cached_version: string | null = null;

export const get_task_runner_version = () => {
  if (cached_version) {
    return cached_version;
  }

  try {
    const package_json: unknown = JSON.parse(
      fs.readFileSync(path.join(package_root, 'package.json'), 'utf-8')
    );
    if (
      package_json &&
      typeof package_json === 'object' &&
      'version' in package_json &&
      typeof package_json.version === 'string'
    ) {
      cached_version = package_json.version;
      return cached_version;
    }
  } catch (error) {
    logger.debug(
      `Error detecting task runner version: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return 'unknown';
};
