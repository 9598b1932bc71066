/**
 * Health check for an OpenAI-compatible chat completions endpoint
 */

import axios, { type AxiosInstance } from 'axios';
import { truncate } from '../utils.js';

export type ApiCheckOutcome =
  | 'ok'
  | 'bad_format'
  | 'invalid_json'
  | 'http_error'
  | 'timeout'
  | 'connection_error'
  | 'unknown_error'
  | 'missing_env';

export interface ApiUsage {
  prompt_tokens: number | null;
  completion_tokens: number | null;
  total_tokens: number | null;
}

export interface ApiCheckReport {
  outcome: ApiCheckOutcome;
  endpoint: string | null;
  /** First 20 characters of the key followed by `...` */
  maskedKey: string | null;
  url: string | null;
  model: string;
  prompt: string;
  status: number | null;
  reply: string | null;
  usage: ApiUsage | null;
  /** Error message, or the start of an unexpected response body */
  detail: string | null;
  hints: string[];
}

export interface CheckApiOptions {
  endpoint?: string;
  apiKey?: string;
  model?: string;
  prompt?: string;
  /** Milliseconds */
  timeout?: number;
  http?: AxiosInstance;
}

export const DEFAULT_CHECK_MODEL = 'o3';
export const DEFAULT_CHECK_PROMPT =
  'Which model are you, and can you read images?';
export const DEFAULT_CHECK_TIMEOUT = 30000;

const BODY_PREVIEW_LENGTH = 500;
const KEY_PREVIEW_LENGTH = 20;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export const maskApiKey = (apiKey: string) =>
  `${apiKey.slice(0, KEY_PREVIEW_LENGTH)}...`;

export const chatCompletionsUrl = (endpoint: string) =>
  `${endpoint.replace(/\/+$/, '')}/chat/completions`;

/**
 * Likely causes for a non-200 status
 */
export function hintsForStatus(status: number): string[] {
  if (status === 401) {
    return ['The API key is invalid or has expired'];
  }
  if (status === 404) {
    return [
      'The API endpoint address is wrong',
      'The model name may be wrong',
    ];
  }
  if (status === 429) {
    return ['Too many requests; the endpoint is rate limiting'];
  }
  if (status >= 500) {
    return ['The API server had an internal error'];
  }
  return ['Check the API configuration and the network connection'];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readCount = (source: Record<string, unknown>, key: string) => {
  const value = source[key];
  return typeof value === 'number' ? value : null;
};

const extractReply = (payload: unknown): string | null => {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) {
    return null;
  }
  const [first] = payload.choices;
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  const content = first.message.content;
  return typeof content === 'string' ? content : null;
};

const extractUsage = (payload: unknown): ApiUsage | null => {
  if (!isRecord(payload) || !isRecord(payload.usage)) {
    return null;
  }
  return {
    prompt_tokens: readCount(payload.usage, 'prompt_tokens'),
    completion_tokens: readCount(payload.usage, 'completion_tokens'),
    total_tokens: readCount(payload.usage, 'total_tokens'),
  };
};

const bodyText = (data: unknown) =>
  typeof data === 'string' ? data : JSON.stringify(data ?? '');

/**
 * Sends one chat message to `<endpoint>/chat/completions` and classifies what
 * comes back. Never throws; every failure is reported in the outcome.
 */
export async function checkApi(
  options: CheckApiOptions = {}
): Promise<ApiCheckReport> {
  const endpoint = options.endpoint ?? process.env.OPENAI_ENDPOINT ?? null;
  const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY ?? null;
  const model = options.model ?? DEFAULT_CHECK_MODEL;
  const prompt = options.prompt ?? DEFAULT_CHECK_PROMPT;

  const report: ApiCheckReport = {
    outcome: 'missing_env',
    endpoint: endpoint || null,
    maskedKey: apiKey ? maskApiKey(apiKey) : null,
    url: null,
    model,
    prompt,
    status: null,
    reply: null,
    usage: null,
    detail: null,
    hints: [],
  };

  if (!endpoint || !apiKey) {
    report.hints = [
      'Set OPENAI_ENDPOINT=http://your-api-endpoint/v1',
      'Set OPENAI_API_KEY=<your api key>',
    ];
    return report;
  }

  const url = chatCompletionsUrl(endpoint);
  report.url = url;
  const http = options.http ?? axios.create();

  let status: number;
  let body: string;
  try {
    const response = await http.post<unknown>(
      url,
      { model, messages: [{ role: 'user', content: prompt }] },
      {
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        timeout: options.timeout ?? DEFAULT_CHECK_TIMEOUT,
        responseType: 'text',
        // Keep the raw body; it is parsed below so that bad JSON can be told apart
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      }
    );
    status = response.status;
    body = bodyText(response.data);
  } catch (error) {
    if (axios.isAxiosError(error)) {
      report.detail = error.message;
      if (error.code && TIMEOUT_CODES.has(error.code)) {
        report.outcome = 'timeout';
        report.hints = [
          'The network connection is unstable',
          'The API server is overloaded',
        ];
        return report;
      }
      report.outcome = 'connection_error';
      report.hints = [
        'The API endpoint address is wrong',
        'There is a network problem',
        'A firewall is blocking the connection',
      ];
      return report;
    }
    report.outcome = 'unknown_error';
    report.detail =
      error instanceof Error
        ? `${error.name}: ${error.message}`
        : String(error);
    return report;
  }

  report.status = status;
  if (status !== 200) {
    report.outcome = 'http_error';
    report.detail = truncate(body, BODY_PREVIEW_LENGTH);
    report.hints = hintsForStatus(status);
    return report;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    report.outcome = 'invalid_json';
    report.detail = truncate(body, BODY_PREVIEW_LENGTH);
    return report;
  }

  const reply = extractReply(payload);
  if (reply === null) {
    report.outcome = 'bad_format';
    report.detail = JSON.stringify(payload, null, 2);
    return report;
  }

  report.outcome = 'ok';
  report.reply = reply;
  report.usage = extractUsage(payload);
  return report;
}

/**
 * The check passed, possibly with an unexpected response shape.
 */
export const apiCheckPassed = (report: ApiCheckReport) =>
  report.outcome === 'ok' || report.outcome === 'bad_format';

const formatCount = (value: number | null) =>
  value === null ? 'N/A' : String(value);

/**
 * Human-readable lines for the terminal
 */
export function formatApiReport(report: ApiCheckReport): string[] {
  const rule = '='.repeat(60);
  const lines = [
    rule,
    'OpenAI-compatible API check',
    rule,
    '',
    '📋 Environment:',
    `✓ OPENAI_ENDPOINT: ${report.endpoint ?? '❌ not set'}`,
    `✓ OPENAI_API_KEY: ${report.maskedKey ? `set (${report.maskedKey})` : '❌ not set'}`,
  ];

  if (report.outcome === 'missing_env') {
    lines.push('', '❌ Error: environment variables are not set');
    lines.push(...report.hints.map((hint) => `  - ${hint}`));
    return lines;
  }

  lines.push(
    '',
    `📡 POST ${report.url ?? ''}`,
    `   Model: ${report.model}`,
    `   Message: ${report.prompt}`
  );

  switch (report.outcome) {
    case 'ok':
      lines.push('', `✅ HTTP ${report.status ?? ''}`, '📨 Reply:', `   ${report.reply ?? ''}`);
      if (report.usage) {
        lines.push(
          '📊 Token usage:',
          `   - prompt tokens: ${formatCount(report.usage.prompt_tokens)}`,
          `   - completion tokens: ${formatCount(report.usage.completion_tokens)}`,
          `   - total tokens: ${formatCount(report.usage.total_tokens)}`
        );
      }
      lines.push('', '✅ The API configuration works');
      break;
    case 'bad_format':
      lines.push('', '⚠️  Unexpected response format', `   ${report.detail ?? ''}`);
      break;
    case 'invalid_json':
      lines.push('', '❌ The response is not valid JSON', `   ${report.detail ?? ''}`);
      break;
    case 'http_error':
      lines.push(
        '',
        `❌ The API returned HTTP ${report.status ?? ''}`,
        `   ${report.detail ?? ''}`
      );
      break;
    case 'timeout':
      lines.push('', '❌ The request timed out');
      break;
    case 'connection_error':
      lines.push('', `❌ Cannot connect to ${report.url ?? ''}`, `   ${report.detail ?? ''}`);
      break;
    case 'unknown_error':
      lines.push('', '❌ Unexpected error', `   ${report.detail ?? ''}`);
      break;
  }

  if (report.hints.length > 0) {
    lines.push('', 'Possible causes:', ...report.hints.map((hint) => `  - ${hint}`));
  }
  return lines;
}
