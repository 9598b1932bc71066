import { setTimeout as sleep } from 'node:timers/promises';
import type { BaseChatModel, OutputFormat } from '../base.js';
import { ModelProviderError, ModelRateLimitError } from '../exceptions.js';
import type { Message } from '../messages.js';
import {
  buildCompletion,
  usageFromCounts,
  type ChatInvokeCompletion,
} from '../views.js';

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const VALID_MODELS = new Set(['bu-latest', 'bu-1-0', 'bu-2-0']);

export const DEFAULT_BROWSER_USE_LLM_URL = 'https://llm.api.browser-use.com';

export interface ChatBrowserUseOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  /** Milliseconds */
  timeout?: number;
  maxRetries?: number;
  /** Milliseconds before the first retry; doubles per attempt */
  retryBaseDelay?: number;
  fetchImplementation?: typeof fetch;
}

interface HostedCompletionPayload {
  completion?: unknown;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const readPayload = (value: unknown): HostedCompletionPayload => {
  if (!isObject(value)) {
    return {};
  }
  const usage = isObject(value.usage) ? value.usage : undefined;
  const count = (key: string) => {
    const raw = usage?.[key];
    return typeof raw === 'number' ? raw : undefined;
  };
  return {
    completion: value.completion,
    usage: usage
      ? {
          prompt_tokens: count('prompt_tokens'),
          completion_tokens: count('completion_tokens'),
          total_tokens: count('total_tokens'),
        }
      : undefined,
  };
};

const errorDetail = async (response: Response) => {
  const text = await response.text().catch(() => '');
  try {
    const parsed: unknown = JSON.parse(text);
    if (isObject(parsed)) {
      const detail = parsed.detail ?? parsed.error ?? parsed.message;
      if (typeof detail === 'string') {
        return detail;
      }
    }
  } catch {
    // Not JSON; fall through to the raw body
  }
  return text;
};

/**
 * Hosted model endpoint of the Browser Use cloud.
 */
export class ChatBrowserUse implements BaseChatModel {
  public model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelay: number;
  private readonly fetchImplementation: typeof fetch;

  constructor(options: ChatBrowserUseOptions) {
    const {
      model = 'bu-latest',
      baseUrl = DEFAULT_BROWSER_USE_LLM_URL,
      timeout = 120000,
      maxRetries = 3,
      retryBaseDelay = 1000,
      fetchImplementation = fetch,
    } = options;

    if (!VALID_MODELS.has(model) && !model.startsWith('browser-use/')) {
      throw new ModelProviderError(
        `Invalid model: '${model}'. Must be one of bu-latest, bu-1-0, bu-2-0 or start with 'browser-use/'`,
        400,
        model
      );
    }

    this.model = model === 'bu-latest' ? 'bu-1-0' : model;
    this.apiKey = options.apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = Math.max(1, timeout);
    this.maxRetries = Math.max(1, Math.trunc(maxRetries));
    this.retryBaseDelay = Math.max(1, retryBaseDelay);
    this.fetchImplementation = fetchImplementation;
  }

  get provider() {
    return 'browser_use' as const;
  }

  get name(): string {
    return this.model;
  }

  get model_name(): string {
    return this.model;
  }

  private httpError(statusCode: number, detail: string): ModelProviderError {
    const suffix = detail || `HTTP ${statusCode}`;
    if (statusCode === 401) {
      return new ModelProviderError(`Invalid API key. ${suffix}`, 401, this.model);
    }
    if (statusCode === 402) {
      return new ModelProviderError(`Insufficient credits. ${suffix}`, 402, this.model);
    }
    if (statusCode === 429) {
      return new ModelRateLimitError(`Rate limit exceeded. ${suffix}`, 429, this.model);
    }
    return new ModelProviderError(`API request failed: ${suffix}`, statusCode, this.model);
  }

  private async request(body: string): Promise<HostedCompletionPayload> {
    let response: Response;
    try {
      response = await this.fetchImplementation(
        `${this.baseUrl}/v1/chat/completions`,
        {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        }
      );
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new ModelProviderError(
        timedOut
          ? `Request timed out after ${Math.round(this.timeoutMs / 1000)}s`
          : `Failed to connect to browser-use API: ${error instanceof Error ? error.message : String(error)}`,
        timedOut ? 408 : 502,
        this.model,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw this.httpError(response.status, await errorDetail(response));
    }
    return readPayload(await response.json());
  }

  private async requestWithRetry(
    body: string
  ): Promise<HostedCompletionPayload> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.request(body);
      } catch (error) {
        const retryable =
          error instanceof ModelProviderError &&
          (RETRYABLE_STATUS_CODES.has(error.statusCode) ||
            error.statusCode === 408);
        if (!retryable || attempt >= this.maxRetries) {
          throw error;
        }
        await sleep(this.retryBaseDelay * 2 ** (attempt - 1));
      }
    }
  }

  async ainvoke(
    messages: Message[],
    output_format?: undefined
  ): Promise<ChatInvokeCompletion<string>>;
  async ainvoke<T>(
    messages: Message[],
    output_format: OutputFormat<T> | undefined
  ): Promise<ChatInvokeCompletion<T>>;
  async ainvoke<T>(
    messages: Message[],
    output_format?: OutputFormat<T> | undefined
  ): Promise<ChatInvokeCompletion<T | string>> {
    const body = JSON.stringify({
      model: this.model,
      messages: messages.map((message) => ({
        role: message.role,
        content: message.text,
      })),
      request_type: 'browser_agent',
    });

    const payload = await this.requestWithRetry(body);

    const text =
      typeof payload.completion === 'string'
        ? payload.completion
        : JSON.stringify(payload.completion ?? '');
    return buildCompletion(
      text,
      payload.usage
        ? usageFromCounts(
            payload.usage.prompt_tokens,
            payload.usage.completion_tokens,
            payload.usage.total_tokens
          )
        : null,
      output_format
    );
  }
}
