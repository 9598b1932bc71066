import Groq from 'groq-sdk';
import type {
  BaseChatModel,
  ChatModelOptions,
  OutputFormat,
} from '../base.js';
import { toModelError } from '../exceptions.js';
import type { Message } from '../messages.js';
import {
  buildCompletion,
  usageFromCounts,
  type ChatInvokeCompletion,
} from '../views.js';
import { GroqMessageSerializer } from './serializer.js';

/**
 * Groq chat completions; the API mirrors the OpenAI one.
 */
export class ChatGroq implements BaseChatModel {
  public model: string;
  private client: Groq;
  private temperature?: number;
  private maxTokens?: number;

  constructor(options: ChatModelOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.client = new Groq({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeout,
    });
  }

  get provider() {
    return 'groq' as const;
  }

  get name(): string {
    return this.model;
  }

  get model_name(): string {
    return this.model;
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
    const serializer = new GroqMessageSerializer();

    const response = await this.client.chat.completions
      .create({
        model: this.model,
        messages: serializer.serialize(messages),
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      })
      .catch((error: unknown) => {
        throw toModelError(error, this.model);
      });

    const content = response.choices[0]?.message.content ?? '';
    return buildCompletion(
      content,
      usageFromCounts(
        response.usage?.prompt_tokens,
        response.usage?.completion_tokens,
        response.usage?.total_tokens
      ),
      output_format
    );
  }
}
