import { AzureOpenAI } from 'openai';
import type {
  BaseChatModel,
  ChatModelOptions,
  OutputFormat,
} from '../base.js';
import { toModelError } from '../exceptions.js';
import type { Message } from '../messages.js';
import { OpenAIMessageSerializer } from '../openai/serializer.js';
import {
  buildCompletion,
  usageFromCounts,
  type ChatInvokeCompletion,
} from '../views.js';

export const DEFAULT_AZURE_API_VERSION = '2024-10-21';

export interface ChatAzureOptions extends ChatModelOptions {
  azureEndpoint: string;
  apiVersion?: string;
}

export class ChatAzure implements BaseChatModel {
  public model: string;
  private client: AzureOpenAI;
  private temperature?: number;
  private maxTokens?: number;

  constructor(options: ChatAzureOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.client = new AzureOpenAI({
      apiKey: options.apiKey,
      endpoint: options.azureEndpoint,
      apiVersion: options.apiVersion ?? DEFAULT_AZURE_API_VERSION,
      deployment: options.model,
      timeout: options.timeout,
    });
  }

  get provider() {
    return 'azure' as const;
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
    const serializer = new OpenAIMessageSerializer();

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

    return buildCompletion(
      response.choices[0]?.message.content ?? '',
      usageFromCounts(
        response.usage?.prompt_tokens,
        response.usage?.completion_tokens,
        response.usage?.total_tokens
      ),
      output_format
    );
  }
}
