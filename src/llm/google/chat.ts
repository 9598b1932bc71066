import { GoogleGenAI } from '@google/genai';
import type {
  BaseChatModel,
  ChatModelOptions,
  OutputFormat,
} from '../base.js';
import { toModelError } from '../exceptions.js';
import { systemPrompt, type Message } from '../messages.js';
import {
  buildCompletion,
  usageFromCounts,
  type ChatInvokeCompletion,
} from '../views.js';
import { GoogleMessageSerializer } from './serializer.js';

export class ChatGoogle implements BaseChatModel {
  public model: string;
  private client: GoogleGenAI;
  private temperature?: number;
  private maxTokens?: number;

  constructor(options: ChatModelOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.client = new GoogleGenAI({
      apiKey: options.apiKey,
      httpOptions: {
        baseUrl: options.baseUrl,
        timeout: options.timeout,
      },
    });
  }

  get provider() {
    return 'google' as const;
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
    const serializer = new GoogleMessageSerializer();

    const result = await this.client.models
      .generateContent({
        model: this.model,
        contents: serializer.serialize(messages),
        config: {
          systemInstruction: systemPrompt(messages),
          temperature: this.temperature,
          maxOutputTokens: this.maxTokens,
        },
      })
      .catch((error: unknown) => {
        throw toModelError(error, this.model);
      });

    return buildCompletion(
      result.text ?? '',
      usageFromCounts(
        result.usageMetadata?.promptTokenCount,
        result.usageMetadata?.candidatesTokenCount,
        result.usageMetadata?.totalTokenCount
      ),
      output_format
    );
  }
}
