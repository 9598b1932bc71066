import { Ollama } from 'ollama';
import type { BaseChatModel, OutputFormat } from '../base.js';
import { toModelError } from '../exceptions.js';
import type { Message } from '../messages.js';
import {
  buildCompletion,
  usageFromCounts,
  type ChatInvokeCompletion,
} from '../views.js';
import { OllamaMessageSerializer } from './serializer.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export interface ChatOllamaOptions {
  model: string;
  host?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Local Ollama server; needs no credentials.
 */
export class ChatOllama implements BaseChatModel {
  public model: string;
  private client: Ollama;
  private temperature?: number;
  private maxTokens?: number;

  constructor(options: ChatOllamaOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.client = new Ollama({ host: options.host ?? DEFAULT_OLLAMA_HOST });
  }

  get provider() {
    return 'ollama' as const;
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
    const serializer = new OllamaMessageSerializer();

    const response = await this.client
      .chat({
        model: this.model,
        messages: serializer.serialize(messages),
        stream: false,
        options: {
          temperature: this.temperature,
          num_predict: this.maxTokens,
        },
      })
      .catch((error: unknown) => {
        throw toModelError(error, this.model);
      });

    return buildCompletion(
      response.message.content,
      usageFromCounts(response.prompt_eval_count, response.eval_count),
      output_format
    );
  }
}
