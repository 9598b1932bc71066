import Anthropic from '@anthropic-ai/sdk';
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
import { AnthropicMessageSerializer } from './serializer.js';

// The Messages API requires an explicit output budget
const DEFAULT_MAX_TOKENS = 8192;

export class ChatAnthropic implements BaseChatModel {
  public model: string;
  private client: Anthropic;
  private temperature?: number;
  private maxTokens: number;

  constructor(options: ChatModelOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeout,
    });
  }

  get provider() {
    return 'anthropic' as const;
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
    const serializer = new AnthropicMessageSerializer();
    const [anthropicMessages, system] = serializer.serializeMessages(messages);

    const response = await this.client.messages
      .create({
        model: this.model,
        max_tokens: this.maxTokens,
        system,
        messages: anthropicMessages,
        temperature: this.temperature,
      })
      .catch((error: unknown) => {
        throw toModelError(error, this.model);
      });

    const text = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('');

    return buildCompletion(
      text,
      usageFromCounts(response.usage.input_tokens, response.usage.output_tokens),
      output_format
    );
  }
}
