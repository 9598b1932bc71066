import type { LLMProvider } from '../config/schema.js';
import type { ChatInvokeCompletion } from './views.js';
import type { Message } from './messages.js';

/**
 * Constructor options shared by every chat client.
 */
export interface ChatModelOptions {
	model: string;
	apiKey?: string;
	baseUrl?: string;
	temperature?: number;
	maxTokens?: number;
	/** Request timeout in milliseconds */
	timeout?: number;
}

export interface OutputFormat<T> {
	parse: (input: string) => T;
}

export interface BaseChatModel {
	model: string;

	get provider(): LLMProvider;
	get name(): string;

	get model_name(): string;

	ainvoke(messages: Message[], output_format?: undefined): Promise<ChatInvokeCompletion<string>>;
	ainvoke<T>(messages: Message[], output_format: OutputFormat<T> | undefined): Promise<ChatInvokeCompletion<T>>;
}
