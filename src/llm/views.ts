import type { OutputFormat } from './base.js';

export interface ChatInvokeUsage {
	prompt_tokens: number;
	prompt_cached_tokens?: number | null;
	completion_tokens: number;
	total_tokens: number;
}

export class ChatInvokeCompletion<T = string> {
	constructor(
		public completion: T,
		public usage: ChatInvokeUsage | null = null,
		public thinking: string | null = null,
	) {}
}

export const usageFromCounts = (
	prompt: number | null | undefined,
	completion: number | null | undefined,
	total?: number | null,
): ChatInvokeUsage => {
	const prompt_tokens = prompt ?? 0;
	const completion_tokens = completion ?? 0;
	return {
		prompt_tokens,
		completion_tokens,
		total_tokens: total ?? prompt_tokens + completion_tokens,
	};
};

/**
 * Applies an optional output parser to the reply text.
 */
export function buildCompletion<T>(
	text: string,
	usage: ChatInvokeUsage | null,
	output_format?: OutputFormat<T>,
): ChatInvokeCompletion<T | string> {
	if (!output_format) {
		return new ChatInvokeCompletion(text, usage);
	}
	return new ChatInvokeCompletion(output_format.parse(text), usage);
}
