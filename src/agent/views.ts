import type { BrowserProfileOptions, BrowserTarget } from '../browser/views.js';
import type { BaseChatModel } from '../llm/base.js';
import type { Logger } from '../logging-config.js';

/**
 * Everything an agent implementation receives from the runner.
 */
export interface AgentOptions {
	task: string;
	llm: BaseChatModel;
	use_vision: boolean;
	/** Seconds allowed per step */
	step_timeout: number;
	flash_mode: boolean;
	browser: BrowserTarget;
	browser_profile?: BrowserProfileOptions;
	initial_url?: string;
	extend_system_message?: string;
	override_system_message?: string;
	/** Placeholder name -> secret; the model only ever sees the placeholder */
	sensitive_data?: Record<string, string>;
	file_system_path?: string;
	logger: Logger;
}

export interface TaskAgent<Result = unknown> {
	run(max_steps: number): Promise<Result>;
}

export type AgentFactory<Result = unknown> = (
	options: AgentOptions,
) => TaskAgent<Result> | Promise<TaskAgent<Result>>;
