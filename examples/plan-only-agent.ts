/**
 * Minimal agent module: asks the configured model for a step-by-step plan
 * instead of driving a browser. Point `agent.module` at the compiled file to
 * try the runner end to end.
 */

import type { AgentFactory } from '../src/agent/index.js';
import { SystemMessage, UserMessage } from '../src/llm/index.js';

export const createAgent: AgentFactory<string> = (options) => ({
  async run(max_steps) {
    options.logger.info(`Planning "${options.task}" in at most ${max_steps} steps`);

    const completion = await options.llm.ainvoke([
      new SystemMessage(
        `You plan browser tasks. Answer with at most ${max_steps} numbered steps.`
      ),
      new UserMessage(options.task),
    ]);

    options.logger.info(`Plan received from ${options.llm.name}`);
    return completion.completion;
  },
});
