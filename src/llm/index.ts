/**
 * LLM module exports
 */

export type { BaseChatModel, ChatModelOptions, OutputFormat } from './base.js';
export { ChatOpenAI } from './openai/chat.js';
export { ChatAnthropic } from './anthropic/chat.js';
export { ChatGoogle } from './google/chat.js';
export { ChatGroq } from './groq/chat.js';
export { ChatOllama } from './ollama/chat.js';
export { ChatAzure } from './azure/chat.js';
export { ChatBrowserUse } from './browser-use/chat.js';
export {
  createChatModel,
  getSupportedProviders,
  getDefaultModels,
} from './factory.js';
export {
  ModelError,
  ModelProviderError,
  ModelRateLimitError,
} from './exceptions.js';
export {
  AssistantMessage,
  ContentPartImageParam,
  ContentPartTextParam,
  ImageURL,
  SystemMessage,
  UserMessage,
} from './messages.js';
export type { Message } from './messages.js';
export { ChatInvokeCompletion } from './views.js';
export type { ChatInvokeUsage } from './views.js';
