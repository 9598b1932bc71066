/**
 * Chat model factory: picks the client for the configured provider
 */

import {
  LLM_PROVIDERS,
  PROVIDER_API_KEY_ENV,
  type LLMConfig,
  type LLMProvider,
} from '../config/schema.js';
import { ConfigurationError } from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import { ChatAnthropic } from './anthropic/chat.js';
import { ChatAzure } from './azure/chat.js';
import type { BaseChatModel } from './base.js';
import { ChatBrowserUse } from './browser-use/chat.js';
import { ChatGoogle } from './google/chat.js';
import { ChatGroq } from './groq/chat.js';
import { ChatOllama } from './ollama/chat.js';
import { ChatOpenAI } from './openai/chat.js';

const logger = createLogger('task_runner.llm');

const requireApiKey = (
  config: LLMConfig,
  provider: Exclude<LLMProvider, 'ollama'>
) => {
  if (!config.apiKey) {
    throw new ConfigurationError(
      `${PROVIDER_API_KEY_ENV[provider]} is not set`,
      'llm.apiKey'
    );
  }
  return config.apiKey;
};

/**
 * Creates the chat model for `config.provider`. Credentials are checked here,
 * before any request is made.
 *
 * @throws ConfigurationError for a missing credential or an unknown provider
 */
export function createChatModel(config: LLMConfig): BaseChatModel {
  const model = config.model ?? getDefaultModels()[config.provider];
  const common = {
    model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeout: config.timeout,
  };

  logger.debug(`Creating ${config.provider} chat model ${model}`);

  switch (config.provider) {
    case 'openai':
      return new ChatOpenAI({
        ...common,
        apiKey: requireApiKey(config, 'openai'),
        baseUrl: config.baseUrl,
      });

    case 'anthropic':
      return new ChatAnthropic({
        ...common,
        apiKey: requireApiKey(config, 'anthropic'),
      });

    case 'google':
      return new ChatGoogle({
        ...common,
        apiKey: requireApiKey(config, 'google'),
      });

    case 'groq':
      return new ChatGroq({
        ...common,
        apiKey: requireApiKey(config, 'groq'),
      });

    case 'ollama':
      return new ChatOllama({
        model,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        host: config.ollamaHost,
      });

    case 'azure': {
      if (!config.apiKey || !config.azureEndpoint) {
        throw new ConfigurationError(
          'AZURE_OPENAI_KEY and AZURE_OPENAI_ENDPOINT must be set',
          config.apiKey ? 'llm.azureEndpoint' : 'llm.apiKey'
        );
      }
      return new ChatAzure({
        ...common,
        apiKey: config.apiKey,
        azureEndpoint: config.azureEndpoint,
        apiVersion: config.apiVersion,
      });
    }

    case 'browser_use':
      return new ChatBrowserUse({
        apiKey: requireApiKey(config, 'browser_use'),
        model: config.model,
        baseUrl: config.baseUrl,
        timeout: config.timeout,
      });

    default:
      return unknownProvider(config.provider);
  }
}

function unknownProvider(provider: never): never {
  throw new ConfigurationError(
    `Unknown LLM provider: ${String(provider)}`,
    'llm.provider'
  );
}

/**
 * Get supported providers
 */
export function getSupportedProviders(): LLMProvider[] {
  return [...LLM_PROVIDERS];
}

/**
 * Get default models for each provider
 */
export function getDefaultModels(): Record<LLMProvider, string> {
  return {
    openai: 'o3',
    anthropic: 'claude-sonnet-4-0',
    google: 'gemini-flash-latest',
    groq: 'llama-3.3-70b-versatile',
    ollama: 'llama2',
    azure: 'gpt-4.1-mini',
    browser_use: 'bu-latest',
  };
}
