import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, type LLMConfig } from '../src/config/index.js';
import { ConfigurationError } from '../src/exceptions.js';
import {
  ChatAnthropic,
  ChatAzure,
  ChatBrowserUse,
  ChatGoogle,
  ChatGroq,
  ChatOllama,
  ChatOpenAI,
  createChatModel,
  getDefaultModels,
  getSupportedProviders,
} from '../src/llm/index.js';

const llmConfig = (overrides: Partial<LLMConfig>): LLMConfig => ({
  ...DEFAULT_CONFIG.llm,
  ...overrides,
});

describe('createChatModel', () => {
  it.each([
    ['openai', ChatOpenAI],
    ['anthropic', ChatAnthropic],
    ['google', ChatGoogle],
    ['groq', ChatGroq],
  ] as const)('creates the %s client with its default model', (provider, expected) => {
    const model = createChatModel(llmConfig({ provider, apiKey: 'test-secret' }));

    expect(model).toBeInstanceOf(expected);
    expect(model.provider).toBe(provider);
    expect(model.model).toBe(getDefaultModels()[provider]);
  });

  it('uses the configured model name', () => {
    const model = createChatModel(
      llmConfig({ provider: 'openai', apiKey: 'test-secret', model: 'gpt-4.1-mini' })
    );

    expect(model.name).toBe('gpt-4.1-mini');
  });

  it('creates an Ollama client without a key', () => {
    const model = createChatModel(llmConfig({ provider: 'ollama' }));

    expect(model).toBeInstanceOf(ChatOllama);
    expect(model.model).toBe('llama2');
  });

  it('creates an Azure client from key and endpoint', () => {
    const model = createChatModel(
      llmConfig({
        provider: 'azure',
        apiKey: 'test-secret',
        azureEndpoint: 'https://example-resource.openai.azure.com',
      })
    );

    expect(model).toBeInstanceOf(ChatAzure);
    expect(model.model).toBe('gpt-4.1-mini');
  });

  it('maps the hosted model alias to a concrete model', () => {
    const model = createChatModel(
      llmConfig({ provider: 'browser_use', apiKey: 'test-secret' })
    );

    expect(model).toBeInstanceOf(ChatBrowserUse);
    expect(model.model).toBe('bu-1-0');
  });

  it('names the missing key variable', () => {
    expect(() => createChatModel(llmConfig({ provider: 'anthropic' }))).toThrow(
      new ConfigurationError('ANTHROPIC_API_KEY is not set', 'llm.apiKey')
    );
  });

  it('requires both Azure settings', () => {
    let caught: unknown;
    try {
      createChatModel(llmConfig({ provider: 'azure', apiKey: 'test-secret' }));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      message: 'AZURE_OPENAI_KEY and AZURE_OPENAI_ENDPOINT must be set',
      field: 'llm.azureEndpoint',
    });
  });
});

describe('provider catalog', () => {
  it('lists every provider with a default model', () => {
    const providers = getSupportedProviders();

    expect(providers).toEqual([
      'openai',
      'anthropic',
      'google',
      'groq',
      'ollama',
      'azure',
      'browser_use',
    ]);
    expect(Object.keys(getDefaultModels()).sort()).toEqual([...providers].sort());
  });
});
