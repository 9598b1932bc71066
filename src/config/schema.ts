/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';

export const LLM_PROVIDERS = [
  'openai',
  'anthropic',
  'google',
  'groq',
  'ollama',
  'azure',
  'browser_use',
] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

/**
 * Environment variable holding the API key of each provider; Ollama needs none.
 */
export const PROVIDER_API_KEY_ENV: Record<Exclude<LLMProvider, 'ollama'>, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY',
  groq: 'GROQ_API_KEY',
  azure: 'AZURE_OPENAI_KEY',
  browser_use: 'BROWSER_USE_API_KEY',
};

const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error', 'critical']);

// LLM configuration schema
export const LLMConfigSchema = z.object({
  provider: z.enum(LLM_PROVIDERS).default('openai'),
  // Falls back to the provider's default model when unset
  model: z.string().min(1).optional(),
  apiKey: z.string().optional(),
  // Alternate OpenAI-compatible endpoint
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().min(1).optional(),
  timeout: z.number().min(1000).default(120000),
  // Azure-specific configuration
  azureEndpoint: z.string().url().optional(),
  apiVersion: z.string().optional(),
  ollamaHost: z.string().url().optional(),
});

// Browser configuration schema
export const BrowserConfigSchema = z.object({
  useCloud: z.boolean().default(false),
  // Attach to an already running browser over CDP
  useExistingBrowser: z.boolean().default(false),
  cdpUrl: z.string().url().default('http://127.0.0.1:9222'),
  headless: z.boolean().default(false),
  executablePath: z.string().optional(),
  userDataDir: z.string().optional(),
  profileDirectory: z.string().optional(),
  allowedDomains: z.array(z.string()).optional(),
  proxyServer: z.string().optional(),
  downloadsPath: z.string().optional(),
  enableDefaultExtensions: z.boolean().default(true),
  initialUrl: z.string().url().optional(),
});

// Agent configuration schema
export const AgentConfigSchema = z.object({
  task: z.string().optional(),
  // Markdown or text file holding the task, relative to the config file
  taskFile: z.string().optional(),
  useVision: z.boolean().default(false),
  maxSteps: z.number().int().min(1).default(70),
  // Seconds per step
  stepTimeout: z.number().min(1).default(130),
  flashMode: z.boolean().default(false),
  extendSystemMessage: z.string().optional(),
  overrideSystemMessage: z.string().optional(),
  // Placeholder name -> real value, kept away from the model
  sensitiveData: z.record(z.string()).optional(),
  fileSystemPath: z.string().default('./agent_output'),
  // Module exporting createAgent(options)
  module: z.string().optional(),
});

// Logging configuration schema
export const LoggingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  logDir: z.string().default('./logs'),
  json: z.boolean().default(true),
  console: z.boolean().default(true),
  level: LogLevelSchema.default('info'),
  channelLevels: z.record(LogLevelSchema).default({
    browser_use: 'info',
    playwright: 'warning',
  }),
  captureConsole: z.boolean().default(false),
});

export const TelemetryConfigSchema = z.object({
  anonymizedTelemetry: z.boolean().default(false),
});

// Main application configuration schema
export const AppConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  browser: BrowserConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  telemetry: TelemetryConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

// Input configuration types (with defaults applied, fields optional for user input)
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type LLMConfigInput = z.input<typeof LLMConfigSchema>;

// Default configuration
export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});
