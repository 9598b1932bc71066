/**
 * Configuration module exports
 */

export {
  loadConfig,
  environmentOverrides,
  resolveCredentials,
  DEFAULT_CONFIG_FILE,
} from './loader.js';
export type { LoadConfigOptions, LoadedConfig } from './loader.js';
export {
  AppConfigSchema,
  DEFAULT_CONFIG,
  LLM_PROVIDERS,
  PROVIDER_API_KEY_ENV,
} from './schema.js';
export type {
  AppConfig,
  AppConfigInput,
  AgentConfig,
  BrowserConfig,
  LLMConfig,
  LLMProvider,
  LoggingConfig,
  TelemetryConfig,
} from './schema.js';
