export * from './config/index.js';
export * from './logging-config.js';
export * from './exceptions.js';
export * from './utils.js';

export * from './services/run-logger.js';
export * from './services/signal-handler.js';

export * from './llm/index.js';
export * from './browser/index.js';
export * from './agent/index.js';

export * from './runner/service.js';
export * from './diagnostics/check-api.js';
export * from './diagnostics/check-install.js';
