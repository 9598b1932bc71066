export { loadAgentFactory, toImportSpecifier } from './loader.js';
export type { AgentFactory, AgentOptions, TaskAgent } from './views.js';
