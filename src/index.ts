export { run, createProgram, isDebugEnabled, type CliDependencies } from './program.js';
export { CodeReviewer, type CodeReviewerDependencies } from './core/reviewer.js';
export {
  FileConfigStore,
  MemoryConfigStore,
  resolveSettings,
  type ConfigStore,
} from './config/index.js';
export {
  GitService,
  type DiffCollector,
  type GitBackend,
  type GitRepository,
} from './services/git.js';
export { AIService, type ModelClient } from './services/ai.js';
export { ProviderRegistry, createDefaultRegistry } from './services/providers/registry.js';
export type {
  CompletionRequest,
  ModelProvider,
  ProviderCallOptions,
  ProviderName,
} from './services/providers/types.js';
export { buildReviewPrompt } from './services/prompt.js';
export { ReviewError } from './utils/error-handler.js';
export { ErrorType } from './types/error-handler.js';
export { DEFAULT_SETTINGS, SETTING_KEYS } from './constants/config.js';

// Type exports are compile-time only
export type * from './types/common.js';
