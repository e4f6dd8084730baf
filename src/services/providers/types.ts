import type { Env } from '../../types/common.js';

export type ProviderName = 'openai' | 'anthropic' | 'gemini' | 'ollama';

export interface CompletionRequest {
  model: string;
  temperature: number;
  system: string;
  user: string;
}

// Applied to the SDK client: one attempt, abandoned once the timeout passes
export interface ProviderCallOptions {
  timeoutMs: number;
}

export interface ModelProvider {
  readonly name: ProviderName;
  complete(request: CompletionRequest, env: Env, options: ProviderCallOptions): Promise<string>;
}
