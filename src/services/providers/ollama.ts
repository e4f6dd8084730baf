import OpenAI from 'openai';
import type { Env } from '../../types/common.js';
import {
  OLLAMA_BASE_URL_ENV,
  OLLAMA_DEFAULT_BASE_URL,
  OLLAMA_PLACEHOLDER_API_KEY,
} from '../../constants/ai.js';
import { completeWithOpenAI } from './openai.js';
import type { CompletionRequest, ModelProvider, ProviderCallOptions } from './types.js';

// Local models served by Ollama, spoken to over its OpenAI-compatible endpoint
export class OllamaProvider implements ModelProvider {
  readonly name = 'ollama';

  async complete(request: CompletionRequest, env: Env, options: ProviderCallOptions): Promise<string> {
    const base = (env[OLLAMA_BASE_URL_ENV] ?? OLLAMA_DEFAULT_BASE_URL).replace(/\/+$/, '');
    const client = new OpenAI({
      apiKey: OLLAMA_PLACEHOLDER_API_KEY,
      baseURL: `${base}/v1`,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
    return completeWithOpenAI(client, request);
  }
}
