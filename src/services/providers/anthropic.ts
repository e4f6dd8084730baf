import Anthropic from '@anthropic-ai/sdk';
import type { Env } from '../../types/common.js';
import { AI_MAX_OUTPUT_TOKENS, ANTHROPIC_BASE_URL_ENV, PROVIDER_ENV_KEYS } from '../../constants/ai.js';
import { requireApiKey } from './credentials.js';
import type { CompletionRequest, ModelProvider, ProviderCallOptions } from './types.js';

export class AnthropicProvider implements ModelProvider {
  readonly name = 'anthropic';

  async complete(request: CompletionRequest, env: Env, options: ProviderCallOptions): Promise<string> {
    const apiKey = requireApiKey(env, PROVIDER_ENV_KEYS.anthropic, this.name);
    const client = new Anthropic({
      apiKey,
      baseURL: env[ANTHROPIC_BASE_URL_ENV],
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
    const response = await client.messages.create({
      model: request.model,
      max_tokens: AI_MAX_OUTPUT_TOKENS,
      system: request.system,
      temperature: request.temperature,
      messages: [{ role: 'user', content: request.user }],
    });

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}
