import OpenAI from 'openai';
import type { Env } from '../../types/common.js';
import { OPENAI_BASE_URL_ENV, PROVIDER_ENV_KEYS } from '../../constants/ai.js';
import { requireApiKey } from './credentials.js';
import type { CompletionRequest, ModelProvider, ProviderCallOptions } from './types.js';

export const completeWithOpenAI = async (
  client: OpenAI,
  request: CompletionRequest
): Promise<string> => {
  const response = await client.chat.completions.create({
    model: request.model,
    temperature: request.temperature,
    messages: [
      { role: 'system', content: request.system },
      { role: 'user', content: request.user },
    ],
  });

  return response.choices[0]?.message?.content ?? '';
};

export class OpenAIProvider implements ModelProvider {
  readonly name = 'openai';

  async complete(request: CompletionRequest, env: Env, options: ProviderCallOptions): Promise<string> {
    const apiKey = requireApiKey(env, PROVIDER_ENV_KEYS.openai, this.name);
    const client = new OpenAI({
      apiKey,
      baseURL: env[OPENAI_BASE_URL_ENV],
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
    return completeWithOpenAI(client, request);
  }
}
