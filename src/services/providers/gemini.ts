import { GoogleGenAI } from '@google/genai';
import type { Env } from '../../types/common.js';
import { PROVIDER_ENV_KEYS } from '../../constants/ai.js';
import { requireApiKey } from './credentials.js';
import type { CompletionRequest, ModelProvider, ProviderCallOptions } from './types.js';

export class GeminiProvider implements ModelProvider {
  readonly name = 'gemini';

  async complete(request: CompletionRequest, env: Env, options: ProviderCallOptions): Promise<string> {
    const apiKey = requireApiKey(env, PROVIDER_ENV_KEYS.gemini, this.name);
    const genAI = new GoogleGenAI({ apiKey, httpOptions: { timeout: options.timeoutMs } });
    const result = await genAI.models.generateContent({
      model: request.model,
      contents: request.user,
      config: {
        systemInstruction: request.system,
        temperature: request.temperature,
      },
    });

    return result.text ?? '';
  }
}
