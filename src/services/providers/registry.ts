import { match, P } from 'ts-pattern';
import { ERROR_MESSAGES } from '../../constants/messages.js';
import { ErrorType } from '../../types/error-handler.js';
import { ReviewError } from '../../utils/error-handler.js';
import { AnthropicProvider } from './anthropic.js';
import { GeminiProvider } from './gemini.js';
import { OllamaProvider } from './ollama.js';
import { OpenAIProvider } from './openai.js';
import type { ModelProvider, ProviderName } from './types.js';

export interface ResolvedModel {
  provider: ModelProvider;
  model: string;
}

const inferProvider = (model: string): ProviderName | undefined =>
  match(model.toLowerCase())
    .with(P.string.startsWith('gpt-'), P.string.startsWith('chatgpt-'), () => 'openai' as const)
    .with(P.string.regex(/^o\d/), () => 'openai' as const)
    .with(P.string.startsWith('claude'), () => 'anthropic' as const)
    .with(P.string.startsWith('gemini'), P.string.startsWith('gemma'), () => 'gemini' as const)
    .otherwise(() => undefined);

export class ProviderRegistry {
  private readonly providers: Map<string, ModelProvider>;

  constructor(providers: ModelProvider[]) {
    this.providers = new Map(providers.map((provider) => [provider.name, provider]));
  }

  list = (): string[] => Array.from(this.providers.keys());

  /**
   * Maps a `model` setting to a provider. `provider/model` picks the provider
   * explicitly; a bare name is matched against well-known model families.
   */
  resolve = (model: string): ResolvedModel => {
    const slash = model.indexOf('/');
    if (slash > 0) {
      const explicit = this.providers.get(model.slice(0, slash));
      if (explicit) {
        return { provider: explicit, model: model.slice(slash + 1) };
      }
    }

    const inferred = inferProvider(model);
    const provider = inferred === undefined ? undefined : this.providers.get(inferred);
    if (!provider) {
      throw new ReviewError(
        `${ERROR_MESSAGES.UNKNOWN_PROVIDER} '${model}'. Prefix it with one of: ${this.list()
          .map((name) => `${name}/`)
          .join(', ')}`,
        ErrorType.MODEL_CALL_FAILED,
        { operation: 'resolveModel', model }
      );
    }

    return { provider, model };
  };
}

export const createDefaultRegistry = (): ProviderRegistry =>
  new ProviderRegistry([
    new OpenAIProvider(),
    new AnthropicProvider(),
    new GeminiProvider(),
    new OllamaProvider(),
  ]);
