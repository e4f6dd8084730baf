import type { Env } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { ReviewError, withErrorHandling } from '../utils/error-handler.js';
import { withTimeout } from '../utils/security.js';
import { calculateAITimeout } from '../utils/timeout.js';
import { ERROR_MESSAGES } from '../constants/messages.js';
import { createDefaultRegistry, type ProviderRegistry } from './providers/registry.js';
import type { CompletionRequest } from './providers/types.js';

export interface ModelClient {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Sends one prompt to whichever provider the model name points at. Failures of
 * any kind surface as `ModelCallFailed`; nothing is retried, by us or the SDK.
 */
export class AIService implements ModelClient {
  constructor(
    private readonly env: Env,
    private readonly registry: ProviderRegistry = createDefaultRegistry()
  ) {}

  complete = async (request: CompletionRequest): Promise<string> => {
    return withErrorHandling(
      async () => {
        const { provider, model } = this.registry.resolve(request.model);
        const aiTimeout = calculateAITimeout({
          diffSize: request.system.length + request.user.length,
        });

        const text = await withTimeout(
          provider.complete({ ...request, model }, this.env, { timeoutMs: aiTimeout }),
          aiTimeout
        );

        if (!text.trim()) {
          throw new ReviewError(ERROR_MESSAGES.EMPTY_MODEL_RESPONSE, ErrorType.MODEL_CALL_FAILED, {
            operation: 'modelCall',
            model: request.model,
          });
        }

        return text;
      },
      ErrorType.MODEL_CALL_FAILED,
      { operation: 'modelCall', model: request.model }
    );
  };
}
