import type { Env } from '../../types/common.js';
import { ErrorType } from '../../types/error-handler.js';
import { ReviewError } from '../../utils/error-handler.js';

export const requireApiKey = (env: Env, variable: string, provider: string): string => {
  const apiKey = env[variable]?.trim();
  if (!apiKey) {
    throw new ReviewError(
      `Missing credential: set ${variable} to use ${provider} models`,
      ErrorType.MODEL_CALL_FAILED,
      { operation: 'modelCall' }
    );
  }
  return apiKey;
};
