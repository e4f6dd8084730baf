import type { ResourceLimits } from '../types/security.js';

export const DEFAULT_LIMITS: ResourceLimits = {
  maxApiRequestSize: 750_000, // characters, system and user message together
};

export const SECRET_REDACTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/api[_-]?key[=:]\s*[^\s]+/gi, 'api_key=***'],
  [/token[=:]\s*[^\s]+/gi, 'token=***'],
  [/password[=:]\s*[^\s]+/gi, 'password=***'],
  [/secret[=:]\s*[^\s]+/gi, 'secret=***'],
];
