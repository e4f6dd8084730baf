import * as path from 'path';
import { SECRET_REDACTIONS } from '../constants/security.js';
import type { ValidationResult } from '../schemas/validation.js';

export const sanitizeError = (error: unknown): string => {
  if (typeof error === 'string') {
    return SECRET_REDACTIONS.reduce(
      (message, [pattern, replacement]) => message.replace(pattern, replacement),
      error
    );
  }

  if (error instanceof Error) {
    return sanitizeError(error.message);
  }

  return 'An unknown error occurred';
};

export const withTimeout = async <T>(
  promise: Promise<T>,
  timeoutMs: number
): Promise<T> => {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Operation timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Normalises a user-supplied path to the repository-relative POSIX form git
 * prints, rejecting anything that resolves outside the repository.
 */
export const validateRepositoryPath = (filePath: string): ValidationResult<string> => {
  const normalized = path.posix.normalize(filePath.replace(/\\/g, '/'));

  if (path.posix.isAbsolute(normalized) || normalized === '..' || normalized.startsWith('../')) {
    return {
      isValid: false,
      error: `Path traversal detected: ${filePath} is outside the repository`,
    };
  }

  if (normalized === '.' || normalized === '') {
    return { isValid: false, error: 'File path is required' };
  }

  return { isValid: true, sanitizedValue: normalized.replace(/\/$/, '') };
};
