import { describe, expect, it } from 'vitest';
import { ErrorType } from '../src/types/error-handler.js';
import { ErrorHandler, ReviewError, toReviewError, withErrorHandling } from '../src/utils/error-handler.js';
import { sanitizeError, validateRepositoryPath, withTimeout } from '../src/utils/security.js';
import { captureOutput } from './helpers.js';

describe('sanitizeError', () => {
  it('redacts credentials in messages', () => {
    expect(sanitizeError('token: test-token and password=test-password')).toBe(
      'token=*** and password=***'
    );
  });

  it('reads the message of an Error', () => {
    expect(sanitizeError(new Error('secret=test-secret'))).toBe('secret=***');
  });

  it('describes values that are not errors', () => {
    expect(sanitizeError(42)).toBe('An unknown error occurred');
  });
});

describe('toReviewError', () => {
  it('returns a ReviewError unchanged', () => {
    const original = new ReviewError('bad key', ErrorType.INVALID_VALUE);
    expect(toReviewError(original, ErrorType.DIFF_UNAVAILABLE)).toBe(original);
  });

  it('uses the fallback type for plain errors', () => {
    const error = toReviewError(new Error('boom'), ErrorType.DIFF_UNAVAILABLE, { operation: 'collectDiff' });
    expect(error).toMatchObject({
      type: ErrorType.DIFF_UNAVAILABLE,
      message: 'boom',
      context: expect.objectContaining({ operation: 'collectDiff' }),
    });
  });

  it('recognises file system failures', () => {
    const error = toReviewError(Object.assign(new Error('no such file'), { code: 'ENOENT' }));
    expect(error.type).toBe(ErrorType.FILE_SYSTEM_ERROR);
  });
});

describe('withErrorHandling', () => {
  it('passes results through', async () => {
    await expect(withErrorHandling(async () => 'ok', ErrorType.UNKNOWN_ERROR)).resolves.toBe('ok');
  });

  it('converts rejections', async () => {
    await expect(
      withErrorHandling(async () => {
        throw new Error('offline');
      }, ErrorType.MODEL_CALL_FAILED)
    ).rejects.toMatchObject({ type: ErrorType.MODEL_CALL_FAILED, message: 'offline' });
  });
});

describe('ErrorHandler', () => {
  it('prints the kind, the message and a hint, then returns 1', () => {
    const { output, errors } = captureOutput();
    const handler = new ErrorHandler(output);

    const code = handler.handleError(
      new ReviewError("Branch 'ghost' not found", ErrorType.DIFF_UNAVAILABLE, {
        operation: 'collectDiff',
        file: 'src/app.ts',
      })
    );

    expect(code).toBe(1);
    expect(errors).toEqual([
      "❌ DiffUnavailable: Branch 'ghost' not found",
      '   Check the branch names and file paths. Run "codify list" to see local branches.',
      '   Operation: collectDiff',
      '   File: src/app.ts',
    ]);
  });

  it('prefers an explicit user message', () => {
    const { output, errors } = captureOutput();
    new ErrorHandler(output).handleError(new ReviewError('boom', ErrorType.UNKNOWN_ERROR, {}, 'Try later.'));
    expect(errors).toEqual(['❌ UnknownError: boom', '   Try later.']);
  });
});

describe('validateRepositoryPath', () => {
  it('normalises to a repository-relative path', () => {
    expect(validateRepositoryPath('./src//app.ts')).toEqual({ isValid: true, sanitizedValue: 'src/app.ts' });
    expect(validateRepositoryPath('src\\lib\\')).toEqual({ isValid: true, sanitizedValue: 'src/lib' });
  });

  it.each(['/etc/passwd', '../outside.ts', 'src/../../outside.ts', '.'])('rejects %s', (value) => {
    expect(validateRepositoryPath(value).isValid).toBe(false);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50)).resolves.toBe('done');
  });

  it('rejects once the limit passes', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10)).rejects.toThrow(
      'Operation timed out after 10ms'
    );
  });
});
