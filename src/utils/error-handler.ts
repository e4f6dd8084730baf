import chalk from 'chalk';
import { match, P } from 'ts-pattern';
import { sanitizeError } from './security.js';
import { EXIT_CODE_FAILURE, FILE_SYSTEM_ERROR_CODES } from '../constants/error-handler.js';
import { ErrorType, type ErrorContext } from '../types/error-handler.js';
import type { Output } from '../types/common.js';

export class ReviewError extends Error {
  public readonly type: ErrorType;
  public readonly context: ErrorContext;
  public readonly userMessage: string;

  constructor(
    message: string,
    type: ErrorType = ErrorType.UNKNOWN_ERROR,
    context: ErrorContext = {},
    userMessage?: string
  ) {
    super(sanitizeError(message));
    this.name = 'ReviewError';
    this.type = type;
    this.context = { ...context, timestamp: new Date() };
    this.userMessage = userMessage ?? this.getDefaultUserMessage();
  }

  private getDefaultUserMessage(): string {
    return match(this.type)
      .with(
        ErrorType.CONFIG_UNREADABLE,
        () => 'Fix or remove the .codify.config file at the repository root, then run "codify init".'
      )
      .with(
        ErrorType.INVALID_VALUE,
        () => 'Check the value and try again. Run "codify config list" to see the current settings.'
      )
      .with(
        ErrorType.DIFF_UNAVAILABLE,
        () => 'Check the branch names and file paths. Run "codify list" to see local branches.'
      )
      .with(
        ErrorType.MODEL_CALL_FAILED,
        () => 'Check the model name, your API key and your network connection.'
      )
      .with(
        ErrorType.REPOSITORY_NOT_FOUND,
        () => 'Run codify from inside a git repository.'
      )
      .with(
        ErrorType.FILE_SYSTEM_ERROR,
        () => 'File operation failed. Please check file permissions and try again.'
      )
      .with(ErrorType.UNKNOWN_ERROR, () => 'An unexpected error occurred. Please try again.')
      .exhaustive();
  }
}

const errorCodeOf = (error: unknown): string | undefined =>
  match(error)
    .with({ code: P.string }, ({ code }) => code)
    .otherwise(() => undefined);

/**
 * Wraps anything thrown into a {@link ReviewError}, keeping existing ones as-is.
 */
export const toReviewError = (
  error: unknown,
  fallbackType: ErrorType = ErrorType.UNKNOWN_ERROR,
  context: ErrorContext = {}
): ReviewError => {
  if (error instanceof ReviewError) {
    return error;
  }

  const code = errorCodeOf(error);
  const type =
    fallbackType === ErrorType.UNKNOWN_ERROR &&
    FILE_SYSTEM_ERROR_CODES.some((fsCode) => fsCode === code)
      ? ErrorType.FILE_SYSTEM_ERROR
      : fallbackType;

  return new ReviewError(sanitizeError(error), type, context);
};

export class ErrorHandler {
  constructor(private readonly output: Output) {}

  public handleError = (error: unknown, context: ErrorContext = {}): number => {
    const reviewError = toReviewError(error, ErrorType.UNKNOWN_ERROR, context);
    this.displayError(reviewError);
    return EXIT_CODE_FAILURE;
  };

  private readonly displayError = (error: ReviewError): void => {
    const color = this.getErrorColor(error.type);
    this.output.error(color(`❌ ${error.type}: ${error.message}`));
    this.output.error(chalk.gray(`   ${error.userMessage}`));

    if (error.context.operation) {
      this.output.error(chalk.gray(`   Operation: ${error.context.operation}`));
    }

    if (error.context.file) {
      this.output.error(chalk.gray(`   File: ${error.context.file}`));
    }
  };

  private readonly getErrorColor = (type: ErrorType): ((text: string) => string) => {
    return match(type)
      .with(ErrorType.INVALID_VALUE, ErrorType.CONFIG_UNREADABLE, () => chalk.yellow)
      .with(ErrorType.MODEL_CALL_FAILED, () => chalk.blue)
      .with(ErrorType.FILE_SYSTEM_ERROR, () => chalk.cyan)
      .otherwise(() => chalk.red);
  };
}

export const withErrorHandling = async <T>(
  operation: () => Promise<T>,
  fallbackType: ErrorType,
  context: ErrorContext = {}
): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    throw toReviewError(error, fallbackType, context);
  }
};
