export enum ErrorType {
  CONFIG_UNREADABLE = 'ConfigUnreadable',
  INVALID_VALUE = 'InvalidValue',
  DIFF_UNAVAILABLE = 'DiffUnavailable',
  MODEL_CALL_FAILED = 'ModelCallFailed',
  REPOSITORY_NOT_FOUND = 'RepositoryNotFound',
  FILE_SYSTEM_ERROR = 'FileSystemError',
  UNKNOWN_ERROR = 'UnknownError',
}

export interface ErrorContext {
  operation?: string;
  file?: string;
  key?: string;
  model?: string;
  timestamp?: Date;
}
