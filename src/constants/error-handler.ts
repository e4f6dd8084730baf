export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_FAILURE = 1;

export const FILE_SYSTEM_ERROR_CODES = ['ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'EISDIR'] as const;
