/**
 * Git-related constants
 */

export const GIT_DIFF_RANGE_SEPARATOR = '...';
export const GIT_PATH_SEPARATOR = '--';
