/**
 * Calculate dynamic timeout based on operation complexity
 */
export interface TimeoutCalculationOptions {
  diffSize?: number; // in characters
  operationType: 'git' | 'ai';
}

const BASE_TIMEOUTS = {
  git: 15000, // 15 seconds for git operations
  ai: 20000, // 20 seconds for AI operations
} as const;

const MAX_TIMEOUTS = {
  git: 60000,
  ai: 90000,
} as const;

export const calculateDynamicTimeout = (options: TimeoutCalculationOptions): number => {
  const { diffSize = 0, operationType } = options;

  let timeout: number = BASE_TIMEOUTS[operationType];

  // 1 second per 10KB of diff
  if (diffSize > 0) {
    const diffSizeKB = diffSize / 1024;
    timeout += Math.floor(diffSizeKB / 10) * 1000;
  }

  return Math.min(timeout, MAX_TIMEOUTS[operationType]);
};

export const calculateGitTimeout = (options: Omit<TimeoutCalculationOptions, 'operationType'> = {}): number =>
  calculateDynamicTimeout({ ...options, operationType: 'git' });

export const calculateAITimeout = (options: Omit<TimeoutCalculationOptions, 'operationType'> = {}): number =>
  calculateDynamicTimeout({ ...options, operationType: 'ai' });
