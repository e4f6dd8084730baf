// Error messages and user-facing text constants
export const ERROR_MESSAGES = {
  NOT_GIT_REPOSITORY: 'Not a git repository. Run codify from inside a git work tree.',
  DETACHED_HEAD: 'HEAD is detached. Pass the branch to review explicitly.',
  UNKNOWN_CONFIG_KEY: 'Unknown configuration key',
  CONFIG_NOT_OBJECT: 'Configuration file must contain a JSON object',
  CONFIG_NOT_JSON: 'Configuration file is not valid JSON',
  CONFIG_READ_FAILED: 'Could not read configuration file',
  CONFIG_WRITE_FAILED: 'Could not write configuration file',
  EMPTY_MODEL_RESPONSE: 'Model returned an empty response',
  PROMPT_SIZE_EXCEEDED: 'Prompt size exceeds limit of',
  UNKNOWN_PROVIDER: 'Cannot determine the provider for model',
} as const;

export const SUCCESS_MESSAGES = {
  INITIALIZED: '✨ Codify initialized successfully!',
  REVIEW_RECEIVED: 'Review received',
} as const;

export const INFO_MESSAGES = {
  ALREADY_INITIALIZED: 'Codify is already initialized',
  CURRENT_CONFIGURATION: 'Current configuration:',
  AVAILABLE_BRANCHES: 'Available branches:',
  NO_BRANCH_SPECIFIED: 'No branch specified, reviewing current branch:',
  COLLECTING_DIFF: 'Collecting changes...',
  REQUESTING_REVIEW: 'Requesting review from',
  USAGE_EXAMPLES: '📚 Codify Usage Examples:',
} as const;

export const HELP_MESSAGES = {
  SET_BASE_BRANCH: 'Set one with "codify config set base_branch <name>" or pass --base-branch.',
  NARROW_REVIEW: 'Narrow the review with --file.',
} as const;
