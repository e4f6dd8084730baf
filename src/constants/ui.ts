// UI and display constants
export const UI_CONSTANTS = {
  CURRENT_BRANCH_MARKER: '✓',
  DEBUG_PANEL_WIDTH: 72,

  // Reply envelope patterns
  JSON_BLOCK_START: /^\s*```(?:json)?\s*\{/m,
  JSON_BLOCK_END: /\}\s*```\s*$/m,
  JSON_FENCE_OPEN: /^\s*```(?:json)?\s*/,
  JSON_FENCE_CLOSE: /\s*```\s*$/,
} as const;
