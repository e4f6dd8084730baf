import { DEFAULT_LIMITS } from '../constants/security.js';
import { ERROR_MESSAGES, HELP_MESSAGES } from '../constants/messages.js';
import { REVIEW_REQUEST_HEADING } from '../constants/prompts.js';
import type { BranchDiff, ReviewPrompt, Settings } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { ReviewError } from '../utils/error-handler.js';

const bulletList = (items: string[]): string => items.map((item) => `- ${item}`).join('\n');

export const buildReviewPrompt = (
  diff: BranchDiff,
  settings: Pick<Settings, 'system_message' | 'review_instructions'>
): ReviewPrompt => {
  const filesSection =
    diff.files.length > 0
      ? `Reviewing specific files:\n${bulletList(diff.files)}`
      : `Changed files:\n${bulletList(diff.changedFiles)}`;

  const sections = [
    `Reviewing changes in branch '${diff.branch}' compared to '${diff.baseBranch}'.`,
    filesSection,
    settings.review_instructions.trim(),
    `${REVIEW_REQUEST_HEADING}\n\n${diff.diff}`,
  ].filter((section) => section.length > 0);

  const prompt = { system: settings.system_message, user: sections.join('\n\n') };

  const size = prompt.system.length + prompt.user.length;
  if (size > DEFAULT_LIMITS.maxApiRequestSize) {
    throw new ReviewError(
      `${ERROR_MESSAGES.PROMPT_SIZE_EXCEEDED} ${DEFAULT_LIMITS.maxApiRequestSize} characters (${size}). ${HELP_MESSAGES.NARROW_REVIEW}`,
      ErrorType.DIFF_UNAVAILABLE,
      { operation: 'buildPrompt' }
    );
  }

  return prompt;
};
