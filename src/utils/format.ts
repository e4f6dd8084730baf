import chalk from 'chalk';
import { UI_CONSTANTS } from '../constants/ui.js';
import { ReviewEnvelopeSchema } from '../schemas/validation.js';
import type { Output, SettingKey, Settings } from '../types/common.js';

const tryParseJson = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};

/**
 * Some models answer with a fenced JSON block instead of markdown. Unwraps it,
 * preferring its `response` field; anything else comes back trimmed.
 */
export const formatReviewContent = (content: string): string => {
  const trimmed = content.trim();
  const start = UI_CONSTANTS.JSON_BLOCK_START.exec(trimmed);
  const end = UI_CONSTANTS.JSON_BLOCK_END.exec(trimmed);

  if (!start || !end || end.index + end[0].length <= start.index) {
    return trimmed;
  }

  const jsonContent = trimmed
    .slice(start.index, end.index + end[0].length)
    .replace(UI_CONSTANTS.JSON_FENCE_OPEN, '')
    .replace(UI_CONSTANTS.JSON_FENCE_CLOSE, '');

  const parsed = tryParseJson(jsonContent);
  if (!parsed.ok) {
    return trimmed;
  }

  const envelope = ReviewEnvelopeSchema.safeParse(parsed.value);
  return (envelope.success ? envelope.data.response : jsonContent).trim();
};

export const formatSettingValue = <K extends SettingKey>(key: K, value: Settings[K]): string =>
  key === 'temperature' && typeof value === 'number' && Number.isInteger(value)
    ? value.toFixed(1)
    : String(value);

export const printDebugPanel = (output: Output, title: string, content: string): void => {
  const rule = '─'.repeat(UI_CONSTANTS.DEBUG_PANEL_WIDTH);
  output.log(chalk.blue(`┌ ${title}`));
  output.log(chalk.blue(rule));
  output.log(content);
  output.log(chalk.blue(rule));
};
