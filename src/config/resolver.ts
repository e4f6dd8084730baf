import { DEFAULT_SETTINGS } from '../constants/config.js';
import { SettingKeySchema, SettingsSchema, formatIssues } from '../schemas/validation.js';
import type {
  EffectiveSettings,
  SettingKey,
  SettingOverrides,
  SettingSource,
  Settings,
} from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { ReviewError } from '../utils/error-handler.js';
import type { ConfigStore } from './store.js';

const SOURCE_LABELS: Record<SettingSource, string> = {
  cli: 'command line',
  config: 'config file',
  default: 'built-in default',
};

export const mapSettingKeys = <T>(fn: (key: SettingKey) => T): Record<SettingKey, T> => ({
  model: fn('model'),
  temperature: fn('temperature'),
  base_branch: fn('base_branch'),
  system_message: fn('system_message'),
  review_instructions: fn('review_instructions'),
});

/**
 * Picks every setting independently: command line first, then the config
 * store, then the built-in default. The chosen values are validated together,
 * so a bad `--temperature` fails even when the stored one is fine.
 */
export const resolveSettings = (
  store: ConfigStore,
  overrides: SettingOverrides = {},
  defaults: Settings = DEFAULT_SETTINGS
): EffectiveSettings => {
  const sources = mapSettingKeys((key): SettingSource => {
    if (overrides[key] !== undefined) return 'cli';
    if (store.get(key) !== undefined) return 'config';
    return 'default';
  });

  const candidate = mapSettingKeys((key): unknown => {
    switch (sources[key]) {
      case 'cli':
        return overrides[key];
      case 'config':
        return store.get(key);
      case 'default':
        return defaults[key];
    }
  });

  const result = SettingsSchema.safeParse(candidate);
  if (!result.success) {
    const keyResult = SettingKeySchema.safeParse(result.error.issues[0]?.path[0]);
    const subject = keyResult.success
      ? `${keyResult.data} (from ${SOURCE_LABELS[sources[keyResult.data]]})`
      : 'settings';
    throw new ReviewError(
      `Invalid value for ${subject}: ${formatIssues(result.error)}`,
      ErrorType.INVALID_VALUE,
      { operation: 'resolveSettings', key: keyResult.success ? keyResult.data : undefined }
    );
  }

  return { values: result.data, sources };
};
