import type { SettingKey, Settings } from '../types/common.js';
import { DEFAULT_REVIEW_INSTRUCTIONS, DEFAULT_SYSTEM_MESSAGE } from './prompts.js';

export const CONFIG_FILE = '.codify.config';
export const CONFIG_FILE_MODE = 0o600;

export const SETTING_KEYS = [
  'model',
  'temperature',
  'base_branch',
  'system_message',
  'review_instructions',
] as const satisfies readonly SettingKey[];

export const TEMPERATURE_MIN = 0;
export const TEMPERATURE_MAX = 2;

export const DEFAULT_SETTINGS: Settings = {
  model: 'gpt-4o',
  temperature: 0.0,
  base_branch: 'main',
  system_message: DEFAULT_SYSTEM_MESSAGE,
  review_instructions: DEFAULT_REVIEW_INSTRUCTIONS,
};

export const DEBUG_ENV_VAR = 'CODIFY_DEBUG_ENABLED';
