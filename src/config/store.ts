import * as fs from 'fs';
import { CONFIG_FILE_MODE, SETTING_KEYS } from '../constants/config.js';
import { ERROR_MESSAGES } from '../constants/messages.js';
import {
  SettingKeySchema,
  SettingsSchema,
  StoredSettingsSchema,
  formatIssues,
} from '../schemas/validation.js';
import type { SettingKey, Settings } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { ReviewError } from '../utils/error-handler.js';
import { sanitizeError } from '../utils/security.js';

/**
 * Flat key/value settings scoped to one repository.
 *
 * `set` validates before it touches anything: a rejected key or value leaves
 * both the in-memory view and the backing storage as they were.
 */
export interface ConfigStore {
  readonly location: string;
  get<K extends SettingKey>(key: K): Settings[K] | undefined;
  set(key: string, value: string | number): void;
  list(): Partial<Settings>;
  /** Writes `defaults` when nothing has been persisted yet. Returns whether it wrote. */
  initialize(defaults: Settings): boolean;
}

export const orderSettings = (values: Partial<Settings>): Partial<Settings> => {
  const ordered: Partial<Settings> = {};
  const copy = <K extends SettingKey>(key: K): void => {
    const value = values[key];
    if (value !== undefined) {
      ordered[key] = value;
    }
  };
  SETTING_KEYS.forEach(copy);
  return ordered;
};

abstract class BaseConfigStore implements ConfigStore {
  public abstract readonly location: string;
  protected values: Partial<Settings> = {};

  protected abstract isPersisted(): boolean;
  protected abstract persist(values: Partial<Settings>): void;

  public get = <K extends SettingKey>(key: K): Settings[K] | undefined => this.values[key];

  public list = (): Partial<Settings> => ({ ...this.values });

  public set = (key: string, value: string | number): void => {
    const keyResult = SettingKeySchema.safeParse(key);
    if (!keyResult.success) {
      throw new ReviewError(
        `${ERROR_MESSAGES.UNKNOWN_CONFIG_KEY}: ${key}. Allowed keys: ${SETTING_KEYS.join(', ')}`,
        ErrorType.INVALID_VALUE,
        { operation: 'configSet', key }
      );
    }

    const result = SettingsSchema.partial().safeParse({ [keyResult.data]: value });
    if (!result.success) {
      throw new ReviewError(
        `Invalid value for ${key}: ${formatIssues(result.error)}`,
        ErrorType.INVALID_VALUE,
        { operation: 'configSet', key }
      );
    }

    const next = orderSettings({ ...this.values, ...result.data });
    this.persist(next);
    this.values = next;
  };

  public initialize = (defaults: Settings): boolean => {
    if (this.isPersisted()) {
      return false;
    }

    const next = orderSettings({ ...defaults, ...this.values });
    this.persist(next);
    this.values = next;
    return true;
  };
}

const unreadable = (message: string, file: string): ReviewError =>
  new ReviewError(message, ErrorType.CONFIG_UNREADABLE, { operation: 'loadConfig', file });

const parseJson = (raw: string, file: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    throw unreadable(`${ERROR_MESSAGES.CONFIG_NOT_JSON}: ${file}`, file);
  }
};

const readConfigFile = (file: string): Partial<Settings> => {
  if (!fs.existsSync(file)) {
    return {};
  }

  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw unreadable(`${ERROR_MESSAGES.CONFIG_READ_FAILED} ${file}: ${sanitizeError(error)}`, file);
  }

  const data = parseJson(raw, file);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw unreadable(`${ERROR_MESSAGES.CONFIG_NOT_OBJECT}: ${file}`, file);
  }

  const result = StoredSettingsSchema.safeParse(data);
  if (!result.success) {
    throw unreadable(`Invalid configuration in ${file}: ${formatIssues(result.error)}`, file);
  }

  return orderSettings(result.data);
};

/**
 * JSON file at the repository root. The file is read once on construction and
 * rewritten in full on every successful `set`.
 */
export class FileConfigStore extends BaseConfigStore {
  public readonly location: string;

  constructor(private readonly filePath: string) {
    super();
    this.location = filePath;
    this.values = readConfigFile(filePath);
  }

  protected isPersisted(): boolean {
    return fs.existsSync(this.filePath);
  }

  protected persist(values: Partial<Settings>): void {
    try {
      fs.writeFileSync(this.filePath, `${JSON.stringify(values, null, 2)}\n`, {
        mode: CONFIG_FILE_MODE,
      });
      // `mode` only applies when the file is created
      fs.chmodSync(this.filePath, CONFIG_FILE_MODE);
    } catch (error) {
      throw new ReviewError(
        `${ERROR_MESSAGES.CONFIG_WRITE_FAILED} ${this.filePath}: ${sanitizeError(error)}`,
        ErrorType.FILE_SYSTEM_ERROR,
        { operation: 'saveConfig', file: this.filePath }
      );
    }
  }
}

export class MemoryConfigStore extends BaseConfigStore {
  public readonly location = 'memory';
  private persisted: boolean;

  constructor(initial?: Partial<Settings>) {
    super();
    this.persisted = initial !== undefined;
    this.values = orderSettings(initial ?? {});
  }

  protected isPersisted(): boolean {
    return this.persisted;
  }

  protected persist(values: Partial<Settings>): void {
    this.values = values;
    this.persisted = true;
  }
}
