import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileConfigStore, MemoryConfigStore, type ConfigStore } from '../src/config/store.js';
import { DEFAULT_SETTINGS, SETTING_KEYS } from '../src/constants/config.js';
import { ErrorType } from '../src/types/error-handler.js';
import { ReviewError } from '../src/utils/error-handler.js';
import type { SettingKey, Settings } from '../src/types/common.js';
import { catchError } from './helpers.js';

const SAMPLE_VALUES: Settings = {
  model: 'anthropic/claude-3-5-sonnet-latest',
  temperature: 0.7,
  base_branch: 'release/2.x',
  system_message: 'You review code.\nKeep it short.',
  review_instructions: '**Guidelines:**\n1. Check error paths\n2. Flag missing tests\n',
};

const roundTrip = <K extends SettingKey>(store: ConfigStore, key: K): Settings[K] | undefined => {
  store.set(key, SAMPLE_VALUES[key]);
  return store.get(key);
};

describe('FileConfigStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'codify-store-'));
    file = path.join(dir, '.codify.config');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('treats a missing file as empty', () => {
    const store = new FileConfigStore(file);
    expect(store.list()).toEqual({});
    expect(store.get('model')).toBeUndefined();
    expect(fs.existsSync(file)).toBe(false);
  });

  it('persists a set value and reads it back in a new instance', () => {
    new FileConfigStore(file).set('base_branch', 'develop');

    const reopened = new FileConfigStore(file);
    expect(reopened.get('base_branch')).toBe('develop');
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({ base_branch: 'develop' });
  });

  it('stores temperature as a number', () => {
    const store = new FileConfigStore(file);
    store.set('temperature', '1.5');

    expect(store.get('temperature')).toBe(1.5);
    expect(fs.readFileSync(file, 'utf-8')).toBe('{\n  "temperature": 1.5\n}\n');
  });

  it('writes keys in a fixed order', () => {
    const store = new FileConfigStore(file);
    store.set('base_branch', 'develop');
    store.set('model', 'gpt-4o-mini');

    expect(Object.keys(JSON.parse(fs.readFileSync(file, 'utf-8')))).toEqual(['model', 'base_branch']);
  });

  it('rejects an unknown key without touching the file', () => {
    const store = new FileConfigStore(file);
    store.set('model', 'gpt-4o-mini');
    const before = fs.readFileSync(file, 'utf-8');

    const error = catchError(() => store.set('colour', 'blue'));

    expect(error).toBeInstanceOf(ReviewError);
    expect(error).toMatchObject({ type: ErrorType.INVALID_VALUE });
    expect(fs.readFileSync(file, 'utf-8')).toBe(before);
  });

  it.each(['abc', '2.5', '-0.1', ''])('rejects temperature %j', (value) => {
    const store = new FileConfigStore(file);
    store.set('temperature', '0.3');

    const error = catchError(() => store.set('temperature', value));

    expect(error).toMatchObject({ type: ErrorType.INVALID_VALUE });
    expect(store.get('temperature')).toBe(0.3);
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({ temperature: 0.3 });
  });

  it('accepts both temperature bounds', () => {
    const store = new FileConfigStore(file);
    store.set('temperature', '0');
    expect(store.get('temperature')).toBe(0);
    store.set('temperature', '2');
    expect(store.get('temperature')).toBe(2);
  });

  it('fails with ConfigUnreadable on malformed JSON', () => {
    fs.writeFileSync(file, '{ "model": ');

    const error = catchError(() => new FileConfigStore(file));

    expect(error).toMatchObject({
      type: ErrorType.CONFIG_UNREADABLE,
      message: `Configuration file is not valid JSON: ${file}`,
    });
  });

  it('fails with ConfigUnreadable on a JSON array', () => {
    fs.writeFileSync(file, '[]');
    expect(catchError(() => new FileConfigStore(file))).toMatchObject({
      type: ErrorType.CONFIG_UNREADABLE,
    });
  });

  it('fails with ConfigUnreadable on an unknown stored key', () => {
    fs.writeFileSync(file, JSON.stringify({ model: 'gpt-4o', colour: 'blue' }));
    expect(catchError(() => new FileConfigStore(file))).toMatchObject({
      type: ErrorType.CONFIG_UNREADABLE,
    });
  });

  it('fails with ConfigUnreadable on an out-of-range stored temperature', () => {
    fs.writeFileSync(file, JSON.stringify({ temperature: 7 }));
    expect(catchError(() => new FileConfigStore(file))).toMatchObject({
      type: ErrorType.CONFIG_UNREADABLE,
    });
  });

  it('initializes once with the defaults', () => {
    const store = new FileConfigStore(file);

    expect(store.initialize(DEFAULT_SETTINGS)).toBe(true);
    expect(new FileConfigStore(file).list()).toEqual(DEFAULT_SETTINGS);

    store.set('model', 'claude-3-5-haiku-latest');
    expect(new FileConfigStore(file).initialize(DEFAULT_SETTINGS)).toBe(false);
    expect(new FileConfigStore(file).get('model')).toBe('claude-3-5-haiku-latest');
  });

  it('writes the file readable by its owner only', () => {
    new FileConfigStore(file).set('model', 'gpt-4o');
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it('tightens the permissions of an existing file', () => {
    fs.writeFileSync(file, '{}\n', { mode: 0o644 });
    fs.chmodSync(file, 0o644);

    new FileConfigStore(file).set('base_branch', 'develop');

    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it.each(SETTING_KEYS)('round-trips %s through a reopened file', (key) => {
    expect(roundTrip(new FileConfigStore(file), key)).toEqual(SAMPLE_VALUES[key]);
    expect(new FileConfigStore(file).get(key)).toEqual(SAMPLE_VALUES[key]);
  });
});

describe('MemoryConfigStore', () => {
  it.each(SETTING_KEYS)('round-trips %s', (key) => {
    expect(roundTrip(new MemoryConfigStore(), key)).toEqual(SAMPLE_VALUES[key]);
  });

  it('starts empty and unpersisted', () => {
    const store = new MemoryConfigStore();
    expect(store.list()).toEqual({});
    expect(store.initialize(DEFAULT_SETTINGS)).toBe(true);
    expect(store.get('base_branch')).toBe('main');
  });

  it('counts seeded values as already persisted', () => {
    const store = new MemoryConfigStore({ base_branch: 'trunk' });
    expect(store.initialize(DEFAULT_SETTINGS)).toBe(false);
    expect(store.list()).toEqual({ base_branch: 'trunk' });
  });

  it('returns a copy from list', () => {
    const store = new MemoryConfigStore({ model: 'gpt-4o' });
    const listed = store.list();
    listed.model = 'changed';
    expect(store.get('model')).toBe('gpt-4o');
  });
});
