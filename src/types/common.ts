export interface Settings {
  model: string;
  temperature: number;
  base_branch: string;
  system_message: string;
  review_instructions: string;
}

export type SettingKey = keyof Settings;

export type SettingSource = 'cli' | 'config' | 'default';

export type SettingOverrides = Partial<Record<SettingKey, string | number>>;

export interface EffectiveSettings {
  values: Settings;
  sources: Record<SettingKey, SettingSource>;
}

export interface DiffRequest {
  branch: string;
  baseBranch: string;
  files?: string[];
}

export interface BranchDiff {
  branch: string;
  baseBranch: string;
  files: string[]; // explicitly requested, empty when reviewing everything
  changedFiles: string[];
  diff: string;
}

export interface BranchEntry {
  name: string;
  current: boolean;
}

export interface ReviewPrompt {
  system: string;
  user: string;
}

export interface ReviewOptions {
  branch?: string;
  files?: string[];
}

export type Env = Record<string, string | undefined>;

export interface Output {
  log(message?: string): void;
  error(message: string): void;
}

export interface Spinner {
  start(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
}

export type SpinnerFactory = (text: string) => Spinner;
