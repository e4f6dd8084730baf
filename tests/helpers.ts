import { vi } from 'vitest';
import type { BranchSummary } from 'simple-git';
import { MemoryConfigStore, type ConfigStore } from '../src/config/store.js';
import type { GitBackend, GitRepository } from '../src/services/git.js';
import type { ModelClient } from '../src/services/ai.js';
import type { CliDependencies } from '../src/program.js';
import type { BranchDiff, BranchEntry, DiffRequest, Output, Spinner, SpinnerFactory } from '../src/types/common.js';

export interface CapturedOutput {
  output: Output;
  logs: string[];
  errors: string[];
}

export const captureOutput = (): CapturedOutput => {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    output: {
      log: (message = '') => {
        logs.push(message);
      },
      error: (message) => {
        errors.push(message);
      },
    },
  };
};

export const silentSpinner: SpinnerFactory = () => {
  const spinner: Spinner = {
    start: () => spinner,
    succeed: () => spinner,
    fail: () => spinner,
  };
  return spinner;
};

export const SAMPLE_DIFF = `diff --git a/src/math.ts b/src/math.ts
index 1111111..2222222 100644
--- a/src/math.ts
+++ b/src/math.ts
@@ -1,3 +1,4 @@
 export const add = (a: number, b: number) => a + b;
+export const sub = (a: number, b: number) => a - b;
`;

/**
 * In-process repository: branches are a list, every diff is the same text.
 */
export class FakeRepository implements GitRepository {
  public readonly root = '/repo';
  public readonly requests: DiffRequest[] = [];

  constructor(
    private readonly branches: string[] = ['main', 'feature'],
    private readonly current: string = 'feature',
    private readonly diffText: string = SAMPLE_DIFF
  ) {}

  getCurrentBranch = async (): Promise<string> => this.current;

  listBranches = async (): Promise<BranchEntry[]> =>
    this.branches.map((name) => ({ name, current: name === this.current }));

  collect = async (request: DiffRequest): Promise<BranchDiff> => {
    this.requests.push(request);
    return {
      branch: request.branch,
      baseBranch: request.baseBranch,
      files: request.files ?? [],
      changedFiles: ['src/math.ts'],
      diff: this.diffText,
    };
  };
}

export const branchSummary = (all: string[], current: string, detached = false): BranchSummary => ({
  all,
  current,
  detached,
  branches: {},
});

export interface FakeBackendOptions {
  isRepo?: boolean;
  root?: string;
  branches?: string[];
  current?: string;
  detached?: boolean;
  changedFiles?: string[];
  trackedFiles?: string[];
  diff?: string;
}

export const createFakeBackend = (options: FakeBackendOptions = {}) => {
  const branches = options.branches ?? ['main', 'feature'];
  const backend = {
    checkIsRepo: vi.fn(async () => options.isRepo ?? true),
    revparse: vi.fn(async (_args: string[]) => `${options.root ?? '/work/project'}\n`),
    branchLocal: vi.fn(async () =>
      branchSummary(branches, options.current ?? 'feature', options.detached ?? false)
    ),
    diff: vi.fn(async (args: string[]) =>
      args.includes('--name-only')
        ? `${(options.changedFiles ?? ['src/math.ts']).join('\n')}\n`
        : (options.diff ?? SAMPLE_DIFF)
    ),
    raw: vi.fn(async (_args: string[]) => `${(options.trackedFiles ?? ['src', 'src/math.ts']).join('\n')}\n`),
  } satisfies GitBackend;
  return backend;
};

export const createModelClient = (reply = '## Summary\nLooks good.') => {
  const complete = vi.fn<ModelClient['complete']>(async () => reply);
  const client: ModelClient = { complete };
  return { client, complete };
};

export interface TestHarness extends CapturedOutput {
  deps: CliDependencies;
  store: ConfigStore;
  repository: FakeRepository;
  complete: ReturnType<typeof createModelClient>['complete'];
}

export const createHarness = (
  options: { store?: ConfigStore; repository?: FakeRepository; reply?: string; env?: Record<string, string> } = {}
): TestHarness => {
  const captured = captureOutput();
  const store = options.store ?? new MemoryConfigStore();
  const repository = options.repository ?? new FakeRepository();
  const { client, complete } = createModelClient(options.reply);

  return {
    ...captured,
    store,
    repository,
    complete,
    deps: {
      version: '0.0.0-test',
      output: captured.output,
      env: options.env ?? {},
      spinner: silentSpinner,
      modelClient: client,
      openRepository: async () => repository,
      openStore: () => store,
    },
  };
};

export const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
};
