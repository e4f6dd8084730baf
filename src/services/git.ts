import { simpleGit, type BranchSummary } from 'simple-git';
import type { BranchDiff, BranchEntry, DiffRequest } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { ReviewError, withErrorHandling } from '../utils/error-handler.js';
import { validateRepositoryPath, withTimeout } from '../utils/security.js';
import { calculateGitTimeout } from '../utils/timeout.js';
import { ERROR_MESSAGES, HELP_MESSAGES } from '../constants/messages.js';
import { GIT_DIFF_RANGE_SEPARATOR, GIT_PATH_SEPARATOR } from '../constants/git.js';

/**
 * The slice of simple-git this service talks to. Kept narrow so tests can
 * stand in for git without spawning it.
 */
export interface GitBackend {
  checkIsRepo(): Promise<boolean>;
  revparse(options: string[]): Promise<string>;
  branchLocal(): Promise<BranchSummary>;
  diff(options: string[]): Promise<string>;
  raw(commands: string[]): Promise<string>;
}

export type GitBackendFactory = (baseDir: string) => GitBackend;

export interface DiffCollector {
  getCurrentBranch(): Promise<string>;
  collect(request: DiffRequest): Promise<BranchDiff>;
}

export interface GitRepository extends DiffCollector {
  readonly root: string;
  listBranches(): Promise<BranchEntry[]>;
}

const defaultBackendFactory: GitBackendFactory = (baseDir) => simpleGit({ baseDir });

const splitLines = (output: string): string[] =>
  output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

const diffUnavailable = (message: string, operation: string, file?: string): ReviewError =>
  new ReviewError(message, ErrorType.DIFF_UNAVAILABLE, { operation, file });

export class GitService implements GitRepository {
  private constructor(
    private readonly git: GitBackend,
    public readonly root: string
  ) {}

  /**
   * Opens the repository containing `cwd`. Every later git command runs from
   * the repository root, so file paths are root-relative.
   */
  static async open(
    cwd: string,
    createBackend: GitBackendFactory = defaultBackendFactory
  ): Promise<GitService> {
    const probe = createBackend(cwd);
    const isRepo = await probe.checkIsRepo().catch(() => false);
    if (!isRepo) {
      throw new ReviewError(ERROR_MESSAGES.NOT_GIT_REPOSITORY, ErrorType.REPOSITORY_NOT_FOUND, {
        operation: 'openRepository',
      });
    }

    const root = await withErrorHandling(
      async () => (await withTimeout(probe.revparse(['--show-toplevel']), calculateGitTimeout())).trim(),
      ErrorType.REPOSITORY_NOT_FOUND,
      { operation: 'openRepository' }
    );

    return new GitService(createBackend(root), root);
  }

  getCurrentBranch = async (): Promise<string> => {
    return withErrorHandling(
      async () => {
        const summary = await withTimeout(this.git.branchLocal(), calculateGitTimeout());
        if (summary.detached || !summary.current) {
          throw diffUnavailable(ERROR_MESSAGES.DETACHED_HEAD, 'getCurrentBranch');
        }
        return summary.current;
      },
      ErrorType.DIFF_UNAVAILABLE,
      { operation: 'getCurrentBranch' }
    );
  };

  listBranches = async (): Promise<BranchEntry[]> => {
    return withErrorHandling(
      async () => {
        const summary = await withTimeout(this.git.branchLocal(), calculateGitTimeout());
        return summary.all.map((name) => ({ name, current: name === summary.current }));
      },
      ErrorType.DIFF_UNAVAILABLE,
      { operation: 'listBranches' }
    );
  };

  collect = async (request: DiffRequest): Promise<BranchDiff> => {
    return withErrorHandling(
      async () => {
        const { branch, baseBranch } = request;

        if (branch === baseBranch) {
          throw diffUnavailable(
            `Cannot compare ${branch} with itself. Please specify a different branch to review.`,
            'collectDiff'
          );
        }

        const summary = await withTimeout(this.git.branchLocal(), calculateGitTimeout());
        if (!summary.all.includes(branch)) {
          throw diffUnavailable(`Branch '${branch}' not found`, 'collectDiff');
        }
        if (!summary.all.includes(baseBranch)) {
          throw diffUnavailable(
            `Base branch '${baseBranch}' not found. ${HELP_MESSAGES.SET_BASE_BRANCH}`,
            'collectDiff'
          );
        }

        const files = this.validateFilePaths(request.files ?? []);
        const range = `${baseBranch}${GIT_DIFF_RANGE_SEPARATOR}${branch}`;

        const changedFiles = splitLines(
          await withTimeout(this.git.diff([range, '--name-only']), calculateGitTimeout())
        );

        if (files.length > 0) {
          await this.ensureFilesExist(branch, files, changedFiles);
        }

        const diffArgs = files.length > 0 ? [range, GIT_PATH_SEPARATOR, ...files] : [range];
        const diff = await withTimeout(this.git.diff(diffArgs), calculateGitTimeout());

        if (!diff.trim()) {
          throw diffUnavailable(
            files.length > 0
              ? `No changes found between ${branch} and ${baseBranch} for the specified files: ${files.join(', ')}`
              : `No changes found between ${branch} and ${baseBranch}`,
            'collectDiff'
          );
        }

        return { branch, baseBranch, files, changedFiles, diff };
      },
      ErrorType.DIFF_UNAVAILABLE,
      { operation: 'collectDiff' }
    );
  };

  private readonly validateFilePaths = (filePaths: string[]): string[] => {
    const validPaths: string[] = [];

    for (const filePath of filePaths) {
      const validation = validateRepositoryPath(filePath);
      if (!validation.isValid || validation.sanitizedValue === undefined) {
        throw diffUnavailable(validation.error ?? 'Invalid file path', 'collectDiff', filePath);
      }
      if (!validPaths.includes(validation.sanitizedValue)) {
        validPaths.push(validation.sanitizedValue);
      }
    }

    return validPaths;
  };

  // Tracked on the branch (directories included), or touched by the diff so deletions count
  private readonly ensureFilesExist = async (
    branch: string,
    files: string[],
    changedFiles: string[]
  ): Promise<void> => {
    const tracked = new Set([
      ...splitLines(
        await withTimeout(this.git.raw(['ls-tree', '-r', '-t', '--name-only', branch]), calculateGitTimeout())
      ),
      ...changedFiles,
    ]);

    const missing = files.find((file) => !tracked.has(file));
    if (missing !== undefined) {
      throw diffUnavailable(`File not found in repository: ${missing}`, 'collectDiff', missing);
    }
  };
}
