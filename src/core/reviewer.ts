import chalk from 'chalk';
import type { DiffCollector } from '../services/git.js';
import type { ModelClient } from '../services/ai.js';
import { buildReviewPrompt } from '../services/prompt.js';
import type { ReviewRequest } from '../schemas/validation.js';
import type { BranchDiff, Output, ReviewOptions, Settings, SpinnerFactory } from '../types/common.js';
import { INFO_MESSAGES, SUCCESS_MESSAGES } from '../constants/messages.js';
import { formatReviewContent, printDebugPanel } from '../utils/format.js';

export interface CodeReviewerDependencies {
  repository: DiffCollector;
  model: ModelClient;
  output: Output;
  spinner: SpinnerFactory;
  debug: boolean;
}

/**
 * Runs one review: collect the diff, build the prompt, ask the model, tidy the
 * answer. Each step either succeeds or throws; there is no partial result.
 */
export class CodeReviewer {
  constructor(private readonly deps: CodeReviewerDependencies) {}

  review = async (settings: Settings, options: ReviewOptions = {}): Promise<string> => {
    const request = await this.resolveRequest(options);
    const diff = await this.collectDiff(settings, request);

    const prompt = buildReviewPrompt(diff, settings);
    this.debug('System Message', prompt.system);
    this.debug('User Message', prompt.user);

    const spinner = this.deps.spinner(`${INFO_MESSAGES.REQUESTING_REVIEW} ${settings.model}...`).start();
    let reply: string;
    try {
      reply = await this.deps.model.complete({
        model: settings.model,
        temperature: settings.temperature,
        system: prompt.system,
        user: prompt.user,
      });
    } catch (error) {
      spinner.fail();
      throw error;
    }
    spinner.succeed(SUCCESS_MESSAGES.REVIEW_RECEIVED);

    this.debug('Raw LLM Response', reply);
    return formatReviewContent(reply);
  };

  private readonly resolveRequest = async (options: ReviewOptions): Promise<ReviewRequest> => {
    if (options.branch) {
      return { ...options, branch: options.branch };
    }

    const branch = await this.deps.repository.getCurrentBranch();
    this.deps.output.log(chalk.gray(`${INFO_MESSAGES.NO_BRANCH_SPECIFIED} ${branch}`));
    return { ...options, branch };
  };

  private readonly collectDiff = async (
    settings: Settings,
    request: ReviewRequest
  ): Promise<BranchDiff> => {
    const spinner = this.deps.spinner(INFO_MESSAGES.COLLECTING_DIFF).start();
    try {
      const diff = await this.deps.repository.collect({
        branch: request.branch,
        baseBranch: settings.base_branch,
        files: request.files,
      });
      const count = diff.files.length > 0 ? diff.files.length : diff.changedFiles.length;
      spinner.succeed(`Collected changes in ${count} file(s) against ${diff.baseBranch}`);
      return diff;
    } catch (error) {
      spinner.fail();
      throw error;
    }
  };

  private readonly debug = (title: string, content: string): void => {
    if (this.deps.debug) {
      printDebugPanel(this.deps.output, title, content);
    }
  };
}
