import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import type { ConfigStore } from './config/store.js';
import { resolveSettings } from './config/resolver.js';
import { CodeReviewer } from './core/reviewer.js';
import type { GitRepository } from './services/git.js';
import type { ModelClient } from './services/ai.js';
import { SettingKeySchema } from './schemas/validation.js';
import type { EffectiveSettings, Env, Output, SettingKey, SettingOverrides, SpinnerFactory } from './types/common.js';
import { ErrorType } from './types/error-handler.js';
import { ErrorHandler, ReviewError, withErrorHandling } from './utils/error-handler.js';
import { formatSettingValue } from './utils/format.js';
import { DEBUG_ENV_VAR, DEFAULT_SETTINGS, SETTING_KEYS } from './constants/config.js';
import { ERROR_MESSAGES, INFO_MESSAGES, SUCCESS_MESSAGES } from './constants/messages.js';
import { EXIT_CODE_SUCCESS } from './constants/error-handler.js';
import { UI_CONSTANTS } from './constants/ui.js';

export interface CliDependencies {
  version: string;
  output: Output;
  env: Env;
  spinner: SpinnerFactory;
  modelClient: ModelClient;
  openRepository(): Promise<GitRepository>;
  openStore(root: string): ConfigStore;
}

interface ReviewCommandOptions {
  baseBranch?: string;
  file: string[];
  model?: string;
  temperature?: string;
  systemMessage?: string;
  reviewInstructions?: string;
  debug?: boolean;
}

const collectFiles = (value: string, previous: string[]): string[] => [...previous, value];

export const isDebugEnabled = (flag: boolean | undefined, env: Env): boolean =>
  flag === true || env[DEBUG_ENV_VAR]?.toLowerCase() === 'true';

const describeSetting = (settings: EffectiveSettings, key: SettingKey): string =>
  formatSettingValue(key, settings.values[key]).split('\n').join('\n    ');

const parseSettingKey = (key: string, operation: string): SettingKey => {
  const result = SettingKeySchema.safeParse(key);
  if (!result.success) {
    throw new ReviewError(
      `${ERROR_MESSAGES.UNKNOWN_CONFIG_KEY}: ${key}. Allowed keys: ${SETTING_KEYS.join(', ')}`,
      ErrorType.INVALID_VALUE,
      { operation, key }
    );
  }
  return result.data;
};

export const createProgram = (deps: CliDependencies): Command => {
  const { output } = deps;

  const openRepositoryStore = async (): Promise<{ repository: GitRepository; store: ConfigStore }> => {
    const repository = await deps.openRepository();
    return { repository, store: deps.openStore(repository.root) };
  };

  const program = new Command();

  program
    .name('codify')
    .description('🔍 AI-powered code review for git branches')
    .version(deps.version)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.log(text.trimEnd()),
      writeErr: (text) => output.error(text.trimEnd()),
    });

  program
    .command('init')
    .description('Initialize Codify in the current repository')
    .action(async (): Promise<void> => {
      await withErrorHandling(
        async () => {
          const { store } = await openRepositoryStore();
          if (store.initialize(DEFAULT_SETTINGS)) {
            output.log(chalk.green(SUCCESS_MESSAGES.INITIALIZED));
            output.log(chalk.gray(`   Config file: ${store.location}`));
          } else {
            output.log(chalk.yellow(`${INFO_MESSAGES.ALREADY_INITIALIZED} (${store.location})`));
          }
        },
        ErrorType.UNKNOWN_ERROR,
        { operation: 'init' }
      );
    });

  program
    .command('review')
    .argument('[branch]', 'branch to review (defaults to the current branch)')
    .description('Review changes in a branch compared to the base branch')
    .option('-b, --base-branch <branch>', 'base branch to compare against')
    .option('-f, --file <path>', 'review only this file (repeatable)', collectFiles, [])
    .option('-m, --model <model>', 'model to use, optionally prefixed with its provider')
    .option('-t, --temperature <value>', 'sampling temperature between 0 and 2')
    .option('--system-message <text>', 'system message sent to the model')
    .option('--review-instructions <text>', 'review guidelines sent with the diff')
    .option('--debug', 'print the prompt and the raw model response')
    .action(async (branch: string | undefined, options: ReviewCommandOptions): Promise<void> => {
      await withErrorHandling(
        async () => {
          const overrides: SettingOverrides = {
            model: options.model,
            temperature: options.temperature,
            base_branch: options.baseBranch,
            system_message: options.systemMessage,
            review_instructions: options.reviewInstructions,
          };

          const { repository, store } = await openRepositoryStore();
          const settings = resolveSettings(store, overrides);

          const reviewer = new CodeReviewer({
            repository,
            model: deps.modelClient,
            output,
            spinner: deps.spinner,
            debug: isDebugEnabled(options.debug, deps.env),
          });

          const content = await reviewer.review(settings.values, { branch, files: options.file });
          output.log();
          output.log(content);
        },
        ErrorType.UNKNOWN_ERROR,
        { operation: 'review' }
      );
    });

  program
    .command('list')
    .alias('branches')
    .description('List local branches')
    .action(async (): Promise<void> => {
      await withErrorHandling(
        async () => {
          const repository = await deps.openRepository();
          const branches = await repository.listBranches();

          output.log(chalk.blue(INFO_MESSAGES.AVAILABLE_BRANCHES));
          for (const branch of branches) {
            const marker = branch.current ? chalk.green(UI_CONSTANTS.CURRENT_BRANCH_MARKER) : ' ';
            output.log(`  ${marker} ${branch.current ? chalk.cyan(branch.name) : branch.name}`);
          }
        },
        ErrorType.UNKNOWN_ERROR,
        { operation: 'list' }
      );
    });

  const configCmd = program.command('config').description('Manage Codify configuration');

  configCmd
    .command('list')
    .description('Show the effective settings and where each comes from')
    .action(async (): Promise<void> => {
      await withErrorHandling(
        async () => {
          const { store } = await openRepositoryStore();
          const settings = resolveSettings(store);

          output.log(chalk.blue(INFO_MESSAGES.CURRENT_CONFIGURATION));
          for (const key of SETTING_KEYS) {
            output.log(`  ${key}: ${describeSetting(settings, key)} ${chalk.gray(`(${settings.sources[key]})`)}`);
          }
        },
        ErrorType.UNKNOWN_ERROR,
        { operation: 'configList' }
      );
    });

  configCmd
    .command('get <key>')
    .description('Show one effective setting')
    .action(async (key: string): Promise<void> => {
      await withErrorHandling(
        async () => {
          const settingKey = parseSettingKey(key, 'configGet');
          const { store } = await openRepositoryStore();
          const settings = resolveSettings(store);
          output.log(`${settingKey}: ${describeSetting(settings, settingKey)}`);
        },
        ErrorType.UNKNOWN_ERROR,
        { operation: 'configGet', key }
      );
    });

  configCmd
    .command('set <key> <value>')
    .description('Validate and store a setting')
    .action(async (key: string, value: string): Promise<void> => {
      await withErrorHandling(
        async () => {
          const { store } = await openRepositoryStore();
          store.set(key, value);
          output.log(chalk.green(`✅ Set ${key} = ${value}`));
        },
        ErrorType.UNKNOWN_ERROR,
        { operation: 'configSet', key }
      );
    });

  program
    .command('help-examples')
    .description('Show usage examples')
    .action(async (): Promise<void> => {
      const { pastel } = await import('gradient-string');
      output.log(`${pastel(INFO_MESSAGES.USAGE_EXAMPLES)}

${chalk.yellow('Getting started:')}
  codify init                              # Write .codify.config with defaults
  codify list                              # Show local branches

${chalk.yellow('Reviewing:')}
  codify review                            # Review the current branch against base_branch
  codify review feature/login              # Review another branch
  codify review -f src/app.ts -f README.md # Review only some files
  codify review --base-branch develop      # Compare against a different base
  codify review -m anthropic/claude-3-5-sonnet-latest -t 0.2
  codify review -m ollama/llama3.1 --debug # Local model, print prompt and raw reply

${chalk.yellow('Configuration:')}
  codify config list                       # Effective settings and their source
  codify config get model                  # One setting
  codify config set temperature 0.3        # Store a setting
  codify config set base_branch develop`);
    });

  return program;
};

/**
 * Parses `args` (without the node and script entries) and runs the matching
 * command. Resolves with the process exit code; never rejects.
 */
export const run = async (args: string[], deps: CliDependencies): Promise<number> => {
  const program = createProgram(deps);
  const errorHandler = new ErrorHandler(deps.output);

  try {
    await program.parseAsync(args, { from: 'user' });
    return EXIT_CODE_SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    return errorHandler.handleError(error);
  }
};
