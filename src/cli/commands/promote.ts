/**
 * Merge the dev branch into the main branch and push it.
 */
import { Command } from 'commander';
import { BranchPromoter, type PromoteResult } from '../../core/promote/index.js';
import { loadConfig, resolveSettings, DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { CommandLineGit } from '../../utils/git.js';
import { DirtyWorkingTreeError, StepFailedError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export interface PromoteCommandOptions {
  dev?: string;
  main?: string;
  config: string;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Create the promote command.
 */
export function createPromoteCommand(): Command {
  return new Command('promote')
    .description('Merge the dev branch into the main branch and push it')
    .argument('[remote]', 'Remote to fetch from and push to (default: origin)')
    .option('--dev <branch>', 'Branch to merge from (overrides DEV_BRANCH)')
    .option('--main <branch>', 'Branch to merge into and push (overrides MAIN_BRANCH)')
    .option('-c, --config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .option('--dry-run', 'Check preconditions and show the plan without changing branches')
    .option('--verbose', 'Log every git command')
    .option('--quiet', 'Only log warnings and errors')
    .action(async (remote: string | undefined, options: PromoteCommandOptions) => {
      try {
        await runPromote(remote, options);
      } catch (error) {
        reportFailure(error);
        process.exit(1);
      }
    });
}

export async function runPromote(
  remote: string | undefined,
  options: PromoteCommandOptions
): Promise<PromoteResult> {
  if (options.verbose) {
    log.setLevel('debug');
  } else if (options.quiet) {
    log.setLevel('warn');
  }

  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const settings = resolveSettings({
    config,
    env: process.env,
    remote,
    dev: options.dev,
    main: options.main,
  });

  const git = new CommandLineGit({ cwd: projectRoot, logger: log });
  const promoter = new BranchPromoter({ git, logger: log });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    log.warn(`Received ${signal}; stopping after the current step`);
    controller.abort(signal);
  };
  for (const signal of HANDLED_SIGNALS) {
    process.on(signal, onSignal);
  }

  try {
    return await promoter.promote(settings, {
      dryRun: options.dryRun ?? false,
      signal: controller.signal,
    });
  } finally {
    for (const signal of HANDLED_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}

/**
 * Print a failure on stderr, with the dirty file list or git's stderr
 * where there is one.
 */
export function reportFailure(error: unknown): void {
  if (error instanceof DirtyWorkingTreeError) {
    log.error(error.message, error.entries);
    return;
  }
  if (error instanceof StepFailedError) {
    const stderr = error.details?.stderr;
    log.error(error.message, typeof stderr === 'string' && stderr ? stderr.split('\n') : []);
    return;
  }
  log.error(error instanceof Error ? error.message : 'Unknown error');
}
