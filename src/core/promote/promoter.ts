/**
 * Branch promoter: fast-forwards dev and main from the remote, merges
 * dev into main with a merge commit, pushes main, and leaves HEAD where
 * it started.
 *
 * Every step is fatal. Failures after the starting point is captured
 * run through WorkflowContext.withRestoration.
 */
import type { GitClient } from '../../utils/git.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import {
  BranchNotFoundError,
  CheckoutFailedError,
  DirtyWorkingTreeError,
  FastForwardFailedError,
  FetchFailedError,
  InterruptedError,
  MergeConflictError,
  NotARepositoryError,
  PushRejectedError,
  type PromoterError,
} from '../../utils/errors.js';
import type { PromoteSettings } from '../config/settings.js';
import { WorkflowContext } from './context.js';
import type { PromoteOptions, PromoteResult } from './types.js';

export interface BranchPromoterOptions {
  git: GitClient;
  logger?: Logger;
}

/** Where a branch can be found after the fetch. */
interface BranchPresence {
  local: boolean;
  remote: boolean;
}

interface StepOutcome {
  merged: boolean;
  pushed: boolean;
}

export class BranchPromoter {
  private readonly git: GitClient;
  private readonly log: Logger;

  constructor(options: BranchPromoterOptions) {
    this.git = options.git;
    this.log = options.logger ?? defaultLogger;
  }

  async promote(settings: PromoteSettings, options: PromoteOptions = {}): Promise<PromoteResult> {
    const { signal } = options;
    const dryRun = options.dryRun ?? false;

    this.throwIfAborted(signal);
    if (!(await this.git.isInsideWorkTree())) {
      throw new NotARepositoryError();
    }
    const context = await WorkflowContext.capture(this.git, settings, this.log);

    const dirty = await this.git.status();
    if (dirty.length > 0) {
      throw new DirtyWorkingTreeError(dirty);
    }

    const outcome = await context.withRestoration(() =>
      dryRun ? this.plan(settings, signal) : this.execute(settings, signal)
    );

    const { devBranch, mainBranch } = settings;
    if (dryRun) {
      this.log.success('Dry run complete. No branches were changed.');
    } else if (outcome.merged) {
      this.log.success(`Done. '${mainBranch}' now includes '${devBranch}'.`);
    } else {
      this.log.success(`Done. '${mainBranch}' already included '${devBranch}'.`);
    }

    return {
      ...settings,
      startingPoint: context.startingPoint,
      merged: outcome.merged,
      pushed: outcome.pushed,
      dryRun,
    };
  }

  private async execute(settings: PromoteSettings, signal?: AbortSignal): Promise<StepOutcome> {
    const { remote, devBranch, mainBranch } = settings;
    const [dev, main] = await this.fetchAndResolve(settings, signal);

    await this.update(devBranch, dev, remote, signal);
    await this.update(mainBranch, main, remote, signal);

    this.throwIfAborted(signal);
    const merged = !(await this.git.isAncestor(devBranch, mainBranch));
    if (merged) {
      await this.merge(devBranch, mainBranch, signal);
    } else {
      this.log.info(`'${mainBranch}' already includes '${devBranch}'; nothing to merge`);
    }

    this.log.info(`Pushing '${mainBranch}' to '${remote}'`);
    await this.attempt(
      signal,
      () => this.git.push(remote, mainBranch),
      (cause) => new PushRejectedError(mainBranch, remote, cause)
    );

    return { merged, pushed: true };
  }

  private async merge(devBranch: string, mainBranch: string, signal?: AbortSignal): Promise<void> {
    this.log.info(`Merging '${devBranch}' into '${mainBranch}'`);
    this.throwIfAborted(signal);
    try {
      await this.git.mergeNoFastForward(devBranch);
    } catch (cause) {
      // Leave no merge in progress, or the restoring checkout would fail.
      await this.abortMerge();
      if (signal?.aborted) {
        throw interrupted(signal);
      }
      throw new MergeConflictError(devBranch, mainBranch, cause);
    }
  }

  /**
   * Dry run: everything up to branch validation, then report what a
   * real run would do.
   */
  private async plan(settings: PromoteSettings, signal?: AbortSignal): Promise<StepOutcome> {
    const { remote, devBranch, mainBranch } = settings;
    const [dev, main] = await this.fetchAndResolve(settings, signal);

    for (const [branch, presence] of [[devBranch, dev], [mainBranch, main]] as const) {
      this.log.info(
        presence.remote
          ? `Would check out '${branch}' and fast-forward it from '${remote}/${branch}'`
          : `Would check out '${branch}' (not on '${remote}'; no pull)`
      );
    }

    this.throwIfAborted(signal);
    const devRef = dev.remote ? `${remote}/${devBranch}` : devBranch;
    const mainRef = main.remote ? `${remote}/${mainBranch}` : mainBranch;
    if (await this.git.isAncestor(devRef, mainRef)) {
      this.log.info(`'${mainRef}' already includes '${devRef}'; nothing to merge`);
    } else {
      this.log.info(`Would merge '${devBranch}' into '${mainBranch}' with a merge commit`);
    }
    this.log.info(`Would push '${mainBranch}' to '${remote}'`);

    return { merged: false, pushed: false };
  }

  private async fetchAndResolve(
    settings: PromoteSettings,
    signal?: AbortSignal
  ): Promise<[BranchPresence, BranchPresence]> {
    const { remote, devBranch, mainBranch } = settings;

    this.log.info(`Fetching from remote '${remote}'`);
    await this.attempt(
      signal,
      () => this.git.fetch(remote, { prune: true }),
      (cause) => new FetchFailedError(remote, cause)
    );

    const dev = await this.resolveBranch(devBranch, remote, signal);
    const main = await this.resolveBranch(mainBranch, remote, signal);
    return [dev, main];
  }

  private async resolveBranch(branch: string, remote: string, signal?: AbortSignal): Promise<BranchPresence> {
    this.throwIfAborted(signal);
    const presence: BranchPresence = {
      local: await this.git.hasLocalBranch(branch),
      remote: await this.git.hasRemoteBranch(remote, branch),
    };
    if (!presence.local && !presence.remote) {
      throw new BranchNotFoundError(branch, remote);
    }
    return presence;
  }

  /**
   * Check out a branch and fast-forward it from its remote counterpart.
   */
  private async update(
    branch: string,
    presence: BranchPresence,
    remote: string,
    signal?: AbortSignal
  ): Promise<void> {
    this.log.info(`Checking out '${branch}' and updating`);
    await this.attempt(
      signal,
      () => this.git.checkout(branch),
      (cause) => new CheckoutFailedError(branch, cause)
    );

    if (!presence.remote) {
      this.log.debug(`'${branch}' has no counterpart on '${remote}'; skipping pull`);
      return;
    }
    await this.attempt(
      signal,
      () => this.git.pullFastForward(remote, branch),
      (cause) => new FastForwardFailedError(branch, remote, cause)
    );
  }

  private async abortMerge(): Promise<void> {
    try {
      await this.git.abortMerge();
    } catch (error) {
      this.log.warn(`Could not abort merge: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Run one git operation. Cancellation is checked first; a failure is
   * mapped to its step error, or to InterruptedError if the run was
   * cancelled while the operation was running.
   */
  private async attempt(
    signal: AbortSignal | undefined,
    operation: () => Promise<void>,
    toError: (cause: unknown) => PromoterError
  ): Promise<void> {
    this.throwIfAborted(signal);
    try {
      await operation();
    } catch (cause) {
      if (signal?.aborted) {
        throw interrupted(signal);
      }
      throw toError(cause);
    }
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw interrupted(signal);
    }
  }
}

function interrupted(signal: AbortSignal): InterruptedError {
  const reason: unknown = signal.reason;
  return new InterruptedError(typeof reason === 'string' ? reason : undefined);
}
