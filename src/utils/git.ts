/**
 * Git integration.
 *
 * GitClient is the seam the promotion workflow talks to; CommandLineGit
 * implements it by running the `git` executable.
 */
import { execFile } from 'child_process';
import { promisify } from 'util';
import { GitCommandError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';

const execFileAsync = promisify(execFile);

/**
 * Version-control operations used by the promotion workflow.
 */
export interface GitClient {
  isInsideWorkTree(): Promise<boolean>;
  /** Porcelain status lines; empty when the tree is clean. */
  status(): Promise<string[]>;
  /** Checked-out branch name, or null when HEAD is detached. */
  currentBranch(): Promise<string | null>;
  headCommit(): Promise<string>;
  hasLocalBranch(branch: string): Promise<boolean>;
  hasRemoteBranch(remote: string, branch: string): Promise<boolean>;
  fetch(remote: string, options: { prune: boolean }): Promise<void>;
  checkout(branch: string): Promise<void>;
  checkoutDetached(commit: string): Promise<void>;
  pullFastForward(remote: string, branch: string): Promise<void>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  /** Merge with a merge commit even when a fast-forward is possible. */
  mergeNoFastForward(branch: string): Promise<void>;
  abortMerge(): Promise<void>;
  push(remote: string, branch: string): Promise<void>;
}

export interface CommandLineGitOptions {
  cwd: string;
  logger?: Logger;
}

interface ExecFailure {
  code?: unknown;
  stderr?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null && ('code' in error || 'stderr' in error);
}

/**
 * GitClient backed by the git CLI.
 */
export class CommandLineGit implements GitClient {
  private readonly cwd: string;
  private readonly log: Logger;

  constructor(options: CommandLineGitOptions) {
    this.cwd = options.cwd;
    this.log = (options.logger ?? defaultLogger).child('git');
  }

  /**
   * Run git with the given arguments and return trimmed stdout.
   * Throws GitCommandError on a non-zero exit.
   */
  async run(args: readonly string[]): Promise<string> {
    return (await this.exec(args)).trim();
  }

  private async exec(args: readonly string[]): Promise<string> {
    this.log.debug(`git ${args.join(' ')}`);
    try {
      const { stdout } = await execFileAsync('git', [...args], {
        cwd: this.cwd,
        encoding: 'utf-8',
        maxBuffer: 10 * 1024 * 1024,
      });
      return stdout;
    } catch (error) {
      throw toGitCommandError(args, error);
    }
  }

  /**
   * Run git and report only whether it exited zero.
   */
  private async succeeds(args: readonly string[]): Promise<boolean> {
    try {
      await this.run(args);
      return true;
    } catch (error) {
      if (error instanceof GitCommandError) {
        return false;
      }
      throw error;
    }
  }

  async isInsideWorkTree(): Promise<boolean> {
    try {
      return (await this.run(['rev-parse', '--is-inside-work-tree'])) === 'true';
    } catch (error) {
      if (error instanceof GitCommandError) {
        return false;
      }
      throw error;
    }
  }

  async status(): Promise<string[]> {
    // Untrimmed: the first status column can be a space.
    const stdout = await this.exec(['status', '--porcelain']);
    return stdout.split('\n').filter(line => line.length > 0);
  }

  async currentBranch(): Promise<string | null> {
    try {
      const name = await this.run(['symbolic-ref', '--short', '-q', 'HEAD']);
      return name || null;
    } catch (error) {
      if (error instanceof GitCommandError) {
        return null;
      }
      throw error;
    }
  }

  async headCommit(): Promise<string> {
    return this.run(['rev-parse', 'HEAD']);
  }

  async hasLocalBranch(branch: string): Promise<boolean> {
    return this.succeeds(['show-ref', '--verify', '--quiet', `refs/heads/${branch}`]);
  }

  async hasRemoteBranch(remote: string, branch: string): Promise<boolean> {
    return this.succeeds(['show-ref', '--verify', '--quiet', `refs/remotes/${remote}/${branch}`]);
  }

  async fetch(remote: string, options: { prune: boolean }): Promise<void> {
    await this.run(options.prune ? ['fetch', remote, '--prune'] : ['fetch', remote]);
  }

  async checkout(branch: string): Promise<void> {
    await this.run(['checkout', '-q', branch]);
  }

  async checkoutDetached(commit: string): Promise<void> {
    await this.run(['checkout', '-q', '--detach', commit]);
  }

  async pullFastForward(remote: string, branch: string): Promise<void> {
    await this.run(['pull', '--ff-only', remote, branch]);
  }

  /**
   * Exit 1 means "not an ancestor"; any other failure (a bad ref, exit
   * 128) is rethrown.
   */
  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    try {
      await this.run(['merge-base', '--is-ancestor', ancestor, descendant]);
      return true;
    } catch (error) {
      if (error instanceof GitCommandError && error.exitCode === 1) {
        return false;
      }
      throw error;
    }
  }

  async mergeNoFastForward(branch: string): Promise<void> {
    await this.run(['merge', '--no-ff', '--no-edit', branch]);
  }

  async abortMerge(): Promise<void> {
    await this.run(['merge', '--abort']);
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.run(['push', remote, branch]);
  }
}

function toGitCommandError(args: readonly string[], error: unknown): GitCommandError {
  if (isExecFailure(error)) {
    const exitCode = typeof error.code === 'number' ? error.code : null;
    const stderr = typeof error.stderr === 'string' ? error.stderr.trim() : '';
    if (!stderr && error instanceof Error && exitCode === null) {
      // spawn failure (e.g. ENOENT when git is not installed)
      return new GitCommandError(args, null, error.message);
    }
    return new GitCommandError(args, exitCode, stderr);
  }
  return new GitCommandError(args, null, error instanceof Error ? error.message : String(error));
}
