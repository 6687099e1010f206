/**
 * In-memory GitClient for workflow tests.
 *
 * Models a commit graph, local branches, one remote and its
 * remote-tracking refs, and HEAD. Every call is recorded in `calls`
 * so tests can assert the exact operation sequence.
 */
import type { GitClient } from '../../src/utils/git.js';
import { GitCommandError } from '../../src/utils/errors.js';

type Head = { branch: string } | { detached: string };

export class FakeGit implements GitClient {
  readonly calls: string[] = [];
  insideWorkTree = true;
  dirty: string[] = [];
  /** sha -> parent shas */
  readonly commits = new Map<string, string[]>();
  readonly local = new Map<string, string>();
  /** Branches as the remote server holds them */
  readonly remote = new Map<string, string>();
  /** refs/remotes/<remote>/* as of the last fetch */
  readonly tracking = new Map<string, string>();
  head: Head = { branch: 'main' };
  mergeInProgress = false;

  private nextSha = 1;
  private readonly failures = new Map<string, Error>();
  private readonly conflicts = new Set<string>();
  private readonly hooks = new Map<string, () => void>();

  constructor(readonly remoteName = 'origin') {}

  /** Create a commit on top of `parents` and return its sha. */
  commit(...parents: string[]): string {
    const sha = `c${this.nextSha++}`;
    this.commits.set(sha, parents);
    return sha;
  }

  /** Append `count` commits to a branch in the given ref map. */
  advance(refs: Map<string, string>, branch: string, count: number): string {
    let tip = refs.get(branch);
    for (let i = 0; i < count; i++) {
      tip = tip ? this.commit(tip) : this.commit();
    }
    if (!tip) throw new Error('count must be positive');
    refs.set(branch, tip);
    return tip;
  }

  /** Make the call whose recorded text starts with `prefix` fail. */
  failOn(prefix: string, error: Error = new GitCommandError([prefix], 1, `fatal: ${prefix} failed`)): void {
    this.failures.set(prefix, error);
  }

  /** Make merging `branch` stop with a conflict. */
  conflictOn(branch: string): void {
    this.conflicts.add(branch);
  }

  /** Run `hook` when the call starting with `prefix` is made. */
  onCall(prefix: string, hook: () => void): void {
    this.hooks.set(prefix, hook);
  }

  parents(sha: string): string[] {
    return this.commits.get(sha) ?? [];
  }

  currentSha(): string {
    if ('detached' in this.head) return this.head.detached;
    const sha = this.local.get(this.head.branch);
    if (!sha) throw new Error(`unborn branch ${this.head.branch}`);
    return sha;
  }

  /** Branch name, or 'DETACHED@<sha>' */
  where(): string {
    return 'branch' in this.head ? this.head.branch : `DETACHED@${this.head.detached}`;
  }

  private record(call: string, mutating = true): void {
    this.calls.push(call);
    for (const [prefix, hook] of this.hooks) {
      if (call.startsWith(prefix)) hook();
    }
    for (const [prefix, error] of this.failures) {
      if (call.startsWith(prefix)) throw error;
    }
    if (mutating && !this.insideWorkTree) {
      throw new GitCommandError([call], 128, 'fatal: not a git repository');
    }
  }

  private reaches(from: string, target: string): boolean {
    const stack = [from];
    const seen = new Set<string>();
    while (stack.length > 0) {
      const sha = stack.pop();
      if (sha === undefined || seen.has(sha)) continue;
      if (sha === target) return true;
      seen.add(sha);
      stack.push(...this.parents(sha));
    }
    return false;
  }

  private resolve(ref: string): string | undefined {
    const prefix = `${this.remoteName}/`;
    if (ref.startsWith(prefix)) {
      return this.tracking.get(ref.slice(prefix.length));
    }
    return this.local.get(ref) ?? (this.commits.has(ref) ? ref : undefined);
  }

  async isInsideWorkTree(): Promise<boolean> {
    this.record('rev-parse --is-inside-work-tree', false);
    return this.insideWorkTree;
  }

  async status(): Promise<string[]> {
    this.record('status', false);
    return [...this.dirty];
  }

  async currentBranch(): Promise<string | null> {
    this.record('symbolic-ref HEAD', false);
    return 'branch' in this.head ? this.head.branch : null;
  }

  async headCommit(): Promise<string> {
    this.record('rev-parse HEAD', false);
    return this.currentSha();
  }

  async hasLocalBranch(branch: string): Promise<boolean> {
    this.record(`show-ref refs/heads/${branch}`, false);
    return this.local.has(branch);
  }

  async hasRemoteBranch(remote: string, branch: string): Promise<boolean> {
    this.record(`show-ref refs/remotes/${remote}/${branch}`, false);
    return remote === this.remoteName && this.tracking.has(branch);
  }

  async fetch(remote: string, options: { prune: boolean }): Promise<void> {
    this.record(`fetch ${remote}${options.prune ? ' --prune' : ''}`);
    if (remote !== this.remoteName) {
      throw new GitCommandError(['fetch', remote], 128, `fatal: '${remote}' does not appear to be a git repository`);
    }
    if (options.prune) this.tracking.clear();
    for (const [branch, sha] of this.remote) {
      this.tracking.set(branch, sha);
    }
  }

  async checkout(branch: string): Promise<void> {
    this.record(`checkout ${branch}`);
    if (this.mergeInProgress) {
      throw new GitCommandError(['checkout', branch], 1, 'error: you need to resolve your current index first');
    }
    if (!this.local.has(branch)) {
      const tracked = this.tracking.get(branch);
      if (!tracked) {
        throw new GitCommandError(['checkout', branch], 1, `error: pathspec '${branch}' did not match`);
      }
      this.local.set(branch, tracked);
    }
    this.head = { branch };
  }

  async checkoutDetached(commit: string): Promise<void> {
    this.record(`checkout --detach ${commit}`);
    if (this.mergeInProgress) {
      throw new GitCommandError(['checkout', '--detach', commit], 1, 'error: you need to resolve your current index first');
    }
    this.head = { detached: commit };
  }

  async pullFastForward(remote: string, branch: string): Promise<void> {
    this.record(`pull --ff-only ${remote} ${branch}`);
    const upstream = this.remote.get(branch);
    if (!upstream || !('branch' in this.head)) {
      throw new GitCommandError(['pull', remote, branch], 1, `fatal: couldn't find remote ref ${branch}`);
    }
    this.tracking.set(branch, upstream);
    const current = this.currentSha();
    if (this.reaches(current, upstream)) return;
    if (!this.reaches(upstream, current)) {
      throw new GitCommandError(['pull', '--ff-only', remote, branch], 128, 'fatal: Not possible to fast-forward, aborting.');
    }
    this.local.set(this.head.branch, upstream);
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    this.record(`merge-base --is-ancestor ${ancestor} ${descendant}`, false);
    const a = this.resolve(ancestor);
    const d = this.resolve(descendant);
    return a !== undefined && d !== undefined && this.reaches(d, a);
  }

  async mergeNoFastForward(branch: string): Promise<void> {
    this.record(`merge --no-ff --no-edit ${branch}`);
    if (!('branch' in this.head)) throw new Error('merge on detached HEAD not modelled');
    if (this.conflicts.has(branch)) {
      this.mergeInProgress = true;
      throw new GitCommandError(['merge', '--no-ff', '--no-edit', branch], 1, 'CONFLICT (content): Merge conflict in cards.json');
    }
    const source = this.local.get(branch);
    if (!source) throw new GitCommandError(['merge', branch], 1, `merge: ${branch} - not something we can merge`);
    const current = this.currentSha();
    if (this.reaches(current, source)) return;
    this.local.set(this.head.branch, this.commit(current, source));
  }

  async abortMerge(): Promise<void> {
    this.record('merge --abort');
    if (!this.mergeInProgress) {
      throw new GitCommandError(['merge', '--abort'], 128, 'fatal: There is no merge to abort (MERGE_HEAD missing).');
    }
    this.mergeInProgress = false;
  }

  async push(remote: string, branch: string): Promise<void> {
    this.record(`push ${remote} ${branch}`);
    const sha = this.local.get(branch);
    if (!sha) throw new GitCommandError(['push', remote, branch], 1, `error: src refspec ${branch} does not match any`);
    const upstream = this.remote.get(branch);
    if (upstream && !this.reaches(sha, upstream)) {
      throw new GitCommandError(['push', remote, branch], 1, `! [rejected] ${branch} -> ${branch} (fetch first)`);
    }
    this.remote.set(branch, sha);
    this.tracking.set(branch, sha);
  }
}

/**
 * Repository where dev and main exist locally and on the remote, in
 * sync, and dev is `devAhead` commits ahead of main. HEAD is on `start`.
 */
export function createSyncedRepo(options: { devAhead?: number; start?: string } = {}): FakeGit {
  const git = new FakeGit();
  const base = git.commit();
  git.local.set('main', base);
  git.local.set('dev', base);
  if (options.devAhead) {
    git.advance(git.local, 'dev', options.devAhead);
  }
  git.local.set('feature', git.commit(base));
  for (const branch of ['main', 'dev']) {
    const sha = git.local.get(branch);
    if (sha) git.remote.set(branch, sha);
  }
  git.head = { branch: options.start ?? 'feature' };
  return git;
}
