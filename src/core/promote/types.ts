/**
 * Type definitions for branch promotion.
 */
import type { PromoteSettings } from '../config/settings.js';

/**
 * Where HEAD was when the run began. A detached HEAD is recorded by
 * commit so it can be restored exactly.
 */
export type StartingPoint =
  | { kind: 'branch'; name: string }
  | { kind: 'detached'; commit: string };

export interface PromoteOptions {
  /** Validate and report the plan without checkout, merge or push */
  dryRun?: boolean;
  /** Aborting cancels the run before its next git operation */
  signal?: AbortSignal;
}

/**
 * Outcome of a successful run.
 */
export interface PromoteResult extends PromoteSettings {
  startingPoint: StartingPoint;
  /** Whether a merge commit was created */
  merged: boolean;
  /** Whether the main branch was pushed */
  pushed: boolean;
  dryRun: boolean;
}
