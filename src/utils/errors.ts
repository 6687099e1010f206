/**
 * Error types and codes for the branch promoter.
 * This is the error contract - all errors should extend PromoterError.
 */

/**
 * Base error class for all promoter errors.
 */
export class PromoterError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PromoterError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PromoterError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends PromoterError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * A git invocation exited non-zero or could not be spawned.
 */
export class GitCommandError extends PromoterError {
  constructor(
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(
      ErrorCodes.GIT_COMMAND_FAILED,
      `git ${args.join(' ')} failed${exitCode === null ? '' : ` (exit ${exitCode})`}${stderr ? `: ${stderr}` : ''}`,
      { args: [...args], exitCode, stderr }
    );
    this.name = 'GitCommandError';
  }
}

// Precondition errors (P001-P003)

export class NotARepositoryError extends PromoterError {
  constructor(cwd?: string) {
    super(ErrorCodes.NOT_A_REPOSITORY, 'Not inside a git repository', cwd ? { cwd } : undefined);
    this.name = 'NotARepositoryError';
  }
}

export class DirtyWorkingTreeError extends PromoterError {
  constructor(public readonly entries: readonly string[]) {
    super(
      ErrorCodes.DIRTY_WORKING_TREE,
      'Working tree is not clean. Commit, stash, or discard changes first.',
      { entries: [...entries] }
    );
    this.name = 'DirtyWorkingTreeError';
  }
}

export class BranchNotFoundError extends PromoterError {
  constructor(
    public readonly branch: string,
    public readonly remote: string
  ) {
    super(
      ErrorCodes.BRANCH_NOT_FOUND,
      `Branch '${branch}' not found locally or on remote '${remote}'.`,
      { branch, remote }
    );
    this.name = 'BranchNotFoundError';
  }
}

/**
 * A workflow step failed. Wraps the underlying git failure.
 */
export class StepFailedError extends PromoterError {
  constructor(code: string, message: string, cause?: unknown) {
    super(code, message, describeCause(cause));
    this.name = 'StepFailedError';
  }
}

export class FetchFailedError extends StepFailedError {
  constructor(remote: string, cause?: unknown) {
    super(ErrorCodes.FETCH_FAILED, `Fetch from remote '${remote}' failed`, cause);
    this.name = 'FetchFailedError';
  }
}

export class FastForwardFailedError extends StepFailedError {
  constructor(branch: string, remote: string, cause?: unknown) {
    super(
      ErrorCodes.FAST_FORWARD_FAILED,
      `Branch '${branch}' cannot be fast-forwarded to '${remote}/${branch}'`,
      cause
    );
    this.name = 'FastForwardFailedError';
  }
}

export class MergeConflictError extends StepFailedError {
  constructor(source: string, target: string, cause?: unknown) {
    super(ErrorCodes.MERGE_CONFLICT, `Merging '${source}' into '${target}' failed`, cause);
    this.name = 'MergeConflictError';
  }
}

export class PushRejectedError extends StepFailedError {
  constructor(branch: string, remote: string, cause?: unknown) {
    super(ErrorCodes.PUSH_REJECTED, `Push of '${branch}' to '${remote}' was rejected`, cause);
    this.name = 'PushRejectedError';
  }
}

export class CheckoutFailedError extends StepFailedError {
  constructor(branch: string, cause?: unknown) {
    super(ErrorCodes.CHECKOUT_FAILED, `Checkout of '${branch}' failed`, cause);
    this.name = 'CheckoutFailedError';
  }
}

/**
 * The run was cancelled by a signal.
 */
export class InterruptedError extends PromoterError {
  constructor(signal?: string) {
    super(ErrorCodes.INTERRUPTED, `Interrupted${signal ? ` by ${signal}` : ''}`, signal ? { signal } : undefined);
    this.name = 'InterruptedError';
  }
}

function describeCause(cause: unknown): Record<string, unknown> | undefined {
  if (cause instanceof GitCommandError) {
    return { cause: cause.message, stderr: cause.stderr };
  }
  if (cause instanceof Error) {
    return { cause: cause.message };
  }
  return undefined;
}

export const ErrorCodes = {
  // Preconditions
  NOT_A_REPOSITORY: 'P001',
  DIRTY_WORKING_TREE: 'P002',
  BRANCH_NOT_FOUND: 'P003',

  // Git operations
  GIT_COMMAND_FAILED: 'G000',
  FETCH_FAILED: 'G001',
  FAST_FORWARD_FAILED: 'G002',
  MERGE_CONFLICT: 'G003',
  PUSH_REJECTED: 'G004',
  CHECKOUT_FAILED: 'G005',

  // Cancellation
  INTERRUPTED: 'X001',

  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_REF_NAME: 'C002',

  // System
  PARSE_ERROR: 'S001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
