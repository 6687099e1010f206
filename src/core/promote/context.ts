/**
 * Workflow context: the starting point captured before any mutation,
 * plus the restoration scope every run executes inside.
 */
import type { GitClient } from '../../utils/git.js';
import type { Logger } from '../../utils/logger.js';
import type { PromoteSettings } from '../config/settings.js';
import type { StartingPoint } from './types.js';

const SHORT_SHA_LENGTH = 7;

export function describeStartingPoint(point: StartingPoint): string {
  return point.kind === 'branch'
    ? point.name
    : `detached at ${point.commit.slice(0, SHORT_SHA_LENGTH)}`;
}

export class WorkflowContext {
  private constructor(
    readonly startingPoint: StartingPoint,
    readonly settings: PromoteSettings,
    private readonly git: GitClient,
    private readonly log: Logger
  ) {}

  /**
   * Record where HEAD is. Must run before the first mutating operation.
   */
  static async capture(git: GitClient, settings: PromoteSettings, log: Logger): Promise<WorkflowContext> {
    const branch = await git.currentBranch();
    const startingPoint: StartingPoint = branch
      ? { kind: 'branch', name: branch }
      : { kind: 'detached', commit: await git.headCommit() };
    return new WorkflowContext(startingPoint, settings, git, log);
  }

  describeStart(): string {
    return describeStartingPoint(this.startingPoint);
  }

  async isAtStart(): Promise<boolean> {
    const branch = await this.git.currentBranch();
    if (this.startingPoint.kind === 'branch') {
      return branch === this.startingPoint.name;
    }
    return branch === null && (await this.git.headCommit()) === this.startingPoint.commit;
  }

  /**
   * Return to the starting point if HEAD has moved. Best effort: a
   * failure is logged as a warning and never thrown.
   */
  async restore(): Promise<void> {
    const target = this.describeStart();
    try {
      if (!(await this.git.isInsideWorkTree()) || (await this.isAtStart())) {
        return;
      }
      this.log.info(`Restoring original branch '${target}'`);
      if (this.startingPoint.kind === 'branch') {
        await this.git.checkout(this.startingPoint.name);
      } else {
        await this.git.checkoutDetached(this.startingPoint.commit);
      }
    } catch (error) {
      this.log.warn(
        `Could not restore '${target}': ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Run the body, then restore the starting point whichever way it exits.
   * A failure is reported before restoration and rethrown after it.
   */
  async withRestoration<T>(body: () => Promise<T>): Promise<T> {
    try {
      return await body();
    } catch (error) {
      this.log.error(`Promotion failed. Restoring '${this.describeStart()}'.`);
      throw error;
    } finally {
      await this.restore();
    }
  }
}
