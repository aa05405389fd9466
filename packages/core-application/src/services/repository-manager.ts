import type { ConfigProfile, VersionControlBackend } from "../ports/version-control-backend";
import type { Logger } from "../ports/logger";
import type { Sleeper, RetryPolicy } from "../ports/retry-policy";
import { RepositoryError, describeError } from "../application/errors";
import { RetryExhaustedError, withRetry } from "../application/with-retry";
import { repositoryInitRetryPolicy } from "../application/retry-policies";

export const DEFAULT_BRANCH = "main";
export const ROOT_COMMIT_MESSAGE = "Initial commit";

/**
 * Settings for shared, resource-constrained hosts where background packing,
 * index preloading or filesystem monitors cause spurious failures.
 */
export const CONSTRAINED_PROFILE: ConfigProfile = [
  ["core.compression", "0"],
  ["gc.auto", "0"],
  ["pack.threads", "1"],
  ["pack.window", "0"],
  ["pack.depth", "0"],
  ["core.preloadIndex", "false"],
  ["core.fsmonitor", "false"],
  ["core.untrackedCache", "false"],
];

export type RepositoryManagerDeps = {
  backend: VersionControlBackend;
  logger: Logger;
  sleep: Sleeper;
  initPolicy?: RetryPolicy;
};

/** Owns the lifecycle of a site's snapshot repository. */
export class RepositoryManager {
  private readonly initPolicy: RetryPolicy;

  constructor(private readonly deps: RepositoryManagerDeps) {
    this.initPolicy = deps.initPolicy ?? repositoryInitRetryPolicy();
  }

  /**
   * Makes `repoPath` a ready repository: initialized, profiled, with a root
   * commit, and structurally valid. Safe to call on every run.
   */
  async ensureRepository(repoPath: string, excludes: readonly string[] = []): Promise<void> {
    const { backend, logger } = this.deps;

    if (!(await backend.isInitialized(repoPath))) {
      logger.info(`Initializing new repository in ${repoPath}`);
      await this.initialize(repoPath);
    }

    if (!(await backend.verify(repoPath))) {
      logger.error(`Repository not properly initialized in ${repoPath}`);
      throw new RepositoryError(`repository at ${repoPath} failed verification`, repoPath);
    }

    // initialized but without history, e.g. a run interrupted right after init
    if (!(await backend.isValidReference(repoPath, "HEAD"))) {
      await this.createRoot(repoPath);
    }

    try {
      await backend.setLocalExcludes(repoPath, excludes);
    } catch (err) {
      throw new RepositoryError(`cannot write exclude list for ${repoPath}: ${describeError(err)}`, repoPath, err);
    }
  }

  /** Re-applies the constrained configuration profile. */
  async applyProfile(repoPath: string): Promise<void> {
    for (const [key, value] of CONSTRAINED_PROFILE) {
      await this.deps.backend.setConfig(repoPath, key, value);
    }
  }

  /** Best-effort; never throws. */
  async compact(repoPath: string): Promise<boolean> {
    const { backend, logger } = this.deps;
    logger.info("Cleaning up repository...");
    try {
      await backend.collectGarbage(repoPath);
      return true;
    } catch (err) {
      logger.warn(`Repository cleanup failed for ${repoPath}: ${describeError(err)}`);
      return false;
    }
  }

  private async initialize(repoPath: string): Promise<void> {
    const { backend, logger, sleep } = this.deps;

    try {
      await withRetry(() => backend.init(repoPath, DEFAULT_BRANCH), this.initPolicy, {
        sleep,
        onRetry: ({ attempt, lastError }) => {
          logger.warn(
            `Repository init failed, retrying (attempt ${attempt} of ${this.initPolicy.maxAttempts}): ${describeError(lastError)}`
          );
        },
      });
    } catch (err) {
      const attempts = err instanceof RetryExhaustedError ? err.attempts : this.initPolicy.maxAttempts;
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      logger.error(`Failed to initialize repository in ${repoPath} after ${attempts} attempts`);
      throw new RepositoryError(`repository init failed after ${attempts} attempts: ${describeError(cause)}`, repoPath, cause);
    }
  }

  private async createRoot(repoPath: string): Promise<void> {
    const { backend, logger } = this.deps;
    try {
      await this.applyProfile(repoPath);
      await backend.commit(repoPath, ROOT_COMMIT_MESSAGE, { allowEmpty: true });
    } catch (err) {
      logger.error(`Failed to create initial commit in ${repoPath}`);
      throw new RepositoryError(`cannot create root commit: ${describeError(err)}`, repoPath, err);
    }
  }
}
