import fs from "node:fs/promises";
import path from "node:path";

import type { CommitReference, FileSnapshotOutcome } from "@sitevault/core-domain";
import type { VersionControlBackend } from "../ports/version-control-backend";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { CommitError, describeError } from "../application/errors";
import { RetryExhaustedError, withRetry } from "../application/with-retry";
import { commitRetryPolicy, stageFileRetryPolicy } from "../application/retry-policies";
import { formatTimestamp } from "../application/format-timestamp";
import { createExcludeMatcher, type ExcludeMatcher } from "../adapters/exclude-patterns";
import type { RepositoryManager } from "./repository-manager";

const PROGRESS_EVERY = 1000;
const RETRY_LOG_EVERY = 100;

export type StagingReport =
  | { mode: "bulk" }
  | { mode: "batch"; total: number; failed: string[] };

export type StagedChangeCommitterDeps = {
  backend: VersionControlBackend;
  repositories: RepositoryManager;
  logger: Logger;
  sleep: Sleeper;
  stageFilePolicy?: RetryPolicy;
  commitPolicy?: RetryPolicy;
};

export function backupCommitMessage(at: Date): string {
  return `Backup from ${formatTimestamp(at)}`;
}

async function walkFiles(
  rootAbs: string,
  rel: string,
  skip: ExcludeMatcher,
  out: string[]
): Promise<void> {
  const entries = await fs.readdir(path.join(rootAbs, rel), { withFileTypes: true });
  for (const e of entries) {
    const childRel = rel ? `${rel}/${e.name}` : e.name;
    if (skip(childRel, e.isDirectory())) continue;

    if (e.isDirectory()) {
      await walkFiles(rootAbs, childRel, skip, out);
    } else if (e.isFile() || e.isSymbolicLink()) {
      out.push(childRel);
    }
  }
}

/** Stages the mirrored working area and turns it into a commit. */
export class StagedChangeCommitter {
  private readonly stageFilePolicy: RetryPolicy;
  private readonly commitPolicy: RetryPolicy;

  constructor(private readonly deps: StagedChangeCommitterDeps) {
    this.stageFilePolicy = deps.stageFilePolicy ?? stageFileRetryPolicy();
    this.commitPolicy = deps.commitPolicy ?? commitRetryPolicy();
  }

  /** Every file under the working area except metadata and excluded paths, posix relative. */
  async listWorkingFiles(repoPath: string, excludes: readonly string[]): Promise<string[]> {
    const metadata = `${this.deps.backend.metadataDirName}/`;
    const skip = createExcludeMatcher([metadata, ...excludes]);
    const files: string[] = [];
    await walkFiles(repoPath, "", skip, files);
    return files.sort();
  }

  /**
   * Bulk staging first; on failure stages file by file. Batch mode never stops
   * early: files that exhaust their retries are reported in `failed`.
   */
  async stageAll(repoPath: string, excludes: readonly string[] = []): Promise<StagingReport> {
    const { backend, logger } = this.deps;

    logger.info("Adding files to repository...");
    try {
      await backend.stageAll(repoPath);
      return { mode: "bulk" };
    } catch (err) {
      logger.warn(`Bulk add failed, trying batch processing: ${describeError(err)}`);
    }

    const files = await this.listWorkingFiles(repoPath, excludes);
    const total = files.length;
    const failed: string[] = [];
    logger.info(`Processing ${total} files one by one`);

    for (let i = 0; i < total; i++) {
      const current = i + 1;
      const rel = files[i];
      try {
        await withRetry(() => backend.stageFile(repoPath, rel), this.stageFilePolicy, {
          sleep: this.deps.sleep,
          onRetry: ({ attempt }) => {
            if (current % RETRY_LOG_EVERY === 0) {
              logger.info(`Retrying file ${current} of ${total} (attempt ${attempt})...`);
            }
          },
        });
      } catch {
        failed.push(rel);
      }

      if (current % PROGRESS_EVERY === 0) {
        logger.info(`Processed ${current} of ${total} files...`);
      }
    }

    if (failed.length > 0) {
      logger.error(`Failed to stage ${failed.length} of ${total} files (first: ${failed[0]})`);
    } else {
      logger.info(`Completed adding ${total} files`);
    }
    return { mode: "batch", total, failed };
  }

  /**
   * Commits the staged set unless it matches the last commit. A commit that
   * keeps failing leaves the staged changes in place for the next run.
   */
  async commitIfChanged(repoPath: string, message: string): Promise<FileSnapshotOutcome> {
    const { backend, repositories, logger, sleep } = this.deps;
    const policy = this.commitPolicy;

    let changed: boolean;
    try {
      changed = await backend.hasStagedChanges(repoPath);
    } catch (err) {
      logger.error(`Cannot inspect staged changes in ${repoPath}: ${describeError(err)}`);
      throw new CommitError(`cannot inspect staged changes: ${describeError(err)}`, 0, err);
    }

    if (!changed) {
      logger.info("No file changes to commit");
      return { type: "noop" };
    }

    try {
      await withRetry(() => backend.commit(repoPath, message), policy, {
        sleep,
        onRetry: async ({ attempt, lastError }) => {
          logger.warn(
            `Commit failed, retrying (attempt ${attempt} of ${policy.maxAttempts}): ${describeError(lastError)}`
          );
          if (attempt === 1) {
            logger.info("Re-applying constrained repository settings before retrying...");
            try {
              await repositories.applyProfile(repoPath);
            } catch (err) {
              logger.warn(`Could not re-apply repository settings: ${describeError(err)}`);
            }
          }
        },
      });
    } catch (err) {
      const attempts = err instanceof RetryExhaustedError ? err.attempts : policy.maxAttempts;
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      logger.error(`Failed to commit changes in ${repoPath} after ${attempts} attempts`);
      throw new CommitError(`commit failed after ${attempts} attempts: ${describeError(cause)}`, attempts, cause);
    }

    logger.info("Changes committed successfully");
    await repositories.compact(repoPath);

    const reference: CommitReference = await backend.head(repoPath);
    return { type: "committed", reference };
  }
}
