import fs from "node:fs/promises";
import path from "node:path";

import type { DatabaseBackend, DatabaseCredentials } from "../ports/database-backend";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { DumpError, RestoreDatabaseError, describeError } from "../application/errors";
import { RetryExhaustedError, withRetry } from "../application/with-retry";
import { dumpRetryPolicy } from "../application/retry-policies";

export type DatabaseAdapterDeps = {
  backend: DatabaseBackend;
  logger: Logger;
  sleep: Sleeper;
  dumpPolicy?: RetryPolicy;
};

async function fileExists(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/**
 * Dumps are retried, restores are not: a restore is an operator-confirmed
 * action and replaying a partially applied import is unsafe.
 */
export class DatabaseAdapter {
  private readonly dumpPolicy: RetryPolicy;

  constructor(private readonly deps: DatabaseAdapterDeps) {
    this.dumpPolicy = deps.dumpPolicy ?? dumpRetryPolicy();
  }

  async dump(credentials: DatabaseCredentials, outputPath: string): Promise<void> {
    const { backend, logger, sleep } = this.deps;
    const policy = this.dumpPolicy;

    if (!(await backend.isAvailable())) {
      logger.error("Database dump command not found; set mysqlBinPath in the configuration");
      throw new DumpError(`database dump tooling is not available for ${credentials.database}`, 0);
    }

    await fs.mkdir(path.dirname(outputPath), { recursive: true });

    try {
      await withRetry(() => backend.exportTo(credentials, outputPath), policy, {
        sleep,
        onRetry: ({ attempt, lastError }) => {
          logger.warn(
            `Database backup failed, retrying (attempt ${attempt} of ${policy.maxAttempts}): ${describeError(lastError)}`
          );
        },
      });
    } catch (err) {
      const attempts = err instanceof RetryExhaustedError ? err.attempts : policy.maxAttempts;
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;

      // never leave a truncated artifact behind
      await fs.rm(outputPath, { force: true });
      logger.error(`Database backup failed for ${credentials.database} after ${attempts} attempts`);
      throw new DumpError(`dump of ${credentials.database} failed after ${attempts} attempts: ${describeError(cause)}`, attempts, cause);
    }

    logger.info("Database backup completed successfully");
  }

  async restore(credentials: DatabaseCredentials, inputPath: string): Promise<void> {
    const { backend, logger } = this.deps;

    if (!(await fileExists(inputPath))) {
      logger.error(`Database backup file not found: ${inputPath}`);
      throw new RestoreDatabaseError(`database backup file not found: ${inputPath}`);
    }

    logger.info(`Importing ${path.basename(inputPath)} into ${credentials.database}...`);
    try {
      await backend.importFrom(credentials, inputPath);
    } catch (err) {
      logger.error(`Database restore failed for ${credentials.database}: ${describeError(err)}`);
      throw new RestoreDatabaseError(`restore of ${credentials.database} failed: ${describeError(err)}`, undefined, err);
    }

    logger.info("Database restore completed");
  }
}
