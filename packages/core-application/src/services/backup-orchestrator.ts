import type {
  BackupRunSummary,
  FileSnapshotOutcome,
  SiteBackupResult,
  SiteLabel,
  SiteSpec,
} from "@sitevault/core-domain";
import type { AppConfig } from "../config/app-config";
import { findSite, siteRepositoryPath, siteSourcePath } from "../config/app-config";
import type { VersionControlBackend } from "../ports/version-control-backend";
import type { MirrorStager } from "../ports/mirror-stager";
import type { Logger } from "../ports/logger";
import type { RunLog } from "../ports/run-log";
import type { Clock } from "../ports/clock";
import { StagingError, describeError } from "../application/errors";
import { dumpArtifactPath, historyExcludes, mirrorExcludes } from "../application/exclusions";
import { failedSteps, runSteps } from "../application/run-steps";
import type { RepositoryManager } from "./repository-manager";
import { backupCommitMessage, type StagedChangeCommitter, type StagingReport } from "./staged-change-committer";
import type { DatabaseAdapter } from "./database-adapter";

export type BackupOrchestratorDeps = {
  config: AppConfig;
  backend: VersionControlBackend;
  mirror: MirrorStager;
  repositories: RepositoryManager;
  committer: StagedChangeCommitter;
  database: DatabaseAdapter;
  logger: Logger;
  runLog: RunLog;
  clock: Clock;
};

export type FileSnapshotResult = {
  outcome: FileSnapshotOutcome;
  staging: StagingReport;
};

/**
 * Backup runs process sites one at a time in registry order. A site's dump
 * and file snapshot are independent: either may fail without stopping the
 * other, and no failure stops the next site.
 */
export class BackupOrchestrator {
  constructor(private readonly deps: BackupOrchestratorDeps) {}

  async run(target?: SiteLabel): Promise<BackupRunSummary> {
    const { config, logger, runLog, clock } = this.deps;
    const sites = target ? [findSite(config, target)] : [...config.sites];
    const startedAt = clock.now();

    runLog.beginRun("Backup started", target ? { Site: target } : {});

    const results: SiteBackupResult[] = [];
    for (const site of sites) {
      results.push(await this.backupSite(site));
    }

    const failures = results.flatMap((r) => failedSteps(r.steps));
    if (failures.length > 0) {
      logger.error(`## Backup process completed with ${failures.length} failed step(s)`);
    } else {
      logger.info("## Backup process completed");
    }

    return { startedAt, finishedAt: clock.now(), sites: results, failures };
  }

  async backupSite(site: SiteSpec): Promise<SiteBackupResult> {
    const { config, database, logger } = this.deps;
    const label = site.outputLabel;
    const result: SiteBackupResult = { site: label, steps: [] };

    logger.info(`### Processing '${label}'`);

    result.steps = await runSteps(
      label,
      [
        {
          name: "dump",
          run: async () => {
            logger.info(`Starting database backup for ${label}`);
            const out = dumpArtifactPath(siteRepositoryPath(config, site), site.dbName);
            await database.dump(
              { database: site.dbName, user: site.dbUser, password: site.dbPassword },
              out
            );
            return `dumped ${site.dbName}`;
          },
        },
        {
          name: "files",
          run: async () => {
            logger.info(`Starting file backup for ${label}`);
            const { outcome, staging } = await this.snapshotFiles(site);
            result.snapshot = outcome;

            if (staging.mode === "batch" && staging.failed.length > 0) {
              throw new StagingError(
                `${staging.failed.length} of ${staging.total} files could not be staged`
              );
            }

            logger.info(`File backup completed for ${label}`);
            return outcome.type === "committed" ? `committed ${outcome.reference}` : "no changes";
          },
        },
      ],
      "continue-on-error",
      logger
    );

    return result;
  }

  /** ensure repository -> mirror source into it -> stage -> commit when changed. */
  async snapshotFiles(site: SiteSpec): Promise<FileSnapshotResult> {
    const { config, backend, mirror, repositories, committer, logger, clock } = this.deps;
    const repoPath = siteRepositoryPath(config, site);
    const sourcePath = siteSourcePath(config, site);
    const excludes = historyExcludes(backend.metadataDirName, config.excludePatterns);

    await repositories.ensureRepository(repoPath, excludes);

    logger.info("Copying files to backup directory...");
    logger.debug(`Mirroring ${sourcePath} -> ${repoPath} (deleteExtraneous: ${config.captureDeletions})`);
    try {
      await mirror.mirror(sourcePath, repoPath, {
        exclude: mirrorExcludes(backend.metadataDirName, config.excludePatterns),
        deleteExtraneous: config.captureDeletions,
      });
    } catch (err) {
      logger.error(`Copying ${sourcePath} failed: ${describeError(err)}`);
      throw new StagingError(`mirror of ${sourcePath} failed: ${describeError(err)}`, err);
    }

    const staging = await committer.stageAll(repoPath, excludes);
    const outcome = await committer.commitIfChanged(repoPath, backupCommitMessage(clock.now()));
    return { outcome, staging };
  }
}
