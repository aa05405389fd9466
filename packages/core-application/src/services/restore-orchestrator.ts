import type { CommitReference, RestoreRunSummary, SiteLabel } from "@sitevault/core-domain";
import type { AppConfig } from "../config/app-config";
import { findSite, siteRepositoryPath, siteSourcePath } from "../config/app-config";
import type { VersionControlBackend } from "../ports/version-control-backend";
import type { Logger } from "../ports/logger";
import type { RunLog } from "../ports/run-log";
import { RestoreFileError } from "../application/errors";
import { dumpArtifactPath, mirrorExcludes } from "../application/exclusions";
import { runSteps } from "../application/run-steps";
import type { RestoreResolver } from "./restore-resolver";
import type { DatabaseAdapter } from "./database-adapter";

export type RestorePlan = {
  site: SiteLabel;
  reference?: string;
  target: string;
  repositoryPath: string;
  database: string;
};

export type RestoreRequest = {
  site: SiteLabel;
  /** Exact id, prefix, or empty for the latest commit. */
  reference?: string;
  /** Asked before anything is touched; `false` cancels with no side effects. */
  confirm: (plan: RestorePlan) => Promise<boolean>;
};

export type RestoreOrchestratorDeps = {
  config: AppConfig;
  backend: VersionControlBackend;
  resolver: RestoreResolver;
  database: DatabaseAdapter;
  logger: Logger;
  runLog: RunLog;
};

/**
 * Restores one site: resolve, materialize files, restore the database. The
 * steps depend on each other, so the first failure stops the run. Nothing is
 * rolled back: a database failure after the files were restored leaves the
 * restored files in place.
 */
export class RestoreOrchestrator {
  constructor(private readonly deps: RestoreOrchestratorDeps) {}

  async restore(request: RestoreRequest): Promise<RestoreRunSummary> {
    const { config, backend, resolver, database, logger, runLog } = this.deps;
    const site = findSite(config, request.site);

    const plan: RestorePlan = {
      site: site.outputLabel,
      reference: request.reference,
      target: siteSourcePath(config, site),
      repositoryPath: siteRepositoryPath(config, site),
      database: site.dbName,
    };

    if (!(await request.confirm(plan))) {
      return { type: "cancelled", site: plan.site };
    }

    runLog.beginRun("Restore started", {
      Site: plan.site,
      Path: plan.target,
      Commit: plan.reference || "latest",
      DB: plan.database,
    });

    const resolved: { reference?: CommitReference } = {};
    const steps = await runSteps(
      plan.site,
      [
        {
          name: "resolve",
          run: async () => {
            const ready =
              (await backend.isInitialized(plan.repositoryPath)) &&
              (await backend.verify(plan.repositoryPath));
            if (!ready) {
              throw new RestoreFileError(`no repository found for ${plan.site}`, plan.site);
            }
            resolved.reference = await resolver.resolveReference(plan.repositoryPath, plan.reference);
            return `resolved ${resolved.reference}`;
          },
        },
        {
          name: "restore-files",
          run: async () => {
            const reference = resolved.reference;
            if (!reference) throw new RestoreFileError("no reference resolved", plan.site);
            logger.info(`Starting file restore for ${plan.site}`);
            await resolver.materialize(
              plan.repositoryPath,
              reference,
              plan.target,
              mirrorExcludes(backend.metadataDirName, config.excludePatterns)
            );
            logger.info(`File restore completed for ${plan.site}`);
            return `restored files from ${reference}`;
          },
        },
        {
          name: "restore-database",
          run: async () => {
            logger.info(`Starting database restore for ${plan.site}`);
            await database.restore(
              { database: site.dbName, user: site.dbUser, password: site.dbPassword },
              dumpArtifactPath(plan.repositoryPath, site.dbName)
            );
            return `restored ${site.dbName}`;
          },
        },
      ],
      "abort-on-first-failure",
      logger
    );

    const filesRestored = steps.some((s) => s.step === "restore-files" && s.status === "ok");
    const failed = steps.some((s) => s.status === "failed");

    if (failed && filesRestored) {
      logger.error(
        `Files at ${plan.target} were already restored from ${resolved.reference ?? "?"}; they are not rolled back`
      );
    } else if (!failed) {
      logger.info(`Restore process completed successfully for ${plan.site}`);
    }

    return {
      type: failed ? "failed" : "completed",
      site: plan.site,
      reference: resolved.reference,
      steps,
      filesRestored,
    };
  }
}
