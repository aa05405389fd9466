import type { AppConfig } from "../config/app-config";
import type { VersionControlBackend } from "../ports/version-control-backend";
import type { DatabaseBackend } from "../ports/database-backend";
import type { MirrorStager } from "../ports/mirror-stager";
import type { Logger } from "../ports/logger";
import type { RunLog } from "../ports/run-log";
import type { Clock } from "../ports/clock";
import type { Sleeper } from "../ports/retry-policy";
import { GitCliBackend } from "../adapters/git-cli-backend";
import { MysqlCliBackend } from "../adapters/mysql-cli-backend";
import { RsyncMirrorStager } from "../adapters/rsync-mirror-stager";
import { NodeMirrorStager } from "../adapters/node-mirror-stager";
import { ConsoleLogger } from "../adapters/console-logger";
import { NodeRunLog } from "../adapters/node-run-log";
import { SystemClock } from "../adapters/system-clock";
import { sleep as realSleep } from "../infra/sleep";
import { RepositoryManager } from "../services/repository-manager";
import { StagedChangeCommitter } from "../services/staged-change-committer";
import { DatabaseAdapter } from "../services/database-adapter";
import { RestoreResolver } from "../services/restore-resolver";
import { BackupOrchestrator } from "../services/backup-orchestrator";
import { RestoreOrchestrator } from "../services/restore-orchestrator";
import { BackupCatalog } from "../services/backup-catalog";
import { createReporter } from "./reporter";

export type EngineOverrides = {
  versionControl?: VersionControlBackend;
  database?: DatabaseBackend;
  mirror?: MirrorStager;
  logger?: Logger;
  runLog?: RunLog;
  clock?: Clock;
  sleep?: Sleeper;
};

export type Engine = {
  config: AppConfig;
  logger: Logger;
  repositories: RepositoryManager;
  committer: StagedChangeCommitter;
  database: DatabaseAdapter;
  resolver: RestoreResolver;
  backup: BackupOrchestrator;
  restore: RestoreOrchestrator;
  catalog: BackupCatalog;
};

function defaultMirror(config: AppConfig): MirrorStager {
  return config.mirror === "node" ? new NodeMirrorStager() : new RsyncMirrorStager(config.rsyncBinary);
}

/** Wires every component from one configuration value. */
export function createEngine(config: AppConfig, overrides: EngineOverrides = {}): Engine {
  const clock = overrides.clock ?? new SystemClock();
  const sleep = overrides.sleep ?? realSleep;
  const runLog = overrides.runLog ?? new NodeRunLog(config.runLogPath, clock);
  const logger = createReporter(overrides.logger ?? new ConsoleLogger(), runLog);

  const backend =
    overrides.versionControl ??
    new GitCliBackend({ bin: config.gitBinary, identity: config.commitIdentity });
  const databaseBackend = overrides.database ?? new MysqlCliBackend({ binPath: config.mysqlBinPath });
  const mirror = overrides.mirror ?? defaultMirror(config);

  const repositories = new RepositoryManager({ backend, logger, sleep });
  const committer = new StagedChangeCommitter({ backend, repositories, logger, sleep });
  const database = new DatabaseAdapter({ backend: databaseBackend, logger, sleep });
  const resolver = new RestoreResolver({ backend, mirror, logger });

  return {
    config,
    logger,
    repositories,
    committer,
    database,
    resolver,
    backup: new BackupOrchestrator({
      config,
      backend,
      mirror,
      repositories,
      committer,
      database,
      logger,
      runLog,
      clock,
    }),
    restore: new RestoreOrchestrator({ config, backend, resolver, database, logger, runLog }),
    catalog: new BackupCatalog(config, backend),
  };
}
