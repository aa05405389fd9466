// Public API of the core-application package: ports, services, node
// adapters and the composition root.

// Ports (interfaces)
export type * from "./ports/clock";
export type * from "./ports/logger";
export type * from "./ports/run-log";
export type * from "./ports/retry-policy";
export type * from "./ports/mirror-stager";
export type * from "./ports/database-backend";
export type * from "./ports/version-control-backend";

// Application
export * from "./application/errors";
export * from "./application/with-retry";
export * from "./application/retry-policies";
export * from "./application/run-steps";
export * from "./application/exclusions";
export * from "./application/reporter";
export * from "./application/format-timestamp";
export * from "./application/create-engine";

// Config
export * from "./config/app-config";
export * from "./config/site-registry";

// Services
export * from "./services/repository-manager";
export * from "./services/staged-change-committer";
export * from "./services/database-adapter";
export * from "./services/restore-resolver";
export * from "./services/backup-orchestrator";
export * from "./services/restore-orchestrator";
export * from "./services/backup-catalog";

// Node adapters
export * from "./adapters/git-cli-backend";
export * from "./adapters/mysql-cli-backend";
export * from "./adapters/rsync-mirror-stager";
export * from "./adapters/node-mirror-stager";
export * from "./adapters/exclude-patterns";
export * from "./adapters/console-logger";
export * from "./adapters/node-run-log";
export * from "./adapters/system-clock";
export * from "./adapters/run-process";
export { sleep } from "./infra/sleep";
