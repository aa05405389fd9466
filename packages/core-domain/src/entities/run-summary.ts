import type { CommitReference } from "./commit";
import type { SiteLabel } from "./site-spec";
import type { StepResult } from "./step-result";

export type FileSnapshotOutcome =
  | { type: "noop" }
  | { type: "committed"; reference: CommitReference };

export interface SiteBackupResult {
  site: SiteLabel;
  steps: StepResult[];
  snapshot?: FileSnapshotOutcome;
}

export interface BackupRunSummary {
  startedAt: Date;
  finishedAt: Date;
  sites: SiteBackupResult[];
  failures: StepResult[];
}

export type RestoreRunSummary =
  | { type: "cancelled"; site: SiteLabel }
  | {
      type: "completed" | "failed";
      site: SiteLabel;
      reference?: CommitReference;
      steps: StepResult[];
      /** True once the live file tree has been overwritten, whatever happened afterwards. */
      filesRestored: boolean;
    };
