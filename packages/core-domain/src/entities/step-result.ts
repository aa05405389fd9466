import type { SiteLabel } from "./site-spec";

export type StepName =
  | "dump"
  | "files"
  | "resolve"
  | "restore-files"
  | "restore-database";

export type StepStatus = "ok" | "failed" | "skipped";

export interface StepResult {
  site: SiteLabel;
  step: StepName;
  status: StepStatus;
  message: string;
  error?: Error;
}
