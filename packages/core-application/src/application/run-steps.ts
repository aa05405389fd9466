import type { SiteLabel, StepName, StepResult } from "@sitevault/core-domain";
import type { Logger } from "../ports/logger";
import { describeError } from "./errors";

export type FailurePolicy = "continue-on-error" | "abort-on-first-failure";

export type Step = {
  name: StepName;
  /** Resolves with the message recorded for a successful step. */
  run: () => Promise<string>;
};

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Runs a site's steps in order. Under "continue-on-error" every step runs;
 * under "abort-on-first-failure" the steps after a failure are recorded as
 * skipped and never started.
 */
export async function runSteps(
  site: SiteLabel,
  steps: readonly Step[],
  policy: FailurePolicy,
  logger: Logger
): Promise<StepResult[]> {
  const results: StepResult[] = [];
  let aborted = false;

  for (const step of steps) {
    if (aborted) {
      results.push({ site, step: step.name, status: "skipped", message: "skipped after an earlier failure" });
      continue;
    }

    try {
      const message = await step.run();
      results.push({ site, step: step.name, status: "ok", message });
    } catch (err) {
      const error = asError(err);
      logger.error(`${step.name} failed for ${site}: ${describeError(error)}`);
      results.push({ site, step: step.name, status: "failed", message: error.message, error });
      if (policy === "abort-on-first-failure") aborted = true;
    }
  }

  return results;
}

export function failedSteps(results: readonly StepResult[]): StepResult[] {
  return results.filter((r) => r.status === "failed");
}
