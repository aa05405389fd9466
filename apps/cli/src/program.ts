import { Command } from "commander";

import {
  DEFAULT_CONFIG_FILE,
  describeError,
  failedSteps,
  formatCommitLine,
  type Engine,
  type RestorePlan,
} from "@sitevault/core-application";

export type EngineOptions = { verbose: boolean };

export type CliDeps = {
  loadEngine: (configPath: string, options: EngineOptions) => Promise<Engine>;
  confirm: (plan: RestorePlan) => Promise<boolean>;
  out: (line: string) => void;
  err: (line: string) => void;
  env: Record<string, string | undefined>;
  setExitCode: (code: number) => void;
};

/** `--config`, then SITEVAULT_CONFIG, then the file in the working directory. */
export function resolveConfigPath(
  option: string | undefined,
  env: Record<string, string | undefined>
): string {
  return option || env.SITEVAULT_CONFIG || DEFAULT_CONFIG_FILE;
}

export function describePlan(plan: RestorePlan): string[] {
  return [
    `Restore plan for '${plan.site}':`,
    `  Files:    ${plan.repositoryPath} -> ${plan.target}`,
    `  Commit:   ${plan.reference || "latest"}`,
    `  Database: ${plan.database}`,
  ];
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("sitevault")
    .description("Versioned backups and restores of website files and their MySQL databases")
    .option("-c, --config <path>", "Path to the configuration file")
    .option("-v, --verbose", "Also print debug output");

  const engine = () => {
    const opts = program.opts<{ config?: string; verbose?: boolean }>();
    return deps.loadEngine(resolveConfigPath(opts.config, deps.env), { verbose: opts.verbose === true });
  };

  const guarded =
    <A extends unknown[]>(fn: (...args: A) => Promise<number>) =>
    async (...args: A): Promise<void> => {
      try {
        deps.setExitCode(await fn(...args));
      } catch (err) {
        deps.err(`Error: ${describeError(err)}`);
        deps.setExitCode(1);
      }
    };

  program
    .command("backup [site]")
    .description("Back up every configured site, or only the named one")
    .action(
      guarded(async (site: string | undefined) => {
        const summary = await (await engine()).backup.run(site);
        for (const f of summary.failures) {
          deps.err(`${f.site}: ${f.step} failed: ${f.message}`);
        }
        return summary.failures.length > 0 ? 1 : 0;
      })
    );

  program
    .command("restore <site> [reference]")
    .description("Restore a site's files and database from a snapshot (latest when no reference is given)")
    .action(
      guarded(async (site: string, reference: string | undefined) => {
        const summary = await (await engine()).restore.restore({
          site,
          reference,
          confirm: deps.confirm,
        });

        if (summary.type === "cancelled") {
          deps.out("Restore cancelled");
          return 0;
        }
        for (const f of failedSteps(summary.steps)) {
          deps.err(`${f.site}: ${f.step} failed: ${f.message}`);
        }
        if (summary.type === "failed" && summary.filesRestored) {
          deps.err("Files were restored but the database was not; the site may be inconsistent");
        }
        return summary.type === "completed" ? 0 : 1;
      })
    );

  program
    .command("list-backups <site>")
    .description("List the snapshots recorded for a site, newest first")
    .action(
      guarded(async (site: string) => {
        const commits = await (await engine()).catalog.listBackups(site);
        deps.out(`Available backups for ${site}:`);
        for (const c of commits) deps.out(formatCommitLine(c));
        return 0;
      })
    );

  program
    .command("list-sites")
    .description("List configured sites")
    .action(
      guarded(async () => {
        deps.out("Configured sites:");
        for (const line of (await engine()).catalog.listSites()) deps.out(`  ${line}`);
        return 0;
      })
    );

  return program;
}
