import inquirer from "inquirer";

import { ConsoleLogger, createEngine, loadAppConfig, type RestorePlan } from "@sitevault/core-application";

import { createProgram, describePlan } from "./program.js";

async function confirmRestore(plan: RestorePlan): Promise<boolean> {
  for (const line of describePlan(plan)) console.log(line);

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: "confirm",
      name: "proceed",
      message: "This overwrites the live files and database. Continue?",
      default: false,
    },
  ]);
  return proceed;
}

const program = createProgram({
  loadEngine: async (configPath, { verbose }) =>
    createEngine(await loadAppConfig(configPath), { logger: new ConsoleLogger(verbose) }),
  confirm: confirmRestore,
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
