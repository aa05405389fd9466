import path from "node:path";

import type { DatabaseBackend, DatabaseCredentials } from "../ports/database-backend";
import { assertSucceeded, runProcess } from "./run-process";

export type MysqlCliBackendOptions = {
  /** Directory holding mysqldump and mysql; PATH lookup when omitted. */
  binPath?: string;
};

/** DatabaseBackend that shells out to mysqldump / mysql. */
export class MysqlCliBackend implements DatabaseBackend {
  private readonly dumpBin: string;
  private readonly clientBin: string;

  constructor(options: MysqlCliBackendOptions = {}) {
    this.dumpBin = options.binPath ? path.join(options.binPath, "mysqldump") : "mysqldump";
    this.clientBin = options.binPath ? path.join(options.binPath, "mysql") : "mysql";
  }

  // the password travels in the environment, not on the command line
  private env(credentials: DatabaseCredentials): Record<string, string> {
    return { MYSQL_PWD: credentials.password };
  }

  async isAvailable(): Promise<boolean> {
    const res = await runProcess(this.dumpBin, ["--version"]);
    return res.code === 0;
  }

  async exportTo(credentials: DatabaseCredentials, outputPath: string): Promise<void> {
    const res = await runProcess(this.dumpBin, ["-u", credentials.user, credentials.database], {
      env: this.env(credentials),
      stdoutFile: outputPath,
    });
    assertSucceeded(res, "mysqldump");
  }

  async importFrom(credentials: DatabaseCredentials, inputPath: string): Promise<void> {
    const res = await runProcess(this.clientBin, ["-u", credentials.user, credentials.database], {
      env: this.env(credentials),
      stdinFile: inputPath,
    });
    assertSucceeded(res, "mysql");
  }
}
