import fs from "node:fs/promises";

import type { MirrorOptions, MirrorStager } from "../ports/mirror-stager";
import { assertSucceeded, runProcess } from "./run-process";

function withTrailingSlash(p: string): string {
  return p.endsWith("/") ? p : `${p}/`;
}

export class RsyncMirrorStager implements MirrorStager {
  constructor(private readonly bin = "rsync") {}

  async mirror(source: string, destination: string, options: MirrorOptions): Promise<void> {
    await fs.mkdir(destination, { recursive: true });

    const args = ["-a"];
    if (options.deleteExtraneous) args.push("--delete");
    for (const pattern of options.exclude) args.push(`--exclude=${pattern}`);
    args.push(withTrailingSlash(source), withTrailingSlash(destination));

    const res = await runProcess(this.bin, args);
    assertSucceeded(res, "rsync");
  }
}
