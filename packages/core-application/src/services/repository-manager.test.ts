import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { CONSTRAINED_PROFILE, ROOT_COMMIT_MESSAGE, RepositoryManager } from "./repository-manager";
import { RepositoryError } from "../application/errors";
import { InMemoryVersionControl } from "../testing/in-memory-version-control";
import { MemoryLogger } from "../testing/memory-logger";
import { createRecordingSleeper } from "../testing/recording-sleeper";

class UnverifiableVersionControl extends InMemoryVersionControl {
  override async verify(): Promise<boolean> {
    return false;
  }
}

describe("RepositoryManager", () => {
  let tmp: string;
  let repo: string;
  let vc: InMemoryVersionControl;
  let logger: MemoryLogger;
  let delays: number[];
  let manager: RepositoryManager;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "sitevault-repo-"));
    repo = path.join(tmp, "backups", "shop");
    vc = new InMemoryVersionControl();
    logger = new MemoryLogger();
    const sleeper = createRecordingSleeper();
    delays = sleeper.delays;
    manager = new RepositoryManager({ backend: vc, logger, sleep: sleeper.sleep });
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it("creates a profiled repository with a synthetic root commit", async () => {
    await manager.ensureRepository(repo, ["*_backup.sql"]);

    const history = await vc.log(repo);
    expect(history.map((c) => c.subject)).toEqual([ROOT_COMMIT_MESSAGE]);
    expect(vc.committedPaths(repo)).toEqual([]);
    expect(vc.configOf(repo)).toEqual(new Map(CONSTRAINED_PROFILE));
    expect(vc.excludesOf(repo)).toEqual(["*_backup.sql"]);
  });

  it("is idempotent for an existing repository", async () => {
    await manager.ensureRepository(repo);
    await manager.ensureRepository(repo);

    expect(vc.count("init")).toBe(1);
    expect(vc.commitCount(repo)).toBe(1);
  });

  it("retries a failing init on a fixed schedule", async () => {
    vc.failNext("init", 2);

    await manager.ensureRepository(repo);

    expect(vc.count("init")).toBe(3);
    expect(delays).toEqual([3000, 3000]);
    expect(vc.commitCount(repo)).toBe(1);
  });

  it("raises RepositoryError once init attempts are exhausted", async () => {
    vc.failNext("init", Infinity);

    await expect(manager.ensureRepository(repo)).rejects.toBeInstanceOf(RepositoryError);
    expect(vc.count("init")).toBe(3);
    expect(logger.messages("error")).toEqual([
      `Failed to initialize repository in ${repo} after 3 attempts`,
    ]);
  });

  it("raises RepositoryError when verification fails", async () => {
    const broken = new UnverifiableVersionControl();
    const m = new RepositoryManager({ backend: broken, logger, sleep: async () => undefined });

    await expect(m.ensureRepository(repo)).rejects.toThrow(`repository at ${repo} failed verification`);
  });

  it("adds the root commit to an initialized repository without history", async () => {
    await vc.init(repo, "main");

    await manager.ensureRepository(repo);

    expect(vc.count("init")).toBe(1);
    expect(vc.commitCount(repo)).toBe(1);
  });

  it("treats compaction failures as non-fatal", async () => {
    await manager.ensureRepository(repo);

    vc.failNext("collectGarbage");
    await expect(manager.compact(repo)).resolves.toBe(false);
    expect(logger.messages("warn")).toEqual([
      `Repository cleanup failed for ${repo}: collectGarbage failed (injected)`,
    ]);

    await expect(manager.compact(repo)).resolves.toBe(true);
    expect(vc.gcRuns(repo)).toBe(1);
  });
});
