import fs from "node:fs/promises";
import path from "node:path";

import type { CommitInfo, CommitReference } from "@sitevault/core-domain";
import type { VersionControlBackend } from "../ports/version-control-backend";
import { CommandFailedError } from "../application/errors";
import { assertSucceeded, runProcess, type ProcessResult } from "./run-process";

const FIELD_SEP = "\x1f";
const LOG_FORMAT = ["%H", "%h", "%s", "%cI", "%cr"].join("%x1f");

export type GitCliBackendOptions = {
  bin?: string;
  /** Used for commits when the host has no git identity configured. */
  identity?: { name: string; email: string };
};

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export function parseLogOutput(stdout: string): CommitInfo[] {
  return stdout
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const [id = "", shortId = "", subject = "", iso = "", relativeAge = ""] = line.split(FIELD_SEP);
      return { id, shortId, subject, committedAt: new Date(iso), relativeAge };
    });
}

/** VersionControlBackend on top of the `git` executable. */
export class GitCliBackend implements VersionControlBackend {
  readonly metadataDirName = ".git";
  private readonly bin: string;

  constructor(private readonly options: GitCliBackendOptions = {}) {
    this.bin = options.bin ?? "git";
  }

  private run(repoPath: string, args: string[]): Promise<ProcessResult> {
    return runProcess(this.bin, ["-C", repoPath, ...args], {
      env: { GIT_DISCOVERY_ACROSS_FILESYSTEM: "1" },
    });
  }

  private async runChecked(repoPath: string, args: string[]): Promise<ProcessResult> {
    const res = await this.run(repoPath, args);
    return assertSucceeded(res, `git ${args[0] ?? ""}`.trim());
  }

  private metadataDir(repoPath: string): string {
    return path.join(repoPath, this.metadataDirName);
  }

  async isInitialized(repoPath: string): Promise<boolean> {
    return isDirectory(this.metadataDir(repoPath));
  }

  async init(repoPath: string, defaultBranch: string): Promise<void> {
    await fs.mkdir(repoPath, { recursive: true });
    await this.runChecked(repoPath, ["init", `--initial-branch=${defaultBranch}`]);
  }

  async setConfig(repoPath: string, key: string, value: string): Promise<void> {
    await this.runChecked(repoPath, ["config", key, value]);
  }

  async setLocalExcludes(repoPath: string, patterns: readonly string[]): Promise<void> {
    const file = path.join(this.metadataDir(repoPath), "info", "exclude");
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, patterns.map((p) => `${p}\n`).join(""), "utf-8");
  }

  async verify(repoPath: string): Promise<boolean> {
    const res = await this.run(repoPath, ["rev-parse", "--absolute-git-dir"]);
    if (res.code !== 0) return false;

    // a parent repository would also answer rev-parse; it must be this one
    try {
      const reported = await fs.realpath(res.stdout.trim());
      const expected = await fs.realpath(this.metadataDir(repoPath));
      return reported === expected;
    } catch {
      return false;
    }
  }

  async stageAll(repoPath: string): Promise<void> {
    await this.runChecked(repoPath, ["add", "."]);
  }

  async stageFile(repoPath: string, relativePath: string): Promise<void> {
    await this.runChecked(repoPath, ["add", "--", relativePath]);
  }

  async hasStagedChanges(repoPath: string): Promise<boolean> {
    const res = await this.run(repoPath, ["diff", "--cached", "--quiet"]);
    if (res.code === 0) return false;
    if (res.code === 1) return true;
    throw new CommandFailedError(
      `git diff --cached exited with code ${res.code}: ${res.stderr.trim()}`,
      "git diff",
      res.code,
      res.stderr
    );
  }

  async commit(repoPath: string, message: string, options: { allowEmpty?: boolean } = {}): Promise<void> {
    const identity = this.options.identity
      ? ["-c", `user.name=${this.options.identity.name}`, "-c", `user.email=${this.options.identity.email}`]
      : [];
    const args = [...identity, "commit", "--quiet", "-m", message];
    if (options.allowEmpty) args.push("--allow-empty");

    const res = await this.run(repoPath, args);
    assertSucceeded(res, "git commit");
  }

  async head(repoPath: string): Promise<CommitReference> {
    const res = await this.runChecked(repoPath, ["rev-parse", "--short", "HEAD"]);
    return res.stdout.trim();
  }

  async log(repoPath: string): Promise<CommitInfo[]> {
    const res = await this.runChecked(repoPath, ["log", `--pretty=format:${LOG_FORMAT}`]);
    return parseLogOutput(res.stdout);
  }

  async isValidReference(repoPath: string, reference: CommitReference): Promise<boolean> {
    const res = await this.run(repoPath, ["rev-parse", "--verify", "--quiet", `${reference}^{commit}`]);
    return res.code === 0;
  }

  /**
   * Index and working area take the full tree of `reference`: tracked files the
   * tree lacks are removed, untracked and ignored files stay. HEAD does not move.
   */
  async checkoutTree(repoPath: string, reference: CommitReference): Promise<void> {
    await this.runChecked(repoPath, ["read-tree", "--reset", "-u", reference]);
  }

  async collectGarbage(repoPath: string): Promise<void> {
    // a stale gc.log makes `gc --auto` refuse to run
    await fs.rm(path.join(this.metadataDir(repoPath), "gc.log"), { force: true });
    await this.runChecked(repoPath, ["gc", "--auto", "--quiet"]);
  }
}
