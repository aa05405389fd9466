import type { CommitInfo, CommitReference } from "@sitevault/core-domain";

export type ConfigProfile = ReadonlyArray<readonly [key: string, value: string]>;

/**
 * The operations the snapshot engine needs from a version-control tool.
 * Every method rejects when the underlying operation fails.
 */
export interface VersionControlBackend {
  /** Name of the metadata directory inside a repository, excluded from every mirror. */
  readonly metadataDirName: string;

  /** True when `repoPath` holds its own metadata directory. */
  isInitialized(repoPath: string): Promise<boolean>;
  init(repoPath: string, defaultBranch: string): Promise<void>;
  setConfig(repoPath: string, key: string, value: string): Promise<void>;
  /** Replaces the repository-local exclude list. */
  setLocalExcludes(repoPath: string, patterns: readonly string[]): Promise<void>;
  /** Structural check: the repository resolves and its metadata belongs to `repoPath`. */
  verify(repoPath: string): Promise<boolean>;

  stageAll(repoPath: string): Promise<void>;
  stageFile(repoPath: string, relativePath: string): Promise<void>;
  hasStagedChanges(repoPath: string): Promise<boolean>;
  commit(repoPath: string, message: string, options?: { allowEmpty?: boolean }): Promise<void>;

  /** Abbreviated id of HEAD. */
  head(repoPath: string): Promise<CommitReference>;
  /** Most recent first. */
  log(repoPath: string): Promise<CommitInfo[]>;
  isValidReference(repoPath: string, reference: CommitReference): Promise<boolean>;
  /** Makes index and working area hold exactly the tracked tree of `reference`; HEAD does not move. */
  checkoutTree(repoPath: string, reference: CommitReference): Promise<void>;
  collectGarbage(repoPath: string): Promise<void>;
}
