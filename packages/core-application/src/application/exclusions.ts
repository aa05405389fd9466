import path from "node:path";

export const DUMP_ARTIFACT_SUFFIX = "_backup.sql";
export const DUMP_ARTIFACT_PATTERN = `*${DUMP_ARTIFACT_SUFFIX}`;

export function dumpArtifactPath(repoPath: string, dbName: string): string {
  return path.join(repoPath, `${dbName}${DUMP_ARTIFACT_SUFFIX}`);
}

/** Patterns for every mirror: metadata directory and dump artifact first, then the configured set. */
export function mirrorExcludes(metadataDirName: string, configured: readonly string[]): string[] {
  return [...new Set([`${metadataDirName}/`, DUMP_ARTIFACT_PATTERN, ...configured])];
}

/** Patterns for the repository's own exclude list; the metadata directory never needs one. */
export function historyExcludes(metadataDirName: string, configured: readonly string[]): string[] {
  const metadata = new Set([metadataDirName, `${metadataDirName}/`, `/${metadataDirName}/`]);
  return mirrorExcludes(metadataDirName, configured).filter((p) => !metadata.has(p));
}
