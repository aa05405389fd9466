import type { CommitInfo, SiteLabel } from "@sitevault/core-domain";
import type { AppConfig } from "../config/app-config";
import { findSite, siteRepositoryPath } from "../config/app-config";
import type { VersionControlBackend } from "../ports/version-control-backend";
import { RepositoryError } from "../application/errors";

export function formatCommitLine(commit: CommitInfo): string {
  return `${commit.shortId} - ${commit.subject} (${commit.relativeAge})`;
}

/** Read-only views over the registry and the snapshot repositories. */
export class BackupCatalog {
  constructor(
    private readonly config: AppConfig,
    private readonly backend: VersionControlBackend
  ) {}

  listSites(): string[] {
    return this.config.sites.map((s) => `${s.outputLabel} (source: ${s.sourcePath})`);
  }

  async listBackups(label: SiteLabel): Promise<CommitInfo[]> {
    const site = findSite(this.config, label);
    const repoPath = siteRepositoryPath(this.config, site);

    if (!(await this.backend.isInitialized(repoPath))) {
      throw new RepositoryError(`no repository found for ${label}`, repoPath);
    }
    if (!(await this.backend.verify(repoPath))) {
      throw new RepositoryError(`repository not properly initialized for ${label}`, repoPath);
    }

    return this.backend.log(repoPath);
  }
}
