import type { CommitReference } from "@sitevault/core-domain";
import type { VersionControlBackend } from "../ports/version-control-backend";
import type { MirrorStager } from "../ports/mirror-stager";
import type { Logger } from "../ports/logger";
import { ReferenceNotFoundError, RestoreFileError, describeError } from "../application/errors";

export type RestoreResolverDeps = {
  backend: VersionControlBackend;
  mirror: MirrorStager;
  logger: Logger;
};

export class RestoreResolver {
  constructor(private readonly deps: RestoreResolverDeps) {}

  /**
   * Empty request means the current head. Otherwise the request is a prefix
   * and the most recent commit whose id starts with it wins.
   */
  async resolveReference(repoPath: string, requested?: string): Promise<CommitReference> {
    const { backend, logger } = this.deps;
    const prefix = requested?.trim() ?? "";

    if (prefix.length === 0) {
      const head = await backend.head(repoPath);
      logger.info(`No reference provided, using latest commit: ${head}`);
      return head;
    }

    const history = await backend.log(repoPath);
    logger.debug(`Matching '${prefix}' against ${history.length} commits`);
    const match = history.find((c) => c.shortId.startsWith(prefix) || c.id.startsWith(prefix));
    if (!match) {
      logger.error(`Could not find commit matching: ${prefix}`);
      throw new ReferenceNotFoundError(`no commit matches '${prefix}'`, prefix);
    }

    logger.info(`Using commit: ${match.shortId}`);
    return match.shortId;
  }

  /** Rewrites the working area with the tree of `reference`; HEAD does not move. */
  async checkoutSnapshot(repoPath: string, reference: CommitReference): Promise<void> {
    const { backend, logger } = this.deps;

    if (!(await backend.isValidReference(repoPath, reference))) {
      throw new ReferenceNotFoundError(`'${reference}' is not a commit in ${repoPath}`, reference);
    }

    logger.info(`Checking out files from commit ${reference}...`);
    try {
      await backend.checkoutTree(repoPath, reference);
    } catch (err) {
      logger.error(`Failed to checkout commit ${reference}: ${describeError(err)}`);
      throw new RestoreFileError(`checkout of ${reference} failed: ${describeError(err)}`, undefined, err);
    }
  }

  /** Checks out `reference` and mirrors it onto `target`, deleting what the snapshot lacks. */
  async materialize(
    repoPath: string,
    reference: CommitReference,
    target: string,
    excludes: readonly string[]
  ): Promise<void> {
    const { mirror, logger } = this.deps;

    await this.checkoutSnapshot(repoPath, reference);

    logger.info(`Copying files to ${target}...`);
    try {
      await mirror.mirror(repoPath, target, { exclude: excludes, deleteExtraneous: true });
    } catch (err) {
      logger.error(`Copying snapshot to ${target} failed: ${describeError(err)}`);
      throw new RestoreFileError(`mirror to ${target} failed: ${describeError(err)}`, undefined, err);
    }
  }
}
