import type { SiteLabel } from "@sitevault/core-domain";

export class ConfigurationError extends Error {
  constructor(message: string, public issues: string[] = [], public cause?: unknown) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class RepositoryError extends Error {
  constructor(message: string, public repositoryPath: string, public cause?: unknown) {
    super(message);
    this.name = "RepositoryError";
  }
}

export class StagingError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "StagingError";
  }
}

export class CommitError extends Error {
  constructor(message: string, public attempts: number, public cause?: unknown) {
    super(message);
    this.name = "CommitError";
  }
}

export class DumpError extends Error {
  constructor(message: string, public attempts: number, public cause?: unknown) {
    super(message);
    this.name = "DumpError";
  }
}

export class RestoreFileError extends Error {
  constructor(message: string, public site?: SiteLabel, public cause?: unknown) {
    super(message);
    this.name = "RestoreFileError";
  }
}

export class RestoreDatabaseError extends Error {
  constructor(message: string, public site?: SiteLabel, public cause?: unknown) {
    super(message);
    this.name = "RestoreDatabaseError";
  }
}

export class ReferenceNotFoundError extends Error {
  constructor(message: string, public requested: string, public cause?: unknown) {
    super(message);
    this.name = "ReferenceNotFoundError";
  }
}

/** Raised by backend adapters when an external command exits non-zero. */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public command: string,
    public exitCode: number,
    public stderr: string
  ) {
    super(message);
    this.name = "CommandFailedError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
