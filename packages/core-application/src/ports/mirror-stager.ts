export type MirrorOptions = {
  /** rsync-style patterns: `*.log`, `cache/`, `/anchored`, `a/b/*.tmp`. */
  exclude: readonly string[];
  /** Remove destination entries absent from the source (excluded entries are kept). */
  deleteExtraneous: boolean;
};

export interface MirrorStager {
  /** Makes `destination` hold the content of `source`, preserving mode and mtime. */
  mirror(source: string, destination: string, options: MirrorOptions): Promise<void>;
}
