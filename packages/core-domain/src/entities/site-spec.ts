export type SiteLabel = string;

export interface SiteSpec {
  /** Live file tree of the site. Relative paths resolve against the sites root. */
  sourcePath: string;
  /** Unique key; also the directory name of the site's repository under the backup root. */
  outputLabel: SiteLabel;
  dbName: string;
  dbUser: string;
  dbPassword: string;
}
