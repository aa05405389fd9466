export type DatabaseCredentials = {
  database: string;
  user: string;
  password: string;
};

export interface DatabaseBackend {
  /** Whether the export/import tooling can be reached at all. */
  isAvailable(): Promise<boolean>;
  /** Streams an export of the database into `outputPath`, replacing it. */
  exportTo(credentials: DatabaseCredentials, outputPath: string): Promise<void>;
  /** Streams `inputPath` into the database. */
  importFrom(credentials: DatabaseCredentials, inputPath: string): Promise<void>;
}
