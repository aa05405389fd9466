export type CommitReference = string;

export interface CommitInfo {
  id: CommitReference;
  shortId: CommitReference;
  subject: string;
  committedAt: Date;
  /** Human form such as "3 days ago", as reported by the backend. */
  relativeAge: string;
}
