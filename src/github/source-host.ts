// src/github/source-host.ts

export interface ChangedFile {
  filename: string;
  status?: string;
  /** Absent for binary files and very large diffs. */
  patch?: string;
}

export interface CommitCommentRequest {
  sha: string;
  path: string;
  line?: number;
  body: string;
}

export interface ReviewComment {
  id: number;
  body: string;
  path?: string;
  user?: string;
}

/** What the review run needs from the repository host. */
export interface SourceHost {
  readonly fullName: string;
  compare(baseSha: string, headSha: string): Promise<ChangedFile[]>;
  /** File text at `ref`, or null when it is missing, a directory, or cannot be fetched. */
  getFileContent(path: string, ref: string): Promise<string | null>;
  createCommitComment(request: CommitCommentRequest): Promise<void>;
  createIssueComment(prNumber: number, body: string): Promise<void>;
  listReviewComments(prNumber: number): Promise<ReviewComment[]>;
}
