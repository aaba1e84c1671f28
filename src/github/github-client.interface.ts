// Abstraction over the GitHub API used by the sync core

export type GithubClientErrorCode =
  | 'RATE_LIMIT'
  | 'SERVER_ERROR'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'UNKNOWN';

export class GithubClientError extends Error {
  constructor(
    message: string,
    readonly code: GithubClientErrorCode,
    readonly status?: number,
    readonly retryable = code === 'RATE_LIMIT' || code === 'SERVER_ERROR',
  ) {
    super(message);
    this.name = 'GithubClientError';
  }
}

export type PullState = 'open' | 'closed';

/** A pull request as GitHub reports it. Read-only from our side. */
export interface ExternalPullRequest {
  id: string; // numeric id as string
  number: number;
  title: string;
  state: PullState;
  merged: boolean;
  createdAt: string; // ISO
  updatedAt: string;
  closedAt: string | null;
  mergedAt: string | null;
  labels: string[];
  authorLogin: string | null;
  headSha: string | null;
  mergeCommitSha: string | null;
}

export interface ExternalReview {
  id: string;
  reviewerLogin: string | null;
  state: string; // GitHub casing, e.g. CHANGES_REQUESTED
  submittedAt: string | null;
  body: string | null;
}

export interface ExternalCheckRun {
  id: string;
  name: string;
  status: string;
  conclusion: string | null;
  startedAt: string | null;
  completedAt: string | null;
}

export interface ExternalIssueComment {
  id: string;
  authorLogin: string | null;
  authorIsBot: boolean;
  body: string;
  createdAt: string | null;
}

export interface ExternalDirectoryEntry {
  name: string;
  path: string;
  type: 'file' | 'dir' | 'other';
}

/** Raw file bytes; decoding is the caller's concern. */
export interface ExternalFileContent {
  path: string;
  ref: string | null;
  content: Buffer;
}

export interface ListPullsParams {
  state: 'open' | 'closed' | 'all';
  sort: 'updated' | 'created';
  direction: 'asc' | 'desc';
}

// The interface consumed by the sync core
export interface GithubClient {
  /** Pages lazily so callers can stop once they pass their time bound. */
  iteratePullRequests(params: ListPullsParams): AsyncIterable<ExternalPullRequest>;

  getPullRequest(params: { pullNumber: number }): Promise<ExternalPullRequest>;

  listPullRequestFiles(params: { pullNumber: number }): Promise<string[]>;

  listReviews(params: { pullNumber: number }): Promise<ExternalReview[]>;

  listCheckRuns(params: { ref: string }): Promise<ExternalCheckRun[]>;

  listIssueComments(params: { issueNumber: number }): Promise<ExternalIssueComment[]>;

  /** Resolves to null when the path does not exist at that ref. */
  getFileContent(params: { path: string; ref?: string }): Promise<ExternalFileContent | null>;

  listDirectory(params: { path: string }): Promise<ExternalDirectoryEntry[]>;
}
