import {
  GithubClientError,
  type ExternalCheckRun,
  type ExternalDirectoryEntry,
  type ExternalFileContent,
  type ExternalIssueComment,
  type ExternalPullRequest,
  type ExternalReview,
  type GithubClient,
  type ListPullsParams,
} from './github-client.interface.js';

const DEFAULT_REF = 'HEAD';

/**
 * In-process GithubClient backed by plain maps. Used by tests in place of the
 * Octokit client.
 */
export class StubGithubClient implements GithubClient {
  readonly pulls: ExternalPullRequest[] = [];
  readonly files = new Map<number, string[]>();
  readonly reviews = new Map<number, ExternalReview[]>();
  readonly checkRuns = new Map<string, ExternalCheckRun[]>();
  readonly comments = new Map<number, ExternalIssueComment[]>();
  readonly directories = new Map<string, ExternalDirectoryEntry[]>();
  /** Errors thrown by per-PR calls, keyed by PR number. */
  readonly failures = new Map<number, GithubClientError>();

  private readonly contents = new Map<string, Buffer>();

  /** How many PRs the iterator handed out, across calls. */
  yielded = 0;
  readonly contentRequests: string[] = [];

  addPull(pr: ExternalPullRequest, extras: { files?: string[]; reviews?: ExternalReview[] } = {}): void {
    this.pulls.push(pr);
    if (extras.files) this.files.set(pr.number, extras.files);
    if (extras.reviews) this.reviews.set(pr.number, extras.reviews);
  }

  putFile(path: string, content: string | Buffer, ref: string = DEFAULT_REF): void {
    this.contents.set(`${ref}:${path}`, typeof content === 'string' ? Buffer.from(content) : content);
  }

  private failFor(pullNumber: number): void {
    const failure = this.failures.get(pullNumber);
    if (failure) throw failure;
  }

  async *iteratePullRequests(params: ListPullsParams): AsyncIterable<ExternalPullRequest> {
    const key = params.sort === 'updated' ? 'updatedAt' : 'createdAt';
    const sign = params.direction === 'desc' ? -1 : 1;
    const rows = this.pulls
      .filter((p) => params.state === 'all' || p.state === params.state)
      .sort((a, b) => sign * a[key].localeCompare(b[key]));

    for (const row of rows) {
      this.yielded++;
      yield { ...row };
    }
  }

  async getPullRequest(params: { pullNumber: number }): Promise<ExternalPullRequest> {
    this.failFor(params.pullNumber);
    const pr = this.pulls.find((p) => p.number === params.pullNumber);
    if (!pr) throw new GithubClientError(`PR #${params.pullNumber} not found`, 'NOT_FOUND', 404);
    return { ...pr };
  }

  async listPullRequestFiles(params: { pullNumber: number }): Promise<string[]> {
    this.failFor(params.pullNumber);
    return [...(this.files.get(params.pullNumber) ?? [])];
  }

  async listReviews(params: { pullNumber: number }): Promise<ExternalReview[]> {
    this.failFor(params.pullNumber);
    return [...(this.reviews.get(params.pullNumber) ?? [])];
  }

  async listCheckRuns(params: { ref: string }): Promise<ExternalCheckRun[]> {
    return [...(this.checkRuns.get(params.ref) ?? [])];
  }

  async listIssueComments(params: { issueNumber: number }): Promise<ExternalIssueComment[]> {
    return [...(this.comments.get(params.issueNumber) ?? [])];
  }

  async getFileContent(params: { path: string; ref?: string }): Promise<ExternalFileContent | null> {
    const ref = params.ref ?? DEFAULT_REF;
    this.contentRequests.push(`${ref}:${params.path}`);
    const content = this.contents.get(`${ref}:${params.path}`);
    return content ? { path: params.path, ref: params.ref ?? null, content } : null;
  }

  async listDirectory(params: { path: string }): Promise<ExternalDirectoryEntry[]> {
    return [...(this.directories.get(params.path) ?? [])];
  }
}
