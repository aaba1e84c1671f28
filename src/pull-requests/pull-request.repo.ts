import type { CheckRunValues } from './check-run.entity.js';
import type { PullRequestEntity, PullRequestValues } from './pull-request.entity.js';
import type { ReviewEntity, ReviewValues } from './review.entity.js';

/** Pull requests and their nested reviews and check runs, keyed by GitHub id. */
export abstract class PullRequestRepo {
  abstract findByGithubId(githubId: string): Promise<PullRequestEntity | null>;

  /** Insert or update by `githubId`; returns the stored row. */
  abstract upsertPullRequest(values: PullRequestValues): Promise<PullRequestEntity>;

  abstract upsertReviews(rows: ReviewValues[]): Promise<void>;

  abstract upsertCheckRuns(rows: CheckRunValues[]): Promise<void>;

  abstract listPullRequests(): Promise<PullRequestEntity[]>;

  abstract listReviews(): Promise<ReviewEntity[]>;
}
