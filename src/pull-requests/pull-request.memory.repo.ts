import { Injectable } from '@nestjs/common';

import { CheckRunEntity, CheckRunValues } from './check-run.entity.js';
import { PullRequestEntity, PullRequestValues } from './pull-request.entity.js';
import { PullRequestRepo } from './pull-request.repo.js';
import { ReviewEntity, ReviewValues } from './review.entity.js';

// In-process stand-in used by tests
@Injectable()
export class PullRequestMemoryRepo extends PullRequestRepo {
  private nextId = 1;

  readonly pullRequests: PullRequestEntity[] = [];
  readonly reviews: ReviewEntity[] = [];
  readonly checkRuns: CheckRunEntity[] = [];

  private upsertInto<T extends { id: number; githubId: string }>(
    rows: T[],
    values: Omit<T, 'id'> & { githubId: string },
    make: () => T,
  ): T {
    const existing = rows.find((r) => r.githubId === values.githubId);
    if (existing) return Object.assign(existing, values);
    const row = Object.assign(make(), values, { id: this.nextId++ });
    rows.push(row);
    return row;
  }

  async findByGithubId(githubId: string): Promise<PullRequestEntity | null> {
    const row = this.pullRequests.find((p) => p.githubId === githubId);
    return row ? Object.assign(new PullRequestEntity(), row) : null;
  }

  async upsertPullRequest(values: PullRequestValues): Promise<PullRequestEntity> {
    const row = this.upsertInto(this.pullRequests, values, () => new PullRequestEntity());
    return Object.assign(new PullRequestEntity(), row);
  }

  async upsertReviews(rows: ReviewValues[]): Promise<void> {
    for (const values of rows) this.upsertInto(this.reviews, values, () => new ReviewEntity());
  }

  async upsertCheckRuns(rows: CheckRunValues[]): Promise<void> {
    for (const values of rows) this.upsertInto(this.checkRuns, values, () => new CheckRunEntity());
  }

  async listPullRequests(): Promise<PullRequestEntity[]> {
    return this.pullRequests.map((p) => Object.assign(new PullRequestEntity(), p));
  }

  async listReviews(): Promise<ReviewEntity[]> {
    return this.reviews.map((r) => Object.assign(new ReviewEntity(), r));
  }
}
