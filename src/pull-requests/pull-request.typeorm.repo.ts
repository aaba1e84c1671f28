import { Inject, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { CheckRunEntity, CheckRunValues } from './check-run.entity.js';
import { PullRequestEntity, PullRequestValues } from './pull-request.entity.js';
import { PullRequestRepo } from './pull-request.repo.js';
import { ReviewEntity, ReviewValues } from './review.entity.js';

@Injectable()
export class PullRequestTypeormRepo extends PullRequestRepo {
  constructor(@Inject(DataSource) private readonly ds: DataSource) {
    super();
  }

  findByGithubId(githubId: string): Promise<PullRequestEntity | null> {
    return this.ds.getRepository(PullRequestEntity).findOne({ where: { githubId } });
  }

  async upsertPullRequest(values: PullRequestValues): Promise<PullRequestEntity> {
    const repo = this.ds.getRepository(PullRequestEntity);
    await repo.upsert(values, { conflictPaths: ['githubId'] });
    return repo.findOneOrFail({ where: { githubId: values.githubId } });
  }

  async upsertReviews(rows: ReviewValues[]): Promise<void> {
    if (rows.length === 0) return;
    await this.ds.transaction((manager) =>
      manager.getRepository(ReviewEntity).upsert(rows, { conflictPaths: ['githubId'] }),
    );
  }

  async upsertCheckRuns(rows: CheckRunValues[]): Promise<void> {
    if (rows.length === 0) return;
    await this.ds.transaction((manager) =>
      manager.getRepository(CheckRunEntity).upsert(rows, { conflictPaths: ['githubId'] }),
    );
  }

  listPullRequests(): Promise<PullRequestEntity[]> {
    return this.ds.getRepository(PullRequestEntity).find({ order: { id: 'ASC' } });
  }

  listReviews(): Promise<ReviewEntity[]> {
    return this.ds.getRepository(ReviewEntity).find({ order: { id: 'ASC' } });
  }
}
