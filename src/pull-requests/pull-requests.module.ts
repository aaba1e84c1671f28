import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { CatalogModule } from '../catalog/catalog.module.js';
import { GithubModule } from '../github/github.module.js';
import { CheckRunEntity } from './check-run.entity.js';
import { PullRequestEntity } from './pull-request.entity.js';
import { PullRequestRepo } from './pull-request.repo.js';
import { PullRequestTypeormRepo } from './pull-request.typeorm.repo.js';
import { RecordSynchronizerService } from './record-synchronizer.service.js';
import { ReviewEntity } from './review.entity.js';

@Module({
  imports: [
    TypeOrmModule.forFeature([PullRequestEntity, ReviewEntity, CheckRunEntity]),
    CatalogModule,
    GithubModule,
  ],
  providers: [{ provide: PullRequestRepo, useClass: PullRequestTypeormRepo }, RecordSynchronizerService],
  exports: [PullRequestRepo, RecordSynchronizerService],
})
export class PullRequestsModule {}
