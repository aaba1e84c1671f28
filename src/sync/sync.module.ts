import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { GithubModule } from '../github/github.module.js';
import { MetricsModule } from '../metrics/metrics.module.js';
import { PullRequestsModule } from '../pull-requests/pull-requests.module.js';
import { SyncStateEntity } from './state/sync-state.entity.js';
import { SyncStateRepo } from './state/sync-state.repo.js';
import { SyncStateTypeormRepo } from './state/sync-state.typeorm.repo.js';
import { SyncEventsService } from './sync-events.service.js';
import { SyncController } from './sync.controller.js';
import { SyncService } from './sync.service.js';

@Module({
  imports: [TypeOrmModule.forFeature([SyncStateEntity]), GithubModule, PullRequestsModule, MetricsModule],
  controllers: [SyncController],
  providers: [{ provide: SyncStateRepo, useClass: SyncStateTypeormRepo }, SyncEventsService, SyncService],
  exports: [SyncService, SyncEventsService],
})
export class SyncModule {}
