import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { CatalogModule } from '../catalog/catalog.module.js';
import { PullRequestsModule } from '../pull-requests/pull-requests.module.js';
import { DeveloperMetricsEntity } from './developer/developer-metrics.entity.js';
import { MetricsAggregatorService } from './metrics-aggregator.service.js';
import { MetricsRepo } from './metrics.repo.js';
import { MetricsTypeormRepo } from './metrics.typeorm.repo.js';
import { ReviewerMetricsEntity } from './reviewer/reviewer-metrics.entity.js';

@Module({
  imports: [
    TypeOrmModule.forFeature([DeveloperMetricsEntity, ReviewerMetricsEntity]),
    CatalogModule,
    PullRequestsModule,
  ],
  providers: [{ provide: MetricsRepo, useClass: MetricsTypeormRepo }, MetricsAggregatorService],
  exports: [MetricsAggregatorService],
})
export class MetricsModule {}
