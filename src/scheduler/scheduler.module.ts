import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';

import { CatalogModule } from '../catalog/catalog.module.js';
import { MetricsModule } from '../metrics/metrics.module.js';
import { SyncModule } from '../sync/sync.module.js';
import { SchedulerService } from './scheduler.service.js';

@Module({
  imports: [ScheduleModule.forRoot(), SyncModule, MetricsModule, CatalogModule],
  providers: [SchedulerService],
  exports: [SchedulerService],
})
export class SchedulerModule {}
