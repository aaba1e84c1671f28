// src/app.module.ts
import 'dotenv/config';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { AppController } from './app.controller.js';
import { CatalogModule } from './catalog/catalog.module.js';
import { MetricsModule } from './metrics/metrics.module.js';
import { PullRequestsModule } from './pull-requests/pull-requests.module.js';
import { SchedulerModule } from './scheduler/scheduler.module.js';
import { SettingsModule } from './settings/settings.module.js';
import { SettingsService } from './settings/settings.service.js';
import { SyncModule } from './sync/sync.module.js';

@Module({
  imports: [
    SettingsModule,
    TypeOrmModule.forRootAsync({
      inject: [SettingsService],
      useFactory: (settings: SettingsService) => {
        const { url, ssl } = settings.current.database;
        return {
          type: 'postgres' as const,
          url,
          ssl: ssl ? { rejectUnauthorized: false } : false,
          autoLoadEntities: true,
          synchronize: false,
        };
      },
    }),
    CatalogModule,
    PullRequestsModule,
    MetricsModule,
    SyncModule,
    SchedulerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
