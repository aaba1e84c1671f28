import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';

import type { SyncRunStatus } from './sync/state/sync-state.entity.js';
import { SyncService } from './sync/sync.service.js';

export interface HealthReport {
  status: 'ok';
  timestamp: string;
  syncing: boolean;
  lastSyncTime: string | null;
  lastSyncStatus: SyncRunStatus | null;
}

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly sync: SyncService) {}

  @Get('health')
  async getHealth(): Promise<HealthReport> {
    const { state } = await this.sync.describeNext();
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      syncing: this.sync.busy,
      lastSyncTime: state?.lastSyncTime?.toISOString() ?? null,
      lastSyncStatus: state?.lastSyncStatus ?? null,
    };
  }
}
