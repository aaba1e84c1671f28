import { Inject, Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { SettingsService } from '../../settings/settings.service.js';
import { SyncStateEntity, SyncStateSnapshot, SyncType } from './sync-state.entity.js';
import { SyncLock, SyncLockError, SyncRunOutcome, SyncStateRepo, applyOutcome, emptySyncState } from './sync-state.repo.js';

function lockAcquired(rows: unknown): boolean {
  const first: unknown = Array.isArray(rows) ? rows[0] : undefined;
  return typeof first === 'object' && first !== null && 'locked' in first && first.locked === true;
}

@Injectable()
export class SyncStateTypeormRepo extends SyncStateRepo {
  private readonly logger = new Logger(SyncStateTypeormRepo.name);

  constructor(
    @Inject(DataSource) private readonly ds: DataSource,
    private readonly settings: SettingsService,
  ) {
    super();
  }

  private async row(): Promise<SyncStateEntity | null> {
    const [first] = await this.ds.getRepository(SyncStateEntity).find({ order: { id: 'ASC' }, take: 1 });
    return first ?? null;
  }

  private async write(patch: Partial<SyncStateSnapshot>): Promise<SyncStateEntity> {
    const repo = this.ds.getRepository(SyncStateEntity);
    const existing = await this.row();
    if (existing) return repo.save(Object.assign(existing, patch));
    return repo.save(repo.create({ ...emptySyncState(), ...patch }));
  }

  load(): Promise<SyncStateSnapshot | null> {
    return this.row();
  }

  async markRunning(type: SyncType): Promise<void> {
    await this.write({ syncType: type, lastSyncStatus: 'running' });
  }

  async markCompleted(outcome: SyncRunOutcome): Promise<SyncStateSnapshot> {
    return this.write(applyOutcome(await this.row(), outcome));
  }

  async markFailed(type: SyncType, error: string, durationMs: number): Promise<void> {
    await this.write({
      syncType: type,
      lastSyncStatus: 'failed',
      lastError: error,
      lastSyncDuration: Math.round(durationMs / 1000),
    });
  }

  // Session-level lock, so it stays on one dedicated connection until released.
  async tryAcquireLock(): Promise<SyncLock | null> {
    const lockId = this.settings.current.sync.lockId;
    const runner = this.ds.createQueryRunner();
    try {
      await runner.connect();
      const rows: unknown = await runner.query('SELECT pg_try_advisory_lock($1) AS locked', [lockId]);
      if (!lockAcquired(rows)) {
        await runner.release();
        return null;
      }
    } catch (error: unknown) {
      await runner.release();
      const message = error instanceof Error ? error.message : String(error);
      throw new SyncLockError(`Could not acquire sync lock ${lockId}: ${message}`);
    }

    this.logger.debug(`🔒 Sync lock ${lockId} acquired`);
    return {
      release: async () => {
        try {
          await runner.query('SELECT pg_advisory_unlock($1)', [lockId]);
          this.logger.debug(`🔓 Sync lock ${lockId} released`);
        } finally {
          await runner.release();
        }
      },
    };
  }
}
