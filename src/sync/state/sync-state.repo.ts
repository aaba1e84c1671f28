import type { CreatedEntities } from '../../pull-requests/record-synchronizer.service.js';
import type { SyncStateSnapshot, SyncType } from './sync-state.entity.js';

export interface SyncRunOutcome {
  type: SyncType;
  /** Becomes the checkpoint for full and incremental runs. */
  startedAt: Date;
  durationMs: number;
  prCount: number;
  created: CreatedEntities;
}

/** Held advisory lock; release exactly once. */
export interface SyncLock {
  release(): Promise<void>;
}

/** The lock mechanism itself failed (not merely held by another process). */
export class SyncLockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncLockError';
  }
}

export function emptySyncState(): SyncStateSnapshot {
  return {
    lastSyncTime: null,
    lastFullSyncTime: null,
    totalPrsSynced: 0,
    totalUsersCreated: 0,
    totalDomainsCreated: 0,
    totalInterfacesCreated: 0,
    lastSyncPrCount: 0,
    lastSyncDuration: 0,
    syncType: null,
    lastSyncStatus: 'success',
    lastError: null,
  };
}

/** Window and quick runs report totals but leave the checkpoint alone. */
export function applyOutcome(previous: SyncStateSnapshot | null, outcome: SyncRunOutcome): SyncStateSnapshot {
  const base = previous ?? emptySyncState();
  const advances = outcome.type === 'full' || outcome.type === 'incremental';
  return {
    lastSyncTime: advances ? outcome.startedAt : base.lastSyncTime,
    lastFullSyncTime: outcome.type === 'full' ? outcome.startedAt : base.lastFullSyncTime,
    totalPrsSynced: base.totalPrsSynced + outcome.prCount,
    totalUsersCreated: base.totalUsersCreated + outcome.created.users,
    totalDomainsCreated: base.totalDomainsCreated + outcome.created.domains,
    totalInterfacesCreated: base.totalInterfacesCreated + outcome.created.interfaces,
    lastSyncPrCount: outcome.prCount,
    lastSyncDuration: Math.round(outcome.durationMs / 1000),
    syncType: outcome.type,
    lastSyncStatus: 'success',
    lastError: null,
  };
}

/**
 * The sync checkpoint row and the cross-process advisory lock taken by the
 * long-running passes.
 */
export abstract class SyncStateRepo {
  abstract load(): Promise<SyncStateSnapshot | null>;

  abstract markRunning(type: SyncType): Promise<void>;

  abstract markCompleted(outcome: SyncRunOutcome): Promise<SyncStateSnapshot>;

  /** Records the error; the checkpoint stays where it was. */
  abstract markFailed(type: SyncType, error: string, durationMs: number): Promise<void>;

  /** `null` when another holder has the lock; throws `SyncLockError` when the mechanism fails. */
  abstract tryAcquireLock(): Promise<SyncLock | null>;
}
