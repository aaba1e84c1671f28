import { Injectable } from '@nestjs/common';

import type { SyncStateSnapshot, SyncType } from './sync-state.entity.js';
import { SyncLock, SyncRunOutcome, SyncStateRepo, applyOutcome, emptySyncState } from './sync-state.repo.js';

// In-process stand-in used by tests; `lockHeld` simulates another holder.
@Injectable()
export class SyncStateMemoryRepo extends SyncStateRepo {
  state: SyncStateSnapshot | null = null;
  lockHeld = false;

  async load(): Promise<SyncStateSnapshot | null> {
    return this.state ? { ...this.state } : null;
  }

  async markRunning(type: SyncType): Promise<void> {
    this.state = { ...(this.state ?? emptySyncState()), syncType: type, lastSyncStatus: 'running' };
  }

  async markCompleted(outcome: SyncRunOutcome): Promise<SyncStateSnapshot> {
    this.state = applyOutcome(this.state, outcome);
    return { ...this.state };
  }

  async markFailed(type: SyncType, error: string, durationMs: number): Promise<void> {
    this.state = {
      ...(this.state ?? emptySyncState()),
      syncType: type,
      lastSyncStatus: 'failed',
      lastError: error,
      lastSyncDuration: Math.round(durationMs / 1000),
    };
  }

  async tryAcquireLock(): Promise<SyncLock | null> {
    if (this.lockHeld) return null;
    this.lockHeld = true;
    return {
      release: async () => {
        this.lockHeld = false;
      },
    };
  }
}
