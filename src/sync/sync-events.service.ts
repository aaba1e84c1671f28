import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';

import type { SyncType } from './state/sync-state.entity.js';

export interface SyncCompletePayload {
  synced_count: number;
  sync_type: SyncType;
  timestamp: string;
}

export interface SyncErrorPayload {
  error: string;
  sync_type: SyncType;
  timestamp: string;
}

/** The pass never started, for example because another process holds the lock. */
export interface SyncSkippedPayload {
  reason: string;
  sync_type: SyncType;
  timestamp: string;
}

export type SyncEvent =
  | { type: 'sync_complete'; data: SyncCompletePayload }
  | { type: 'sync_error'; data: SyncErrorPayload }
  | { type: 'sync_skipped'; data: SyncSkippedPayload };

/**
 * In-process notification bus. Delivery is fire-and-forget: subscribers that
 * join late miss earlier events.
 */
@Injectable()
export class SyncEventsService implements OnModuleDestroy {
  private readonly subject = new Subject<SyncEvent>();

  readonly events$: Observable<SyncEvent> = this.subject.asObservable();

  complete(syncType: SyncType, syncedCount: number): void {
    this.subject.next({
      type: 'sync_complete',
      data: { synced_count: syncedCount, sync_type: syncType, timestamp: new Date().toISOString() },
    });
  }

  error(syncType: SyncType, error: string): void {
    this.subject.next({
      type: 'sync_error',
      data: { error, sync_type: syncType, timestamp: new Date().toISOString() },
    });
  }

  skipped(syncType: SyncType, reason: string): void {
    this.subject.next({
      type: 'sync_skipped',
      data: { reason, sync_type: syncType, timestamp: new Date().toISOString() },
    });
  }

  onModuleDestroy(): void {
    this.subject.complete();
  }
}
