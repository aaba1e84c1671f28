import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';

import { ExternalPullRequest, GithubClient, GithubClientError } from '../github/github-client.interface.js';
import { GITHUB_CLIENT } from '../github/github-client.token.js';
import { MetricsAggregatorService } from '../metrics/metrics-aggregator.service.js';
import {
  CreatedEntities,
  RecordSyncResult,
  RecordSynchronizerService,
} from '../pull-requests/record-synchronizer.service.js';
import { SettingsService } from '../settings/settings.service.js';
import { decide, describe, SyncDecision } from './sync-planner.js';
import { SyncEventsService } from './sync-events.service.js';
import type { SyncStateSnapshot, SyncType } from './state/sync-state.entity.js';
import { SyncLock, SyncStateRepo } from './state/sync-state.repo.js';

export interface SyncRunOptions {
  forceFull?: boolean;
  lookbackDays?: number;
  signal?: AbortSignal;
}

export interface SyncRunSummary {
  type: SyncType;
  status: 'completed' | 'locked' | 'aborted';
  description: string;
  inspected: number;
  synced: number;
  skipped: number;
  failed: number;
  /** The record cap ended candidate selection early. */
  capped: boolean;
  durationMs: number;
}

export type TriggerRequest =
  | { kind: 'incremental' | 'full'; lookbackDays?: number }
  | { kind: 'window'; days?: number }
  | { kind: 'quick'; pullNumber: number };

export interface TriggerAck {
  status: 'accepted';
  kind: TriggerRequest['kind'];
  description: string;
}

export interface NextSyncInfo {
  state: SyncStateSnapshot | null;
  mode: SyncDecision['mode'];
  description: string;
}

type NestedPolicy = 'when-incomplete' | 'always';

interface PassPlan {
  type: SyncType;
  description: string;
  since: Date;
  cap: number | null;
  nested: NestedPolicy;
  needsLock: boolean;
  signal?: AbortSignal;
}

interface Tally {
  synced: number;
  skipped: number;
  failed: number;
  created: CreatedEntities;
  aborted: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** A 404 or rate limit on one PR skips it; anything else fails it. */
function isTransient(error: unknown): boolean {
  return error instanceof GithubClientError && (error.code === 'NOT_FOUND' || error.code === 'RATE_LIMIT');
}

@Injectable()
export class SyncService implements OnApplicationShutdown {
  private readonly logger = new Logger(SyncService.name);
  private readonly shutdown = new AbortController();
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(
    @Inject(GITHUB_CLIENT) private readonly github: GithubClient,
    private readonly synchronizer: RecordSynchronizerService,
    private readonly metrics: MetricsAggregatorService,
    private readonly state: SyncStateRepo,
    private readonly events: SyncEventsService,
    private readonly settings: SettingsService,
  ) {}

  // ---------- triggers ----------

  /** Acknowledges at once; the outcome is reported on the event stream. */
  async trigger(request: TriggerRequest): Promise<TriggerAck> {
    const { description, run } = await this.prepare(request);
    this.track(
      run().catch((error: unknown) => {
        this.logger.error(`❌ Background ${request.kind} sync failed: ${errorMessage(error)}`);
      }),
    );
    return { status: 'accepted', kind: request.kind, description };
  }

  private async prepare(request: TriggerRequest): Promise<{ description: string; run: () => Promise<unknown> }> {
    switch (request.kind) {
      case 'incremental':
      case 'full': {
        const forceFull = request.kind === 'full';
        const { lookbackDays } = request;
        const next = await this.describeNext({ forceFull, lookbackDays });
        return { description: next.description, run: () => this.runSync({ forceFull, lookbackDays }) };
      }
      case 'window': {
        const days = request.days ?? this.settings.current.sync.windowDays;
        return { description: `Window sync - fetching last ${days} days`, run: () => this.runWindowSync(days) };
      }
      case 'quick': {
        const { pullNumber } = request;
        return { description: `Quick update - PR #${pullNumber}`, run: () => this.quickUpdate(pullNumber) };
      }
    }
  }

  async describeNext(options: Pick<SyncRunOptions, 'forceFull' | 'lookbackDays'> = {}): Promise<NextSyncInfo> {
    const state = await this.state.load();
    const now = new Date();
    const decision = this.plan(state, options, now);
    return { state, mode: decision.mode, description: describe(decision, now) };
  }

  // ---------- runs ----------

  /** Full or incremental pass, as the planner decides. */
  async runSync(options: SyncRunOptions = {}): Promise<SyncRunSummary> {
    const startedAt = new Date();
    return this.execute(options.forceFull ? 'full' : 'incremental', startedAt, async () => {
      const decision = this.plan(await this.state.load(), options, startedAt);
      return {
        type: decision.mode,
        description: describe(decision, startedAt),
        since: decision.effectiveSince,
        cap: this.settings.current.sync.maxRecordsPerPass,
        nested: 'when-incomplete',
        needsLock: decision.mode === 'full',
        signal: options.signal,
      };
    });
  }

  /** Complete re-sync of recently updated PRs, nested data included. */
  async runWindowSync(days: number = this.settings.current.sync.windowDays, signal?: AbortSignal): Promise<SyncRunSummary> {
    const startedAt = new Date();
    return this.execute('window', startedAt, async () => ({
      type: 'window',
      description: `Window sync - fetching last ${days} days`,
      since: new Date(startedAt.getTime() - days * DAY_MS),
      cap: null,
      nested: 'always',
      needsLock: true,
      signal,
    }));
  }

  /** Fetches one PR and syncs it with nested data, then refreshes rollups. */
  async quickUpdate(pullNumber: number): Promise<RecordSyncResult> {
    const startedAt = new Date();
    const elapsed = () => Date.now() - startedAt.getTime();
    try {
      await this.state.markRunning('quick');
      const record = await this.github.getPullRequest({ pullNumber });
      const result = await this.synchronizer.sync(record, false);
      const synced = result.status === 'synced' ? 1 : 0;
      if (result.status === 'synced') await this.metrics.recomputeAll();
      await this.state.markCompleted({
        type: 'quick',
        startedAt,
        durationMs: elapsed(),
        prCount: synced,
        created: result.status === 'synced' ? result.created : { users: 0, domains: 0, interfaces: 0 },
      });
      this.logger.log(`⚡ Quick update of PR #${pullNumber}: ${result.status}`);
      this.events.complete('quick', synced);
      return result;
    } catch (error: unknown) {
      const message = errorMessage(error);
      await this.recordFailure('quick', message, elapsed());
      this.events.error('quick', message);
      throw error;
    }
  }

  // ---------- lifecycle ----------

  /** Resolves once every run started so far has settled. */
  async waitForIdle(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  get busy(): boolean {
    return this.inFlight.size > 0;
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`🛑 Shutting down (${signal ?? 'no signal'}); waiting for ${this.inFlight.size} run(s)`);
    this.shutdown.abort();
    await this.waitForIdle();
  }

  // ---------- internals ----------

  private plan(
    state: SyncStateSnapshot | null,
    options: Pick<SyncRunOptions, 'forceFull' | 'lookbackDays'>,
    now: Date,
  ): SyncDecision {
    const { lookbackDays, stalenessDays } = this.settings.current.sync;
    return decide(state?.lastSyncTime ?? null, options.lookbackDays ?? lookbackDays, options.forceFull ?? false, {
      now,
      stalenessDays,
    });
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.inFlight.add(promise);
    const done = () => {
      this.inFlight.delete(promise);
    };
    void promise.then(done, done);
    return promise;
  }

  private execute(type: SyncType, startedAt: Date, preparePlan: () => Promise<PassPlan>): Promise<SyncRunSummary> {
    return this.track(this.runPass(type, startedAt, preparePlan));
  }

  /**
   * One guarded pass. `type` is what gets reported when planning itself fails;
   * once the plan exists its own type is used.
   */
  private async runPass(
    type: SyncType,
    startedAt: Date,
    preparePlan: () => Promise<PassPlan>,
  ): Promise<SyncRunSummary> {
    const elapsed = () => Date.now() - startedAt.getTime();
    let reportedType = type;
    let lock: SyncLock | null = null;

    try {
      const plan = await preparePlan();
      reportedType = plan.type;
      const aborted = () => this.shutdown.signal.aborted || (plan.signal?.aborted ?? false);
      const summary = (
        status: SyncRunSummary['status'],
        inspected: number,
        tally: Pick<Tally, 'synced' | 'skipped' | 'failed'>,
        capped: boolean,
      ): SyncRunSummary => ({
        type: plan.type,
        status,
        description: plan.description,
        inspected,
        synced: tally.synced,
        skipped: tally.skipped,
        failed: tally.failed,
        capped,
        durationMs: elapsed(),
      });

      if (plan.needsLock) {
        lock = await this.state.tryAcquireLock();
        if (!lock) {
          this.logger.warn(`⏭️ ${plan.type} sync skipped: another sync holds the lock`);
          this.events.skipped(plan.type, 'another sync holds the lock');
          return summary('locked', 0, { synced: 0, skipped: 0, failed: 0 }, false);
        }
      }

      this.logger.log(`🔄 ${plan.description}`);
      await this.state.markRunning(plan.type);

      const { records, capped } = await this.selectCandidates(plan.since, plan.cap);
      if (capped) this.logger.warn(`⚠️ Record cap of ${plan.cap} reached; remaining history left for the next pass`);

      const tally = await this.processRecords(records, plan.nested, aborted);
      if (tally.aborted) {
        await this.state.markFailed(plan.type, 'sync aborted before completion', elapsed());
        this.events.error(plan.type, 'sync aborted before completion');
        return summary('aborted', records.length, tally, capped);
      }

      await this.metrics.recomputeAll();
      await this.state.markCompleted({
        type: plan.type,
        startedAt,
        durationMs: elapsed(),
        prCount: tally.synced,
        created: tally.created,
      });

      this.logger.log(
        `✅ ${plan.type} sync done: ${tally.synced} synced, ${tally.skipped} skipped, ${tally.failed} failed of ${records.length} (${elapsed()}ms)`,
      );
      this.events.complete(plan.type, tally.synced);
      return summary('completed', records.length, tally, capped);
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.logger.error(`❌ ${reportedType} sync failed: ${message}`);
      await this.recordFailure(reportedType, message, elapsed());
      this.events.error(reportedType, message);
      throw error;
    } finally {
      if (lock) await this.releaseLock(lock);
    }
  }

  /** PRs updated since the bound, newest first; stops at the bound or the cap. */
  private async selectCandidates(
    since: Date,
    cap: number | null,
  ): Promise<{ records: ExternalPullRequest[]; capped: boolean }> {
    const records: ExternalPullRequest[] = [];
    for await (const record of this.github.iteratePullRequests({ state: 'all', sort: 'updated', direction: 'desc' })) {
      if (new Date(record.updatedAt).getTime() < since.getTime()) break;
      if (cap !== null && records.length >= cap) return { records, capped: true };
      records.push(record);
    }
    return { records, capped: false };
  }

  private async processRecords(
    records: ExternalPullRequest[],
    nested: NestedPolicy,
    aborted: () => boolean,
  ): Promise<Tally> {
    const tally: Tally = {
      synced: 0,
      skipped: 0,
      failed: 0,
      created: { users: 0, domains: 0, interfaces: 0 },
      aborted: false,
    };
    const size = this.settings.current.sync.concurrency;
    const totalBatches = Math.ceil(records.length / size);

    for (let i = 0; i < records.length; i += size) {
      if (aborted()) {
        tally.aborted = true;
        this.logger.warn(`🛑 Sync cancelled after ${i} of ${records.length} records`);
        break;
      }

      const batch = records.slice(i, i + size);
      const results = await Promise.allSettled(batch.map((record) => this.syncOne(record, nested)));

      results.forEach((result, j) => {
        const pr = batch[j];
        if (result.status === 'fulfilled') {
          if (result.value.status === 'synced') {
            tally.synced++;
            tally.created.users += result.value.created.users;
            tally.created.domains += result.value.created.domains;
            tally.created.interfaces += result.value.created.interfaces;
          } else {
            tally.skipped++;
          }
        } else if (isTransient(result.reason)) {
          tally.skipped++;
          this.logger.warn(`PR #${pr.number} skipped: ${errorMessage(result.reason)}`);
        } else {
          tally.failed++;
          this.logger.error(`PR #${pr.number} failed: ${errorMessage(result.reason)}`);
        }
      });

      this.logger.debug(`Batch ${Math.floor(i / size) + 1}/${totalBatches} complete`);
    }
    return tally;
  }

  private async syncOne(record: ExternalPullRequest, nested: NestedPolicy): Promise<RecordSyncResult> {
    const skipNested = nested === 'when-incomplete' && (await this.synchronizer.canSkipNested(record));
    return this.synchronizer.sync(record, skipNested);
  }

  private async recordFailure(type: SyncType, message: string, durationMs: number): Promise<void> {
    try {
      await this.state.markFailed(type, message, durationMs);
    } catch (error: unknown) {
      this.logger.error(`Could not record sync failure: ${errorMessage(error)}`);
    }
  }

  private async releaseLock(lock: SyncLock): Promise<void> {
    try {
      await lock.release();
    } catch (error: unknown) {
      this.logger.warn(`Error releasing sync lock: ${errorMessage(error)}`);
    }
  }
}
