import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { Cron, CronExpression, Timeout } from '@nestjs/schedule';

import { DomainCatalogService } from '../catalog/domain-catalog.service.js';
import { MetricsAggregatorService } from '../metrics/metrics-aggregator.service.js';
import { SettingsService } from '../settings/settings.service.js';
import { SyncService } from '../sync/sync.service.js';

export type ScheduledJob = 'incremental-sync' | 'window-sync' | 'metrics' | 'domain-refresh';

const STARTUP_DELAY_MS = 60_000;

@Injectable()
export class SchedulerService implements OnApplicationShutdown {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly running = new Set<ScheduledJob>();
  private stopping = false;

  constructor(
    private readonly syncService: SyncService,
    private readonly metrics: MetricsAggregatorService,
    private readonly domains: DomainCatalogService,
    private readonly settings: SettingsService,
  ) {}

  // First pass shortly after boot
  @Timeout('startup-sync', STARTUP_DELAY_MS)
  async handleStartupSync(): Promise<void> {
    await this.runJob('incremental-sync', () => this.syncService.runSync());
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleHourlySync(): Promise<void> {
    await this.runJob('incremental-sync', () => this.syncService.runSync());
  }

  // Run every day at 2 AM
  @Cron(CronExpression.EVERY_DAY_AT_2AM)
  async handleDailyWindowSync(): Promise<void> {
    await this.runJob('window-sync', () => this.syncService.runWindowSync());
  }

  @Cron('30 * * * *')
  async handleMetricsRecompute(): Promise<void> {
    await this.runJob('metrics', () => this.metrics.recomputeAll());
  }

  // Re-reads the environment first so the allow-list and intervals follow it
  @Cron('15 * * * *')
  async handleDomainRefresh(): Promise<void> {
    await this.runJob('domain-refresh', async () => {
      this.settings.reload();
      await this.domains.refreshFromSource();
    });
  }

  onApplicationShutdown(): void {
    this.stopping = true;
  }

  /** Runs a job unless scheduling is off, shutdown began, or the previous tick is still going. */
  async runJob(job: ScheduledJob, work: () => Promise<unknown>): Promise<boolean> {
    if (!this.settings.current.schedulerEnabled || this.stopping) {
      this.logger.debug(`${job} not started: scheduler ${this.stopping ? 'stopping' : 'disabled'}`);
      return false;
    }
    if (this.running.has(job)) {
      this.logger.warn(`⏭️ ${job} still running from the previous tick; skipping`);
      return false;
    }

    this.running.add(job);
    const started = Date.now();
    try {
      await work();
      this.logger.log(`⏰ ${job} finished in ${Date.now() - started}ms`);
    } catch (error: unknown) {
      const stack = error instanceof Error ? error.stack : String(error);
      this.logger.error(`${job} failed`, stack);
    } finally {
      this.running.delete(job);
    }
    return true;
  }
}
