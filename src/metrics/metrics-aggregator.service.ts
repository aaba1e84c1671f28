import { Injectable, Logger } from '@nestjs/common';

import { CatalogRepo } from '../catalog/catalog.repo.js';
import { PullRequestRepo } from '../pull-requests/pull-request.repo.js';
import { MetricsRepo } from './metrics.repo.js';
import {
  buildDeveloperRollups,
  buildDomainRollups,
  buildInterfaceRollups,
  buildReviewerRollups,
} from './rollups.js';

export const METRICS_SCOPES = ['developer', 'reviewer', 'domain', 'interface'] as const;
export type MetricsScope = (typeof METRICS_SCOPES)[number];

export interface RecomputeReport {
  scope: MetricsScope;
  written: number;
  failed: number;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

@Injectable()
export class MetricsAggregatorService {
  private readonly logger = new Logger(MetricsAggregatorService.name);
  private running: Promise<RecomputeReport[]> | null = null;
  private queued: Promise<RecomputeReport[]> | null = null;

  constructor(
    private readonly pullRequests: PullRequestRepo,
    private readonly catalog: CatalogRepo,
    private readonly metrics: MetricsRepo,
  ) {}

  /**
   * Rebuild every scope from the persisted rows. A call that arrives while a
   * run is in progress gets a follow-up run started after it, so rows written
   * before the call are always included. Calls made while that follow-up is
   * still queued share it.
   */
  recomputeAll(): Promise<RecomputeReport[]> {
    if (!this.running) return this.start();
    if (!this.queued) {
      // the current run's outcome belongs to its own callers
      this.queued = this.running
        .catch(() => undefined)
        .then(() => {
          this.queued = null;
          return this.start();
        });
    }
    return this.queued;
  }

  private start(): Promise<RecomputeReport[]> {
    const run = this.runAll().finally(() => {
      if (this.running === run) this.running = null;
    });
    this.running = run;
    return run;
  }

  private async runAll(): Promise<RecomputeReport[]> {
    const started = Date.now();
    const reports: RecomputeReport[] = [];
    for (const scope of METRICS_SCOPES) reports.push(await this.recompute(scope));
    const written = reports.reduce((n, r) => n + r.written, 0);
    const failed = reports.reduce((n, r) => n + r.failed, 0);
    this.logger.log(`📊 Metrics recomputed: ${written} rollups written, ${failed} failed (${Date.now() - started}ms)`);
    return reports;
  }

  async recompute(scope: MetricsScope): Promise<RecomputeReport> {
    const [prs, reviews] = await Promise.all([this.pullRequests.listPullRequests(), this.pullRequests.listReviews()]);
    const report: RecomputeReport = { scope, written: 0, failed: 0 };

    const write = async (key: string, save: () => Promise<void>): Promise<void> => {
      try {
        await save();
        report.written++;
      } catch (error: unknown) {
        report.failed++;
        this.logger.error(`❌ Failed to write ${scope} rollup for ${key}: ${errorMessage(error)}`);
      }
    };

    switch (scope) {
      case 'developer': {
        const logins = await this.userLogins();
        const stored = await this.metrics.listDeveloperUserIds();
        for (const [userId, rollup] of buildDeveloperRollups(prs, stored)) {
          const login = logins.get(userId);
          if (!login) {
            report.failed++;
            this.logger.warn(`⚠️ Developer ${userId} has no user row; rollup skipped`);
            continue;
          }
          await write(login, () => this.metrics.saveDeveloperMetrics(userId, login, rollup));
        }
        break;
      }
      case 'reviewer': {
        const logins = await this.userLogins();
        const stored = await this.metrics.listReviewerUserIds();
        for (const [userId, rollup] of buildReviewerRollups(reviews, prs, stored)) {
          const login = logins.get(userId);
          if (!login) {
            report.failed++;
            this.logger.warn(`⚠️ Reviewer ${userId} has no user row; rollup skipped`);
            continue;
          }
          await write(login, () => this.metrics.saveReviewerMetrics(userId, login, rollup));
        }
        break;
      }
      case 'domain': {
        const domains = await this.catalog.listDomains();
        for (const [domainId, rollup] of buildDomainRollups(prs, reviews, domains.map((d) => d.id))) {
          await write(`domain ${domainId}`, () => this.metrics.saveDomainRollup(domainId, rollup));
        }
        break;
      }
      case 'interface': {
        const interfaces = await this.catalog.listInterfaces();
        for (const [interfaceId, rollup] of buildInterfaceRollups(prs, reviews, interfaces.map((i) => i.id))) {
          await write(`interface ${interfaceId}`, () => this.metrics.saveInterfaceRollup(interfaceId, rollup));
        }
        break;
      }
    }

    this.logger.debug(`${scope}: ${report.written} written, ${report.failed} failed`);
    return report;
  }

  private async userLogins(): Promise<Map<number, string>> {
    const users = await this.catalog.listUsers();
    return new Map(users.map((u) => [u.id, u.githubUsername]));
  }
}
