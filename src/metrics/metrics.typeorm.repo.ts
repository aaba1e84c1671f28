import { Inject, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { DomainEntity } from '../catalog/domain/domain.entity.js';
import { InterfaceEntity } from '../catalog/interface/interface.entity.js';
import { DeveloperMetricsEntity } from './developer/developer-metrics.entity.js';
import { MetricsRepo } from './metrics.repo.js';
import { ReviewerMetricsEntity } from './reviewer/reviewer-metrics.entity.js';
import type { DeveloperRollup, DomainRollup, InterfaceRollup, ReviewerRollup } from './rollup.types.js';

@Injectable()
export class MetricsTypeormRepo extends MetricsRepo {
  constructor(@Inject(DataSource) private readonly ds: DataSource) {
    super();
  }

  async saveDeveloperMetrics(userId: number, githubUsername: string, rollup: DeveloperRollup): Promise<void> {
    await this.ds
      .getRepository(DeveloperMetricsEntity)
      .upsert({ userId, githubUsername, ...rollup }, { conflictPaths: ['userId'] });
  }

  async saveReviewerMetrics(userId: number, githubUsername: string, rollup: ReviewerRollup): Promise<void> {
    await this.ds
      .getRepository(ReviewerMetricsEntity)
      .upsert({ userId, githubUsername, ...rollup }, { conflictPaths: ['userId'] });
  }

  async saveDomainRollup(domainId: number, rollup: DomainRollup): Promise<void> {
    await this.ds.getRepository(DomainEntity).update(domainId, {
      totalTasks: rollup.totalTasks,
      mergedTasks: rollup.mergedTasks,
      totalRework: rollup.totalRework,
      statusCounts: rollup.statusCounts,
      complexityCounts: rollup.complexityCounts,
      detailedMetrics: rollup.detailed,
    });
  }

  async saveInterfaceRollup(interfaceId: number, rollup: InterfaceRollup): Promise<void> {
    await this.ds.getRepository(InterfaceEntity).update(interfaceId, {
      totalTasks: rollup.totalTasks,
      mergedTasks: rollup.mergedTasks,
      totalRework: rollup.totalRework,
      statusCounts: rollup.statusCounts,
      complexityCounts: rollup.complexityCounts,
      detailedMetrics: rollup.detailed,
      weeklyStats: rollup.weekly,
      complexityBreakdown: rollup.complexityBreakdown,
    });
  }

  async listDeveloperUserIds(): Promise<number[]> {
    const rows = await this.ds.getRepository(DeveloperMetricsEntity).find({ select: { userId: true } });
    return rows.map((r) => r.userId);
  }

  async listReviewerUserIds(): Promise<number[]> {
    const rows = await this.ds.getRepository(ReviewerMetricsEntity).find({ select: { userId: true } });
    return rows.map((r) => r.userId);
  }
}
