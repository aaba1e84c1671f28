import { Injectable } from '@nestjs/common';

import { MetricsRepo } from './metrics.repo.js';
import type { DeveloperRollup, DomainRollup, InterfaceRollup, ReviewerRollup } from './rollup.types.js';

// In-process stand-in used by tests
@Injectable()
export class MetricsMemoryRepo extends MetricsRepo {
  readonly developers = new Map<number, DeveloperRollup & { githubUsername: string }>();
  readonly reviewers = new Map<number, ReviewerRollup & { githubUsername: string }>();
  readonly domains = new Map<number, DomainRollup>();
  readonly interfaces = new Map<number, InterfaceRollup>();

  async saveDeveloperMetrics(userId: number, githubUsername: string, rollup: DeveloperRollup): Promise<void> {
    this.developers.set(userId, { githubUsername, ...rollup });
  }

  async saveReviewerMetrics(userId: number, githubUsername: string, rollup: ReviewerRollup): Promise<void> {
    this.reviewers.set(userId, { githubUsername, ...rollup });
  }

  async saveDomainRollup(domainId: number, rollup: DomainRollup): Promise<void> {
    this.domains.set(domainId, rollup);
  }

  async saveInterfaceRollup(interfaceId: number, rollup: InterfaceRollup): Promise<void> {
    this.interfaces.set(interfaceId, rollup);
  }

  async listDeveloperUserIds(): Promise<number[]> {
    return [...this.developers.keys()];
  }

  async listReviewerUserIds(): Promise<number[]> {
    return [...this.reviewers.keys()];
  }
}
