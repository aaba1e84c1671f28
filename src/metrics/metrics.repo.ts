import type { DeveloperRollup, DomainRollup, InterfaceRollup, ReviewerRollup } from './rollup.types.js';

/**
 * Rollup persistence. Each call replaces the stored rollup for one natural key
 * and commits on its own.
 */
export abstract class MetricsRepo {
  abstract saveDeveloperMetrics(userId: number, githubUsername: string, rollup: DeveloperRollup): Promise<void>;

  abstract saveReviewerMetrics(userId: number, githubUsername: string, rollup: ReviewerRollup): Promise<void>;

  abstract saveDomainRollup(domainId: number, rollup: DomainRollup): Promise<void>;

  abstract saveInterfaceRollup(interfaceId: number, rollup: InterfaceRollup): Promise<void>;

  /** Users that already have a stored developer rollup. */
  abstract listDeveloperUserIds(): Promise<number[]>;

  abstract listReviewerUserIds(): Promise<number[]>;
}
