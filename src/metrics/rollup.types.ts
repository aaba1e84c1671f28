import type { Complexity } from '../parsing/title-parser.js';

export type ComplexityCounts = Record<Complexity, number>;

export interface RecentPullRequest {
  number: number;
  title: string;
  state: 'open' | 'closed' | 'merged';
  domain: string | null;
  createdAt: string;
}

export interface RecentReview {
  pullRequestNumber: number;
  state: string;
  domain: string | null;
  submittedAt: string | null;
}

export interface DeveloperRollup {
  totalPrs: number;
  openPrs: number;
  mergedPrs: number;
  closedPrs: number; // closed without merge
  totalRework: number;
  totalCheckFailures: number;
  recentPrs: RecentPullRequest[];
  domainCounts: Record<string, number>;
  complexityCounts: ComplexityCounts;
}

export interface ReviewerRollup {
  totalReviews: number;
  approved: number;
  changesRequested: number;
  commented: number;
  dismissed: number;
  recentReviews: RecentReview[];
  domainCounts: Record<string, number>;
}

export interface DeveloperBreakdown {
  total: number;
  merged: number;
  rework: number;
}

export interface ReviewerBreakdown {
  total: number;
  approved: number;
  changesRequested: number;
}

export interface ParticipantBreakdown {
  developers: Record<string, DeveloperBreakdown>;
  reviewers: Record<string, ReviewerBreakdown>;
}

export interface DomainRollup {
  totalTasks: number;
  mergedTasks: number;
  totalRework: number;
  statusCounts: Record<string, number>;
  complexityCounts: ComplexityCounts;
  detailed: ParticipantBreakdown;
}

export interface WeeklyBucket {
  week: string; // ISO week, e.g. 2024-W14
  total: number;
  merged: number;
}

/** Percentages (one decimal) of each complexity within the subset. */
export interface ComplexityBreakdown {
  merged: ComplexityCounts;
  nonMerged: ComplexityCounts;
}

export interface InterfaceRollup extends DomainRollup {
  weekly: WeeklyBucket[];
  complexityBreakdown: ComplexityBreakdown;
}
