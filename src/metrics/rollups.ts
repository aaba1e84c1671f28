import type { Complexity } from '../parsing/title-parser.js';
import type { PullRequestEntity } from '../pull-requests/pull-request.entity.js';
import type { ReviewEntity } from '../pull-requests/review.entity.js';
import type {
  ComplexityBreakdown,
  ComplexityCounts,
  DeveloperBreakdown,
  DeveloperRollup,
  DomainRollup,
  InterfaceRollup,
  ParticipantBreakdown,
  RecentPullRequest,
  RecentReview,
  ReviewerBreakdown,
  ReviewerRollup,
  WeeklyBucket,
} from './rollup.types.js';

export type PullRequestRow = Pick<
  PullRequestEntity,
  | 'id'
  | 'number'
  | 'title'
  | 'state'
  | 'merged'
  | 'labels'
  | 'createdAt'
  | 'trainerId'
  | 'trainerName'
  | 'domainId'
  | 'domain'
  | 'interfaceId'
  | 'complexity'
  | 'reworkCount'
  | 'checkFailures'
>;

export type ReviewRow = Pick<
  ReviewEntity,
  'id' | 'pullRequestId' | 'reviewerId' | 'reviewerLogin' | 'state' | 'submittedAt'
>;

/** Status labels in priority order; the first one present on a PR wins. */
export const STATUS_LABEL_PRIORITY = [
  'discarded',
  'ready to merge',
  'expert approved',
  'pod lead approved',
  'good task',
  'calibrator review pending',
  'expert review pending',
  'pending review',
  'needs changes',
  'resubmitted',
] as const;

export type StatusBucket = (typeof STATUS_LABEL_PRIORITY)[number];

const COMPLEXITIES: readonly Complexity[] = ['expert', 'hard', 'medium', 'unknown'];
const RECENT_LIMIT = 5;

// ---------- helpers ----------

const round1 = (value: number): number => Math.round(value * 10) / 10;

function emptyComplexityCounts(): ComplexityCounts {
  return { expert: 0, hard: 0, medium: 0, unknown: 0 };
}

function countComplexities(prs: readonly PullRequestRow[]): ComplexityCounts {
  const counts = emptyComplexityCounts();
  for (const pr of prs) counts[pr.complexity]++;
  return counts;
}

/** Plain object with keys in sorted order so serialized output is stable. */
function sortedRecord<T>(entries: Map<string, T>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const key of [...entries.keys()].sort()) {
    const value = entries.get(key);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function countBy<T>(items: readonly T[], key: (item: T) => string | null): Record<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    if (k !== null) counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return sortedRecord(counts);
}

function groupBy<T>(items: readonly T[], key: (item: T) => number | null): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const item of items) {
    const k = key(item);
    if (k === null) continue;
    const bucket = groups.get(k);
    if (bucket) bucket.push(item);
    else groups.set(k, [item]);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => a - b));
}

/** Adds an empty group for every known key without rows, so stale keys are rewritten as empty. */
function withKnownKeys<T>(groups: Map<number, T[]>, known: Iterable<number>): Map<number, T[]> {
  const all = new Map(groups);
  for (const key of known) if (!all.has(key)) all.set(key, []);
  return new Map([...all.entries()].sort(([a], [b]) => a - b));
}

const sum = (values: number[]): number => values.reduce((acc, v) => acc + v, 0);

/** ISO-8601 week containing the date, in UTC: `2024-W14`. */
export function isoWeekKey(date: Date): string {
  const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const day = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - day); // Thursday decides the year
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / 86_400_000 + 1) / 7);
  return `${d.getUTCFullYear()}-W${String(week).padStart(2, '0')}`;
}

/** Merged PRs never land in a label bucket. */
export function statusBucket(pr: Pick<PullRequestRow, 'merged' | 'labels'>): StatusBucket | null {
  if (pr.merged) return null;
  const labels = new Set(pr.labels.map((l) => l.trim().toLowerCase()));
  return STATUS_LABEL_PRIORITY.find((label) => labels.has(label)) ?? null;
}

function statusCounts(prs: readonly PullRequestRow[]): Record<string, number> {
  const counts = new Map<string, number>(STATUS_LABEL_PRIORITY.map((l) => [l, 0]));
  for (const pr of prs) {
    const bucket = statusBucket(pr);
    if (bucket) counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }
  return sortedRecord(counts);
}

function displayState(pr: PullRequestRow): RecentPullRequest['state'] {
  if (pr.merged) return 'merged';
  return pr.state;
}

function recentPullRequests(prs: readonly PullRequestRow[]): RecentPullRequest[] {
  return [...prs]
    .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.number - a.number)
    .slice(0, RECENT_LIMIT)
    .map((pr) => ({
      number: pr.number,
      title: pr.title,
      state: displayState(pr),
      domain: pr.domain,
      createdAt: pr.createdAt.toISOString(),
    }));
}

function recentReviews(reviews: readonly ReviewRow[], prsById: Map<number, PullRequestRow>): RecentReview[] {
  return [...reviews]
    .sort(
      (a, b) =>
        (b.submittedAt?.getTime() ?? -Infinity) - (a.submittedAt?.getTime() ?? -Infinity) || b.id - a.id,
    )
    .slice(0, RECENT_LIMIT)
    .map((r) => {
      const pr = prsById.get(r.pullRequestId);
      return {
        pullRequestNumber: pr ? pr.number : 0,
        state: r.state,
        domain: pr ? pr.domain : null,
        submittedAt: r.submittedAt ? r.submittedAt.toISOString() : null,
      };
    });
}

const indexById = (prs: readonly PullRequestRow[]): Map<number, PullRequestRow> =>
  new Map(prs.map((p) => [p.id, p]));

// ---------- developer ----------

export function buildDeveloperRollup(prs: readonly PullRequestRow[]): DeveloperRollup {
  return {
    totalPrs: prs.length,
    openPrs: prs.filter((p) => p.state === 'open').length,
    mergedPrs: prs.filter((p) => p.merged).length,
    closedPrs: prs.filter((p) => p.state === 'closed' && !p.merged).length,
    totalRework: sum(prs.map((p) => p.reworkCount)),
    totalCheckFailures: sum(prs.map((p) => p.checkFailures)),
    recentPrs: recentPullRequests(prs),
    domainCounts: countBy(prs, (p) => p.domain),
    complexityCounts: countComplexities(prs),
  };
}

/** Keyed by trainer user id; `known` ids without PRs get an empty rollup. */
export function buildDeveloperRollups(
  prs: readonly PullRequestRow[],
  known: Iterable<number> = [],
): Map<number, DeveloperRollup> {
  const out = new Map<number, DeveloperRollup>();
  for (const [trainerId, rows] of withKnownKeys(groupBy(prs, (p) => p.trainerId), known)) {
    out.set(trainerId, buildDeveloperRollup(rows));
  }
  return out;
}

// ---------- reviewer ----------

export function buildReviewerRollup(
  reviews: readonly ReviewRow[],
  prsById: Map<number, PullRequestRow>,
): ReviewerRollup {
  const byState = (state: ReviewRow['state']) => reviews.filter((r) => r.state === state).length;
  return {
    totalReviews: reviews.length,
    approved: byState('approved'),
    changesRequested: byState('changes_requested'),
    commented: byState('commented'),
    dismissed: byState('dismissed'),
    recentReviews: recentReviews(reviews, prsById),
    domainCounts: countBy(reviews, (r) => prsById.get(r.pullRequestId)?.domain ?? null),
  };
}

/** Keyed by reviewer user id; reviews without a known reviewer are left out. */
export function buildReviewerRollups(
  reviews: readonly ReviewRow[],
  prs: readonly PullRequestRow[],
  known: Iterable<number> = [],
): Map<number, ReviewerRollup> {
  const prsById = indexById(prs);
  const out = new Map<number, ReviewerRollup>();
  for (const [reviewerId, rows] of withKnownKeys(groupBy(reviews, (r) => r.reviewerId), known)) {
    out.set(reviewerId, buildReviewerRollup(rows, prsById));
  }
  return out;
}

// ---------- domain ----------

function participantBreakdown(prs: readonly PullRequestRow[], reviews: readonly ReviewRow[]): ParticipantBreakdown {
  const developers = new Map<string, DeveloperBreakdown>();
  for (const pr of prs) {
    const entry = developers.get(pr.trainerName) ?? { total: 0, merged: 0, rework: 0 };
    entry.total++;
    if (pr.merged) entry.merged++;
    entry.rework += pr.reworkCount;
    developers.set(pr.trainerName, entry);
  }

  const prIds = new Set(prs.map((p) => p.id));
  const reviewers = new Map<string, ReviewerBreakdown>();
  for (const review of reviews) {
    if (!review.reviewerLogin || !prIds.has(review.pullRequestId)) continue;
    const entry = reviewers.get(review.reviewerLogin) ?? { total: 0, approved: 0, changesRequested: 0 };
    entry.total++;
    if (review.state === 'approved') entry.approved++;
    if (review.state === 'changes_requested') entry.changesRequested++;
    reviewers.set(review.reviewerLogin, entry);
  }

  return { developers: sortedRecord(developers), reviewers: sortedRecord(reviewers) };
}

export function buildDomainRollup(prs: readonly PullRequestRow[], reviews: readonly ReviewRow[]): DomainRollup {
  return {
    totalTasks: prs.length,
    mergedTasks: prs.filter((p) => p.merged).length,
    totalRework: sum(prs.map((p) => p.reworkCount)),
    statusCounts: statusCounts(prs),
    complexityCounts: countComplexities(prs),
    detailed: participantBreakdown(prs, reviews),
  };
}

/** Keyed by domain id. */
export function buildDomainRollups(
  prs: readonly PullRequestRow[],
  reviews: readonly ReviewRow[],
  known: Iterable<number> = [],
): Map<number, DomainRollup> {
  const out = new Map<number, DomainRollup>();
  for (const [domainId, rows] of withKnownKeys(groupBy(prs, (p) => p.domainId), known)) {
    out.set(domainId, buildDomainRollup(rows, reviews));
  }
  return out;
}

// ---------- interface ----------

export function weeklyBuckets(prs: readonly PullRequestRow[]): WeeklyBucket[] {
  const weeks = new Map<string, WeeklyBucket>();
  for (const pr of prs) {
    const week = isoWeekKey(pr.createdAt);
    const bucket = weeks.get(week) ?? { week, total: 0, merged: 0 };
    bucket.total++;
    if (pr.merged) bucket.merged++;
    weeks.set(week, bucket);
  }
  return [...weeks.values()].sort((a, b) => a.week.localeCompare(b.week));
}

function complexityPercentages(prs: readonly PullRequestRow[]): ComplexityCounts {
  const counts = countComplexities(prs);
  const out = emptyComplexityCounts();
  if (prs.length === 0) return out;
  for (const c of COMPLEXITIES) out[c] = round1((counts[c] / prs.length) * 100);
  return out;
}

export function complexityBreakdown(prs: readonly PullRequestRow[]): ComplexityBreakdown {
  return {
    merged: complexityPercentages(prs.filter((p) => p.merged)),
    nonMerged: complexityPercentages(prs.filter((p) => !p.merged)),
  };
}

export function buildInterfaceRollup(prs: readonly PullRequestRow[], reviews: readonly ReviewRow[]): InterfaceRollup {
  return {
    ...buildDomainRollup(prs, reviews),
    weekly: weeklyBuckets(prs),
    complexityBreakdown: complexityBreakdown(prs),
  };
}

/** Keyed by interface id. */
export function buildInterfaceRollups(
  prs: readonly PullRequestRow[],
  reviews: readonly ReviewRow[],
  known: Iterable<number> = [],
): Map<number, InterfaceRollup> {
  const out = new Map<number, InterfaceRollup>();
  for (const [interfaceId, rows] of withKnownKeys(groupBy(prs, (p) => p.interfaceId), known)) {
    out.set(interfaceId, buildInterfaceRollup(rows, reviews));
  }
  return out;
}
