import { Inject, Injectable, Logger } from '@nestjs/common';

import { DomainCatalogService } from '../catalog/domain-catalog.service.js';
import { EntityResolverService } from '../catalog/entity-resolver.service.js';
import type { UserEntity } from '../catalog/user/user.entity.js';
import type { ExternalPullRequest, GithubClient } from '../github/github-client.interface.js';
import { GITHUB_CLIENT } from '../github/github-client.token.js';
import {
  RESULT_ARTIFACTS,
  TASK_ARTIFACT,
  candidateArtifactPaths,
  findArtifactPath,
  parseWeekAndPod,
} from '../parsing/path-parser.js';
import {
  classifyDifficulty,
  decodeJsonArtifact,
  extractInstruction,
  parseResultsComment,
  summarizeTrials,
  type TrialSummary,
} from '../parsing/task-artifacts.js';
import { parseTaskIdentifier, parseTitle, type ParsedTitle } from '../parsing/title-parser.js';
import { countCheckOutcomes } from './check-runs.js';
import type { CheckRunValues } from './check-run.entity.js';
import type { PullRequestEntity, PullRequestValues } from './pull-request.entity.js';
import { PullRequestRepo } from './pull-request.repo.js';
import type { ReviewState, ReviewValues } from './review.entity.js';

/** Catalog rows this record caused to be inserted. */
export interface CreatedEntities {
  users: number;
  domains: number;
  interfaces: number;
}

export type RecordSyncResult =
  | { status: 'synced'; pullRequest: PullRequestEntity; nested: boolean; created: CreatedEntities }
  | { status: 'skipped'; reason: string };

// Fields only the nested pass writes; a scalar refresh carries them over.
type NestedFields = Pick<
  PullRequestValues,
  | 'weekId'
  | 'weekNum'
  | 'weekName'
  | 'podId'
  | 'podName'
  | 'reworkCount'
  | 'checkFailures'
  | 'checkPasses'
  | 'taskInstruction'
  | 'taskDataMissing'
  | 'resultDataMissing'
  | 'totalTrials'
  | 'passCount'
  | 'failCount'
  | 'successRate'
  | 'actualDifficulty'
  | 'nestedSyncedAt'
>;

type Placement = Pick<NestedFields, 'weekId' | 'weekNum' | 'weekName' | 'podId' | 'podName'>;

const REVIEW_STATES: readonly ReviewState[] = ['approved', 'changes_requested', 'commented', 'dismissed'];

/** GitHub review state to the stored form; PENDING (unsubmitted) maps to null. */
export function toReviewState(raw: string): ReviewState | null {
  const state = raw.toLowerCase();
  return REVIEW_STATES.find((s) => s === state) ?? null;
}

function carriedFields(existing: PullRequestEntity | null): NestedFields {
  return {
    weekId: existing?.weekId ?? null,
    weekNum: existing?.weekNum ?? null,
    weekName: existing?.weekName ?? null,
    podId: existing?.podId ?? null,
    podName: existing?.podName ?? null,
    reworkCount: existing?.reworkCount ?? 0,
    checkFailures: existing?.checkFailures ?? 0,
    checkPasses: existing?.checkPasses ?? 0,
    taskInstruction: existing?.taskInstruction ?? null,
    taskDataMissing: existing?.taskDataMissing ?? false,
    resultDataMissing: existing?.resultDataMissing ?? false,
    totalTrials: existing?.totalTrials ?? null,
    passCount: existing?.passCount ?? null,
    failCount: existing?.failCount ?? null,
    successRate: existing?.successRate ?? null,
    actualDifficulty: existing?.actualDifficulty ?? null,
    nestedSyncedAt: existing?.nestedSyncedAt ?? null,
  };
}

const toDate = (iso: string | null): Date | null => (iso ? new Date(iso) : null);

@Injectable()
export class RecordSynchronizerService {
  private readonly logger = new Logger(RecordSynchronizerService.name);

  constructor(
    @Inject(GITHUB_CLIENT) private readonly github: GithubClient,
    private readonly prs: PullRequestRepo,
    private readonly resolver: EntityResolverService,
    private readonly domains: DomainCatalogService,
  ) {}

  /** Closed PRs whose nested data is already recorded only need a scalar refresh. */
  async canSkipNested(record: ExternalPullRequest): Promise<boolean> {
    if (record.state !== 'closed') return false;
    const existing = await this.prs.findByGithubId(record.id);
    return existing !== null && existing.state === 'closed' && existing.nestedSyncedAt !== null;
  }

  async sync(record: ExternalPullRequest, skipNested: boolean): Promise<RecordSyncResult> {
    const parsed = parseTitle(record.title, this.domains.known);
    if (!parsed) {
      return { status: 'skipped', reason: 'title does not match the task naming pattern' };
    }

    // Required foreign keys; any failure here fails the record.
    const trainer = await this.resolver.resolveUser(record.authorLogin ?? parsed.trainerName, 'trainer');
    const domain = await this.resolver.resolveDomain(parsed.domain);
    const iface = await this.resolver.resolveInterface(domain.entity.id, parsed.interfaceNum);
    await this.linkToDomain(trainer.entity, domain.entity.id);
    const created: CreatedEntities = {
      users: trainer.created ? 1 : 0,
      domains: domain.created ? 1 : 0,
      interfaces: iface.created ? 1 : 0,
    };

    const existing = await this.prs.findByGithubId(record.id);
    const values: PullRequestValues = {
      ...carriedFields(existing),
      githubId: record.id,
      number: record.number,
      title: record.title,
      state: record.state,
      merged: record.merged,
      labels: [...record.labels],
      authorLogin: record.authorLogin,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
      closedAt: toDate(record.closedAt),
      mergedAt: toDate(record.mergedAt),
      trainerId: trainer.entity.id,
      trainerName: parsed.trainerName,
      domainId: domain.entity.id,
      domain: domain.entity.domainName,
      interfaceId: iface.entity.id,
      interfaceNum: iface.entity.interfaceNum,
      complexity: parsed.complexity,
      taskTimestamp: parsed.timestamp,
      headSha: record.headSha,
      mergeCommitSha: record.mergeCommitSha,
      lastSynced: new Date(),
    };

    const stored = await this.prs.upsertPullRequest(values);
    if (skipNested) {
      this.logger.debug(`PR #${record.number}: scalar fields refreshed`);
      return { status: 'synced', pullRequest: stored, nested: false, created };
    }

    const nested = await this.syncNested(record, parsed, stored, created);
    const pullRequest = await this.prs.upsertPullRequest({ ...values, ...nested, nestedSyncedAt: new Date() });
    this.logger.debug(`PR #${record.number}: synced with nested data`);
    return { status: 'synced', pullRequest, nested: true, created };
  }

  private async linkToDomain(user: UserEntity, domainId: number): Promise<void> {
    try {
      await this.resolver.ensureAssignment(user, domainId);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Domain assignment for ${user.githubUsername} not recorded: ${message}`);
    }
  }

  private async syncNested(
    record: ExternalPullRequest,
    parsed: ParsedTitle,
    row: PullRequestEntity,
    created: CreatedEntities,
  ): Promise<Omit<NestedFields, 'nestedSyncedAt'>> {
    const files = await this.github.listPullRequestFiles({ pullNumber: record.number });
    const placement = await this.resolvePlacement(files, row);

    const reworkCount = await this.syncReviews(record, row.id, created);
    const checks = await this.syncCheckRuns(record, row.id);
    const commentSummary = await this.readResultsComment(record.number);

    let taskInstruction = row.taskInstruction;
    let taskDataMissing = false;
    let resultDataMissing = false;
    let summary: TrialSummary | null = null;

    if (record.merged) {
      const task = await this.fetchArtifact(record, this.artifactPaths(record, parsed, files, placement, [TASK_ARTIFACT]));
      const instruction = task ? extractInstruction(task.value) : null;
      taskDataMissing = instruction === null;
      if (instruction !== null) taskInstruction = instruction;

      const result = await this.fetchArtifact(record, this.artifactPaths(record, parsed, files, placement, RESULT_ARTIFACTS));
      summary = result ? summarizeTrials(result.value) : null;
      resultDataMissing = summary === null;
      if (resultDataMissing) this.logger.warn(`PR #${record.number}: results artifact missing or unreadable`);
    }

    const trials = summary ?? commentSummary;
    return {
      ...placement,
      reworkCount,
      checkPasses: checks.passes,
      checkFailures: checks.failures,
      taskInstruction,
      taskDataMissing,
      resultDataMissing,
      totalTrials: trials ? trials.totalTrials : row.totalTrials,
      passCount: trials ? trials.passCount : row.passCount,
      failCount: trials ? trials.failCount : row.failCount,
      successRate: trials ? trials.successRate : row.successRate,
      actualDifficulty: trials ? classifyDifficulty(trials.passCount, trials.totalTrials) : row.actualDifficulty,
    };
  }

  private async resolvePlacement(files: string[], row: PullRequestEntity): Promise<Placement> {
    const known: Placement = {
      weekId: row.weekId,
      weekNum: row.weekNum,
      weekName: row.weekName,
      podId: row.podId,
      podName: row.podName,
    };
    if (row.weekId !== null && row.podId !== null) return known;

    const found = parseWeekAndPod(files);
    if (!found) return known;

    const week = await this.resolver.resolveWeek(found.weekNum);
    const pod = await this.resolver.resolvePod(found.podName);
    return {
      weekId: week.entity.id,
      weekNum: week.entity.weekNum,
      weekName: week.entity.weekName,
      podId: pod.entity.id,
      podName: pod.entity.name,
    };
  }

  private async syncReviews(
    record: ExternalPullRequest,
    pullRequestId: number,
    created: CreatedEntities,
  ): Promise<number> {
    const reviews = await this.github.listReviews({ pullNumber: record.number });

    const rows: ReviewValues[] = [];
    for (const review of reviews) {
      const state = toReviewState(review.state);
      if (!state) continue;
      const reviewer = review.reviewerLogin ? await this.resolver.resolveUser(review.reviewerLogin) : null;
      if (reviewer?.created) created.users++;
      rows.push({
        githubId: review.id,
        pullRequestId,
        reviewerId: reviewer ? reviewer.entity.id : null,
        reviewerLogin: review.reviewerLogin,
        state,
        submittedAt: toDate(review.submittedAt),
        body: review.body,
      });
    }

    await this.prs.upsertReviews(rows);
    return rows.filter((r) => r.state === 'changes_requested').length;
  }

  private async syncCheckRuns(
    record: ExternalPullRequest,
    pullRequestId: number,
  ): Promise<{ passes: number; failures: number }> {
    if (!record.headSha) return { passes: 0, failures: 0 };

    const runs = await this.github.listCheckRuns({ ref: record.headSha });
    const rows: CheckRunValues[] = runs.map((run) => ({
      githubId: run.id,
      pullRequestId,
      name: run.name,
      status: run.status,
      conclusion: run.conclusion,
      startedAt: toDate(run.startedAt),
      completedAt: toDate(run.completedAt),
    }));
    await this.prs.upsertCheckRuns(rows);
    return countCheckOutcomes(runs);
  }

  /** The latest bot comment carrying a results table, if any. */
  private async readResultsComment(issueNumber: number): Promise<TrialSummary | null> {
    const comments = await this.github.listIssueComments({ issueNumber });
    for (const comment of [...comments].reverse()) {
      if (!comment.authorIsBot) continue;
      const summary = parseResultsComment(comment.body);
      if (summary) return summary;
    }
    return null;
  }

  private artifactPaths(
    record: ExternalPullRequest,
    parsed: ParsedTitle,
    files: string[],
    placement: Placement,
    names: readonly string[],
  ): string[] {
    // a changed file under another task's folder can share the timestamp token
    const owned = files.filter((path) => {
      const id = parseTaskIdentifier(path, this.domains.known);
      return id === null || (id.timestamp === parsed.timestamp && id.domain === parsed.domain);
    });
    const inDiff = findArtifactPath(owned, parsed.timestamp, names);
    if (inDiff) return [inDiff];

    const { weekNum, podName } = placement;
    if (weekNum === null || podName === null) return [];
    return names.flatMap((fileName) =>
      candidateArtifactPaths({ weekNum, podName, domain: parsed.domain, taskId: record.title.trim(), fileName }),
    );
  }

  /**
   * Tries each path on the default branch, then at the merge commit (a just
   * merged file may not be visible on the default branch yet).
   */
  private async fetchArtifact(record: ExternalPullRequest, paths: string[]): Promise<{ value: unknown } | null> {
    const refs: Array<string | undefined> = [undefined];
    if (record.mergeCommitSha) refs.push(record.mergeCommitSha);

    for (const path of paths) {
      for (const ref of refs) {
        try {
          const file = await this.github.getFileContent(ref ? { path, ref } : { path });
          if (!file) continue;

          const decoded = decodeJsonArtifact(file.content);
          if (decoded.ok) return { value: decoded.value };
          this.logger.warn(`PR #${record.number}: ${path}@${ref ?? 'default'} ${decoded.error}`);
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`PR #${record.number}: fetching ${path} failed: ${message}`);
        }
      }
    }
    return null;
  }
}
