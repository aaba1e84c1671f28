import { CatalogMemoryRepo } from '../../catalog/catalog.memory.repo.js';
import { DomainCatalogService } from '../../catalog/domain-catalog.service.js';
import { EntityResolutionError, EntityResolverService } from '../../catalog/entity-resolver.service.js';
import { GithubClientError, type ExternalPullRequest } from '../../github/github-client.interface.js';
import { StubGithubClient } from '../../github/stub-github-client.js';
import { SettingsService } from '../../settings/settings.service.js';
import { PullRequestMemoryRepo } from '../pull-request.memory.repo.js';
import { RecordSynchronizerService, toReviewState } from '../record-synchronizer.service.js';

const TITLE = 'alex-fund_finance-3-hard-1712345678';
const TASK_DIR = `week_14_fund_finance/alex_pod/${TITLE}`;

const setup = () => {
  const github = new StubGithubClient();
  const catalog = new CatalogMemoryRepo();
  const prs = new PullRequestMemoryRepo();
  const resolver = new EntityResolverService(catalog);
  const domains = new DomainCatalogService(
    new SettingsService({ GITHUB_TOKEN: 'test-token', GITHUB_REPO: 'example-org/tasks' }),
    github,
  );
  const synchronizer = new RecordSynchronizerService(github, prs, resolver, domains);
  return { github, catalog, prs, synchronizer };
};

const pull = (overrides: Partial<ExternalPullRequest> = {}): ExternalPullRequest => ({
  id: '1001',
  number: 7,
  title: TITLE,
  state: 'closed',
  merged: true,
  createdAt: '2024-04-05T10:00:00Z',
  updatedAt: '2024-04-06T10:00:00Z',
  closedAt: '2024-04-06T10:00:00Z',
  mergedAt: '2024-04-06T10:00:00Z',
  labels: ['ready to merge'],
  authorLogin: 'alex',
  headSha: 'sha-head',
  mergeCommitSha: 'sha-merge',
  ...overrides,
});

const trials = (passing: number, total: number) =>
  JSON.stringify(Array.from({ length: total }, (_, i) => ({ reward: i < passing ? 1.0 : 0.0 })));

describe('RecordSynchronizerService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('syncs a merged task end to end', async () => {
    const { github, catalog, prs, synchronizer } = setup();
    github.files.set(7, [`${TASK_DIR}/result.json`]);
    github.putFile(`${TASK_DIR}/result.json`, trials(9, 16));

    const result = await synchronizer.sync(pull(), false);

    expect(result.status).toBe('synced');
    expect(prs.pullRequests).toHaveLength(1);
    expect(prs.pullRequests[0]).toMatchObject({
      githubId: '1001',
      trainerName: 'alex',
      domain: 'fund_finance',
      interfaceNum: 3,
      complexity: 'hard',
      taskTimestamp: '1712345678',
      weekNum: 14,
      weekName: 'week_14',
      podName: 'alex_pod',
      passCount: 9,
      failCount: 7,
      totalTrials: 16,
      successRate: 56.25,
      actualDifficulty: 'hard',
      resultDataMissing: false,
      taskDataMissing: true,
    });
    expect(prs.pullRequests[0].nestedSyncedAt).toBeInstanceOf(Date);
    expect(catalog.users.map((u) => [u.githubUsername, u.role])).toEqual([['alex', 'trainer']]);
    expect(catalog.assignments).toHaveLength(1);
    expect(catalog.pods.map((p) => p.displayName)).toEqual(['Alex Pod']);
  });

  it('skips titles that do not parse without touching the catalog', async () => {
    const { catalog, prs, synchronizer } = setup();

    const result = await synchronizer.sync(pull({ title: 'Fix typo in README' }), false);

    expect(result).toEqual({ status: 'skipped', reason: 'title does not match the task naming pattern' });
    expect(prs.pullRequests).toHaveLength(0);
    expect(catalog.users).toHaveLength(0);
  });

  it('updates the same row on re-sync', async () => {
    const { github, prs, synchronizer } = setup();
    github.reviews.set(7, [
      { id: 'r1', reviewerLogin: 'sam', state: 'APPROVED', submittedAt: '2024-04-06T09:00:00Z', body: null },
    ]);

    const first = await synchronizer.sync(pull({ state: 'open', merged: false, mergedAt: null }), false);
    const second = await synchronizer.sync(pull(), false);

    expect(prs.pullRequests).toHaveLength(1);
    expect(prs.reviews).toHaveLength(1);
    expect(first.status === 'synced' && second.status === 'synced').toBe(true);
    if (first.status === 'synced' && second.status === 'synced') {
      expect(second.pullRequest.id).toBe(first.pullRequest.id);
      expect(second.pullRequest.state).toBe('closed');
    }
  });

  it('records reviews, counting only changes-requested as rework', async () => {
    const { github, catalog, prs, synchronizer } = setup();
    github.reviews.set(7, [
      { id: 'r1', reviewerLogin: 'sam', state: 'CHANGES_REQUESTED', submittedAt: '2024-04-05T11:00:00Z', body: 'fix' },
      { id: 'r2', reviewerLogin: 'sam', state: 'APPROVED', submittedAt: '2024-04-05T12:00:00Z', body: null },
      { id: 'r3', reviewerLogin: 'kim', state: 'PENDING', submittedAt: null, body: null },
      { id: 'r4', reviewerLogin: null, state: 'COMMENTED', submittedAt: '2024-04-05T13:00:00Z', body: 'note' },
    ]);
    github.checkRuns.set('sha-head', [
      { id: '1', name: 'lint', status: 'completed', conclusion: 'failure', startedAt: '2024-04-05T10:00:00Z', completedAt: null },
    ]);

    const result = await synchronizer.sync(pull(), false);

    expect(result).toMatchObject({ status: 'synced', created: { users: 2, domains: 1, interfaces: 1 } });
    expect(prs.pullRequests[0].reworkCount).toBe(1);
    expect(prs.pullRequests[0].checkFailures).toBe(1);
    expect(prs.reviews.map((r) => [r.githubId, r.state, r.reviewerLogin])).toEqual([
      ['r1', 'changes_requested', 'sam'],
      ['r2', 'approved', 'sam'],
      ['r4', 'commented', null],
    ]);
    expect(prs.reviews[2].reviewerId).toBeNull();
    expect(catalog.users.map((u) => [u.githubUsername, u.role])).toEqual([
      ['alex', 'trainer'],
      ['sam', null],
    ]);
  });

  it('counts checks from the latest run of each name', async () => {
    const { github, prs, synchronizer } = setup();
    github.checkRuns.set('sha-head', [
      { id: '1', name: 'lint', status: 'completed', conclusion: 'failure', startedAt: '2024-04-05T10:00:00Z', completedAt: null },
      { id: '2', name: 'lint', status: 'completed', conclusion: 'success', startedAt: '2024-04-05T11:00:00Z', completedAt: null },
      { id: '3', name: 'test', status: 'completed', conclusion: 'timed_out', startedAt: '2024-04-05T10:00:00Z', completedAt: null },
      { id: '4', name: 'build', status: 'completed', conclusion: 'success', startedAt: '2024-04-05T10:00:00Z', completedAt: null },
    ]);

    await synchronizer.sync(pull(), false);

    expect(prs.pullRequests[0]).toMatchObject({ checkPasses: 2, checkFailures: 1, reworkCount: 0 });
    expect(prs.checkRuns).toHaveLength(4);
  });

  it('refreshes only scalar fields when nested data is skipped', async () => {
    const { github, prs, synchronizer } = setup();
    github.reviews.set(7, [
      { id: 'r1', reviewerLogin: 'sam', state: 'CHANGES_REQUESTED', submittedAt: null, body: null },
    ]);
    await synchronizer.sync(pull(), false);
    const listReviews = jest.spyOn(github, 'listReviews');

    expect(await synchronizer.canSkipNested(pull())).toBe(true);
    const result = await synchronizer.sync(pull({ labels: ['expert approved'] }), true);

    expect(result).toMatchObject({ status: 'synced', nested: false });
    expect(listReviews).not.toHaveBeenCalled();
    expect(prs.pullRequests[0].labels).toEqual(['expert approved']);
    expect(prs.pullRequests[0].reworkCount).toBe(1);
  });

  it('never skips nested data for open or unseen records', async () => {
    const { synchronizer } = setup();
    expect(await synchronizer.canSkipNested(pull())).toBe(false);
    expect(await synchronizer.canSkipNested(pull({ state: 'open' }))).toBe(false);
  });

  it('looks for artifacts under both folder conventions, default branch first', async () => {
    const { github, prs, synchronizer } = setup();
    github.files.set(7, [`week_14/alex_pod/${TITLE}/notes.md`]);
    github.putFile(`week_14_fund_finance/alex_pod/${TITLE}/task.json`, '{"instruction":"Balance the fund"}', 'sha-merge');
    github.putFile(`week_14/alex_pod/${TITLE}/results.json`, '{"reward":1}\n{"reward":0}\n{"reward":1}\n');

    await synchronizer.sync(pull(), false);

    expect(github.contentRequests.slice(0, 4)).toEqual([
      `HEAD:week_14/alex_pod/${TITLE}/task.json`,
      `sha-merge:week_14/alex_pod/${TITLE}/task.json`,
      `HEAD:week_14_fund_finance/alex_pod/${TITLE}/task.json`,
      `sha-merge:week_14_fund_finance/alex_pod/${TITLE}/task.json`,
    ]);
    expect(prs.pullRequests[0]).toMatchObject({
      taskInstruction: 'Balance the fund',
      taskDataMissing: false,
      resultDataMissing: false,
      totalTrials: 3,
      passCount: 2,
      actualDifficulty: 'medium',
    });
  });

  it("ignores another task's artifact that shares the timestamp token", async () => {
    const { github, prs, synchronizer } = setup();
    const foreign = 'week_14_smart_home/sam_pod/sam-smart_home-2-hard-1712345678/result.json';
    github.files.set(7, [`${TASK_DIR}/task.json`, foreign]);
    github.putFile(`${TASK_DIR}/task.json`, '{"instruction":"Balance the fund"}');
    github.putFile(foreign, trials(1, 16));
    github.putFile(`${TASK_DIR}/result.json`, trials(9, 16));

    await synchronizer.sync(pull(), false);

    expect(github.contentRequests.some((r) => r.endsWith(foreign))).toBe(false);
    expect(prs.pullRequests[0]).toMatchObject({
      taskInstruction: 'Balance the fund',
      resultDataMissing: false,
      totalTrials: 16,
      passCount: 9,
    });
  });

  it('falls back to the bot results comment and flags the missing artifact', async () => {
    const { github, prs, synchronizer } = setup();
    github.comments.set(7, [
      { id: 'c1', authorLogin: 'alex', authorIsBot: false, body: '**Total Trials**: 2', createdAt: null },
      {
        id: 'c2',
        authorLogin: 'eval-bot[bot]',
        authorIsBot: true,
        body: '**Total Trials**: 16\n**Passed**: 11\n**Failed**: 5\n**Success Rate**: 68.75%',
        createdAt: null,
      },
    ]);

    await synchronizer.sync(pull(), false);

    expect(prs.pullRequests[0]).toMatchObject({
      totalTrials: 16,
      passCount: 11,
      failCount: 5,
      successRate: 68.75,
      actualDifficulty: 'medium',
      resultDataMissing: true,
    });
  });

  it('flags undecodable artifacts without failing the record', async () => {
    const { github, prs, synchronizer } = setup();
    github.files.set(7, [`${TASK_DIR}/result.json`, `${TASK_DIR}/task.json`]);
    github.putFile(`${TASK_DIR}/result.json`, 'not json');
    github.putFile(`${TASK_DIR}/task.json`, '{"instruction":"Rebalance"}');

    const result = await synchronizer.sync(pull(), false);

    expect(result.status).toBe('synced');
    expect(prs.pullRequests[0]).toMatchObject({
      taskInstruction: 'Rebalance',
      taskDataMissing: false,
      resultDataMissing: true,
      totalTrials: null,
      actualDifficulty: null,
    });
  });

  it('does not fetch artifacts for unmerged records', async () => {
    const { github, prs, synchronizer } = setup();

    await synchronizer.sync(pull({ state: 'open', merged: false, mergedAt: null, closedAt: null }), false);

    expect(github.contentRequests).toEqual([]);
    expect(prs.pullRequests[0]).toMatchObject({ taskDataMissing: false, resultDataMissing: false });
  });

  it('falls back to the parsed trainer name without an author', async () => {
    const { catalog, prs, synchronizer } = setup();

    await synchronizer.sync(pull({ authorLogin: null }), false);

    expect(catalog.users.map((u) => u.githubUsername)).toEqual(['alex']);
    expect(prs.pullRequests[0].trainerId).toBe(catalog.users[0].id);
  });

  it('fails the record when a required entity cannot be resolved', async () => {
    const { catalog, prs, synchronizer } = setup();
    jest.spyOn(catalog, 'insertDomain').mockRejectedValue(new Error('db down'));

    await expect(synchronizer.sync(pull(), false)).rejects.toBeInstanceOf(EntityResolutionError);
    expect(prs.pullRequests).toHaveLength(0);
  });

  it('propagates GitHub errors from nested fetches', async () => {
    const { github, synchronizer } = setup();
    github.failures.set(7, new GithubClientError('gone', 'NOT_FOUND', 404));

    await expect(synchronizer.sync(pull(), false)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});

describe('toReviewState', () => {
  it('lower-cases submitted states and drops pending ones', () => {
    expect(toReviewState('CHANGES_REQUESTED')).toBe('changes_requested');
    expect(toReviewState('DISMISSED')).toBe('dismissed');
    expect(toReviewState('PENDING')).toBeNull();
  });
});
