import { CatalogMemoryRepo } from '../../catalog/catalog.memory.repo.js';
import { DomainCatalogService } from '../../catalog/domain-catalog.service.js';
import { EntityResolverService } from '../../catalog/entity-resolver.service.js';
import { GithubClientError, type ExternalPullRequest } from '../../github/github-client.interface.js';
import { StubGithubClient } from '../../github/stub-github-client.js';
import { MetricsAggregatorService } from '../../metrics/metrics-aggregator.service.js';
import { MetricsMemoryRepo } from '../../metrics/metrics.memory.repo.js';
import { PullRequestMemoryRepo } from '../../pull-requests/pull-request.memory.repo.js';
import { RecordSynchronizerService } from '../../pull-requests/record-synchronizer.service.js';
import { SettingsService } from '../../settings/settings.service.js';
import { SyncStateMemoryRepo } from '../state/sync-state.memory.repo.js';
import { SyncLockError, emptySyncState } from '../state/sync-state.repo.js';
import { SyncEvent, SyncEventsService } from '../sync-events.service.js';
import { SyncService } from '../sync.service.js';

const hoursAgo = (h: number) => new Date(Date.now() - h * 60 * 60 * 1000);

const pull = (n: number, overrides: Partial<ExternalPullRequest> = {}): ExternalPullRequest => ({
  id: String(1000 + n),
  number: n,
  title: `alex-fund_finance-${n}-hard-17123456${String(n).padStart(2, '0')}`,
  state: 'open',
  merged: false,
  createdAt: hoursAgo(48).toISOString(),
  updatedAt: hoursAgo(1).toISOString(),
  closedAt: null,
  mergedAt: null,
  labels: [],
  authorLogin: 'alex',
  headSha: null,
  mergeCommitSha: null,
  ...overrides,
});

const setup = (env: Record<string, string> = {}) => {
  const settings = new SettingsService({
    GITHUB_TOKEN: 'test-token',
    GITHUB_REPO: 'example-org/tasks',
    SYNC_CONCURRENCY: '1',
    ...env,
  });
  const github = new StubGithubClient();
  const catalog = new CatalogMemoryRepo();
  const prs = new PullRequestMemoryRepo();
  const synchronizer = new RecordSynchronizerService(
    github,
    prs,
    new EntityResolverService(catalog),
    new DomainCatalogService(settings, github),
  );
  const metrics = new MetricsMemoryRepo();
  const aggregator = new MetricsAggregatorService(prs, catalog, metrics);
  const state = new SyncStateMemoryRepo();
  const bus = new SyncEventsService();
  const events: SyncEvent[] = [];
  bus.events$.subscribe((event) => events.push(event));

  const service = new SyncService(github, synchronizer, aggregator, state, bus, settings);
  return { github, catalog, prs, synchronizer, metrics, state, events, service };
};

describe('SyncService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('runs a full pass on first sync and records the checkpoint', async () => {
    const { github, catalog, metrics, state, events, service } = setup();
    github.addPull(pull(1));
    github.addPull(pull(2, { title: 'Fix typo in README', updatedAt: hoursAgo(2).toISOString() }));
    github.addPull(pull(3, { updatedAt: hoursAgo(100 * 24).toISOString() }));
    const before = Date.now();

    const summary = await service.runSync();

    expect(summary).toMatchObject({
      type: 'full',
      status: 'completed',
      description: 'Initial sync - fetching last 60 days',
      inspected: 2,
      synced: 1,
      skipped: 1,
      failed: 0,
      capped: false,
    });
    expect(github.yielded).toBe(3);
    expect(state.state).toMatchObject({
      syncType: 'full',
      lastSyncStatus: 'success',
      lastSyncPrCount: 1,
      totalPrsSynced: 1,
      totalUsersCreated: 1,
      totalDomainsCreated: 1,
      totalInterfacesCreated: 1,
      lastError: null,
    });
    const checkpoint = state.state?.lastSyncTime?.getTime() ?? 0;
    expect(checkpoint).toBeGreaterThanOrEqual(before);
    expect(checkpoint).toBeLessThanOrEqual(Date.now());
    expect(state.state?.lastFullSyncTime).toEqual(state.state?.lastSyncTime);
    expect(state.lockHeld).toBe(false);
    expect(catalog.users.map((u) => u.githubUsername)).toEqual(['alex']);
    expect(metrics.developers.get(catalog.users[0].id)?.totalPrs).toBe(1);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'sync_complete', data: { synced_count: 1, sync_type: 'full' } });
  });

  it('runs incrementally from a fresh checkpoint without taking the lock', async () => {
    const { github, state, service } = setup();
    state.state = { ...emptySyncState(), lastSyncTime: hoursAgo(2) };
    state.lockHeld = true;
    github.addPull(pull(1));
    github.addPull(pull(4, { updatedAt: hoursAgo(3).toISOString() }));

    const summary = await service.runSync();

    expect(summary).toMatchObject({ type: 'incremental', status: 'completed', inspected: 1, synced: 1 });
    expect(summary.description).toBe('Incremental sync - fetching updates from last 2 hours');
    expect(state.state?.lastFullSyncTime).toBeNull();
  });

  it('advances the checkpoint when the record cap ends the pass', async () => {
    const { github, state, service } = setup({ SYNC_MAX_RECORDS: '2' });
    github.addPull(pull(1, { updatedAt: hoursAgo(1).toISOString() }));
    github.addPull(pull(2, { updatedAt: hoursAgo(2).toISOString() }));
    github.addPull(pull(3, { updatedAt: hoursAgo(3).toISOString() }));

    const summary = await service.runSync();

    expect(summary).toMatchObject({ status: 'completed', capped: true, inspected: 2, synced: 2 });
    expect(state.state?.lastSyncTime).toBeInstanceOf(Date);
    expect(state.state?.lastSyncStatus).toBe('success');
  });

  it('skips a full pass while another holder has the lock', async () => {
    const { github, state, events, service } = setup();
    github.addPull(pull(1));
    state.lockHeld = true;

    const summary = await service.runSync();

    expect(summary).toMatchObject({ type: 'full', status: 'locked', inspected: 0 });
    expect(github.yielded).toBe(0);
    expect(state.state).toBeNull();
    expect(events).toEqual([
      {
        type: 'sync_skipped',
        data: expect.objectContaining({ reason: 'another sync holds the lock', sync_type: 'full' }),
      },
    ]);
  });

  it('reports a failing lock mechanism on the event stream and in the state row', async () => {
    const { github, state, events, service } = setup();
    github.addPull(pull(1));
    jest.spyOn(state, 'tryAcquireLock').mockRejectedValue(new SyncLockError('connection refused'));

    await service.trigger({ kind: 'full' });
    await service.waitForIdle();

    expect(github.yielded).toBe(0);
    expect(state.state).toMatchObject({ syncType: 'full', lastSyncStatus: 'failed', lastError: 'connection refused' });
    expect(events).toEqual([
      { type: 'sync_error', data: expect.objectContaining({ error: 'connection refused', sync_type: 'full' }) },
    ]);
  });

  it('reports a failure to read the checkpoint', async () => {
    const { state, events, service } = setup();
    jest.spyOn(state, 'load').mockRejectedValue(new Error('connection terminated'));

    await expect(service.runSync()).rejects.toThrow('connection terminated');

    expect(state.state).toMatchObject({ syncType: 'incremental', lastSyncStatus: 'failed', lastError: 'connection terminated' });
    expect(events).toEqual([
      { type: 'sync_error', data: expect.objectContaining({ error: 'connection terminated', sync_type: 'incremental' }) },
    ]);
  });

  it('counts transient GitHub errors as skipped and others as failed', async () => {
    const { github, state, service } = setup();
    github.addPull(pull(5));
    github.addPull(pull(6, { updatedAt: hoursAgo(2).toISOString() }));
    github.failures.set(5, new GithubClientError('PR #5 not found', 'NOT_FOUND', 404));
    github.failures.set(6, new GithubClientError('bad gateway', 'SERVER_ERROR', 502));

    const summary = await service.runSync();

    expect(summary).toMatchObject({ status: 'completed', synced: 0, skipped: 1, failed: 1 });
    expect(state.state?.lastSyncStatus).toBe('success');
  });

  it('records a failed run and keeps the checkpoint when listing fails', async () => {
    const { github, state, events, service } = setup();
    const checkpoint = hoursAgo(2);
    state.state = { ...emptySyncState(), lastSyncTime: checkpoint };
    jest.spyOn(github, 'iteratePullRequests').mockImplementation(async function* () {
      throw new GithubClientError('bad credentials', 'UNAUTHORIZED', 401);
    });

    await expect(service.runSync()).rejects.toThrow('bad credentials');

    expect(state.state).toMatchObject({ lastSyncStatus: 'failed', lastError: 'bad credentials', syncType: 'incremental' });
    expect(state.state?.lastSyncTime).toBe(checkpoint);
    expect(events).toEqual([
      { type: 'sync_error', data: expect.objectContaining({ error: 'bad credentials', sync_type: 'incremental' }) },
    ]);
  });

  it('stops between batches once aborted and leaves the checkpoint alone', async () => {
    const { github, state, service } = setup();
    github.addPull(pull(1));
    const controller = new AbortController();
    controller.abort();

    const summary = await service.runSync({ signal: controller.signal });

    expect(summary).toMatchObject({ status: 'aborted', synced: 0 });
    expect(state.state).toMatchObject({ lastSyncStatus: 'failed', lastSyncTime: null });
    expect(state.lockHeld).toBe(false);
  });

  it('skips nested fetches for complete closed PRs except in window syncs', async () => {
    const { github, service } = setup();
    github.addPull(pull(1, { state: 'closed', closedAt: hoursAgo(1).toISOString() }));
    await service.runSync();
    const listReviews = jest.spyOn(github, 'listReviews');

    await service.runSync({ forceFull: true });
    expect(listReviews).not.toHaveBeenCalled();

    const window = await service.runWindowSync(3);
    expect(window).toMatchObject({ type: 'window', status: 'completed', synced: 1 });
    expect(listReviews).toHaveBeenCalledTimes(1);
  });

  it('leaves the incremental checkpoint alone after a window sync', async () => {
    const { github, state, service } = setup();
    const checkpoint = hoursAgo(5);
    state.state = { ...emptySyncState(), lastSyncTime: checkpoint };
    github.addPull(pull(1));

    await service.runWindowSync();

    expect(state.state).toMatchObject({ syncType: 'window', lastSyncPrCount: 1 });
    expect(state.state?.lastSyncTime).toBe(checkpoint);
  });

  it('acknowledges triggers at once and reports through events', async () => {
    const { github, events, service } = setup();
    github.addPull(pull(1));

    const ack = await service.trigger({ kind: 'incremental' });
    expect(ack).toEqual({ status: 'accepted', kind: 'incremental', description: 'Initial sync - fetching last 60 days' });

    await service.waitForIdle();
    expect(events.map((e) => e.type)).toEqual(['sync_complete']);
    expect(events[0].data).toMatchObject({ synced_count: 1, sync_type: 'full' });
  });

  it('reports quick updates, including failures, on the event stream', async () => {
    const { github, prs, state, events, service } = setup();
    github.addPull(pull(7));

    await expect(service.trigger({ kind: 'quick', pullNumber: 7 })).resolves.toEqual({
      status: 'accepted',
      kind: 'quick',
      description: 'Quick update - PR #7',
    });
    await service.waitForIdle();
    await service.trigger({ kind: 'quick', pullNumber: 99 });
    await service.waitForIdle();

    expect(prs.pullRequests.map((p) => p.number)).toEqual([7]);
    expect(state.state).toMatchObject({
      syncType: 'quick',
      lastSyncStatus: 'failed',
      lastError: 'PR #99 not found',
      lastSyncTime: null,
      totalPrsSynced: 1,
      lastSyncPrCount: 1,
    });
    expect(events).toEqual([
      { type: 'sync_complete', data: expect.objectContaining({ synced_count: 1, sync_type: 'quick' }) },
      { type: 'sync_error', data: expect.objectContaining({ error: 'PR #99 not found', sync_type: 'quick' }) },
    ]);
  });

  it('describes the next sync from the stored checkpoint', async () => {
    const { state, service } = setup();
    state.state = { ...emptySyncState(), lastSyncTime: hoursAgo(3) };

    const next = await service.describeNext();

    expect(next.mode).toBe('incremental');
    expect(next.description).toBe('Incremental sync - fetching updates from last 3 hours');
  });

  it('waits for the running pass on shutdown and stops it between batches', async () => {
    const { github, synchronizer, service } = setup();
    github.addPull(pull(1, { updatedAt: hoursAgo(1).toISOString() }));
    github.addPull(pull(2, { updatedAt: hoursAgo(2).toISOString() }));
    const sync = synchronizer.sync.bind(synchronizer);
    let shutdown: Promise<void> | undefined;
    jest.spyOn(synchronizer, 'sync').mockImplementation((record, skipNested) => {
      shutdown ??= service.onApplicationShutdown('SIGTERM');
      return sync(record, skipNested);
    });

    const summary = await service.runSync();
    await shutdown;

    expect(summary).toMatchObject({ status: 'aborted', synced: 1, inspected: 2 });
    expect(service.busy).toBe(false);
  });
});
