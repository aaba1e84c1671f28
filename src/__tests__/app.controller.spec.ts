import { AppController } from '../app.controller.js';
import { SettingsService } from '../settings/settings.service.js';
import { SyncStateMemoryRepo } from '../sync/state/sync-state.memory.repo.js';
import { emptySyncState } from '../sync/state/sync-state.repo.js';
import { SyncService } from '../sync/sync.service.js';

describe('AppController', () => {
  const build = (state: SyncStateMemoryRepo) => {
    const settings = new SettingsService({ GITHUB_TOKEN: 'test-token', GITHUB_REPO: 'example-org/tasks' });
    const sync = new SyncService(
      {} as unknown as ConstructorParameters<typeof SyncService>[0],
      {} as unknown as ConstructorParameters<typeof SyncService>[1],
      {} as unknown as ConstructorParameters<typeof SyncService>[2],
      state,
      {} as unknown as ConstructorParameters<typeof SyncService>[4],
      settings,
    );
    return new AppController(sync);
  };

  it('reports no checkpoint before the first sync', async () => {
    const health = await build(new SyncStateMemoryRepo()).getHealth();

    expect(health).toMatchObject({ status: 'ok', syncing: false, lastSyncTime: null, lastSyncStatus: null });
  });

  it('reports the stored checkpoint', async () => {
    const repo = new SyncStateMemoryRepo();
    repo.state = { ...emptySyncState(), lastSyncTime: new Date('2024-04-20T12:00:00Z'), lastSyncStatus: 'failed' };

    const health = await build(repo).getHealth();

    expect(health.lastSyncTime).toBe('2024-04-20T12:00:00.000Z');
    expect(health.lastSyncStatus).toBe('failed');
  });
});
