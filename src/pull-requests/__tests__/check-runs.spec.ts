import type { ExternalCheckRun } from '../../github/github-client.interface.js';
import { countCheckOutcomes, latestRunPerName } from '../check-runs.js';

const run = (
  id: string,
  name: string,
  conclusion: string | null,
  startedAt: string | null,
  completedAt: string | null = null,
): ExternalCheckRun => ({ id, name, status: 'completed', conclusion, startedAt, completedAt });

describe('latestRunPerName', () => {
  it('keeps the most recently started run of each name', () => {
    const runs = [
      run('1', 'lint', 'failure', '2024-04-01T10:00:00Z'),
      run('2', 'lint', 'success', '2024-04-01T11:00:00Z'),
      run('3', 'test', 'success', '2024-04-01T09:00:00Z'),
    ];
    expect(latestRunPerName(runs).map((r) => r.id)).toEqual(['2', '3']);
  });

  it('breaks ties by completion time and then by id', () => {
    const sameStart = '2024-04-01T10:00:00Z';
    expect(
      latestRunPerName([
        run('5', 'build', 'failure', sameStart, '2024-04-01T10:05:00Z'),
        run('4', 'build', 'success', sameStart, '2024-04-01T10:09:00Z'),
      ])[0].id,
    ).toBe('4');
    expect(latestRunPerName([run('100', 'e2e', 'success', null), run('99', 'e2e', 'failure', null)])[0].id).toBe('100');
  });
});

describe('countCheckOutcomes', () => {
  it('ignores a failed run superseded by a later success', () => {
    const runs = [
      run('1', 'lint', 'failure', '2024-04-01T10:00:00Z'),
      run('2', 'lint', 'success', '2024-04-01T11:00:00Z'),
    ];
    expect(countCheckOutcomes(runs)).toEqual({ passes: 1, failures: 0 });
  });

  it('counts timeouts as failures and ignores neutral outcomes', () => {
    const runs = [
      run('1', 'test', 'timed_out', '2024-04-01T10:00:00Z'),
      run('2', 'build', 'success', '2024-04-01T10:00:00Z'),
      run('3', 'docs', 'skipped', '2024-04-01T10:00:00Z'),
      run('4', 'deploy', null, '2024-04-01T10:00:00Z'),
    ];
    expect(countCheckOutcomes(runs)).toEqual({ passes: 1, failures: 1 });
  });
});
