import type { ExternalCheckRun } from '../github/github-client.interface.js';

const PASSING = new Set(['success']);
const FAILING = new Set(['failure', 'timed_out']);

function compareIds(a: string, b: string): number {
  // numeric ids as strings: longer is larger
  return a.length - b.length || a.localeCompare(b);
}

function compareRuns(a: ExternalCheckRun, b: ExternalCheckRun): number {
  return (
    (a.startedAt ?? '').localeCompare(b.startedAt ?? '') ||
    (a.completedAt ?? '').localeCompare(b.completedAt ?? '') ||
    compareIds(a.id, b.id)
  );
}

/** The most recent run of each check name; reruns replace earlier runs. */
export function latestRunPerName(runs: readonly ExternalCheckRun[]): ExternalCheckRun[] {
  const latest = new Map<string, ExternalCheckRun>();
  for (const run of runs) {
    const current = latest.get(run.name);
    if (!current || compareRuns(run, current) > 0) latest.set(run.name, run);
  }
  return [...latest.values()];
}

export function countCheckOutcomes(runs: readonly ExternalCheckRun[]): { passes: number; failures: number } {
  let passes = 0;
  let failures = 0;
  for (const run of latestRunPerName(runs)) {
    if (run.conclusion && PASSING.has(run.conclusion)) passes++;
    else if (run.conclusion && FAILING.has(run.conclusion)) failures++;
  }
  return { passes, failures };
}
