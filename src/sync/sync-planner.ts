export type SyncMode = 'full' | 'incremental';

/** Why the planner picked its mode. */
export type SyncReason = 'initial' | 'forced' | 'stale' | 'checkpoint';

export interface SyncDecision {
  mode: SyncMode;
  /** Lower bound on PR update time for this pass. */
  effectiveSince: Date;
  reason: SyncReason;
  lookbackDays: number;
  stalenessDays: number;
  lastCheckpoint: Date | null;
}

export interface PlannerOptions {
  now?: Date;
  stalenessDays?: number;
}

export const DEFAULT_LOOKBACK_DAYS = 60;
export const DEFAULT_STALENESS_DAYS = 7;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Chooses between a full pass over the lookback window and an incremental
 * pass from the last checkpoint. A checkpoint counts as stale once more than
 * `stalenessDays` whole days have elapsed.
 */
export function decide(
  lastCheckpoint: Date | null,
  lookbackDays: number = DEFAULT_LOOKBACK_DAYS,
  forceFull = false,
  options: PlannerOptions = {},
): SyncDecision {
  const now = options.now ?? new Date();
  const stalenessDays = options.stalenessDays ?? DEFAULT_STALENESS_DAYS;
  const full = (reason: SyncReason): SyncDecision => ({
    mode: 'full',
    effectiveSince: new Date(now.getTime() - lookbackDays * DAY_MS),
    reason,
    lookbackDays,
    stalenessDays,
    lastCheckpoint,
  });

  if (!lastCheckpoint) return full('initial');
  if (forceFull) return full('forced');

  const elapsedDays = Math.floor((now.getTime() - lastCheckpoint.getTime()) / DAY_MS);
  if (elapsedDays > stalenessDays) return full('stale');

  return {
    mode: 'incremental',
    effectiveSince: lastCheckpoint,
    reason: 'checkpoint',
    lookbackDays,
    stalenessDays,
    lastCheckpoint,
  };
}

const plural = (n: number, unit: string) => `${n} ${unit}${n === 1 ? '' : 's'}`;

export function describe(decision: SyncDecision, now: Date = new Date()): string {
  const window = `fetching last ${decision.lookbackDays} days`;
  switch (decision.reason) {
    case 'initial':
      return `Initial sync - ${window}`;
    case 'forced':
      return `Full sync - ${window} (requested)`;
    case 'stale':
      return `Full sync - ${window} (last sync was over ${decision.stalenessDays} days ago)`;
    case 'checkpoint':
      break;
  }

  const since = decision.lastCheckpoint ?? decision.effectiveSince;
  const hours = Math.max(0, now.getTime() - since.getTime()) / HOUR_MS;
  let span: string;
  if (hours < 1) span = plural(Math.floor(hours * 60), 'minute');
  else if (hours < 24) span = plural(Math.floor(hours), 'hour');
  else span = plural(Math.floor(hours / 24), 'day');
  return `Incremental sync - fetching updates from last ${span}`;
}
