// Decoding and interpretation of task.json / result.json and the results bot comment

export type DecodeStrategy = 'utf8' | 'utf8-bom' | 'latin1' | 'json-lines';

export type DecodeResult =
  | { ok: true; value: unknown; strategy: DecodeStrategy }
  | { ok: false; error: string };

export type ActualDifficulty = 'medium' | 'hard' | 'expert' | 'not enough trials' | 'unclassified';

export interface TrialSummary {
  totalTrials: number;
  passCount: number;
  failCount: number;
  successRate: number; // percent, 0-100
}

const MIN_TRIALS = 3;
const BAND_SCALE = 16;

// [from, to) on a 16-trial scale
const DIFFICULTY_BANDS: ReadonlyArray<{ from: number; to: number; label: ActualDifficulty }> = [
  { from: 10, to: 13, label: 'medium' },
  { from: 6, to: 10, label: 'hard' },
  { from: 3, to: 6, label: 'expert' },
];

function tryJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Decodes artifact bytes, trying plain UTF-8, UTF-8 with a byte-order mark,
 * Latin-1, and finally one JSON document per line.
 */
export function decodeJsonArtifact(content: Buffer): DecodeResult {
  const utf8 = content.toString('utf8');

  // Invalid UTF-8 sequences decode to U+FFFD; leave those bytes to Latin-1.
  const lossy = utf8.includes('\uFFFD');

  if (!lossy) {
    const plain = tryJson(utf8);
    if (plain.ok) return { ok: true, value: plain.value, strategy: 'utf8' };
  }

  if (!lossy && utf8.charCodeAt(0) === 0xfeff) {
    const stripped = tryJson(utf8.slice(1));
    if (stripped.ok) return { ok: true, value: stripped.value, strategy: 'utf8-bom' };
  }

  const latin1 = tryJson(content.toString('latin1'));
  if (latin1.ok) return { ok: true, value: latin1.value, strategy: 'latin1' };

  const lines = utf8
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  if (lines.length > 0) {
    const values: unknown[] = [];
    for (const line of lines) {
      const parsed = tryJson(line);
      if (!parsed.ok) return { ok: false, error: 'content is not JSON under any supported decoding' };
      values.push(parsed.value);
    }
    return { ok: true, value: values, strategy: 'json-lines' };
  }

  return { ok: false, error: 'artifact is empty' };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const INSTRUCTION_KEYS = ['instruction', 'task_instruction', 'prompt', 'description'] as const;

/** Instruction text from a decoded task.json, or null when none is present. */
export function extractInstruction(task: unknown): string | null {
  if (!isRecord(task)) return null;
  for (const key of INSTRUCTION_KEYS) {
    const v = task[key];
    if (typeof v === 'string' && v.trim().length > 0) return v.trim();
  }
  if (isRecord(task.task)) return extractInstruction(task.task);
  return null;
}

function trialList(result: unknown): unknown[] | null {
  if (Array.isArray(result)) return result;
  if (isRecord(result)) {
    for (const key of ['trials', 'results']) {
      const v = result[key];
      if (Array.isArray(v)) return v;
    }
  }
  return null;
}

function rewardOf(trial: unknown): number | null {
  if (!isRecord(trial)) return null;
  const reward = trial.reward;
  if (typeof reward === 'number') return reward;
  if (typeof reward === 'string' && reward.trim() !== '' && Number.isFinite(Number(reward))) {
    return Number(reward);
  }
  return null;
}

function roundTo(value: number, digits: number): number {
  const f = Math.pow(10, digits);
  return Math.round(value * f) / f;
}

/** Summarizes a decoded results artifact; a trial passes when its reward is exactly 1. */
export function summarizeTrials(result: unknown): TrialSummary | null {
  const trials = trialList(result);
  if (!trials || trials.length === 0) return null;

  const passCount = trials.filter((t) => rewardOf(t) === 1).length;
  const totalTrials = trials.length;
  return {
    totalTrials,
    passCount,
    failCount: totalTrials - passCount,
    successRate: roundTo((passCount / totalTrials) * 100, 2),
  };
}

export function classifyDifficulty(passCount: number, totalTrials: number): ActualDifficulty {
  if (totalTrials < MIN_TRIALS) return 'not enough trials';

  const scaled = (passCount * BAND_SCALE) / totalTrials;
  const band = DIFFICULTY_BANDS.find((b) => scaled >= b.from && scaled < b.to);
  return band ? band.label : 'unclassified';
}

function labelledNumber(body: string, label: string): number | null {
  const re = new RegExp(`\\*\\*${label}:?\\*\\*\\s*[:|]?\\s*([\\d.]+)`, 'i');
  const m = re.exec(body);
  if (!m) return null;
  const n = Number(m[1]);
  return Number.isFinite(n) ? n : null;
}

/**
 * Reads the results table posted by the evaluation bot. Fields absent from the
 * comment are derived from the others when possible.
 */
export function parseResultsComment(body: string): TrialSummary | null {
  const totalTrials = labelledNumber(body, 'Total Trials');
  if (totalTrials === null) return null;

  const passed = labelledNumber(body, 'Passed');
  const failed = labelledNumber(body, 'Failed');
  const rate = labelledNumber(body, 'Success Rate');

  const passCount = passed ?? (failed !== null ? totalTrials - failed : null);
  if (passCount === null) return null;

  return {
    totalTrials,
    passCount,
    failCount: failed ?? totalTrials - passCount,
    successRate: rate ?? (totalTrials > 0 ? roundTo((passCount / totalTrials) * 100, 2) : 0),
  };
}
