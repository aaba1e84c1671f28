import { normalizeName } from '../settings/settings.js';

export type Complexity = 'expert' | 'hard' | 'medium' | 'unknown';

const TITLE_COMPLEXITIES = ['expert', 'hard', 'medium'] as const;

function toComplexity(value: string): Complexity {
  return TITLE_COMPLEXITIES.find((c) => c === value) ?? 'unknown';
}

export interface ParsedTitle {
  trainerName: string;
  domain: string; // normalized
  interfaceNum: number;
  complexity: Complexity;
  timestamp: string;
  grammar: 'primary' | 'fallback';
}

// <trainer>-<domain>-<interfaceNum>-<complexity>-<timestamp>
const PRIMARY = /^([A-Za-z0-9._-]+?)-([A-Za-z0-9_-]+)-(\d+)-(expert|hard|medium)-(\d{10})$/;

// <trainer>-<domain>[-anything]-<timestamp>
const FALLBACK = /^([A-Za-z0-9._-]+?)-([A-Za-z0-9_]+)(?:-[A-Za-z0-9._-]*)?-(\d{10,})$/;

// Last `-`/`_` separated segment of a trainer token
const TRAILING_SEGMENT = /^(.+)[-_]([A-Za-z0-9]+)$/;

/** True when `candidate` is only the tail of some known compound domain. */
function isSuffixFragment(candidate: string, knownDomains: ReadonlySet<string>): boolean {
  if (knownDomains.has(candidate)) return false;
  for (const domain of knownDomains) {
    if (domain.endsWith(`_${candidate}`)) return true;
  }
  return false;
}

/**
 * Repairs a trainer/domain split produced by the non-greedy trainer capture.
 * Returns the captured pair normalized when no repair lands on a known domain.
 */
export function resolveTrainerAndDomain(
  trainer: string,
  rawDomain: string,
  knownDomains: ReadonlySet<string>,
): { trainerName: string; domain: string } {
  const domain = normalizeName(rawDomain);
  if (knownDomains.has(domain)) return { trainerName: trainer, domain };

  // "jo_hr-experts": borrow the trainer's trailing segment as the domain prefix
  if (isSuffixFragment(domain, knownDomains)) {
    const m = TRAILING_SEGMENT.exec(trainer);
    if (m) {
      const borrowed = normalizeName(`${m[2]}_${domain}`);
      if (knownDomains.has(borrowed)) return { trainerName: m[1], domain: borrowed };
    }
  }

  // "mary-jane-finance": hand leading domain segments back to the trainer
  const segments = rawDomain.split('-');
  for (let i = 1; i < segments.length; i++) {
    const remainder = normalizeName(segments.slice(i).join('-'));
    if (knownDomains.has(remainder)) {
      return { trainerName: [trainer, ...segments.slice(0, i)].join('-'), domain: remainder };
    }
  }

  return { trainerName: trainer, domain };
}

export function parseTitle(title: string, knownDomains: ReadonlySet<string>): ParsedTitle | null {
  const text = title.trim();

  const primary = PRIMARY.exec(text);
  if (primary) {
    const { trainerName, domain } = resolveTrainerAndDomain(primary[1], primary[2], knownDomains);
    return {
      trainerName,
      domain,
      interfaceNum: Number.parseInt(primary[3], 10),
      complexity: toComplexity(primary[4]),
      timestamp: primary[5],
      grammar: 'primary',
    };
  }

  const fallback = FALLBACK.exec(text);
  if (fallback) {
    const { trainerName, domain } = resolveTrainerAndDomain(fallback[1], fallback[2], knownDomains);
    return {
      trainerName,
      domain,
      interfaceNum: 0,
      complexity: 'unknown',
      timestamp: fallback[3],
      grammar: 'fallback',
    };
  }

  return null;
}

/**
 * Same grammar applied to a task folder or file name. Walks the path from the
 * deepest segment up and returns the first one that parses.
 */
export function parseTaskIdentifier(path: string, knownDomains: ReadonlySet<string>): ParsedTitle | null {
  const segments = path.split('/').filter(Boolean).reverse();
  for (const segment of segments) {
    const parsed = parseTitle(segment.replace(/\.[A-Za-z]+$/, ''), knownDomains);
    if (parsed) return parsed;
  }
  return null;
}
