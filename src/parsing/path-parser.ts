// Week/pod extraction and task-artifact location from repository paths

export interface WeekAndPod {
  weekNum: number;
  podName: string;
}

// week_14/pod/...  or  week_14_fund_finance/pod/...
const WEEK_POD = /^week_(\d+)(?:_[\w-]+)?\/([^/]+)\//;

export const TASK_ARTIFACT = 'task.json';
export const RESULT_ARTIFACTS = ['result.json', 'results.json'] as const;

export function parseWeekAndPod(paths: readonly string[]): WeekAndPod | null {
  for (const path of paths) {
    const m = WEEK_POD.exec(path);
    if (m) return { weekNum: Number.parseInt(m[1], 10), podName: m[2] };
  }
  return null;
}

export const weekName = (weekNum: number): string => `week_${weekNum}`;

export const weekDisplayName = (weekNum: number): string => `Week ${weekNum}`;

/** `alex_pod` -> `Alex Pod` */
export function podDisplayName(podName: string): string {
  return podName
    .replace(/_/g, ' ')
    .split(' ')
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

function basename(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx >= 0 ? path.slice(idx + 1) : path;
}

/**
 * Finds the first changed file whose basename is one of `names` (in priority
 * order) and whose path carries the record's timestamp token.
 */
export function findArtifactPath(
  paths: readonly string[],
  timestamp: string,
  names: readonly string[],
): string | null {
  for (const name of names) {
    const hit = paths.find((p) => p.includes(timestamp) && basename(p) === name);
    if (hit) return hit;
  }
  return null;
}

/**
 * Repository paths where an artifact may live when it is not among the changed
 * files. Both folder conventions are returned, plain week folder first.
 */
export function candidateArtifactPaths(params: {
  weekNum: number;
  podName: string;
  domain: string;
  taskId: string;
  fileName: string;
}): string[] {
  const { weekNum, podName, domain, taskId, fileName } = params;
  return [
    `${weekName(weekNum)}/${podName}/${taskId}/${fileName}`,
    `${weekName(weekNum)}_${domain}/${podName}/${taskId}/${fileName}`,
  ];
}
