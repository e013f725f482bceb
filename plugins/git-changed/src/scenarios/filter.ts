import type { ChangedFileSet } from '../changed/resolver.js';
import type { Scenario } from './types.js';
import { normalizeRepoPath } from './paths.js';

/**
 * Keeps the scenarios with at least one path in `changed`, in their original
 * order. Paths are compared as exact strings once mapped through `toRepoPath`;
 * a directory never matches the files beneath it.
 */
export function filterScenarios<T extends Scenario>(
  scenarios: readonly T[],
  changed: ChangedFileSet,
  toRepoPath: (filePath: string) => string = normalizeRepoPath
): T[] {
  if (changed.size === 0) return [];
  return scenarios.filter(scenario => scenario.paths.some(p => changed.has(toRepoPath(p))));
}
