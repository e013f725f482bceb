import path from 'path';

// Repository-relative POSIX form: no leading './', forward slashes only.
export function normalizeRepoPath(filePath: string): string {
  let normalized = filePath.replace(/\\/g, '/');
  while (normalized.startsWith('./')) normalized = normalized.slice(2);
  return path.posix.normalize(normalized);
}

export function toRepoRelative(repoRoot: string, cwd: string, filePath: string): string {
  const absolute = path.resolve(cwd, filePath);
  return normalizeRepoPath(path.relative(repoRoot, absolute));
}
