export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace('T', ' ').slice(0, 19) + ' UTC';
}

export function buildNoChangesSummary(branch: string, lastFetchedAt?: number): string {
  const summary = `No scenarios have changed relative to the '${branch}' branch`;
  return lastFetchedAt === undefined
    ? summary
    : `${summary} since the last fetch at ${formatTimestamp(lastFetchedAt)}`;
}
