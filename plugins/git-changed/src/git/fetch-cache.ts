export interface FetchCacheState {
  lastFetchedBranch?: string;
  // whole seconds since the epoch
  lastFetchedAt?: number;
}

/**
 * Remembers the last successful `git fetch` so repeated runs inside the TTL
 * window skip the network round-trip. Only the fetch is cached; diff output is
 * always recomputed.
 */
export class FetchCache {
  private state: FetchCacheState = {};

  shouldFetch(branch: string, now: number, ttl: number): boolean {
    const { lastFetchedBranch, lastFetchedAt } = this.state;
    if (lastFetchedAt === undefined || lastFetchedBranch !== branch) return true;
    if (ttl === 0) return true;
    return now - lastFetchedAt >= ttl;
  }

  // Call only after the fetch succeeded.
  recordFetch(branch: string, now: number): void {
    this.state = { lastFetchedBranch: branch, lastFetchedAt: now };
  }

  get lastFetchedAt(): number | undefined {
    return this.state.lastFetchedAt;
  }

  snapshot(): FetchCacheState {
    return { ...this.state };
  }

  restore(state: FetchCacheState): void {
    this.state = { ...state };
  }
}
