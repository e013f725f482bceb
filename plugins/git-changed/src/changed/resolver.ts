import type { GitRunner } from '../git/runner.js';
import { FetchCache } from '../git/fetch-cache.js';
import { fetchBranch, getRepoRoot, listChangedFiles } from '../git/repo.js';
import { logger } from '../shared/logger.js';

export type ChangedFileSet = ReadonlySet<string>;

// Seconds since the epoch.
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface ChangedFilesResolverOptions {
  git: GitRunner;
  cache?: FetchCache;
  clock?: Clock;
  remote?: string;
}

export interface ResolveOptions {
  // Diff against the existing remote-tracking ref without fetching.
  noFetch?: boolean;
}

export class ChangedFilesResolver {
  readonly cache: FetchCache;
  private readonly git: GitRunner;
  private readonly clock: Clock;
  private readonly remote: string;

  constructor(options: ChangedFilesResolverOptions) {
    this.git = options.git;
    this.cache = options.cache ?? new FetchCache();
    this.clock = options.clock ?? systemClock;
    this.remote = options.remote ?? 'origin';
  }

  get lastFetchedAt(): number | undefined {
    return this.cache.lastFetchedAt;
  }

  repoRoot(): Promise<string> {
    return getRepoRoot(this.git);
  }

  async resolve(branch: string, ttl: number, options: ResolveOptions = {}): Promise<ChangedFileSet> {
    if (!options.noFetch) {
      if (this.cache.shouldFetch(branch, this.clock(), ttl)) {
        logger.debug({ remote: this.remote, branch }, 'fetching target branch');
        // A failed fetch propagates; diffing against a stale ref is never attempted.
        await fetchBranch(this.git, this.remote, branch);
        this.cache.recordFetch(branch, this.clock());
      } else {
        logger.debug({ branch, lastFetchedAt: this.cache.lastFetchedAt, ttl }, 'reusing previous fetch');
      }
    }

    const files = await listChangedFiles(this.git, this.remote, branch);
    return new Set(files);
  }
}
