import { ChangedFilesResolver, systemClock, type Clock } from '../changed/resolver.js';
import { DEFAULT_CONFIG, type GitChangedConfig } from '../config/loader.js';
import { FetchCache } from '../git/fetch-cache.js';
import { CliGitRunner, type GitRunner } from '../git/runner.js';
import type { Dispatcher, Plugin } from '../host/dispatcher.js';
import type {
  ArgParseEvent,
  ArgParsedEvent,
  CleanupEvent,
  ConfigLoadedEvent,
  StartupEvent,
} from '../host/events.js';
import { filterScenarios } from '../scenarios/filter.js';
import { toRepoRelative } from '../scenarios/paths.js';
import { logger } from '../shared/logger.js';
import { FetchStateStore } from '../state/fetch-state-store.js';
import { parsePluginOptions, registerOptions, type PluginOptions } from './options.js';
import { buildNoChangesSummary } from './summary.js';

export interface GitChangedPluginDeps {
  gitFactory?: (projectDir: string) => GitRunner;
  clock?: Clock;
}

export class GitChangedPlugin implements Plugin {
  // Lives as long as the host process; only a successful fetch updates it.
  readonly cache = new FetchCache();

  private readonly gitFactory: (projectDir: string) => GitRunner;
  private readonly clock: Clock;

  private projectDir = process.cwd();
  private config: GitChangedConfig = DEFAULT_CONFIG;
  private options: PluginOptions | null = null;
  private resolver: ChangedFilesResolver | null = null;
  private noChanged = false;

  constructor(deps: GitChangedPluginDeps = {}) {
    this.gitFactory = deps.gitFactory ?? (cwd => new CliGitRunner({ cwd }));
    this.clock = deps.clock ?? systemClock;
  }

  subscribe(dispatcher: Dispatcher): void {
    dispatcher
      .listen('config-loaded', event => this.onConfigLoaded(event))
      .listen('arg-parse', event => this.onArgParse(event))
      .listen('arg-parsed', event => this.onArgParsed(event))
      .listen('startup', event => this.onStartup(event))
      .listen('cleanup', event => this.onCleanup(event));
  }

  onConfigLoaded(event: ConfigLoadedEvent): void {
    this.projectDir = event.projectDir;
    this.config = event.config;
    this.resolver = null;
  }

  onArgParse(event: ArgParseEvent): void {
    registerOptions(event.command, this.config.fetch_cache_seconds);
  }

  onArgParsed(event: ArgParsedEvent): void {
    this.options = parsePluginOptions(event.options, this.config.fetch_cache_seconds);
  }

  async onStartup(event: StartupEvent): Promise<void> {
    const branch = this.options?.branch;
    if (!this.options || branch === undefined) return;

    const { fetchCacheSeconds, noFetch } = this.options;
    const resolver = this.getResolver();
    const stateStore = this.getStateStore();
    if (stateStore) {
      this.cache.restore(await stateStore.read());
    }

    const repoRoot = await resolver.repoRoot();
    const changed = await resolver.resolve(branch, fetchCacheSeconds, { noFetch });
    const retained = filterScenarios(
      event.scheduler.scheduled,
      changed,
      p => toRepoRelative(repoRoot, this.projectDir, p)
    );
    event.scheduler.replace(retained);
    this.noChanged = retained.length === 0;

    logger.info(
      { branch, changedFiles: changed.size, scheduled: retained.length, discovered: event.scheduler.discovered.length },
      'filtered scenarios by git changes'
    );
  }

  async onCleanup(event: CleanupEvent): Promise<void> {
    const branch = this.options?.branch;
    if (branch === undefined) return;

    if (this.noChanged) {
      event.report.addSummary(buildNoChangesSummary(branch, this.cache.lastFetchedAt));
    }

    const stateStore = this.getStateStore();
    if (stateStore && this.cache.lastFetchedAt !== undefined) {
      await stateStore.write(this.cache.snapshot());
    }
  }

  private getResolver(): ChangedFilesResolver {
    if (!this.resolver) {
      this.resolver = new ChangedFilesResolver({
        git: this.gitFactory(this.projectDir),
        cache: this.cache,
        clock: this.clock,
        remote: this.config.remote,
      });
    }
    return this.resolver;
  }

  // Persistence only matters when fetching; --changed-no-fetch leaves the state file alone.
  private getStateStore(): FetchStateStore | null {
    if (!this.config.persist_fetch_state || this.options?.noFetch) return null;
    return new FetchStateStore(this.projectDir, this.config.state_file);
  }
}
