export { GitChangedPlugin, type GitChangedPluginDeps } from './plugin/git-changed-plugin.js';
export { parsePluginOptions, registerOptions, isValidBranchName, type PluginOptions } from './plugin/options.js';
export { buildNoChangesSummary } from './plugin/summary.js';
export { ChangedFilesResolver, systemClock, type ChangedFileSet, type Clock } from './changed/resolver.js';
export { FetchCache, type FetchCacheState } from './git/fetch-cache.js';
export { CliGitRunner, type GitRunner } from './git/runner.js';
export { filterScenarios } from './scenarios/filter.js';
export { toRepoRelative, normalizeRepoPath } from './scenarios/paths.js';
export { ScenarioScheduler } from './scenarios/scheduler.js';
export type { Scenario } from './scenarios/types.js';
export { Dispatcher, type Plugin } from './host/dispatcher.js';
export type {
  ArgParseEvent,
  ArgParsedEvent,
  CleanupEvent,
  ConfigLoadedEvent,
  HostEventName,
  HostEvents,
  StartupEvent,
} from './host/events.js';
export { RunReport } from './host/report.js';
export { loadConfig, DEFAULT_CONFIG, type GitChangedConfig } from './config/loader.js';
export { FetchStateStore } from './state/fetch-state-store.js';
export { GitChangedError, GitChangedErrorCode, ExternalToolError, ConfigurationError } from './shared/errors.js';
export { runCli, type CliOptions } from './cli/program.js';
