import type { Command } from 'commander';
import type { GitChangedConfig } from '../config/loader.js';
import type { ScenarioScheduler } from '../scenarios/scheduler.js';
import type { RunReport } from './report.js';

export interface ConfigLoadedEvent {
  readonly projectDir: string;
  readonly config: GitChangedConfig;
}

export interface ArgParseEvent {
  // The host's `run` command; plugins add their options to it.
  readonly command: Command;
}

export interface ArgParsedEvent {
  readonly options: Readonly<Record<string, unknown>>;
}

export interface StartupEvent {
  readonly scheduler: ScenarioScheduler;
}

export interface CleanupEvent {
  readonly report: RunReport;
}

export interface HostEvents {
  'config-loaded': ConfigLoadedEvent;
  'arg-parse': ArgParseEvent;
  'arg-parsed': ArgParsedEvent;
  startup: StartupEvent;
  cleanup: CleanupEvent;
}

export type HostEventName = keyof HostEvents;

export type HostHandler<K extends HostEventName> = (event: HostEvents[K]) => void | Promise<void>;
