import type { Scenario } from './types.js';

// The host's view of what will run. Plugins narrow it during startup.
export class ScenarioScheduler<T extends Scenario = Scenario> {
  readonly discovered: readonly T[];
  private queue: T[];

  constructor(scenarios: readonly T[]) {
    this.discovered = [...scenarios];
    this.queue = [...scenarios];
  }

  get scheduled(): readonly T[] {
    return this.queue;
  }

  replace(scenarios: readonly T[]): void {
    this.queue = [...scenarios];
  }
}
