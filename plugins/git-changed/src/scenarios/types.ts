// A single test case unit owned by the host. The plugin reads it and never mutates it.
export interface Scenario {
  id: string;
  // Absolute, cwd-relative or repository-relative source paths backing the scenario.
  paths: readonly string[];
}
