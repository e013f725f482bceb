import { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import { Dispatcher, type Plugin } from '../host/dispatcher.js';
import { RunReport } from '../host/report.js';
import { GitChangedPlugin } from '../plugin/git-changed-plugin.js';
import { discoverScenarios } from '../scenarios/discovery.js';
import { ScenarioScheduler } from '../scenarios/scheduler.js';

export interface CliOptions {
  projectDir?: string;
  plugins?: Plugin[];
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

const VERSION = '0.1.0';

/**
 * Minimal host: loads the project config, lets plugins register their options
 * on `run`, discovers scenario files and prints the ones left scheduled after
 * startup. Summary lines from the report go to stderr.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<void> {
  const projectDir = options.projectDir ?? process.cwd();
  const stdout = options.stdout ?? ((line: string) => process.stdout.write(line + '\n'));
  const stderr = options.stderr ?? ((line: string) => process.stderr.write(line + '\n'));

  const dispatcher = new Dispatcher();
  for (const plugin of options.plugins ?? [new GitChangedPlugin()]) {
    dispatcher.register(plugin);
  }

  const { config } = await loadConfig(projectDir);
  await dispatcher.fire('config-loaded', { projectDir, config });

  const program = new Command('git-changed')
    .description('List the scenarios whose files changed relative to a git branch')
    .version(VERSION)
    .exitOverride();

  const run = program
    .command('run')
    .description(`Print the scenarios under '${config.scenarios_dir}' that should run, one per line`);
  await dispatcher.fire('arg-parse', { command: run });

  run.action(async () => {
    await dispatcher.fire('arg-parsed', { options: run.opts() });

    const scenarios = await discoverScenarios({
      projectDir,
      scenariosDir: config.scenarios_dir,
      patterns: config.scenario_patterns,
    });
    const scheduler = new ScenarioScheduler(scenarios);
    await dispatcher.fire('startup', { scheduler });

    for (const scenario of scheduler.scheduled) {
      stdout(scenario.id);
    }

    const report = new RunReport();
    await dispatcher.fire('cleanup', { report });
    for (const line of report.summary) {
      stderr(line);
    }
  });

  await program.parseAsync([...argv]);
}
