import { run, type ExecFn } from '../shared/exec.js';
import { ExternalToolError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

// Narrow seam over the git binary so tests can script output without spawning processes.
export interface GitRunner {
  run(args: readonly string[]): Promise<string[]>;
  // Unsplit stdout, for commands whose records are not newline-separated (`-z`).
  runRaw(args: readonly string[]): Promise<string>;
}

export interface CliGitRunnerOptions {
  cwd?: string;
  exec?: ExecFn;
}

export function splitLines(output: string): string[] {
  return output.split(/\r?\n/).filter(line => line.trim() !== '');
}

export function splitNul(output: string): string[] {
  return output.split('\0').filter(entry => entry !== '');
}

export class CliGitRunner implements GitRunner {
  private readonly cwd?: string;
  private readonly exec: ExecFn;

  constructor(options: CliGitRunnerOptions = {}) {
    this.cwd = options.cwd;
    this.exec = options.exec ?? run;
  }

  async run(args: readonly string[]): Promise<string[]> {
    return splitLines(await this.runRaw(args));
  }

  async runRaw(args: readonly string[]): Promise<string> {
    logger.debug({ args, cwd: this.cwd }, 'git');
    const result = await this.exec('git', args, { cwd: this.cwd });
    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        `git ${args[0] ?? ''} exited with ${result.exitCode}: ${result.stderr.trim() || result.stdout.trim()}`,
        { args: [...args], exitCode: result.exitCode, stderr: result.stderr }
      );
    }
    return result.stdout;
  }
}
