import execa from 'execa';
import { ExternalToolError } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export type ExecFn = (command: string, args: readonly string[], options?: ExecOptions) => Promise<ExecResult>;

// No timeout: the caller waits for the child to exit, however long that takes.
export async function run(
  command: string,
  args: readonly string[],
  options?: ExecOptions
): Promise<ExecResult> {
  const result = await execa(command, [...args], {
    cwd: options?.cwd,
    env: options?.env,
    reject: false,
  }).catch((err: unknown) => {
    throw new ExternalToolError(`Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  });
  // With reject: false a missing binary resolves as a failed result with no exit code.
  if (result.failed && result.exitCode === undefined) {
    throw new ExternalToolError(`Command failed to spawn: ${command}`, {
      command: result.command,
    });
  }
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: result.exitCode,
  };
}
