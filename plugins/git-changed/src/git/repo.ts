import { splitNul, type GitRunner } from './runner.js';
import { ExternalToolError } from '../shared/errors.js';

// Added, copied, modified, type-changed and renamed. Deleted files cannot back a scenario.
const DIFF_FILTER = '--diff-filter=ACMTR';

// Returns the absolute path of the repository root containing the runner's cwd.
export async function getRepoRoot(git: GitRunner): Promise<string> {
  let lines: string[];
  try {
    lines = await git.run(['rev-parse', '--show-toplevel']);
  } catch (err) {
    throw new ExternalToolError(
      'Unable to find a git repository in the current or any parent directory',
      { cause: err instanceof Error ? err.message : String(err) }
    );
  }
  const root = lines[0]?.trim();
  if (!root) {
    throw new ExternalToolError('git rev-parse --show-toplevel returned no repository root');
  }
  return root;
}

export async function fetchBranch(git: GitRunner, remote: string, branch: string): Promise<void> {
  try {
    await git.run(['fetch', remote, branch]);
  } catch (err) {
    throw new ExternalToolError(
      `git fetch of '${remote}/${branch}' failed; check the remote settings, credentials and network connectivity`,
      { cause: err instanceof Error ? err.message : String(err) }
    );
  }
}

// Paths are relative to the repository root regardless of the cwd git runs in.
// -z keeps them verbatim; otherwise core.quotePath C-quotes non-ASCII names.
export async function listChangedFiles(git: GitRunner, remote: string, branch: string): Promise<string[]> {
  try {
    return splitNul(await git.runRaw(['diff', '--name-only', '-z', DIFF_FILTER, `${remote}/${branch}...HEAD`]));
  } catch (err) {
    throw new ExternalToolError(
      `Failed to list files changed against '${remote}/${branch}'; check that the branch exists on the remote`,
      { cause: err instanceof Error ? err.message : String(err) }
    );
  }
}
