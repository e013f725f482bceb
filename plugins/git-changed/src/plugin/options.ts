import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { ConfigurationError } from '../shared/errors.js';

export interface PluginOptions {
  // Unset means the plugin is disabled for this run.
  branch?: string;
  fetchCacheSeconds: number;
  noFetch: boolean;
}

// Subset of git-check-ref-format rules that can be checked without calling git.
export function isValidBranchName(name: string): boolean {
  if (name.length === 0 || name === '@') return false;
  if (name.startsWith('-') || name.startsWith('/') || name.endsWith('/')) return false;
  if (name.endsWith('.') || name.endsWith('.lock')) return false;
  if (name.includes('..') || name.includes('//') || name.includes('@{')) return false;
  if (/[\x00-\x20\x7f~^:?*[\\]/.test(name)) return false;
  return name.split('/').every(part => !part.startsWith('.'));
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('must be an integer number of seconds');
  }
  return parseInt(value, 10);
}

export function registerOptions(command: Command, defaultFetchCacheSeconds: number): void {
  command
    .addOption(
      new Option('--changed-against-branch <branch>',
        'run only scenarios that have changed relative to the specified git branch')
    )
    .addOption(
      new Option('--changed-fetch-cache <seconds>',
        `duration to reuse the result of 'git fetch' (default: ${defaultFetchCacheSeconds} seconds)`)
        .argParser(parseInteger)
        .default(defaultFetchCacheSeconds)
    )
    .addOption(
      new Option('--changed-no-fetch', 'do not fetch the latest changes from the remote repository')
    );
}

const optionsSchema = z.object({
  changedAgainstBranch: z
    .string()
    .refine(isValidBranchName, {
      message: "Malformed branch name. Please provide a valid value for '--changed-against-branch'.",
    })
    .optional(),
  changedFetchCache: z
    .number({ invalid_type_error: "Please provide an integer value for '--changed-fetch-cache'." })
    .int()
    .nonnegative({
      message: "Cache duration must be non-negative. Please provide a valid value for '--changed-fetch-cache'.",
    }),
  changedNoFetch: z.boolean().optional(),
});

export function parsePluginOptions(
  raw: Readonly<Record<string, unknown>>,
  defaultFetchCacheSeconds: number
): PluginOptions {
  const result = optionsSchema.safeParse({
    changedAgainstBranch: raw['changedAgainstBranch'],
    changedFetchCache: raw['changedFetchCache'] ?? defaultFetchCacheSeconds,
    changedNoFetch: raw['changedNoFetch'],
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue?.message ?? 'Invalid git-changed options', {
      issues: result.error.issues.map(i => i.message),
    });
  }

  const { changedAgainstBranch, changedFetchCache, changedNoFetch = false } = result.data;
  if (changedNoFetch && changedFetchCache !== defaultFetchCacheSeconds) {
    throw new ConfigurationError(
      "The options '--changed-no-fetch' and '--changed-fetch-cache' cannot be used together. Please choose one."
    );
  }
  return { branch: changedAgainstBranch, fetchCacheSeconds: changedFetchCache, noFetch: changedNoFetch };
}
