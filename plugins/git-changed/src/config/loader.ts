// Config loader: reads <projectDir>/git-changed.yaml and validates it against the schema below.
// A missing file yields the defaults; unset keys inherit defaults through zod.
import { readFile } from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const CONFIG_FILE_NAME = 'git-changed.yaml';

export const DEFAULT_FETCH_CACHE_SECONDS = 60;

export const configSchema = z
  .object({
    remote: z.string().min(1).default('origin'),
    fetch_cache_seconds: z.number().int().nonnegative().default(DEFAULT_FETCH_CACHE_SECONDS),
    persist_fetch_state: z.boolean().default(false),
    state_file: z.string().min(1).default('.git-changed/fetch-state.json'),
    scenarios_dir: z.string().min(1).default('scenarios'),
    scenario_patterns: z.array(z.string().min(1)).min(1).default(['**/*.ts', '**/*.js']),
  })
  .strict();

export type GitChangedConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: GitChangedConfig = configSchema.parse({});

export interface ConfigResult {
  config: GitChangedConfig;
  configPath: string;
  found: boolean;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export async function loadConfig(projectDir: string): Promise<ConfigResult> {
  const configPath = path.join(projectDir, CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug({ configPath }, 'no config file, using defaults');
      return { config: { ...DEFAULT_CONFIG }, configPath, found: false };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const result = configSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid config in ${configPath}: ${formatIssues(result.error)}`);
  }
  return { config: result.data, configPath, found: true };
}
