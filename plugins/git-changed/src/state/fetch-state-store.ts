import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { FetchCacheState } from '../git/fetch-cache.js';
import { ConfigurationError } from '../shared/errors.js';

const persistedStateSchema = z.object({
  lastFetchedBranch: z.string().min(1),
  lastFetchedAt: z.number().int().nonnegative(),
});

// Keeps the fetch cache alive across runs when persist_fetch_state is enabled.
export class FetchStateStore {
  readonly filePath: string;

  constructor(projectDir: string, stateFile: string) {
    this.filePath = path.resolve(projectDir, stateFile);
  }

  async read(): Promise<FetchCacheState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return {};
      throw err;  // permission errors and the like
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(`Fetch state file is not valid JSON: ${this.filePath}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    const result = persistedStateSchema.safeParse(json);
    if (!result.success) {
      throw new ConfigurationError(`Fetch state file has an unexpected shape: ${this.filePath}`);
    }
    return result.data;
  }

  async write(state: FetchCacheState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf-8');
  }
}
