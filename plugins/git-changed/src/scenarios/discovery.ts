import path from 'path';
import fg from 'fast-glob';
import type { Scenario } from './types.js';

export interface DiscoverOptions {
  projectDir: string;
  scenariosDir: string;
  patterns: readonly string[];
}

// One scenario per file; its id is the path relative to the project directory.
export async function discoverScenarios(options: DiscoverOptions): Promise<Scenario[]> {
  const root = path.resolve(options.projectDir, options.scenariosDir);
  const files = await fg([...options.patterns], {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    ignore: ['**/node_modules/**'],
  });
  return files
    .sort()
    .map(file => ({
      id: path.relative(options.projectDir, file).split(path.sep).join('/'),
      paths: [file],
    }));
}
