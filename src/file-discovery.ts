/**
 * File Discovery - expands input paths into the list of suite files
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { ConfigError } from './errors.js';

export interface DiscoveryOptions {
  /** Extensions of suite files, dot included */
  extensions: readonly string[];
  /** Globs skipped while walking directories */
  exclude?: readonly string[];
  /** Base for relative paths; defaults to the process working directory */
  cwd?: string;
}

const ALWAYS_IGNORED = ['**/node_modules/**', '**/.git/**'];

/**
 * Expand files and directories into a sorted, de-duplicated file list.
 * Files named explicitly are kept whatever their extension.
 *
 * @throws ConfigError when a path does not exist
 */
export async function discoverFiles(paths: readonly string[], options: DiscoveryOptions): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const found = new Set<string>();

  for (const input of paths) {
    const absolute = path.resolve(cwd, input);

    let stats: Stats;
    try {
      stats = await fs.stat(absolute);
    } catch (error) {
      throw new ConfigError(`Path does not exist: ${input}`, { cause: error });
    }

    if (stats.isFile()) {
      found.add(path.relative(cwd, absolute) || input);
      continue;
    }

    const matches = await glob(
      options.extensions.map(ext => `**/*${ext}`),
      {
        cwd: absolute,
        nodir: true,
        ignore: [...ALWAYS_IGNORED, ...(options.exclude ?? [])],
      }
    );
    for (const match of matches) {
      found.add(path.relative(cwd, path.join(absolute, match)));
    }
  }

  return [...found].sort();
}
