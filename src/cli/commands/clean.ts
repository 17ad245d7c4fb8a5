import { rmSync } from 'node:fs';
import chalk from 'chalk';
import { findProjectRoot, getPaths } from '../../config.js';
import type { BaseOptions } from '../context.js';

export interface CleanOptions extends BaseOptions {
  force?: boolean;
}

/** Deletes `.lodkeep/`: configuration, index and sidecars. */
export async function cleanCommand(opts: CleanOptions = {}): Promise<number> {
  const paths = getPaths(findProjectRoot(opts.cwd));

  if (!opts.force) {
    console.error(chalk.yellow(`This removes ${paths.dataDir} and everything in it. Re-run with --force to proceed.`));
    return 1;
  }

  rmSync(paths.dataDir, { recursive: true, force: true });
  console.log(chalk.green(`Removed ${paths.dataDir}`));
  return 0;
}
