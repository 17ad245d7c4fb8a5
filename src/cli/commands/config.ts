import chalk from 'chalk';
import { findProjectRoot, getPaths, loadConfig, saveConfig, setConfigValue } from '../../config.js';
import { LodkeepError } from '../../errors.js';
import type { BaseOptions } from '../context.js';

/** Prints the configuration, one value, or sets `key` to `value`. */
export async function configCommand(key: string | undefined, value: string | undefined, opts: BaseOptions = {}): Promise<number> {
  const paths = getPaths(findProjectRoot(opts.cwd));
  const config = loadConfig(paths);

  if (key === undefined) {
    console.log(JSON.stringify(config, null, 2));
    return 0;
  }

  if (value === undefined) {
    let current: unknown = config;
    for (const part of key.split('.')) {
      current = typeof current === 'object' && current !== null ? Object.entries(current).find(([k]) => k === part)?.[1] : undefined;
    }
    if (current === undefined) {
      throw new LodkeepError(`Configuration key ${key} is not set`, 'INVALID_ARGUMENT', { key });
    }
    console.log(typeof current === 'string' ? current : JSON.stringify(current));
    return 0;
  }

  saveConfig(setConfigValue(config, key, value), paths);
  console.log(chalk.green(`Set ${key} = ${value}`));
  return 0;
}
