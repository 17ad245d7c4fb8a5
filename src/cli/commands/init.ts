import { mkdirSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { HashIndex } from '../../storage/database.js';
import { GitBridge } from '../../git/bridge.js';
import { defaultConfig, getPaths, saveConfig, setConfigValue } from '../../config.js';
import type { BaseOptions } from '../context.js';

export interface InitOptions extends BaseOptions {
  provider?: string;
  languages?: string;
}

/** Creates `.lodkeep/` at the repository root (or the working directory outside git). */
export async function initCommand(opts: InitOptions = {}): Promise<number> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const git = new GitBridge(cwd);
  const root = (await git.isRepo()) ? await git.getRepoRoot() : cwd;
  const paths = getPaths(root);

  if (existsSync(paths.dataDir)) {
    console.log(chalk.yellow(`${paths.dataDir} already exists. Keeping its configuration.`));
  } else {
    let config = defaultConfig();
    if (opts.provider) config = setConfigValue(config, 'provider', opts.provider);
    if (opts.languages) config = setConfigValue(config, 'languages', opts.languages);
    mkdirSync(paths.sidecarDir, { recursive: true });
    saveConfig(config, paths);
  }

  mkdirSync(paths.sidecarDir, { recursive: true });
  const index = new HashIndex(paths.indexDb);
  try {
    index.setMetadata('schema_version', '1');
    if (!index.getMetadata('initialized_at')) {
      index.setMetadata('initialized_at', new Date().toISOString());
    }
  } finally {
    index.close();
  }

  console.log(chalk.green(`Initialized lodkeep in ${paths.dataDir}`));
  console.log(chalk.dim(`  Index: ${paths.indexDb}`));
  console.log(chalk.dim(`  Sidecars: ${paths.sidecarDir}`));
  return 0;
}
