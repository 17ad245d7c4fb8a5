import { resolve } from 'node:path';
import chalk from 'chalk';
import { HashIndex } from '../storage/database.js';
import { StalenessTracker } from '../staleness/tracker.js';
import { SidecarSynchronizer } from '../sidecar/synchronizer.js';
import { createDefaultRegistry } from '../parser/plugins/index.js';
import type { ParserRegistry } from '../parser/registry.js';
import { findProjectRoot, getPaths, loadConfig, type LodkeepConfig, type LodkeepPaths } from '../config.js';
import { LodkeepError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const debug = createLogger('cli');

export type OutputFormat = 'terminal' | 'json';

export interface BaseOptions {
  cwd?: string;
}

/** Everything a command needs, wired from the project's configuration. */
export interface Workspace {
  paths: LodkeepPaths;
  config: LodkeepConfig;
  index: HashIndex;
  tracker: StalenessTracker;
  registry: ParserRegistry;
  synchronizer: SidecarSynchronizer;
  close(): void;
}

export function openWorkspace(cwd = process.cwd()): Workspace {
  const paths = getPaths(findProjectRoot(cwd));
  const config = loadConfig(paths);
  const index = new HashIndex(paths.indexDb);
  const tracker = new StalenessTracker(index, { historyLimit: config.historyLimit });
  const registry = createDefaultRegistry(config.languages);
  const synchronizer = new SidecarSynchronizer({
    projectRoot: paths.root,
    sidecarDir: paths.sidecarDir,
    index,
    tracker,
    registry,
  });

  debug('opened workspace at %s', paths.root);
  return { paths, config, index, tracker, registry, synchronizer, close: () => index.close() };
}

export async function withWorkspace<T>(cwd: string | undefined, fn: (ws: Workspace) => Promise<T> | T): Promise<T> {
  const ws = openWorkspace(cwd);
  try {
    return await fn(ws);
  } finally {
    ws.close();
  }
}

/** A path argument as typed, resolved against the working directory. */
export function resolveTarget(cwd: string | undefined, target: string | undefined): string | undefined {
  return target === undefined ? undefined : resolve(cwd ?? process.cwd(), target);
}

export function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'terminal' || value === 'json') return value ?? 'terminal';
  throw new LodkeepError(`Unknown format "${value}" (expected terminal or json)`, 'INVALID_ARGUMENT', { value });
}

/**
 * Runs a command action: known errors print in red on stderr, anything else
 * with its stack under DEBUG. The returned code becomes the exit code.
 */
export async function runAction(action: () => Promise<number | void>): Promise<void> {
  try {
    const code = await action();
    if (typeof code === 'number' && code !== 0) process.exitCode = code;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${message}`));
    if (!(err instanceof LodkeepError)) debug('%O', err);
    process.exitCode = 1;
  }
}
