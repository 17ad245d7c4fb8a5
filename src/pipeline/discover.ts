import { existsSync, readFileSync, readdirSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { ParserRegistry } from '../parser/registry.js';
import type { ParsedEntity } from '../model/entity.js';
import { GitBridge } from '../git/bridge.js';
import { DATA_DIR } from '../config.js';
import { isOutsideProject, toProjectPath } from '../utils/path.js';
import { createLogger } from '../utils/logger.js';

const debug = createLogger('discover');

const SKIPPED_DIRS = new Set(['node_modules', 'dist', 'build', '__pycache__', 'target', 'vendor']);

/**
 * Project-relative source files under `target` (default: the whole project)
 * that a registered parser handles. Inside a git repository the file list
 * comes from git, so ignored files are skipped; elsewhere the tree is walked.
 */
export async function discoverFiles(root: string, registry: ParserRegistry, target?: string): Promise<string[]> {
  const absTarget = resolve(root, target ?? '.');
  if (!existsSync(absTarget)) return [];

  const rel = toProjectPath(absTarget, root);
  if (isOutsideProject(rel)) return [];

  if (statSync(absTarget).isFile()) {
    return registry.supports(rel) ? [rel] : [];
  }

  const git = new GitBridge(root);
  let files: string[];
  if (await git.isRepo()) {
    files = await git.listFiles(rel ? [rel] : []);
  } else {
    debug('%s is not a git repository, walking the tree', root);
    files = walk(absTarget, rel);
  }

  return files.filter(file => !file.startsWith(`${DATA_DIR}/`) && registry.supports(file)).sort();
}

function walk(dir: string, prefix: string): string[] {
  const results: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith('.') || SKIPPED_DIRS.has(entry.name)) continue;
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) results.push(...walk(join(dir, entry.name), rel));
    else if (entry.isFile()) results.push(rel);
  }
  return results;
}

/** Entities of every file, in file order. */
export function parseFiles(root: string, registry: ParserRegistry, files: string[]): ParsedEntity[] {
  return files.flatMap(file => registry.parseFile(readFileSync(join(root, file), 'utf-8'), file));
}
