import { chmodSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import chalk from 'chalk';
import { GitBridge } from '../../git/bridge.js';
import { findProjectRoot, getPaths, loadConfig } from '../../config.js';
import { LodkeepError } from '../../errors.js';
import type { BaseOptions } from '../context.js';

export const HOOK_TYPES = ['pre-commit', 'pre-push'] as const;
export type HookType = (typeof HOOK_TYPES)[number];

const MARKER = '# installed by lodkeep';

export interface HookOptions extends BaseOptions {
  hookType?: string;
}

export function hookScript(hookType: HookType, autoUpdate: boolean): string {
  const lines = ['#!/bin/sh', `${MARKER} (${hookType})`];
  if (autoUpdate) lines.push('lodkeep generate || exit 1');
  lines.push('lodkeep validate --fail-on-stale', '');
  return lines.join('\n');
}

export async function hookCommand(action: string, opts: HookOptions = {}): Promise<number> {
  const hookType = opts.hookType ?? 'pre-commit';
  if (!isHookType(hookType)) {
    throw new LodkeepError(`Unknown hook type "${hookType}" (expected ${HOOK_TYPES.join(' or ')})`, 'INVALID_ARGUMENT');
  }

  const cwd = opts.cwd ?? process.cwd();
  const git = new GitBridge(cwd);
  if (!(await git.isRepo())) {
    throw new LodkeepError('Not inside a Git repository', 'NOT_A_REPOSITORY', { cwd });
  }
  const hookFile = join(await git.getHooksDir(), hookType);

  switch (action) {
    case 'install': {
      const config = loadConfig(getPaths(findProjectRoot(cwd)));
      if (existsSync(hookFile) && !readFileSync(hookFile, 'utf-8').includes(MARKER)) {
        throw new LodkeepError(`${hookFile} exists and was not installed by lodkeep`, 'HOOK_EXISTS', { hookFile });
      }
      mkdirSync(join(hookFile, '..'), { recursive: true });
      writeFileSync(hookFile, hookScript(hookType, config.autoUpdate), 'utf-8');
      chmodSync(hookFile, 0o755);
      console.log(chalk.green(`Installed ${hookType} hook`));
      return 0;
    }
    case 'uninstall': {
      if (!existsSync(hookFile) || !readFileSync(hookFile, 'utf-8').includes(MARKER)) {
        console.log(chalk.dim(`No lodkeep ${hookType} hook found`));
        return 0;
      }
      rmSync(hookFile);
      console.log(chalk.green(`Uninstalled ${hookType} hook`));
      return 0;
    }
    default:
      throw new LodkeepError(`Unknown hook action "${action}" (expected install or uninstall)`, 'INVALID_ARGUMENT');
  }
}

function isHookType(value: string): value is HookType {
  return (HOOK_TYPES as readonly string[]).includes(value);
}
