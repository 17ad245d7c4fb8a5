import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { parseFiles } from '../../pipeline/discover.js';
import { isOutsideProject, toProjectPath } from '../../utils/path.js';
import { LodkeepError } from '../../errors.js';
import { withWorkspace, type BaseOptions } from '../context.js';

/**
 * Marks the descriptions of `file` (or of one entity in it) stale so the next
 * `generate` replaces them.
 */
export async function invalidateCommand(file: string, name: string | undefined, opts: BaseOptions = {}): Promise<number> {
  return withWorkspace(opts.cwd, ws => {
    const relPath = toProjectPath(resolve(opts.cwd ?? process.cwd(), file), ws.paths.root);
    if (isOutsideProject(relPath)) {
      throw new LodkeepError(`${file} is outside the project at ${ws.paths.root}`, 'INVALID_ARGUMENT', { file });
    }
    if (!existsSync(resolve(ws.paths.root, relPath))) {
      throw new LodkeepError(`No such file: ${file}`, 'INVALID_ARGUMENT', { file });
    }

    const entities = parseFiles(ws.paths.root, ws.registry, [relPath]).filter(e => !name || e.name === name);
    if (name && entities.length === 0) {
      throw new LodkeepError(`No entity named ${name} in ${relPath}`, 'INVALID_ARGUMENT', { file: relPath, name });
    }

    let invalidated = 0;
    for (const entity of entities) {
      if (ws.tracker.invalidate(entity.fingerprint)) invalidated++;
    }
    ws.synchronizer.reconcile(relPath, parseFiles(ws.paths.root, ws.registry, [relPath]));

    console.log(invalidated > 0
      ? chalk.yellow(`Marked ${invalidated} description${invalidated === 1 ? '' : 's'} stale in ${relPath}`)
      : chalk.dim(`No stored descriptions to invalidate in ${relPath}`));
    return 0;
  });
}
