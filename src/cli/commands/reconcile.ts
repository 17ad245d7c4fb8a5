import { existsSync } from 'node:fs';
import { join } from 'node:path';
import chalk from 'chalk';
import { discoverFiles } from '../../pipeline/discover.js';
import { resolveTarget, withWorkspace, type BaseOptions } from '../context.js';

/**
 * Rewrites sidecars from the index. Without a path, sidecars whose source
 * file is gone are reconciled too, which drops their fragments.
 */
export async function reconcileCommand(target: string | undefined, opts: BaseOptions = {}): Promise<number> {
  return withWorkspace(opts.cwd, async ws => {
    const files = new Set(await discoverFiles(ws.paths.root, ws.registry, resolveTarget(opts.cwd, target)));
    if (!target) {
      for (const source of ws.synchronizer.listSidecars()) {
        if (!existsSync(join(ws.paths.root, source))) files.add(source);
      }
    }

    let written = 0;
    for (const file of [...files].sort()) {
      const result = ws.synchronizer.reconcile(file);
      if (result.written) {
        written++;
        console.log(chalk.dim(`  ${result.sourcePath}: ${result.fragments} fragments`));
      }
    }

    console.log(chalk.green(`Reconciled ${files.size} files, ${written} sidecars updated`));
    return 0;
  });
}
