import chalk from 'chalk';
import { discoverFiles, parseFiles } from '../../pipeline/discover.js';
import { shortFingerprint } from '../../utils/hash.js';
import { withWorkspace, type BaseOptions } from '../context.js';

/**
 * Rebuilds missing index records from the sidecars. Fingerprints that no
 * current entity has are seeded but listed as unverified.
 */
export async function recoverCommand(opts: BaseOptions = {}): Promise<number> {
  return withWorkspace(opts.cwd, async ws => {
    const files = await discoverFiles(ws.paths.root, ws.registry);
    const current = parseFiles(ws.paths.root, ws.registry, files).map(entity => entity.fingerprint);
    const result = ws.synchronizer.seedIndex({ currentFingerprints: current });

    console.log(chalk.green(`Seeded ${result.seeded} descriptions from ${result.files} sidecars`));
    if (result.skipped > 0) console.log(chalk.dim(`  ${result.skipped} already in the index`));
    if (result.unverified.length > 0) {
      console.log(chalk.yellow(`  ${result.unverified.length} match no current entity:`));
      for (const fp of result.unverified) console.log(chalk.dim(`    ${shortFingerprint(fp)}`));
    }
    return 0;
  });
}
