import chalk from 'chalk';
import { discoverFiles, parseFiles } from '../../pipeline/discover.js';
import { needsAttention } from '../../model/record.js';
import { formatReport } from '../formatters/terminal.js';
import { formatReportJson } from '../formatters/json.js';
import { parseFormat, resolveTarget, withWorkspace, type BaseOptions } from '../context.js';

export interface StatusOptions extends BaseOptions {
  format?: string;
  failOnStale?: boolean;
}

export async function statusCommand(target: string | undefined, opts: StatusOptions = {}): Promise<number> {
  const format = parseFormat(opts.format);

  return withWorkspace(opts.cwd, async ws => {
    const files = await discoverFiles(ws.paths.root, ws.registry, resolveTarget(opts.cwd, target));
    const report = ws.tracker.checkBatch(parseFiles(ws.paths.root, ws.registry, files));

    if (format === 'json') {
      console.log(formatReportJson(report));
    } else {
      console.log('');
      console.log(formatReport(report));
      console.log('');
      if (needsAttention(report)) {
        console.log(chalk.dim('  Run `lodkeep generate` to describe new and changed entities.'));
        console.log('');
      }
    }

    const failOnStale = opts.failOnStale ?? ws.config.failOnStale;
    return failOnStale && needsAttention(report) ? 1 : 0;
  });
}
