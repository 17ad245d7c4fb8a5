import chalk from 'chalk';
import { discoverFiles, parseFiles } from '../../pipeline/discover.js';
import { needsAttention } from '../../model/record.js';
import { formatCounts } from '../formatters/terminal.js';
import { formatReportJson } from '../formatters/json.js';
import { parseFormat, resolveTarget, withWorkspace, type BaseOptions } from '../context.js';

export interface ValidateOptions extends BaseOptions {
  format?: string;
  failOnStale?: boolean;
}

/** One-line freshness verdict for hooks and CI. */
export async function validateCommand(target: string | undefined, opts: ValidateOptions = {}): Promise<number> {
  const format = parseFormat(opts.format);

  return withWorkspace(opts.cwd, async ws => {
    const files = await discoverFiles(ws.paths.root, ws.registry, resolveTarget(opts.cwd, target));
    const report = ws.tracker.checkBatch(parseFiles(ws.paths.root, ws.registry, files));

    if (format === 'json') {
      console.log(formatReportJson(report));
    } else if (needsAttention(report)) {
      console.log(chalk.yellow(`${report.entries.length} entities need descriptions (${report.stale} stale, ${report.unknown} undescribed)`));
      console.log(formatCounts(report));
    } else {
      console.log(chalk.green('All descriptions are fresh'));
    }

    const failOnStale = opts.failOnStale ?? ws.config.failOnStale;
    return failOnStale && needsAttention(report) ? 1 : 0;
  });
}
