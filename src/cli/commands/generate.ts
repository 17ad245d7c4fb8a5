import chalk from 'chalk';
import { discoverFiles } from '../../pipeline/discover.js';
import { generateDescriptions } from '../../pipeline/generate.js';
import { createGenerator } from '../../generator/registry.js';
import { isProvider } from '../../generator/generator.js';
import { isScope } from '../../model/scope.js';
import { ConfigError, LodkeepError } from '../../errors.js';
import { formatSummary } from '../formatters/terminal.js';
import { formatSummaryJson } from '../formatters/json.js';
import { parseFormat, resolveTarget, withWorkspace, type BaseOptions } from '../context.js';

export interface GenerateOptions extends BaseOptions {
  force?: boolean;
  scope?: string;
  provider?: string;
  context?: string;
  format?: string;
}

export async function generateCommand(target: string | undefined, opts: GenerateOptions = {}): Promise<number> {
  const format = parseFormat(opts.format);
  if (opts.scope !== undefined && !isScope(opts.scope)) {
    throw new LodkeepError(`Unknown scope "${opts.scope}"`, 'INVALID_ARGUMENT', { scope: opts.scope });
  }
  const scope = opts.scope;

  return withWorkspace(opts.cwd, async ws => {
    const provider = opts.provider ?? ws.config.provider;
    if (!isProvider(provider)) {
      throw new ConfigError(`Unknown provider "${provider}"`, { provider });
    }

    const files = await discoverFiles(ws.paths.root, ws.registry, resolveTarget(opts.cwd, target));
    if (files.length === 0) {
      console.log(chalk.dim('No source files found.'));
      return 0;
    }

    const controller = new AbortController();
    const onSigint = () => controller.abort(new Error('interrupted'));
    process.once('SIGINT', onSigint);

    try {
      const summary = await generateDescriptions(
        {
          root: ws.paths.root,
          config: ws.config,
          registry: ws.registry,
          tracker: ws.tracker,
          synchronizer: ws.synchronizer,
          generator: createGenerator(provider),
        },
        { files, force: opts.force, scope, context: opts.context, signal: controller.signal },
      );

      console.log(format === 'json' ? formatSummaryJson(summary) : formatSummary(summary));
      return summary.failed > summary.placeholders || summary.aborted ? 1 : 0;
    } finally {
      process.off('SIGINT', onSigint);
    }
  });
}
