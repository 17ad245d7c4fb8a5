import { isScope } from '../../model/scope.js';
import { toProjectPath } from '../../utils/path.js';
import { LodkeepError } from '../../errors.js';
import type { SidecarFragment } from '../../sidecar/fragment.js';
import { formatFragments } from '../formatters/terminal.js';
import { formatFragmentsJson } from '../formatters/json.js';
import { parseFormat, resolveTarget, withWorkspace, type BaseOptions } from '../context.js';

export interface ReadOptions extends BaseOptions {
  scope?: string;
  format?: string;
}

/** Prints stored descriptions from the sidecars, for people or for a model's context. */
export async function readCommand(target: string | undefined, opts: ReadOptions = {}): Promise<number> {
  const format = parseFormat(opts.format);
  if (opts.scope !== undefined && !isScope(opts.scope)) {
    throw new LodkeepError(`Unknown scope "${opts.scope}"`, 'INVALID_ARGUMENT', { scope: opts.scope });
  }
  const scope = opts.scope;

  return withWorkspace(opts.cwd, ws => {
    const absTarget = resolveTarget(opts.cwd, target);
    const prefix = absTarget ? toProjectPath(absTarget, ws.paths.root) : '';

    const fragments: Array<{ path: string; fragment: SidecarFragment }> = [];
    for (const path of ws.synchronizer.listSidecars()) {
      if (prefix && path !== prefix && !path.startsWith(`${prefix}/`)) continue;
      for (const fragment of ws.synchronizer.read(path)) {
        if (!scope || fragment.scope === scope) fragments.push({ path, fragment });
      }
    }

    console.log(format === 'json' ? formatFragmentsJson(fragments) : formatFragments(fragments));
    return 0;
  });
}
