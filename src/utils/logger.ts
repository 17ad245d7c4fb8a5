import registerDebug from 'debug';

/**
 * Diagnostic loggers, one namespace per area. Silent unless enabled with
 * `DEBUG=lodkeep:*` (or a narrower pattern such as `DEBUG=lodkeep:index`).
 */
export function createLogger(area: string): registerDebug.Debugger {
  return registerDebug(`lodkeep:${area}`);
}
