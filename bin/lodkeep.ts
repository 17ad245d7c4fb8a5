#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from '../src/cli/commands/init.js';
import { generateCommand } from '../src/cli/commands/generate.js';
import { statusCommand } from '../src/cli/commands/status.js';
import { validateCommand } from '../src/cli/commands/validate.js';
import { invalidateCommand } from '../src/cli/commands/invalidate.js';
import { reconcileCommand } from '../src/cli/commands/reconcile.js';
import { readCommand } from '../src/cli/commands/read.js';
import { recoverCommand } from '../src/cli/commands/recover.js';
import { hookCommand } from '../src/cli/commands/hook.js';
import { configCommand } from '../src/cli/commands/config.js';
import { cleanCommand } from '../src/cli/commands/clean.js';
import { runAction } from '../src/cli/context.js';

const program = new Command();

program
  .name('lodkeep')
  .description('Keep generated descriptions of code entities in sync with the code')
  .version('0.1.0');

program
  .command('init')
  .description('Initialize lodkeep in the current repository')
  .option('-p, --provider <provider>', 'Description provider: mock or anthropic')
  .option('-l, --languages <list>', 'Comma-separated languages to describe')
  .action(async (opts) => {
    await runAction(() => initCommand({ provider: opts.provider, languages: opts.languages }));
  });

program
  .command('generate [path]')
  .description('Generate descriptions for new and changed entities')
  .option('--force', 'Regenerate descriptions that are still fresh')
  .option('-s, --scope <scope>', 'Only generate for one scope: module, class or function')
  .option('-p, --provider <provider>', 'Override the configured provider')
  .option('-c, --context <text>', 'Extra context passed to the generator')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .action(async (path: string | undefined, opts) => {
    await runAction(() =>
      generateCommand(path, {
        force: opts.force,
        scope: opts.scope,
        provider: opts.provider,
        context: opts.context,
        format: opts.format,
      }),
    );
  });

program
  .command('status [path]')
  .description('Show which entities have fresh, stale or missing descriptions')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .option('--fail-on-stale', 'Exit with status 1 if any entity needs a description')
  .action(async (path: string | undefined, opts) => {
    await runAction(() => statusCommand(path, { format: opts.format, failOnStale: opts.failOnStale }));
  });

program
  .command('validate [path]')
  .description('Check description freshness (for hooks and CI)')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .option('--fail-on-stale', 'Exit with status 1 if any entity needs a description')
  .action(async (path: string | undefined, opts) => {
    await runAction(() => validateCommand(path, { format: opts.format, failOnStale: opts.failOnStale }));
  });

program
  .command('invalidate <file> [name]')
  .description('Mark the descriptions of a file, or one entity in it, stale')
  .action(async (file: string, name: string | undefined) => {
    await runAction(() => invalidateCommand(file, name));
  });

program
  .command('reconcile [path]')
  .description('Rewrite sidecar files from the index')
  .action(async (path: string | undefined) => {
    await runAction(() => reconcileCommand(path));
  });

program
  .command('read [path]')
  .description('Print stored descriptions')
  .option('-s, --scope <scope>', 'Only show one scope')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .action(async (path: string | undefined, opts) => {
    await runAction(() => readCommand(path, { scope: opts.scope, format: opts.format }));
  });

program
  .command('recover')
  .description('Seed a lost or rebuilt index from the sidecar files')
  .action(async () => {
    await runAction(() => recoverCommand());
  });

program
  .command('hook <action>')
  .description('Install or uninstall the git hook (install | uninstall)')
  .option('-t, --hook-type <type>', 'pre-commit or pre-push', 'pre-commit')
  .action(async (action: string, opts) => {
    await runAction(() => hookCommand(action, { hookType: opts.hookType }));
  });

program
  .command('config [key] [value]')
  .description('Show or change configuration (e.g. config provider anthropic)')
  .action(async (key: string | undefined, value: string | undefined) => {
    await runAction(() => configCommand(key, value));
  });

program
  .command('clean')
  .description('Remove all lodkeep data')
  .option('--force', 'Required: confirm removal')
  .action(async (opts) => {
    await runAction(() => cleanCommand({ force: opts.force }));
  });

await program.parseAsync();
