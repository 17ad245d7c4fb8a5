import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { initCommand } from '../src/cli/commands/init.js';
import { generateCommand } from '../src/cli/commands/generate.js';
import { statusCommand } from '../src/cli/commands/status.js';
import { invalidateCommand } from '../src/cli/commands/invalidate.js';
import { recoverCommand } from '../src/cli/commands/recover.js';
import { cleanCommand } from '../src/cli/commands/clean.js';
import { loadConfig, getPaths } from '../src/config.js';
import type { GenerateSummary } from '../src/pipeline/generate.js';

describe('commands', () => {
  let root: string;
  let output: string[];

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'lodkeep-cli-'));
    writeFileSync(join(root, 'util.py'), 'def double(x):\n    return x * 2\n');
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it('initializes, generates and reports freshness', async () => {
    expect(await initCommand({ cwd: root, languages: 'python' })).toBe(0);
    expect(loadConfig(getPaths(root)).languages).toEqual(['python']);

    output = [];
    expect(await generateCommand(undefined, { cwd: root, format: 'json' })).toBe(0);
    const summary: GenerateSummary = JSON.parse(output.join('\n'));
    expect(summary.failed).toBe(0);
    expect(summary.generated).toBe(summary.entities);
    expect(existsSync(join(root, '.lodkeep', 'lod', 'util.py.lod'))).toBe(true);

    expect(await statusCommand(undefined, { cwd: root, failOnStale: true })).toBe(0);

    writeFileSync(join(root, 'util.py'), 'def double(x):\n    return x + x\n');
    expect(await statusCommand(undefined, { cwd: root, failOnStale: true })).toBe(1);
    expect(await statusCommand(undefined, { cwd: root })).toBe(0);
  });

  it('invalidates a file on request', async () => {
    await initCommand({ cwd: root });
    await generateCommand(undefined, { cwd: root });

    expect(await invalidateCommand('util.py', undefined, { cwd: root })).toBe(0);
    expect(await statusCommand(undefined, { cwd: root, failOnStale: true })).toBe(1);
  });

  it('refuses to invalidate a file outside the project', async () => {
    await initCommand({ cwd: root });
    const outside = mkdtempSync(join(tmpdir(), 'lodkeep-outside-'));
    writeFileSync(join(outside, 'other.py'), 'def other():\n    return 1\n');

    try {
      await expect(invalidateCommand(join(outside, 'other.py'), undefined, { cwd: root })).rejects.toThrow(
        'is outside the project',
      );
      expect(readdirSync(join(root, '.lodkeep', 'lod'))).toEqual([]);
    } finally {
      rmSync(outside, { recursive: true, force: true });
    }
  });

  it('recovers a lost index from the sidecars', async () => {
    await initCommand({ cwd: root });
    await generateCommand(undefined, { cwd: root });

    for (const suffix of ['', '-wal', '-shm']) {
      rmSync(join(root, '.lodkeep', `index.db${suffix}`), { force: true });
    }
    expect(await statusCommand(undefined, { cwd: root, failOnStale: true })).toBe(1);

    expect(await recoverCommand({ cwd: root })).toBe(0);
    expect(await statusCommand(undefined, { cwd: root, failOnStale: true })).toBe(0);
  });

  it('removes data only when forced', async () => {
    await initCommand({ cwd: root });

    expect(await cleanCommand({ cwd: root })).toBe(1);
    expect(existsSync(join(root, '.lodkeep'))).toBe(true);

    expect(await cleanCommand({ cwd: root, force: true })).toBe(0);
    expect(existsSync(join(root, '.lodkeep'))).toBe(false);
  });
});
