import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { HashIndex } from '../src/storage/database.js';
import { StalenessTracker } from '../src/staleness/tracker.js';
import { SidecarSynchronizer } from '../src/sidecar/synchronizer.js';
import { ParserRegistry } from '../src/parser/registry.js';
import type { SourceParserPlugin } from '../src/parser/plugin.js';
import type { DescriptionGenerator } from '../src/generator/generator.js';
import { defaultConfig, type LodkeepConfig } from '../src/config.js';
import { discoverFiles } from '../src/pipeline/discover.js';
import { generateDescriptions, type EntityOutcome, type PipelineDeps } from '../src/pipeline/generate.js';
import { fingerprint } from '../src/utils/hash.js';
import type { ParsedEntity } from '../src/model/entity.js';

/** One function per `name: body` line. */
class LinePlugin implements SourceParserPlugin {
  id = 'lines';
  extensions = ['.fake'];

  extractEntities(content: string, filePath: string): ParsedEntity[] {
    return content.split('\n').flatMap((line, i): ParsedEntity[] => {
      const match = /^(\w+): (.*)$/.exec(line);
      if (!match) return [];
      const [, name, body] = match;
      return [
        {
          scope: 'function',
          name,
          filePath,
          startLine: i + 1,
          endLine: i + 1,
          source: body,
          language: 'fake',
          fingerprint: fingerprint(body, 'fake'),
        },
      ];
    });
  }
}

class RecordingGenerator implements DescriptionGenerator {
  readonly provider = 'mock' as const;
  readonly calls: string[] = [];
  readonly failOn = new Set<string>();
  during?: (entity: ParsedEntity) => void;

  async generate(entity: ParsedEntity): Promise<string> {
    this.calls.push(entity.name);
    this.during?.(entity);
    if (this.failOn.has(entity.name)) throw new Error(`no model for ${entity.name}`);
    return `Describes ${entity.name}: ${entity.source}`;
  }

  async generateBatch(entities: ParsedEntity[]): Promise<string[]> {
    return Promise.all(entities.map(entity => this.generate(entity)));
  }
}

const MATH = 'add: a + b\nsub: a - b\n';

describe('generateDescriptions', () => {
  let root: string;
  let index: HashIndex;
  let tracker: StalenessTracker;
  let synchronizer: SidecarSynchronizer;
  let generator: RecordingGenerator;
  let registry: ParserRegistry;

  const write = (file: string, content: string) => {
    mkdirSync(dirname(join(root, file)), { recursive: true });
    writeFileSync(join(root, file), content);
  };

  const deps = (config: Partial<LodkeepConfig> = {}): PipelineDeps => ({
    root,
    config: { ...defaultConfig(), maxParallelism: 2, ...config },
    registry,
    tracker,
    synchronizer,
    generator,
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'lodkeep-pipeline-'));
    index = new HashIndex(':memory:');
    tracker = new StalenessTracker(index);
    registry = new ParserRegistry();
    registry.register(new LinePlugin());
    synchronizer = new SidecarSynchronizer({
      projectRoot: root,
      sidecarDir: join(root, '.lodkeep', 'lod'),
      index,
      tracker,
      registry,
    });
    generator = new RecordingGenerator();
    write('math.fake', MATH);
  });

  afterEach(() => {
    index.close();
    rmSync(root, { recursive: true, force: true });
  });

  it('generates once and skips fresh entities afterwards', async () => {
    const first = await generateDescriptions(deps(), { files: ['math.fake'] });
    expect(first).toEqual({
      files: 1,
      entities: 2,
      generated: 2,
      skipped: 0,
      failed: 0,
      placeholders: 0,
      conflicts: 0,
      sidecarsWritten: 1,
      aborted: false,
      errors: [],
    });
    expect(synchronizer.read('math.fake').map(f => f.description)).toEqual([
      'Describes add: a + b',
      'Describes sub: a - b',
    ]);

    const second = await generateDescriptions(deps(), { files: ['math.fake'] });
    expect(second).toMatchObject({ generated: 0, skipped: 2, sidecarsWritten: 0 });
    expect(generator.calls.sort()).toEqual(['add', 'sub']);
  });

  it('regenerates only edited entities and reuses descriptions on revert', async () => {
    await generateDescriptions(deps(), { files: ['math.fake'] });

    write('math.fake', 'add: a + b + 0\nsub: a - b\n');
    const edited = await generateDescriptions(deps(), { files: ['math.fake'] });
    expect(edited).toMatchObject({ generated: 1, skipped: 1 });

    write('math.fake', MATH);
    const reverted = await generateDescriptions(deps(), { files: ['math.fake'] });
    expect(reverted).toMatchObject({ generated: 0, skipped: 2, sidecarsWritten: 1 });
    expect(generator.calls).toHaveLength(3);

    const add = { scope: 'function' as const, name: 'add', filePath: 'math.fake' };
    expect(tracker.describe(add, fingerprint('a + b', 'fake'))).toBe('Describes add: a + b');
    expect(index.getIdentity('math.fake::function::add')?.fingerprint).toBe(fingerprint('a + b', 'fake'));
  });

  it('isolates failures', async () => {
    generator.failOn.add('sub');
    const summary = await generateDescriptions(deps(), { files: ['math.fake'] });

    expect(summary).toMatchObject({ generated: 1, failed: 1, placeholders: 0 });
    expect(summary.errors).toEqual([{ path: 'math.fake', scope: 'function', name: 'sub', message: 'no model for sub' }]);
    expect(synchronizer.read('math.fake').map(f => f.name)).toEqual(['add']);
  });

  it('records placeholders for failures when configured', async () => {
    generator.failOn.add('sub');
    const summary = await generateDescriptions(deps({ placeholderOnFailure: true }), { files: ['math.fake'] });

    expect(summary).toMatchObject({ generated: 1, failed: 1, placeholders: 1 });
    expect(index.get(fingerprint('a - b', 'fake'))?.description).toBe('Function sub in fake.');
  });

  it('regenerates fresh entities when forced', async () => {
    await generateDescriptions(deps(), { files: ['math.fake'] });
    const forced = await generateDescriptions(deps(), { files: ['math.fake'], force: true });

    expect(forced).toMatchObject({ generated: 2, skipped: 0 });
    expect(generator.calls).toHaveLength(4);
  });

  it('limits generation to one scope', async () => {
    const summary = await generateDescriptions(deps(), { files: ['math.fake'], scope: 'module' });
    expect(summary).toMatchObject({ entities: 2, generated: 0, skipped: 0 });
    expect(generator.calls).toEqual([]);
  });

  it('discards descriptions whose record was invalidated meanwhile', async () => {
    await generateDescriptions(deps(), { files: ['math.fake'] });
    generator.during = entity => tracker.invalidate(entity.fingerprint);

    const summary = await generateDescriptions(deps(), { files: ['math.fake'], force: true });
    expect(summary).toMatchObject({ generated: 0, conflicts: 2 });
    expect(index.get(fingerprint('a + b', 'fake'))).toMatchObject({ description: 'Describes add: a + b', stale: true });
  });

  it('regenerates entities invalidated before the run', async () => {
    await generateDescriptions(deps(), { files: ['math.fake'] });
    const add = fingerprint('a + b', 'fake');

    for (let i = 0; i < 50; i++) {
      tracker.invalidate(add);
      const summary = await generateDescriptions(deps(), { files: ['math.fake'] });
      expect(summary).toMatchObject({ generated: 1, skipped: 1, conflicts: 0 });
    }
    expect(index.get(add)?.stale).toBe(false);
  });

  it('stops starting work once aborted', async () => {
    const controller = new AbortController();
    generator.during = () => controller.abort();

    const summary = await generateDescriptions(deps({ maxParallelism: 1 }), {
      files: ['math.fake'],
      signal: controller.signal,
    });
    expect(summary).toMatchObject({ generated: 1, failed: 0, aborted: true, sidecarsWritten: 1 });
    expect(generator.calls).toEqual(['add']);
  });

  it('reports unreadable files and continues', async () => {
    const outcomes: Array<[string, EntityOutcome]> = [];
    const summary = await generateDescriptions(deps(), {
      files: ['missing.fake', 'math.fake'],
      onEntity: event => outcomes.push([event.entity.name, event.outcome]),
    });

    expect(summary.files).toBe(1);
    expect(summary.errors).toHaveLength(1);
    expect(summary.errors[0]?.path).toBe('missing.fake');
    expect(summary.errors[0]?.message).toMatch(/^could not read or parse: /);
    expect(outcomes.sort()).toEqual([
      ['add', 'generated'],
      ['sub', 'generated'],
    ]);
  });
});

describe('discoverFiles', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'lodkeep-discover-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('walks a directory outside git, skipping data and dependency directories', async () => {
    const registry = new ParserRegistry();
    registry.register(new LinePlugin());
    for (const file of ['a.fake', 'sub/b.fake', 'notes.txt', '.hidden/c.fake', 'node_modules/d.fake', '.lodkeep/lod/e.fake']) {
      mkdirSync(dirname(join(root, file)), { recursive: true });
      writeFileSync(join(root, file), 'x: 1\n');
    }

    expect(await discoverFiles(root, registry)).toEqual(['a.fake', 'sub/b.fake']);
    expect(await discoverFiles(root, registry, 'sub')).toEqual(['sub/b.fake']);
    expect(await discoverFiles(root, registry, 'notes.txt')).toEqual([]);
  });
});
