import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { HashIndex } from '../storage/database.js';
import type { StalenessTracker } from '../staleness/tracker.js';
import type { ParserRegistry } from '../parser/registry.js';
import type { ParsedEntity } from '../model/entity.js';
import { buildIdentityKey } from '../model/entity.js';
import { compareScopes } from '../model/scope.js';
import type { Fingerprint } from '../utils/hash.js';
import { isOutsideProject, toProjectPath } from '../utils/path.js';
import { LodkeepError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import {
  commentPrefix,
  parseFragments,
  projectFragment,
  signatureLine,
  splitSidecar,
  type SidecarFragment,
} from './fragment.js';

const debug = createLogger('sidecar');

export const SIDECAR_EXTENSION = '.lod';

export interface SidecarOptions {
  projectRoot: string;
  /** Directory holding the mirror tree, e.g. `<root>/.lodkeep/lod`. */
  sidecarDir: string;
  index: HashIndex;
  tracker: StalenessTracker;
  /** Used by `reconcile` when the caller does not pass entities. */
  registry?: ParserRegistry;
}

export interface ReconcileResult {
  sourcePath: string;
  sidecarPath: string;
  fragments: number;
  /** Text blocks kept from entities that no longer exist. */
  orphaned: number;
  written: boolean;
}

export interface SeedOptions {
  /** Fingerprints produced by a fresh parse; anything else is reported unverified. */
  currentFingerprints?: Iterable<Fingerprint>;
}

export interface SeedResult {
  files: number;
  seeded: number;
  skipped: number;
  unverified: Fingerprint[];
}

/**
 * Projects index records into `.lod` mirror files and reads them back. The
 * index is the source of truth; sidecars feed it only through `seedIndex`.
 */
export class SidecarSynchronizer {
  constructor(private readonly options: SidecarOptions) {}

  sidecarPathFor(sourcePath: string): string {
    const relPath = toProjectPath(sourcePath, this.options.projectRoot);
    if (isOutsideProject(relPath)) {
      throw new LodkeepError(`${sourcePath} is outside the project`, 'INVALID_ARGUMENT', { sourcePath });
    }
    return join(this.options.sidecarDir, relPath + SIDECAR_EXTENSION);
  }

  reconcile(sourcePath: string, entities?: ParsedEntity[]): ReconcileResult {
    const relPath = toProjectPath(sourcePath, this.options.projectRoot);
    const sidecarPath = this.sidecarPathFor(relPath);
    const current = entities ?? this.parseSource(relPath);

    const existing = existsSync(sidecarPath) ? readFileSync(sidecarPath, 'utf-8') : undefined;
    const { preamble, attached } = collectText(existing ?? '');

    const blocks: string[] = [];
    if (preamble.length > 0) blocks.push(preamble.join('\n'));

    let fragments = 0;
    for (const entity of [...current].sort(bySourceOrder)) {
      const result = this.options.tracker.check(entity, entity.fingerprint);
      if (!result.record) continue;

      const fragment = projectFragment(
        { fingerprint: entity.fingerprint, stale: result.status === 'stale', description: result.record.description },
        {
          scope: entity.scope,
          name: entity.name,
          startLine: entity.startLine,
          endLine: entity.endLine,
          language: entity.language,
          signature: signatureLine(entity, commentPrefix(entity.language)),
        },
      );
      fragments++;

      const key = entityKey(entity.scope, entity.name);
      const text = attached.get(key) ?? attached.get(entity.fingerprint);
      attached.delete(key);
      attached.delete(entity.fingerprint);
      blocks.push(text ? `${fragment}\n\n${text.join('\n')}` : fragment);
    }

    // Text that followed fragments of vanished entities
    const orphans = [...attached.values()];
    for (const text of orphans) blocks.push(text.join('\n'));

    const content = blocks.length > 0 ? blocks.join('\n\n') + '\n' : '';
    const written = this.writeIfChanged(sidecarPath, existing, content);
    debug('reconciled %s: %d fragments, %d orphaned, written=%s', relPath, fragments, orphans.length, written);

    return { sourcePath: relPath, sidecarPath, fragments, orphaned: orphans.length, written };
  }

  read(sourcePath: string): SidecarFragment[] {
    const sidecarPath = this.sidecarPathFor(sourcePath);
    if (!existsSync(sidecarPath)) return [];
    return parseFragments(readFileSync(sidecarPath, 'utf-8'));
  }

  /** Project-relative source paths that have a sidecar, sorted. */
  listSidecars(): string[] {
    const results: string[] = [];
    const walk = (dir: string, prefix: string) => {
      for (const entry of readdirSync(dir, { withFileTypes: true })) {
        const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
        if (entry.isDirectory()) walk(join(dir, entry.name), rel);
        else if (entry.isFile() && entry.name.endsWith(SIDECAR_EXTENSION)) {
          results.push(rel.slice(0, -SIDECAR_EXTENSION.length));
        }
      }
    };
    if (existsSync(this.options.sidecarDir)) walk(this.options.sidecarDir, '');
    return results.sort();
  }

  /**
   * Recovery: seeds the index from sidecar fragments for fingerprints it does
   * not have. Seeded records carry no history. Existing records and identity
   * pointers are left alone.
   */
  seedIndex(opts: SeedOptions = {}): SeedResult {
    const { index } = this.options;
    const verified = opts.currentFingerprints ? new Set(opts.currentFingerprints) : undefined;
    const result: SeedResult = { files: 0, seeded: 0, skipped: 0, unverified: [] };

    for (const sourcePath of this.listSidecars()) {
      result.files++;
      for (const fragment of this.read(sourcePath)) {
        if (index.get(fragment.fingerprint)) {
          result.skipped++;
          continue;
        }

        index.set(fragment.fingerprint, fragment.description, { stale: fragment.stale });
        result.seeded++;
        if (verified && !verified.has(fragment.fingerprint)) result.unverified.push(fragment.fingerprint);

        if (fragment.scope && fragment.name) {
          const identity = { scope: fragment.scope, name: fragment.name, filePath: sourcePath };
          if (!index.getIdentity(buildIdentityKey(identity))) {
            index.setIdentity(identity, fragment.fingerprint);
          }
        }
      }
    }

    debug('seeded %d records from %d sidecars (%d unverified)', result.seeded, result.files, result.unverified.length);
    return result;
  }

  private parseSource(relPath: string): ParsedEntity[] {
    const { registry, projectRoot } = this.options;
    const absPath = join(projectRoot, relPath);
    if (!registry || !existsSync(absPath)) return [];
    return registry.parseFile(readFileSync(absPath, 'utf-8'), relPath);
  }

  private writeIfChanged(sidecarPath: string, existing: string | undefined, content: string): boolean {
    if (existing === content) return false;

    if (content === '') {
      if (existing === undefined) return false;
      rmSync(sidecarPath, { force: true });
      return true;
    }

    mkdirSync(dirname(sidecarPath), { recursive: true });
    const tmpPath = `${sidecarPath}.${process.pid}.tmp`;
    writeFileSync(tmpPath, content, 'utf-8');
    renameSync(tmpPath, sidecarPath);
    return true;
  }
}

function entityKey(scope: string, name: string): string {
  return `${scope}:${name}`;
}

function bySourceOrder(a: ParsedEntity, b: ParsedEntity): number {
  return a.startLine - b.startLine || compareScopes(a.scope, b.scope) || a.name.localeCompare(b.name);
}

/**
 * Non-fragment text of an existing sidecar: the preamble before the first
 * fragment, and the text following each fragment keyed by the fragment's
 * entity (or fingerprint when it names no entity). Blank edges are trimmed.
 */
function collectText(text: string): { preamble: string[]; attached: Map<string, string[]> } {
  let preamble: string[] = [];
  const attached = new Map<string, string[]>();
  let owner: string | undefined;

  for (const segment of splitSidecar(text)) {
    if (segment.kind === 'fragment') {
      const { fragment } = segment;
      owner = fragment.scope && fragment.name ? entityKey(fragment.scope, fragment.name) : fragment.fingerprint;
      continue;
    }

    const lines = trimBlankEdges(segment.lines);
    if (lines.length === 0) continue;
    if (owner === undefined) {
      preamble = preamble.length > 0 ? [...preamble, '', ...lines] : lines;
    } else {
      const previous = attached.get(owner);
      attached.set(owner, previous ? [...previous, '', ...lines] : lines);
    }
  }

  return { preamble, attached };
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end);
}
