import type { HashIndex } from '../storage/database.js';
import type { EntityIdentity } from '../model/entity.js';
import { buildIdentityKey } from '../model/entity.js';
import type { CheckResult, DescriptionRecord, FreshnessReport, StaleEntry } from '../model/record.js';
import type { Fingerprint } from '../utils/hash.js';
import { ConcurrentInvalidationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const debug = createLogger('tracker');

export const DEFAULT_HISTORY_LIMIT = 10;

export interface TrackerOptions {
  /** Maximum superseded fingerprints kept per record. */
  historyLimit?: number;
}

export interface TrackedEntity extends EntityIdentity {
  fingerprint: Fingerprint;
}

export interface BatchOptions<T extends TrackedEntity> {
  /** Checked between entities; an aborted signal stops the batch with its reason. */
  signal?: AbortSignal;
  onResult?: (entity: T, result: CheckResult) => void;
}

export interface RecordOptions {
  /**
   * `revisionOf(fingerprint)` taken when generation was planned. If the record
   * has been written since and is now flagged stale, the description is
   * refused with ConcurrentInvalidationError. Without it a concurrent
   * invalidation is overwritten by the new description.
   */
  expectedRevision?: number | null;
}

/**
 * Decides whether an entity's stored description still matches its code, and
 * records new descriptions with the fingerprint history that makes reverts
 * free.
 */
export class StalenessTracker {
  readonly historyLimit: number;

  constructor(
    private readonly index: HashIndex,
    opts: TrackerOptions = {},
  ) {
    this.historyLimit = Math.max(0, opts.historyLimit ?? DEFAULT_HISTORY_LIMIT);
  }

  check(entity: EntityIdentity, fingerprint: Fingerprint): CheckResult {
    const record = this.index.get(fingerprint);

    if (record && !record.stale) {
      const pointer = this.index.getIdentity(buildIdentityKey(entity));
      const revertedFrom =
        pointer && pointer.fingerprint !== fingerprint && this.historyOf(pointer.fingerprint).includes(fingerprint)
          ? pointer.fingerprint
          : undefined;
      return { status: 'fresh', fingerprint, record, revertedFrom };
    }

    if (record) {
      return { status: 'stale', fingerprint, record };
    }

    const owner = this.findRevert(entity, fingerprint);
    if (owner) {
      // An explicit stale flag outranks the revert match
      if (owner.stale) return { status: 'stale', fingerprint, record: owner };
      return { status: 'fresh', fingerprint, record: owner, revertedFrom: owner.fingerprint };
    }

    return { status: 'unknown', fingerprint };
  }

  checkBatch<T extends TrackedEntity>(entities: Iterable<T>, opts: BatchOptions<T> = {}): FreshnessReport {
    const report: FreshnessReport = { total: 0, fresh: 0, stale: 0, unknown: 0, reverted: 0, entries: [] };

    for (const entity of entities) {
      opts.signal?.throwIfAborted();

      const result = this.check(entity, entity.fingerprint);
      report.total++;
      opts.onResult?.(entity, result);

      if (result.status === 'fresh') {
        report.fresh++;
        if (result.revertedFrom) report.reverted++;
        continue;
      }

      if (result.status === 'stale') report.stale++;
      else report.unknown++;
      report.entries.push(this.toStaleEntry(entity, result));
    }

    return report;
  }

  /**
   * Revert detection: the record this identity currently points at lists
   * `fingerprint` among the fingerprints it superseded. Only that record's
   * bounded history is searched, so evicted fingerprints are not recognized.
   */
  findRevert(entity: EntityIdentity, fingerprint: Fingerprint): DescriptionRecord | undefined {
    const pointer = this.index.getIdentity(buildIdentityKey(entity));
    if (!pointer || pointer.fingerprint === fingerprint) return undefined;

    const owner = this.index.get(pointer.fingerprint);
    if (!owner?.fingerprintHistory.includes(fingerprint)) return undefined;

    debug('%s reverted to %s (owner %s)', entity.name, fingerprint, owner.fingerprint);
    return owner;
  }

  recordGenerated(
    entity: EntityIdentity,
    fingerprint: Fingerprint,
    description: string,
    opts: RecordOptions = {},
  ): DescriptionRecord {
    const existing = this.index.get(fingerprint);
    if (opts.expectedRevision !== undefined && existing?.stale && existing.revision !== opts.expectedRevision) {
      throw new ConcurrentInvalidationError(fingerprint, existing.updatedAt);
    }

    const history = this.nextHistory(entity, fingerprint, existing);
    this.index.commit(fingerprint, description, history, entity);
    debug('recorded %s at %s (history %d)', entity.name, fingerprint, history.length);

    return (
      this.index.get(fingerprint) ?? {
        fingerprint,
        description,
        stale: false,
        createdAt: existing?.createdAt ?? new Date().toISOString(),
        updatedAt: new Date().toISOString(),
        fingerprintHistory: history,
        revision: (existing?.revision ?? 0) + 1,
      }
    );
  }

  /** Current revision of the record for `fingerprint`; null when there is none. */
  revisionOf(fingerprint: Fingerprint): number | null {
    return this.index.get(fingerprint)?.revision ?? null;
  }

  /**
   * Moves the identity to a fingerprint that was found fresh without
   * generating. A revert matched through history is written as its own record
   * so later checks hit it directly.
   */
  adopt(entity: EntityIdentity, result: CheckResult): void {
    if (result.status !== 'fresh' || !result.record) return;

    if (result.record.fingerprint !== result.fingerprint) {
      const history = this.nextHistory(entity, result.fingerprint, undefined);
      this.index.commit(result.fingerprint, result.record.description, history, entity);
      return;
    }

    const pointer = this.index.getIdentity(buildIdentityKey(entity));
    if (pointer?.fingerprint !== result.fingerprint) {
      this.index.setIdentity(entity, result.fingerprint);
    }
  }

  /** Forced invalidation. Returns false when no record exists for the fingerprint. */
  invalidate(fingerprint: Fingerprint): boolean {
    return this.index.markStale(fingerprint);
  }

  markFresh(fingerprint: Fingerprint): boolean {
    return this.index.markFresh(fingerprint);
  }

  /** The description that applies to this content, if it is fresh. */
  describe(entity: EntityIdentity, fingerprint: Fingerprint): string | undefined {
    const result = this.check(entity, fingerprint);
    return result.status === 'fresh' ? result.record?.description : undefined;
  }

  private historyOf(fingerprint: Fingerprint): Fingerprint[] {
    return this.index.get(fingerprint)?.fingerprintHistory ?? [];
  }

  private nextHistory(
    entity: EntityIdentity,
    fingerprint: Fingerprint,
    existing: DescriptionRecord | undefined,
  ): Fingerprint[] {
    const pointer = this.index.getIdentity(buildIdentityKey(entity));

    const candidates =
      pointer && pointer.fingerprint !== fingerprint
        ? [pointer.fingerprint, ...this.historyOf(pointer.fingerprint)]
        : (existing?.fingerprintHistory ?? []);

    return boundHistory(candidates, fingerprint, this.historyLimit);
  }

  private toStaleEntry(entity: TrackedEntity, result: CheckResult): StaleEntry {
    const pointer = this.index.getIdentity(buildIdentityKey(entity));
    return {
      scope: entity.scope,
      name: entity.name,
      path: entity.filePath,
      currentFingerprint: entity.fingerprint,
      storedFingerprint: result.status === 'stale' ? result.record?.fingerprint : undefined,
      previousFingerprint: pointer && pointer.fingerprint !== entity.fingerprint ? pointer.fingerprint : undefined,
    };
  }
}

/**
 * Most-recent-first, without duplicates or `current`, truncated to `limit`.
 * Truncation drops the oldest entries: insertion order decides, lookups never
 * reorder.
 */
export function boundHistory(candidates: Fingerprint[], current: Fingerprint, limit: number): Fingerprint[] {
  const seen = new Set<Fingerprint>([current]);
  const result: Fingerprint[] = [];
  for (const fingerprint of candidates) {
    if (seen.has(fingerprint)) continue;
    seen.add(fingerprint);
    result.push(fingerprint);
  }
  return result.slice(0, limit);
}
