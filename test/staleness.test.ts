import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HashIndex } from '../src/storage/database.js';
import { StalenessTracker, boundHistory, type TrackedEntity } from '../src/staleness/tracker.js';
import { ConcurrentInvalidationError } from '../src/errors.js';
import { fingerprint } from '../src/utils/hash.js';
import type { EntityIdentity } from '../src/model/entity.js';

const AUTH: EntityIdentity = { scope: 'function', name: 'authenticate_user', filePath: 'auth.py' };

const ORIGINAL = 'def authenticate_user(name, password):\n    return check(name, password)\n';
const REFORMATTED = 'def authenticate_user( name,password ):\n  return check( name , password )  # verify\n';
const CHANGED = 'def authenticate_user(name, password):\n    return check(name, password) and not locked(name)\n';

const FP_ORIGINAL = fingerprint(ORIGINAL, 'python');
const FP_CHANGED = fingerprint(CHANGED, 'python');

function versions(count: number): string[] {
  return Array.from({ length: count }, (_, i) => fingerprint(`def f():\n    return ${i}\n`, 'python'));
}

describe('StalenessTracker', () => {
  let clock: number;
  let index: HashIndex;
  let tracker: StalenessTracker;

  beforeEach(() => {
    clock = Date.parse('2024-05-01T00:00:00.000Z');
    index = new HashIndex(':memory:', { now: () => new Date((clock += 1000)) });
    tracker = new StalenessTracker(index, { historyLimit: 3 });
  });

  afterEach(() => {
    index.close();
  });

  it('reports content that was never described as unknown', () => {
    expect(tracker.check(AUTH, FP_ORIGINAL)).toEqual({ status: 'unknown', fingerprint: FP_ORIGINAL });
  });

  it('keeps a description fresh across reformatting', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');

    expect(fingerprint(REFORMATTED, 'python')).toBe(FP_ORIGINAL);
    const result = tracker.check(AUTH, fingerprint(REFORMATTED, 'python'));
    expect(result.status).toBe('fresh');
    expect(result.record?.description).toBe('Checks credentials.');
    expect(result.revertedFrom).toBeUndefined();
  });

  it('follows an edit and recognizes the revert', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');
    expect(tracker.check(AUTH, FP_CHANGED).status).toBe('unknown');

    const changed = tracker.recordGenerated(AUTH, FP_CHANGED, 'Checks credentials and lockout.');
    expect(changed.fingerprintHistory).toEqual([FP_ORIGINAL]);

    const reverted = tracker.check(AUTH, FP_ORIGINAL);
    expect(reverted.status).toBe('fresh');
    expect(reverted.record?.description).toBe('Checks credentials.');
    expect(reverted.revertedFrom).toBe(FP_CHANGED);
  });

  it('reuses the owner description when the reverted record is gone', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');
    tracker.recordGenerated(AUTH, FP_CHANGED, 'Checks credentials and lockout.');
    index.delete(FP_ORIGINAL);

    const result = tracker.check(AUTH, FP_ORIGINAL);
    expect(result).toMatchObject({ status: 'fresh', fingerprint: FP_ORIGINAL, revertedFrom: FP_CHANGED });
    expect(result.record?.fingerprint).toBe(FP_CHANGED);

    tracker.adopt(AUTH, result);
    const adopted = index.get(FP_ORIGINAL);
    expect(adopted?.description).toBe('Checks credentials and lockout.');
    expect(adopted?.fingerprintHistory).toEqual([FP_CHANGED]);
    expect(index.getIdentity('auth.py::function::authenticate_user')?.fingerprint).toBe(FP_ORIGINAL);
  });

  it('lets an explicit stale flag outrank a revert match', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');
    tracker.recordGenerated(AUTH, FP_CHANGED, 'Checks credentials and lockout.');
    index.delete(FP_ORIGINAL);
    tracker.invalidate(FP_CHANGED);

    const result = tracker.check(AUTH, FP_ORIGINAL);
    expect(result.status).toBe('stale');
    expect(result.record?.fingerprint).toBe(FP_CHANGED);
  });

  it('moves between stale and fresh on request', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');

    expect(tracker.invalidate(FP_ORIGINAL)).toBe(true);
    expect(tracker.check(AUTH, FP_ORIGINAL).status).toBe('stale');
    expect(tracker.describe(AUTH, FP_ORIGINAL)).toBeUndefined();

    expect(tracker.markFresh(FP_ORIGINAL)).toBe(true);
    expect(tracker.describe(AUTH, FP_ORIGINAL)).toBe('Checks credentials.');

    expect(tracker.invalidate(FP_CHANGED)).toBe(false);
  });

  it('bounds history and forgets evicted fingerprints', () => {
    const [v1, v2, v3, v4, v5] = versions(5);
    for (const [i, fp] of [v1, v2, v3, v4, v5].entries()) {
      tracker.recordGenerated(AUTH, fp, `version ${i + 1}`);
    }

    expect(index.get(v5)?.fingerprintHistory).toEqual([v4, v3, v2]);
    expect(tracker.findRevert(AUTH, v2)?.fingerprint).toBe(v5);
    expect(tracker.findRevert(AUTH, v1)).toBeUndefined();
  });

  it('refuses a description for a record invalidated during generation', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');
    const planned = tracker.revisionOf(FP_ORIGINAL);
    tracker.invalidate(FP_ORIGINAL);

    expect(() => tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Rewritten.', { expectedRevision: planned })).toThrow(
      ConcurrentInvalidationError,
    );
    expect(index.get(FP_ORIGINAL)?.description).toBe('Checks credentials.');
    expect(index.get(FP_ORIGINAL)?.stale).toBe(true);
  });

  it('accepts a description when the invalidation predates planning', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');
    tracker.invalidate(FP_ORIGINAL);
    const planned = tracker.revisionOf(FP_ORIGINAL);

    const record = tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Rewritten.', { expectedRevision: planned });
    expect(record.description).toBe('Rewritten.');
    expect(record.stale).toBe(false);
  });

  it('refuses a record created and invalidated while nothing was stored at planning', () => {
    const planned = tracker.revisionOf(FP_ORIGINAL);
    expect(planned).toBeNull();
    index.set(FP_ORIGINAL, 'Written elsewhere.', { stale: true });

    expect(() => tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Rewritten.', { expectedRevision: planned })).toThrow(
      ConcurrentInvalidationError,
    );
  });

  it('overwrites a concurrent invalidation when no revision is given', () => {
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Checks credentials.');
    tracker.invalidate(FP_ORIGINAL);

    expect(tracker.recordGenerated(AUTH, FP_ORIGINAL, 'Rewritten.').stale).toBe(false);
  });

  describe('checkBatch', () => {
    const entity = (name: string, source: string): TrackedEntity => ({
      scope: 'function',
      name,
      filePath: 'batch.py',
      fingerprint: fingerprint(source, 'python'),
    });

    it('accounts for every entity and lists the ones needing attention', () => {
      const fresh = entity('fresh', 'return 1');
      const stale = entity('stale', 'return 2');
      const unknown = entity('unknown', 'return 3');
      const edited = entity('edited', 'return 5');

      tracker.recordGenerated(fresh, fresh.fingerprint, 'one');
      tracker.recordGenerated(stale, stale.fingerprint, 'two');
      tracker.invalidate(stale.fingerprint);
      const before = fingerprint('return 4', 'python');
      tracker.recordGenerated(edited, before, 'four');

      const seen: string[] = [];
      const report = tracker.checkBatch([fresh, stale, unknown, edited], {
        onResult: (item, result) => seen.push(`${item.name}:${result.status}`),
      });

      expect(report).toEqual({
        total: 4,
        fresh: 1,
        stale: 1,
        unknown: 2,
        reverted: 0,
        entries: [
          {
            scope: 'function',
            name: 'stale',
            path: 'batch.py',
            currentFingerprint: stale.fingerprint,
            storedFingerprint: stale.fingerprint,
            previousFingerprint: undefined,
          },
          {
            scope: 'function',
            name: 'unknown',
            path: 'batch.py',
            currentFingerprint: unknown.fingerprint,
            storedFingerprint: undefined,
            previousFingerprint: undefined,
          },
          {
            scope: 'function',
            name: 'edited',
            path: 'batch.py',
            currentFingerprint: edited.fingerprint,
            storedFingerprint: undefined,
            previousFingerprint: before,
          },
        ],
      });
      expect(seen).toEqual(['fresh:fresh', 'stale:stale', 'unknown:unknown', 'edited:unknown']);
    });

    it('counts reverts as fresh', () => {
      const original = entity('auth', ORIGINAL);
      tracker.recordGenerated(original, FP_ORIGINAL, 'Checks credentials.');
      tracker.recordGenerated(original, FP_CHANGED, 'Checks credentials and lockout.');

      const report = tracker.checkBatch([original]);
      expect(report.fresh).toBe(1);
      expect(report.reverted).toBe(1);
      expect(report.entries).toEqual([]);
    });

    it('stops when the signal is aborted', () => {
      const controller = new AbortController();
      controller.abort(new Error('cancelled'));

      expect(() => tracker.checkBatch([entity('x', 'return 0')], { signal: controller.signal })).toThrow('cancelled');
    });
  });
});

describe('boundHistory', () => {
  it('drops duplicates and the current fingerprint, then keeps the newest', () => {
    const [a, b, c, d] = versions(4);
    expect(boundHistory([a, b, a, c, d], c, 2)).toEqual([a, b]);
    expect(boundHistory([a, b], c, 0)).toEqual([]);
  });
});

describe('StalenessTracker on the real clock', () => {
  it('regenerates right after an invalidation made in the same millisecond', () => {
    const index = new HashIndex(':memory:');
    const tracker = new StalenessTracker(index);
    tracker.recordGenerated(AUTH, FP_ORIGINAL, 'v0');

    for (let i = 1; i <= 200; i++) {
      tracker.invalidate(FP_ORIGINAL);
      const planned = tracker.revisionOf(FP_ORIGINAL);
      tracker.recordGenerated(AUTH, FP_ORIGINAL, `v${i}`, { expectedRevision: planned });
    }

    expect(index.get(FP_ORIGINAL)).toMatchObject({ description: 'v200', stale: false });
    index.close();
  });
});
