import Database from 'better-sqlite3';
import { z } from 'zod';
import type { DescriptionRecord, IdentityPointer } from '../model/record.js';
import type { EntityIdentity } from '../model/entity.js';
import { buildIdentityKey } from '../model/entity.js';
import { isScope } from '../model/scope.js';
import { FINGERPRINT_PATTERN, type Fingerprint } from '../utils/hash.js';
import { LodkeepError, StorageError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { SCHEMA_DDL } from './schema.js';

const debug = createLogger('index');

const HistorySchema = z.array(z.string().regex(FINGERPRINT_PATTERN));

interface DescriptionRow {
  fingerprint: string;
  description: string;
  stale: number;
  created_at: string;
  updated_at: string;
  fingerprint_history: string;
  revision: number;
}

interface IdentityRow {
  identity_key: string;
  scope: string;
  name: string;
  file_path: string;
  fingerprint: string;
  updated_at: string;
}

export interface HashIndexOptions {
  /** Clock for created_at/updated_at. */
  now?: () => Date;
}

export interface SetOptions {
  stale?: boolean;
  history?: Fingerprint[];
}

export interface IndexCounts {
  records: number;
  stale: number;
  identities: number;
}

/**
 * Durable fingerprint → description store.
 *
 * better-sqlite3 is synchronous, so each call finishes before any other code
 * in the process runs; together with one transaction per mutation this is the
 * global write lock. With WAL and `synchronous = FULL` a mutation that returns
 * has been committed to disk.
 */
export class HashIndex {
  private db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string, opts: HashIndexOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.db = openDatabase(dbPath);
  }

  get(fingerprint: Fingerprint): DescriptionRecord | undefined {
    const row = this.run('read', () =>
      this.db.prepare<[string], DescriptionRow>('SELECT * FROM descriptions WHERE fingerprint = ?').get(fingerprint),
    );
    return row ? toRecord(row) : undefined;
  }

  /** Inserts or fully replaces the record. `created_at` survives replacement. */
  set(fingerprint: Fingerprint, description: string, opts: SetOptions = {}): void {
    this.run('write', () => {
      this.db.transaction(() => this.upsertRecord(fingerprint, description, opts.stale ?? false, opts.history ?? []))();
    });
  }

  /**
   * Writes the record for `fingerprint` and points `identity` at it in one
   * transaction.
   */
  commit(fingerprint: Fingerprint, description: string, history: Fingerprint[], identity: EntityIdentity): void {
    this.run('write', () => {
      this.db.transaction(() => {
        this.upsertRecord(fingerprint, description, false, history);
        this.upsertIdentity(identity, fingerprint);
      })();
    });
  }

  markStale(fingerprint: Fingerprint): boolean {
    return this.setStale(fingerprint, true);
  }

  markFresh(fingerprint: Fingerprint): boolean {
    return this.setStale(fingerprint, false);
  }

  listStale(): DescriptionRecord[] {
    const rows = this.run('read', () =>
      this.db.prepare<[], DescriptionRow>('SELECT * FROM descriptions WHERE stale = 1 ORDER BY updated_at DESC').all(),
    );
    return rows.flatMap(row => toRecord(row) ?? []);
  }

  delete(fingerprint: Fingerprint): boolean {
    const result = this.run('delete', () =>
      this.db.prepare('DELETE FROM descriptions WHERE fingerprint = ?').run(fingerprint),
    );
    return result.changes > 0;
  }

  /** Drops every record and identity pointer. Metadata is kept. */
  reset(): void {
    this.run('reset', () => {
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM descriptions').run();
        this.db.prepare('DELETE FROM identities').run();
      })();
    });
  }

  // Identity pointers

  getIdentity(identityKey: string): IdentityPointer | undefined {
    const row = this.run('read', () =>
      this.db.prepare<[string], IdentityRow>('SELECT * FROM identities WHERE identity_key = ?').get(identityKey),
    );
    return row ? toPointer(row) : undefined;
  }

  setIdentity(identity: EntityIdentity, fingerprint: Fingerprint): void {
    this.run('write', () => {
      this.db.transaction(() => this.upsertIdentity(identity, fingerprint))();
    });
  }

  listIdentitiesByFingerprint(fingerprint: Fingerprint): IdentityPointer[] {
    const rows = this.run('read', () =>
      this.db
        .prepare<[string], IdentityRow>('SELECT * FROM identities WHERE fingerprint = ? ORDER BY identity_key')
        .all(fingerprint),
    );
    return rows.flatMap(row => toPointer(row) ?? []);
  }

  listIdentitiesByFile(filePath: string): IdentityPointer[] {
    const rows = this.run('read', () =>
      this.db
        .prepare<[string], IdentityRow>('SELECT * FROM identities WHERE file_path = ? ORDER BY identity_key')
        .all(filePath),
    );
    return rows.flatMap(row => toPointer(row) ?? []);
  }

  count(): IndexCounts {
    return this.run('read', () => {
      const records = this.db.prepare<[], { n: number }>('SELECT count(*) AS n FROM descriptions').get();
      const stale = this.db.prepare<[], { n: number }>('SELECT count(*) AS n FROM descriptions WHERE stale = 1').get();
      const identities = this.db.prepare<[], { n: number }>('SELECT count(*) AS n FROM identities').get();
      return { records: records?.n ?? 0, stale: stale?.n ?? 0, identities: identities?.n ?? 0 };
    });
  }

  // Metadata

  setMetadata(key: string, value: string): void {
    this.run('write', () => {
      this.db.prepare('INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)').run(key, value);
    });
  }

  getMetadata(key: string): string | undefined {
    const row = this.run('read', () =>
      this.db.prepare<[string], { value: string }>('SELECT value FROM metadata WHERE key = ?').get(key),
    );
    return row?.value;
  }

  close(): void {
    this.db.close();
  }

  private upsertRecord(fingerprint: Fingerprint, description: string, stale: boolean, history: Fingerprint[]): void {
    const now = this.now().toISOString();
    this.db.prepare(`
      INSERT INTO descriptions (fingerprint, description, stale, created_at, updated_at, fingerprint_history)
      VALUES (@fingerprint, @description, @stale, @now, @now, @history)
      ON CONFLICT(fingerprint) DO UPDATE SET
        description = excluded.description,
        stale = excluded.stale,
        updated_at = excluded.updated_at,
        fingerprint_history = excluded.fingerprint_history,
        revision = descriptions.revision + 1
    `).run({ fingerprint, description, stale: stale ? 1 : 0, now, history: JSON.stringify(history) });
  }

  private upsertIdentity(identity: EntityIdentity, fingerprint: Fingerprint): void {
    this.db.prepare(`
      INSERT INTO identities (identity_key, scope, name, file_path, fingerprint, updated_at)
      VALUES (@key, @scope, @name, @filePath, @fingerprint, @now)
      ON CONFLICT(identity_key) DO UPDATE SET
        fingerprint = excluded.fingerprint,
        updated_at = excluded.updated_at
    `).run({
      key: buildIdentityKey(identity),
      scope: identity.scope,
      name: identity.name,
      filePath: identity.filePath,
      fingerprint,
      now: this.now().toISOString(),
    });
  }

  private setStale(fingerprint: Fingerprint, stale: boolean): boolean {
    const result = this.run('write', () =>
      this.db
        .prepare('UPDATE descriptions SET stale = ?, updated_at = ?, revision = revision + 1 WHERE fingerprint = ?')
        .run(stale ? 1 : 0, this.now().toISOString(), fingerprint),
    );
    return result.changes > 0;
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof LodkeepError) throw err;
      throw new StorageError(operation, err);
    }
  }
}

function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
    db.exec(SCHEMA_DDL);
    migrate(db);
    return db;
  } catch (err) {
    throw new StorageError('open', err, { dbPath });
  }
}

// Indexes written before records carried a revision
function migrate(db: Database.Database): void {
  const columns = db.prepare<[], { name: string }>('PRAGMA table_info(descriptions)').all();
  if (!columns.some(column => column.name === 'revision')) {
    db.exec('ALTER TABLE descriptions ADD COLUMN revision INTEGER NOT NULL DEFAULT 1');
  }
}

function toRecord(row: DescriptionRow): DescriptionRecord | undefined {
  const history = parseHistory(row.fingerprint_history);
  if (!history) {
    debug('ignoring %s: corrupt fingerprint_history %o', row.fingerprint, row.fingerprint_history);
    return undefined;
  }
  return {
    fingerprint: row.fingerprint,
    description: row.description,
    stale: row.stale !== 0,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    fingerprintHistory: history,
    revision: row.revision,
  };
}

function parseHistory(raw: string): Fingerprint[] | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    debug('fingerprint_history is not JSON: %s', err instanceof Error ? err.message : String(err));
    return undefined;
  }
  const parsed = HistorySchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function toPointer(row: IdentityRow): IdentityPointer | undefined {
  if (!isScope(row.scope)) {
    debug('ignoring identity %s: unknown scope %s', row.identity_key, row.scope);
    return undefined;
  }
  return {
    identityKey: row.identity_key,
    scope: row.scope,
    name: row.name,
    filePath: row.file_path,
    fingerprint: row.fingerprint,
    updatedAt: row.updated_at,
  };
}
