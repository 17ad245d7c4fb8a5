import type { Fingerprint } from '../utils/hash.js';
import type { Scope } from './scope.js';

export interface DescriptionRecord {
  fingerprint: Fingerprint;
  description: string;
  stale: boolean;
  createdAt: string;
  updatedAt: string;
  /** Superseded fingerprints of the same identity, most recent first. */
  fingerprintHistory: Fingerprint[];
  /** Bumped by every write to the record, including stale flag changes. */
  revision: number;
}

export interface IdentityPointer {
  identityKey: string;
  scope: Scope;
  name: string;
  filePath: string;
  fingerprint: Fingerprint;
  updatedAt: string;
}

export type Freshness = 'fresh' | 'stale' | 'unknown';

export interface CheckResult {
  status: Freshness;
  fingerprint: Fingerprint;
  /** Record whose description applies (fresh), or the record flagged stale. */
  record?: DescriptionRecord;
  /** Set when the current content matches a fingerprint this identity had before. */
  revertedFrom?: Fingerprint;
}

export interface StaleEntry {
  scope: Scope;
  name: string;
  path: string;
  currentFingerprint: Fingerprint;
  /** Fingerprint of the stored record flagged stale; undefined for never-described content. */
  storedFingerprint?: Fingerprint;
  /** Fingerprint this identity was last recorded at, when it differs from the current one. */
  previousFingerprint?: Fingerprint;
}

export interface FreshnessReport {
  total: number;
  fresh: number;
  stale: number;
  unknown: number;
  /** Fresh entities whose description came from revert detection. */
  reverted: number;
  /** Stale and unknown entities, in input order. */
  entries: StaleEntry[];
}

export function needsAttention(report: FreshnessReport): boolean {
  return report.entries.length > 0;
}
