import type { Fingerprint } from '../utils/hash.js';
import type { Scope } from './scope.js';

/** The stable part of an entity: survives edits to its content. */
export interface EntityIdentity {
  scope: Scope;
  /** Qualified name, e.g. "Calculator.add" */
  name: string;
  filePath: string;
}

export interface ParsedEntity extends EntityIdentity {
  parentName?: string;
  startLine: number;
  endLine: number;
  source: string;
  language: string;
  fingerprint: Fingerprint;
}

/** "filePath::scope::name" */
export function buildIdentityKey(identity: EntityIdentity): string {
  return `${identity.filePath}::${identity.scope}::${identity.name}`;
}

export function qualifyName(name: string, parentName?: string): string {
  return parentName ? `${parentName}.${name}` : name;
}
