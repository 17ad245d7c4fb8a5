import type { Scope } from '../model/scope.js';
import { isScope } from '../model/scope.js';
import { isFingerprint, type Fingerprint } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';

const debug = createLogger('sidecar');

const LOD_LINE = /^\s*(?:#|\/\/) @lod ([a-z]+):(.*)$/;
const HEADER = /^(\S+) stale:(true|false)(?: lines:(\d+)-(\d+))?\s*$/;
const ENTITY = /^([a-z]+):(.+)$/;

export type CommentPrefix = '#' | '//';

/** What a fragment shows. The current fingerprint, not necessarily the key the description is stored under. */
export interface FragmentContent {
  fingerprint: Fingerprint;
  stale: boolean;
  description: string;
}

export interface FragmentLocation {
  scope: Scope;
  name: string;
  startLine: number;
  endLine: number;
  language: string;
  /** Literal declaration line shown under the fragment. */
  signature: string;
}

export interface SidecarFragment extends FragmentContent {
  signature: string;
  lineRange?: [start: number, end: number];
  scope?: Scope;
  name?: string;
}

/** A sidecar file split into fragments and the text around them. */
export type SidecarSegment =
  | { kind: 'fragment'; fragment: SidecarFragment }
  | { kind: 'text'; lines: string[] };

export function commentPrefix(language?: string): CommentPrefix {
  return language === 'python' ? '#' : '//';
}

/** First non-empty line of the entity's source, or a synthetic one for modules. */
export function signatureLine(
  entity: { scope: Scope; name: string; source: string },
  prefix: CommentPrefix,
): string {
  if (entity.scope === 'module') return `${prefix} module ${entity.name}`;
  const first = entity.source.split(/\r?\n/).find(line => line.trim() !== '');
  return first?.trim() ?? `${prefix} ${entity.scope} ${entity.name}`;
}

export function projectFragment(content: FragmentContent, location: FragmentLocation): string {
  const p = commentPrefix(location.language);
  const lines = [
    `${p} @lod fingerprint:${content.fingerprint} stale:${content.stale} lines:${location.startLine}-${location.endLine}`,
    `${p} @lod entity:${location.scope}:${location.name}`,
    ...content.description
      .replace(/\r\n?/g, '\n')
      .split('\n')
      .map(line => `${p} @lod description:${line}`),
    location.signature,
  ];
  return lines.join('\n');
}

export function parseFragments(text: string): SidecarFragment[] {
  return splitSidecar(text).flatMap(segment => (segment.kind === 'fragment' ? [segment.fragment] : []));
}

/**
 * A fragment is a run of `@lod` lines plus the line after it (the signature).
 * Runs that do not carry a valid fingerprint header and at least one
 * description line are dropped and logged; the rest of the file still parses.
 */
export function splitSidecar(text: string): SidecarSegment[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  const segments: SidecarSegment[] = [];
  let textLines: string[] = [];
  const flushText = () => {
    if (textLines.length > 0) segments.push({ kind: 'text', lines: textLines });
    textLines = [];
  };

  let i = 0;
  while (i < lines.length) {
    if (!LOD_LINE.test(lines[i])) {
      textLines.push(lines[i]);
      i++;
      continue;
    }

    let end = i;
    while (end < lines.length && LOD_LINE.test(lines[end])) end++;
    const signature = end < lines.length ? lines[end] : undefined;

    const fragment = parseBlock(lines.slice(i, end), signature ?? '');
    if (!fragment) {
      debug('skipping malformed fragment at line %d', i + 1);
      i = end;
      continue;
    }

    flushText();
    segments.push({ kind: 'fragment', fragment });
    i = signature === undefined ? end : end + 1;
  }

  flushText();
  return segments;
}

function parseBlock(block: string[], signature: string): SidecarFragment | undefined {
  let header: { fingerprint: string; stale: boolean; lineRange?: [number, number] } | undefined;
  let entity: { scope: Scope; name: string } | undefined;
  const description: string[] = [];

  for (const line of block) {
    const match = LOD_LINE.exec(line);
    if (!match) return undefined;
    const [, key, value] = match;

    switch (key) {
      case 'fingerprint': {
        const parsed = HEADER.exec(value);
        if (!parsed || !isFingerprint(parsed[1])) return undefined;
        header = {
          fingerprint: parsed[1],
          stale: parsed[2] === 'true',
          lineRange: parsed[3] && parsed[4] ? [Number(parsed[3]), Number(parsed[4])] : undefined,
        };
        break;
      }
      case 'entity': {
        const parsed = ENTITY.exec(value);
        if (parsed && isScope(parsed[1])) entity = { scope: parsed[1], name: parsed[2] };
        break;
      }
      case 'description':
        description.push(value);
        break;
      default:
        debug('ignoring unknown @lod key %s', key);
    }
  }

  if (!header || description.length === 0) return undefined;

  return {
    fingerprint: header.fingerprint,
    stale: header.stale,
    description: description.join('\n'),
    signature,
    lineRange: header.lineRange,
    scope: entity?.scope,
    name: entity?.name,
  };
}
