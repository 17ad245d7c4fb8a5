import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { hookScript } from '../src/cli/commands/hook.js';
import { formatCounts, formatReport } from '../src/cli/formatters/terminal.js';
import { formatReportJson } from '../src/cli/formatters/json.js';
import { fingerprint, shortFingerprint } from '../src/utils/hash.js';
import type { FreshnessReport } from '../src/model/record.js';

const CURRENT = fingerprint('return 2', 'python');
const PREVIOUS = fingerprint('return 1', 'python');

const REPORT: FreshnessReport = {
  total: 3,
  fresh: 1,
  stale: 0,
  unknown: 2,
  reverted: 1,
  entries: [
    { scope: 'function', name: 'charge', path: 'billing.py', currentFingerprint: CURRENT, previousFingerprint: PREVIOUS },
    { scope: 'module', name: 'billing', path: 'billing.py', currentFingerprint: PREVIOUS },
  ],
};

beforeAll(() => {
  chalk.level = 0;
});

describe('hookScript', () => {
  it('validates before commit', () => {
    expect(hookScript('pre-commit', false)).toBe(
      '#!/bin/sh\n# installed by lodkeep (pre-commit)\nlodkeep validate --fail-on-stale\n',
    );
  });

  it('regenerates first when auto-update is on', () => {
    expect(hookScript('pre-push', true)).toBe(
      '#!/bin/sh\n# installed by lodkeep (pre-push)\nlodkeep generate || exit 1\nlodkeep validate --fail-on-stale\n',
    );
  });
});

describe('formatters', () => {
  it('summarizes counts', () => {
    expect(formatCounts(REPORT)).toBe('Total: 3 | Fresh: 1 | Stale: 0 | Unknown: 2 | Reverted: 1');
  });

  it('shows the fingerprint transition of edited entities', () => {
    const lines = formatReport(REPORT).split('\n');
    expect(lines).toContain(`│    ${shortFingerprint(PREVIOUS)} → ${shortFingerprint(CURRENT)}`);
    expect(lines[lines.length - 1]).toBe(formatCounts(REPORT));
  });

  it('renders json with explicit nulls', () => {
    expect(JSON.parse(formatReportJson(REPORT)).entries[1]).toEqual({
      scope: 'module',
      name: 'billing',
      path: 'billing.py',
      status: 'unknown',
      currentFingerprint: PREVIOUS,
      storedFingerprint: null,
      previousFingerprint: null,
    });
  });
});
