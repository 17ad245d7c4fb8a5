import type { FreshnessReport } from '../../model/record.js';
import type { GenerateSummary } from '../../pipeline/generate.js';
import type { SidecarFragment } from '../../sidecar/fragment.js';

export function formatReportJson(report: FreshnessReport): string {
  return JSON.stringify({
    summary: {
      total: report.total,
      fresh: report.fresh,
      stale: report.stale,
      unknown: report.unknown,
      reverted: report.reverted,
    },
    entries: report.entries.map(e => ({
      scope: e.scope,
      name: e.name,
      path: e.path,
      status: e.storedFingerprint ? 'stale' : 'unknown',
      currentFingerprint: e.currentFingerprint,
      storedFingerprint: e.storedFingerprint ?? null,
      previousFingerprint: e.previousFingerprint ?? null,
    })),
  }, null, 2);
}

export function formatSummaryJson(summary: GenerateSummary): string {
  return JSON.stringify(summary, null, 2);
}

export function formatFragmentsJson(fragments: Array<{ path: string; fragment: SidecarFragment }>): string {
  return JSON.stringify(
    fragments.map(({ path, fragment }) => ({
      path,
      scope: fragment.scope ?? null,
      name: fragment.name ?? null,
      description: fragment.description,
      stale: fragment.stale,
      fingerprint: fragment.fingerprint,
      lines: fragment.lineRange ?? null,
    })),
    null,
    2,
  );
}
