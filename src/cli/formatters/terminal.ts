import chalk from 'chalk';
import type { FreshnessReport, StaleEntry } from '../../model/record.js';
import type { GenerateSummary } from '../../pipeline/generate.js';
import type { SidecarFragment } from '../../sidecar/fragment.js';
import { shortFingerprint } from '../../utils/hash.js';

const SYMBOLS = {
  stale: chalk.yellow('∆'),
  unknown: chalk.red('⊕'),
};

export function formatReport(report: FreshnessReport): string {
  if (report.total === 0) {
    return chalk.dim('No entities found.');
  }

  const lines: string[] = [];

  // Group entries by file
  const byFile = new Map<string, StaleEntry[]>();
  for (const entry of report.entries) {
    const group = byFile.get(entry.path) ?? [];
    group.push(entry);
    byFile.set(entry.path, group);
  }

  for (const [filePath, entries] of byFile) {
    const header = `─ ${filePath} `;
    const padLen = Math.max(0, 55 - header.length);
    lines.push(chalk.dim(`┌${header}${'─'.repeat(padLen)}`));
    lines.push(chalk.dim('│'));

    for (const entry of entries) {
      const kind = entry.storedFingerprint ? 'stale' : 'unknown';
      const tag = kind === 'stale' ? chalk.yellow('[stale]') : chalk.red('[no description]');
      lines.push(
        chalk.dim('│  ') +
          `${SYMBOLS[kind]} ${chalk.dim(entry.scope.padEnd(10))} ${chalk.bold(entry.name).padEnd(25)} ${tag}`,
      );
      if (entry.previousFingerprint) {
        lines.push(
          chalk.dim('│    ') +
            chalk.dim(`${shortFingerprint(entry.previousFingerprint)} → ${shortFingerprint(entry.currentFingerprint)}`),
        );
      }
    }

    lines.push(chalk.dim('│'));
    lines.push(chalk.dim('└' + '─'.repeat(55)));
    lines.push('');
  }

  lines.push(formatCounts(report));
  return lines.join('\n');
}

export function formatCounts(report: FreshnessReport): string {
  const parts = [
    `Total: ${report.total}`,
    chalk.green(`Fresh: ${report.fresh}`),
    (report.stale > 0 ? chalk.yellow : chalk.dim)(`Stale: ${report.stale}`),
    (report.unknown > 0 ? chalk.red : chalk.dim)(`Unknown: ${report.unknown}`),
  ];
  if (report.reverted > 0) parts.push(chalk.cyan(`Reverted: ${report.reverted}`));
  return parts.join(' | ');
}

export function formatSummary(summary: GenerateSummary): string {
  const lines: string[] = [];

  for (const error of summary.errors) {
    const subject = error.name ? `${error.path} ${error.scope}:${error.name}` : error.path;
    lines.push(chalk.red(`  ✗ ${subject}: ${error.message}`));
  }
  if (summary.errors.length > 0) lines.push('');

  const parts = [
    chalk.green(`${summary.generated} generated`),
    chalk.dim(`${summary.skipped} up to date`),
  ];
  if (summary.failed > 0) parts.push(chalk.red(`${summary.failed} failed`));
  if (summary.placeholders > 0) parts.push(chalk.yellow(`${summary.placeholders} placeholders`));
  if (summary.conflicts > 0) parts.push(chalk.yellow(`${summary.conflicts} invalidated during generation`));

  lines.push(`  ${parts.join(', ')}`);
  lines.push(chalk.dim(`  ${summary.entities} entities across ${summary.files} files, ${summary.sidecarsWritten} sidecars written`));
  if (summary.aborted) lines.push(chalk.yellow('  Interrupted: completed descriptions were kept'));
  return lines.join('\n');
}

export function formatFragments(fragments: Array<{ path: string; fragment: SidecarFragment }>): string {
  if (fragments.length === 0) {
    return chalk.dim('No descriptions found.');
  }

  const lines: string[] = [];
  for (const { path, fragment } of fragments) {
    const label = fragment.scope && fragment.name ? `[${fragment.scope}] ${fragment.name}` : `[?] ${path}`;
    lines.push(fragment.stale ? `${label} ${chalk.yellow('(stale)')}` : label);
    for (const line of fragment.description.split('\n')) {
      lines.push(`  ${line}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}
