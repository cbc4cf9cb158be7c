import { readErrorsOf } from './integrity.js';
import type {
  CollectorOutcome,
  DatasetDelta,
  DatasetSnapshot,
  FileCheck,
  IntegrityReport,
  PropagationOutcome,
  ShrinkageDiagnosis,
} from './types.js';

const UNKNOWN = 'Unknown';

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

function formatSigned(value: number): string {
  return value > 0 ? `+${formatCount(value)}` : formatCount(value);
}

export function renderSnapshot(snapshot: DatasetSnapshot): string[] {
  const lines = [`Recording initial job counts (${snapshot.entries.size} tracked files)`];
  for (const entry of snapshot.entries.values()) {
    lines.push(
      entry.error
        ? `  ${entry.name}: could not read (${entry.error}); counted as 0`
        : `  ${entry.name}: ${formatCount(entry.count)} jobs, ${formatCount(entry.size)} bytes`,
    );
  }
  return lines;
}

export function renderCollector(description: string, outcome: CollectorOutcome): string[] {
  if (outcome.success) {
    return [`${description} completed`];
  }
  const exitCode = outcome.exitCode === null ? 'none' : String(outcome.exitCode);
  return [`${description} failed (exit code ${exitCode}); continuing to integrity check`];
}

export function renderFileCheck(check: FileCheck): string {
  if (check.status === 'read_error') {
    return `READ ERROR ${check.name}: ${check.error}`;
  }

  const { name, initialCount, currentCount, initialSize, currentSize } = check.file;
  const jobs = currentCount - initialCount;

  switch (check.status) {
    case 'loss':
      return (
        `LOST JOBS ${name}: ${formatCount(initialCount)} -> ${formatCount(currentCount)} jobs (${formatSigned(jobs)}), ` +
        `${formatCount(initialSize)} -> ${formatCount(currentSize)} bytes` +
        (check.removedFromDisk ? ' [file removed]' : '')
      );
    case 'growth':
      return (
        `OK ${name}: ${formatCount(initialCount)} -> ${formatCount(currentCount)} jobs (${formatSigned(jobs)}), ` +
        `${formatCount(initialSize)} -> ${formatCount(currentSize)} bytes (${formatSigned(currentSize - initialSize)})`
      );
    case 'unchanged':
      return `OK ${name}: ${formatCount(currentCount)} jobs (unchanged), ${formatCount(currentSize)} bytes`;
  }
}

export function renderDiagnosis(diagnosis: ShrinkageDiagnosis): string[] {
  const lines = [`Diagnosing ${diagnosis.name}:`, `  Initial jobs: ${formatCount(diagnosis.initialCount)}`];

  if (diagnosis.status === 'error') {
    lines.push(`  Current jobs: ${diagnosis.currentCount === null ? UNKNOWN : formatCount(diagnosis.currentCount)}`);
    lines.push(`  Error during diagnosis: ${diagnosis.message}`);
    return lines;
  }

  lines.push(`  Current jobs: ${formatCount(diagnosis.currentCount)}`);
  if (diagnosis.delta < 0) {
    lines.push(`  Jobs lost: ${formatCount(-diagnosis.delta)}`);
  } else if (diagnosis.delta > 0) {
    lines.push(`  Jobs added: ${formatCount(diagnosis.delta)}`);
  } else {
    lines.push('  Jobs unchanged');
  }

  switch (diagnosis.status) {
    case 'history_unavailable':
      lines.push(`  Historical comparison unavailable: ${diagnosis.reason}`);
      break;
    case 'no_identifier_column':
      lines.push('  No control number column found for comparison; counts only');
      break;
    case 'compared':
      lines.push(`  Compared against ${diagnosis.revision} (${formatCount(diagnosis.historicalCount)} jobs)`);
      lines.push(`  Jobs removed: ${formatCount(diagnosis.removedCount)}`);
      lines.push(`  Jobs added: ${formatCount(diagnosis.addedCount)}`);
      if (diagnosis.removed.length > 0) {
        lines.push('  Removed jobs:');
        for (const record of diagnosis.removed) {
          lines.push(
            `  - ${record.id}: ${record.title ?? UNKNOWN} (${record.organization ?? UNKNOWN}) - opened ${record.openedOn ?? UNKNOWN}`,
          );
        }
      }
      if (diagnosis.sampleIds.length > 0) {
        lines.push(`  Too many removed jobs to list (${formatCount(diagnosis.removedCount)} total)`);
        lines.push(`  First ${diagnosis.sampleIds.length} control numbers: ${diagnosis.sampleIds.join(', ')}`);
      }
      break;
  }

  return lines;
}

export function renderIntegrity(report: IntegrityReport): string[] {
  const lines = [`Checking data integrity (${report.files.length} tracked files)`];
  lines.push(...report.files.map(renderFileCheck));

  if (report.diagnoses.length > 0) {
    lines.push('', 'Diagnostics for files with data loss:');
    for (const diagnosis of report.diagnoses) {
      lines.push(...renderDiagnosis(diagnosis));
    }
  }

  if (!report.verdict.ok) {
    lines.push(
      '',
      'CRITICAL: DATA LOSS DETECTED. Refusing to commit or push changes.',
      'Next steps:',
      '  1. Review the diagnostics above',
      '  2. Restore the affected files from history if needed (git checkout -- <file>)',
      '  3. Fix the root cause before running again',
    );
  }

  const readErrors = readErrorsOf(report);
  if (readErrors.length > 0) {
    lines.push('', `${readErrors.length} tracked file(s) could not be read; propagation is blocked until they load.`);
  }

  return lines;
}

export function renderDeltas(deltas: readonly DatasetDelta[]): string[] {
  const lines = ['Jobs added per file:'];
  for (const delta of deltas) {
    if (delta.added > 0) {
      lines.push(
        `  ${delta.name}: +${formatCount(delta.added)} jobs (was ${formatCount(delta.initialCount)}, now ${formatCount(delta.currentCount)})`,
      );
    } else {
      lines.push(`  ${delta.name}: 0 jobs added${delta.unreadable ? ' (unreadable)' : ''}`);
    }
  }
  return lines;
}

export function renderPropagation(outcome: PropagationOutcome): string {
  switch (outcome.status) {
    case 'propagated':
      return `Committed ${outcome.files.length} dataset file(s)${outcome.pushed ? ' and pushed' : ''}`;
    case 'skipped':
      return `Propagation skipped: ${outcome.reason}`;
    case 'failed':
      return `Propagation failed: ${outcome.error}`;
  }
}
