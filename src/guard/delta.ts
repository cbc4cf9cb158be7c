import type { DatasetDelta, IntegrityReport } from './types.js';

function compareNames(left: DatasetDelta, right: DatasetDelta): number {
  if (left.name === right.name) {
    return left.path < right.path ? -1 : left.path > right.path ? 1 : 0;
  }
  return left.name < right.name ? -1 : 1;
}

/**
 * Net additions per tracked file, sorted by file name. Only meaningful for a
 * passing report, where no count went down. Unreadable files are listed as zero.
 */
export function computeDeltas(report: IntegrityReport): DatasetDelta[] {
  if (!report.verdict.ok) {
    throw new Error('Deltas are only reported for a passing integrity check');
  }

  return report.files
    .map((check): DatasetDelta => {
      if (check.status === 'read_error') {
        return {
          name: check.name,
          path: check.path,
          added: 0,
          initialCount: check.initialCount,
          currentCount: check.initialCount,
          unreadable: true,
        };
      }

      return {
        name: check.file.name,
        path: check.file.path,
        added: check.file.currentCount - check.file.initialCount,
        initialCount: check.file.initialCount,
        currentCount: check.file.currentCount,
        unreadable: false,
      };
    })
    .sort(compareNames);
}

export function totalAdded(deltas: readonly DatasetDelta[]): number {
  return deltas.reduce((sum, delta) => sum + delta.added, 0);
}
