import fs from 'node:fs';
import path from 'node:path';

import type { TableLoader } from '../db/types.js';
import type { HistoricalVersionFetcher } from './history.js';
import type { DatasetSnapshot, SnapshotEntry } from './types.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fileSize(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}

/**
 * Capture size and row count for every tracked file before the collector runs.
 * A file that cannot be loaded gets count 0, so anything it holds later counts
 * as growth rather than loss.
 */
export function recordSnapshot(paths: readonly string[], loader: TableLoader, now: Date = new Date()): DatasetSnapshot {
  const entries = new Map<string, SnapshotEntry>();

  for (const filePath of paths) {
    const entry: SnapshotEntry = {
      path: filePath,
      name: path.basename(filePath),
      size: fileSize(filePath),
      count: 0,
      error: null,
    };

    try {
      entry.count = loader.load(filePath).rows.length;
    } catch (error) {
      entry.error = describeError(error);
    }

    entries.set(filePath, entry);
  }

  return { takenAt: now.toISOString(), baseline: 'working_copy', entries };
}

/**
 * Build the baseline from each file's committed version instead of the working
 * copy. Files with no committed version start at zero.
 */
export function recordCommittedSnapshot(
  paths: readonly string[],
  loader: TableLoader,
  history: HistoricalVersionFetcher,
  now: Date = new Date(),
): DatasetSnapshot {
  const entries = new Map<string, SnapshotEntry>();

  for (const filePath of paths) {
    const entry: SnapshotEntry = {
      path: filePath,
      name: path.basename(filePath),
      size: 0,
      count: 0,
      error: null,
    };

    const fetched = history.fetch(filePath);
    if (fetched.found) {
      entry.size = fetched.content.length;
      try {
        entry.count = loader.loadFromBytes(fetched.content, filePath).rows.length;
      } catch (error) {
        entry.error = describeError(error);
      }
    }

    entries.set(filePath, entry);
  }

  return { takenAt: now.toISOString(), baseline: 'committed', entries };
}

export function serializeSnapshot(snapshot: DatasetSnapshot): {
  takenAt: string;
  baseline: DatasetSnapshot['baseline'];
  entries: SnapshotEntry[];
} {
  return { takenAt: snapshot.takenAt, baseline: snapshot.baseline, entries: [...snapshot.entries.values()] };
}
