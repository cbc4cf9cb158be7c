import path from 'node:path';

import { formatForPath } from '../db/table-loader.js';
import { TableReadError, type DatasetTable, type TableLoader } from '../db/types.js';
import type { HistoricalVersionFetcher } from './history.js';
import { describeRecord, extractRecordSet, recordIdOf } from './record-set.js';
import type { DiffResult, RemovedRecord, ShrinkageDiagnosis } from './types.js';

/** Removed identifiers are resolved to full rows only up to this many. */
export const MAX_LISTED_REMOVALS = 10;
export const REMOVED_ID_SAMPLE_SIZE = 5;

export interface ShrinkageInput {
  path: string;
  initialCount: number;
}

export interface DiagnoserDeps {
  loader: TableLoader;
  history: HistoricalVersionFetcher;
}

export function diffRecordSets(historicalIds: ReadonlySet<string>, currentIds: ReadonlySet<string>): DiffResult {
  const removedIds = new Set<string>();
  const addedIds = new Set<string>();

  for (const id of historicalIds) {
    if (!currentIds.has(id)) {
      removedIds.add(id);
    }
  }
  for (const id of currentIds) {
    if (!historicalIds.has(id)) {
      addedIds.add(id);
    }
  }

  return { removedIds, addedIds };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function loadCurrent(loader: TableLoader, filePath: string): DatasetTable {
  try {
    return loader.load(filePath);
  } catch (error) {
    // A tracked file deleted by the collector lost every record it had.
    if (error instanceof TableReadError && error.reason === 'missing') {
      return { format: formatForPath(filePath) ?? 'sqlite', columns: [], rows: [] };
    }
    throw error;
  }
}

/**
 * Explain a count drop by diffing the current identifiers against the
 * committed version of the same file. Never throws: failures come back as an
 * `error` diagnosis so sibling files are still diagnosed.
 */
export function diagnoseShrinkage(input: ShrinkageInput, deps: DiagnoserDeps): ShrinkageDiagnosis {
  const base = {
    path: input.path,
    name: path.basename(input.path),
    initialCount: input.initialCount,
  };

  let currentCount: number | null = null;

  try {
    const current = loadCurrent(deps.loader, input.path);
    currentCount = current.rows.length;
    const counts = { ...base, currentCount, delta: currentCount - input.initialCount };

    const fetched = deps.history.fetch(input.path);
    if (!fetched.found) {
      return { ...counts, status: 'history_unavailable', reason: fetched.reason };
    }

    const historical = deps.loader.loadFromBytes(fetched.content, input.path);
    const historicalSet = extractRecordSet(historical);
    const currentSet = extractRecordSet(current);

    const variant = historicalSet.variant;
    if (!variant || (!currentSet.variant && current.rows.length > 0)) {
      return { ...counts, status: 'no_identifier_column', historicalCount: historical.rows.length };
    }

    const diff = diffRecordSets(historicalSet.ids, currentSet.ids);
    const removed: RemovedRecord[] = [];
    let sampleIds: string[] = [];

    if (diff.removedIds.size <= MAX_LISTED_REMOVALS) {
      const pending = new Set(diff.removedIds);
      for (const row of historical.rows) {
        const id = recordIdOf(row, variant);
        if (id !== null && pending.delete(id)) {
          removed.push(describeRecord(id, row, variant));
        }
      }
    } else {
      sampleIds = [...diff.removedIds].slice(0, REMOVED_ID_SAMPLE_SIZE);
    }

    return {
      ...counts,
      status: 'compared',
      revision: deps.history.revision,
      historicalCount: historical.rows.length,
      removedCount: diff.removedIds.size,
      addedCount: diff.addedIds.size,
      removed,
      sampleIds,
    };
  } catch (error) {
    return { ...base, status: 'error', currentCount, message: describeError(error) };
  }
}
