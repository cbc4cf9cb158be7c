import fs from 'node:fs';
import path from 'node:path';

import { TableReadError, type TableLoader } from '../db/types.js';
import { diagnoseShrinkage } from './diagnose.js';
import type { HistoricalVersionFetcher } from './history.js';
import type { DatasetSnapshot, FileCheck, IntegrityReport, ShrinkageDiagnosis } from './types.js';

export interface IntegrityCheckDeps {
  loader: TableLoader;
  history: HistoricalVersionFetcher;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function checkFile(filePath: string, snapshot: DatasetSnapshot, loader: TableLoader): FileCheck | null {
  const baseline = snapshot.entries.get(filePath);
  const initialCount = baseline?.count ?? 0;
  const initialSize = baseline?.size ?? 0;
  const name = path.basename(filePath);

  if (!fs.existsSync(filePath)) {
    if (initialCount === 0) {
      return null;
    }
    return {
      status: 'loss',
      file: { path: filePath, name, initialSize, currentSize: 0, initialCount, currentCount: 0 },
      removedFromDisk: true,
    };
  }

  let currentCount: number;
  let currentSize: number;
  try {
    currentSize = fs.statSync(filePath).size;
    currentCount = loader.load(filePath).rows.length;
  } catch (error) {
    return {
      status: 'read_error',
      path: filePath,
      name,
      initialCount,
      initialSize,
      reason: error instanceof TableReadError ? error.reason : 'unknown',
      error: describeError(error),
    };
  }

  const file = { path: filePath, name, initialSize, currentSize, initialCount, currentCount };
  if (currentCount < initialCount) {
    return { status: 'loss', file, removedFromDisk: false };
  }
  if (currentCount > initialCount) {
    return { status: 'growth', file, removedFromDisk: false };
  }
  return { status: 'unchanged', file, removedFromDisk: false };
}

/**
 * Compare the files found after collection against the snapshot. One shrunken
 * file fails the whole run; read errors are reported per file and leave the
 * verdict to the readable files.
 */
export function checkIntegrity(
  currentPaths: readonly string[],
  snapshot: DatasetSnapshot,
  deps: IntegrityCheckDeps,
): IntegrityReport {
  const paths = [...new Set([...currentPaths, ...snapshot.entries.keys()])].sort();
  const files: FileCheck[] = [];

  for (const filePath of paths) {
    const check = checkFile(filePath, snapshot, deps.loader);
    if (check) {
      files.push(check);
    }
  }

  const diagnoses: ShrinkageDiagnosis[] = [];
  for (const check of files) {
    if (check.status === 'loss') {
      diagnoses.push(diagnoseShrinkage({ path: check.file.path, initialCount: check.file.initialCount }, deps));
    }
  }

  if (diagnoses.length > 0) {
    return { verdict: { ok: false, changed: false }, files, diagnoses };
  }

  const changed = files.some((check) => check.status === 'growth');
  return { verdict: { ok: true, changed }, files, diagnoses };
}

export function readErrorsOf(report: IntegrityReport): Array<Extract<FileCheck, { status: 'read_error' }>> {
  return report.files.filter(
    (check): check is Extract<FileCheck, { status: 'read_error' }> => check.status === 'read_error',
  );
}

/** Downstream commit/push is allowed only for a passing verdict with every file readable. */
export function mayPropagate(report: IntegrityReport): boolean {
  return report.verdict.ok && readErrorsOf(report).length === 0;
}
