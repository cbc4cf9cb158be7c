import type { TableReadReason } from '../db/types.js';

export interface SnapshotEntry {
  path: string;
  name: string;
  size: number;
  count: number;
  /** Set when the file could not be loaded; the entry then carries count 0. */
  error: string | null;
}

/**
 * Baseline captured before the collector runs. Written once, then only read by
 * the integrity check.
 */
export interface DatasetSnapshot {
  takenAt: string;
  baseline: 'working_copy' | 'committed';
  entries: ReadonlyMap<string, SnapshotEntry>;
}

export interface DatasetFile {
  path: string;
  name: string;
  initialSize: number;
  currentSize: number;
  initialCount: number;
  currentCount: number;
}

export type FileCheck =
  | {
      status: 'loss' | 'growth' | 'unchanged';
      file: DatasetFile;
      /** The file was in the snapshot but no longer exists. */
      removedFromDisk: boolean;
    }
  | {
      status: 'read_error';
      path: string;
      name: string;
      initialCount: number;
      initialSize: number;
      reason: TableReadReason | 'unknown';
      error: string;
    };

export interface DiffResult {
  removedIds: Set<string>;
  addedIds: Set<string>;
}

export interface RemovedRecord {
  id: string;
  title: string | null;
  organization: string | null;
  openedOn: string | null;
}

interface DiagnosisBase {
  path: string;
  name: string;
  initialCount: number;
}

interface DiagnosisCounts extends DiagnosisBase {
  currentCount: number;
  /** currentCount - initialCount; negative when records were lost. */
  delta: number;
}

export type ShrinkageDiagnosis =
  | (DiagnosisCounts & {
      status: 'compared';
      revision: string;
      historicalCount: number;
      removedCount: number;
      addedCount: number;
      /** Resolved rows for every removed identifier, filled only when few enough to list. */
      removed: RemovedRecord[];
      /** Bounded sample of removed identifiers, filled only when too many to list. */
      sampleIds: string[];
    })
  | (DiagnosisCounts & { status: 'history_unavailable'; reason: string })
  | (DiagnosisCounts & { status: 'no_identifier_column'; historicalCount: number })
  | (DiagnosisBase & { status: 'error'; currentCount: number | null; message: string });

export interface PipelineVerdict {
  ok: boolean;
  changed: boolean;
}

export interface IntegrityReport {
  verdict: PipelineVerdict;
  files: FileCheck[];
  diagnoses: ShrinkageDiagnosis[];
}

export interface DatasetDelta {
  name: string;
  path: string;
  added: number;
  initialCount: number;
  currentCount: number;
  unreadable: boolean;
}

export interface CollectorOutcome {
  success: boolean;
  exitCode: number | null;
  output: string;
}

export interface Collector {
  readonly description: string;
  run(): CollectorOutcome;
}

export type PropagationOutcome =
  | { status: 'propagated'; files: string[]; pushed: boolean }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export interface Propagator {
  propagate(files: string[]): PropagationOutcome;
}
