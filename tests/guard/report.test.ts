import { describe, expect, it } from 'vitest';

import {
  formatCount,
  renderCollector,
  renderDeltas,
  renderDiagnosis,
  renderFileCheck,
  renderIntegrity,
  renderPropagation,
  renderSnapshot,
} from '../../src/guard/report.js';
import type { DatasetSnapshot, IntegrityReport, ShrinkageDiagnosis, SnapshotEntry } from '../../src/guard/types.js';

const counts = {
  path: '/data/current_jobs_2025.db',
  name: 'current_jobs_2025.db',
  initialCount: 100,
  currentCount: 95,
  delta: -5,
};

describe('report rendering', () => {
  it('groups thousands', () => {
    expect(formatCount(1234567)).toBe('1,234,567');
  });

  it('renders snapshot entries, including unreadable ones', () => {
    const snapshot: DatasetSnapshot = {
      takenAt: '2025-06-01T00:00:00.000Z',
      baseline: 'working_copy',
      entries: new Map<string, SnapshotEntry>([
        ['/data/a.db', { path: '/data/a.db', name: 'a.db', size: 40960, count: 1200, error: null }],
        ['/data/b.db', { path: '/data/b.db', name: 'b.db', size: 12, count: 0, error: 'file is not a database' }],
      ]),
    };

    expect(renderSnapshot(snapshot)).toEqual([
      'Recording initial job counts (2 tracked files)',
      '  a.db: 1,200 jobs, 40,960 bytes',
      '  b.db: could not read (file is not a database); counted as 0',
    ]);
  });

  it('renders collector outcomes', () => {
    expect(renderCollector('Collecting current jobs', { success: true, exitCode: 0, output: '' })).toEqual([
      'Collecting current jobs completed',
    ]);
    expect(renderCollector('Collecting current jobs', { success: false, exitCode: 2, output: '' })).toEqual([
      'Collecting current jobs failed (exit code 2); continuing to integrity check',
    ]);
  });

  it('renders each kind of file check', () => {
    const file = { path: '/data/x.db', name: 'x.db', initialSize: 1000, currentSize: 1500, initialCount: 100, currentCount: 130 };

    expect(renderFileCheck({ status: 'growth', file, removedFromDisk: false })).toBe(
      'OK x.db: 100 -> 130 jobs (+30), 1,000 -> 1,500 bytes (+500)',
    );
    expect(
      renderFileCheck({ status: 'loss', file: { ...file, currentCount: 95, currentSize: 900 }, removedFromDisk: false }),
    ).toBe('LOST JOBS x.db: 100 -> 95 jobs (-5), 1,000 -> 900 bytes');
    expect(
      renderFileCheck({ status: 'loss', file: { ...file, currentCount: 0, currentSize: 0 }, removedFromDisk: true }),
    ).toBe('LOST JOBS x.db: 100 -> 0 jobs (-100), 1,000 -> 0 bytes [file removed]');
    expect(
      renderFileCheck({ status: 'unchanged', file: { ...file, currentCount: 100 }, removedFromDisk: false }),
    ).toBe('OK x.db: 100 jobs (unchanged), 1,500 bytes');
    expect(
      renderFileCheck({
        status: 'read_error',
        path: '/data/x.db',
        name: 'x.db',
        initialCount: 100,
        initialSize: 1000,
        reason: 'unreadable',
        error: 'file is not a database',
      }),
    ).toBe('READ ERROR x.db: file is not a database');
  });

  it('lists resolved removals', () => {
    const diagnosis: ShrinkageDiagnosis = {
      ...counts,
      status: 'compared',
      revision: 'HEAD',
      historicalCount: 100,
      removedCount: 2,
      addedCount: 0,
      removed: [
        { id: 'JOB-1', title: 'Position 1', organization: 'Agency 1', openedOn: '2025-03-01' },
        { id: 'JOB-2', title: null, organization: null, openedOn: null },
      ],
      sampleIds: [],
    };

    expect(renderDiagnosis(diagnosis)).toEqual([
      'Diagnosing current_jobs_2025.db:',
      '  Initial jobs: 100',
      '  Current jobs: 95',
      '  Jobs lost: 5',
      '  Compared against HEAD (100 jobs)',
      '  Jobs removed: 2',
      '  Jobs added: 0',
      '  Removed jobs:',
      '  - JOB-1: Position 1 (Agency 1) - opened 2025-03-01',
      '  - JOB-2: Unknown (Unknown) - opened Unknown',
    ]);
  });

  it('samples long removal lists', () => {
    const diagnosis: ShrinkageDiagnosis = {
      ...counts,
      status: 'compared',
      revision: 'HEAD',
      historicalCount: 110,
      removedCount: 15,
      addedCount: 0,
      removed: [],
      sampleIds: ['JOB-1', 'JOB-2', 'JOB-3', 'JOB-4', 'JOB-5'],
    };

    expect(renderDiagnosis(diagnosis).slice(-2)).toEqual([
      '  Too many removed jobs to list (15 total)',
      '  First 5 control numbers: JOB-1, JOB-2, JOB-3, JOB-4, JOB-5',
    ]);
  });

  it('says when historical comparison is unavailable', () => {
    expect(
      renderDiagnosis({ ...counts, status: 'history_unavailable', reason: 'git show HEAD:./current_jobs_2025.db failed' }).at(-1),
    ).toBe('  Historical comparison unavailable: git show HEAD:./current_jobs_2025.db failed');
    expect(renderDiagnosis({ ...counts, status: 'no_identifier_column', historicalCount: 100 }).at(-1)).toBe(
      '  No control number column found for comparison; counts only',
    );
    expect(
      renderDiagnosis({
        path: counts.path,
        name: counts.name,
        initialCount: 100,
        status: 'error',
        currentCount: null,
        message: 'boom',
      }),
    ).toEqual(['Diagnosing current_jobs_2025.db:', '  Initial jobs: 100', '  Current jobs: Unknown', '  Error during diagnosis: boom']);
  });

  it('ends a failing report with the abort notice', () => {
    const report: IntegrityReport = {
      verdict: { ok: false, changed: false },
      files: [
        {
          status: 'loss',
          file: { path: counts.path, name: counts.name, initialSize: 10, currentSize: 9, initialCount: 100, currentCount: 95 },
          removedFromDisk: false,
        },
      ],
      diagnoses: [{ ...counts, status: 'history_unavailable', reason: 'no history' }],
    };

    const lines = renderIntegrity(report);

    expect(lines[0]).toBe('Checking data integrity (1 tracked files)');
    expect(lines).toContain('Diagnostics for files with data loss:');
    expect(lines).toContain('CRITICAL: DATA LOSS DETECTED. Refusing to commit or push changes.');
    expect(lines.at(-1)).toBe('  3. Fix the root cause before running again');
  });

  it('notes read errors after the file list', () => {
    const report: IntegrityReport = {
      verdict: { ok: true, changed: false },
      files: [
        {
          status: 'read_error',
          path: counts.path,
          name: counts.name,
          initialCount: 100,
          initialSize: 10,
          reason: 'unreadable',
          error: 'file is not a database',
        },
      ],
      diagnoses: [],
    };

    expect(renderIntegrity(report)).toEqual([
      'Checking data integrity (1 tracked files)',
      'READ ERROR current_jobs_2025.db: file is not a database',
      '',
      '1 tracked file(s) could not be read; propagation is blocked until they load.',
    ]);
  });

  it('renders per-file additions and propagation outcomes', () => {
    expect(
      renderDeltas([
        { name: 'a.db', path: '/data/a.db', added: 1500, initialCount: 100, currentCount: 1600, unreadable: false },
        { name: 'b.db', path: '/data/b.db', added: 0, initialCount: 5, currentCount: 5, unreadable: false },
        { name: 'c.db', path: '/data/c.db', added: 0, initialCount: 5, currentCount: 5, unreadable: true },
      ]),
    ).toEqual([
      'Jobs added per file:',
      '  a.db: +1,500 jobs (was 100, now 1,600)',
      '  b.db: 0 jobs added',
      '  c.db: 0 jobs added (unreadable)',
    ]);
    expect(renderPropagation({ status: 'propagated', files: ['data/a.db'], pushed: true })).toBe(
      'Committed 1 dataset file(s) and pushed',
    );
    expect(renderPropagation({ status: 'skipped', reason: 'data loss detected' })).toBe(
      'Propagation skipped: data loss detected',
    );
    expect(renderPropagation({ status: 'failed', error: 'nothing to commit' })).toBe('Propagation failed: nothing to commit');
  });
});
