import fs from 'node:fs';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DatasetTableLoader } from '../../src/db/table-loader.js';
import { diagnoseShrinkage } from '../../src/guard/diagnose.js';
import { GitHistoryFetcher } from '../../src/guard/history.js';
import {
  commitAll,
  createDataDir,
  initGitRepo,
  makeJobs,
  removeDataDir,
  writeSqliteDataset,
} from '../fixtures/job-datasets.js';

describe('GitHistoryFetcher', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = createDataDir();
  });

  afterEach(() => {
    removeDataDir(dataDir);
  });

  it('defaults to the last commit', () => {
    expect(new GitHistoryFetcher().revision).toBe('HEAD');
    expect(new GitHistoryFetcher({ revision: 'HEAD~1' }).revision).toBe('HEAD~1');
  });

  it('reports content outside any repository as unavailable', () => {
    const result = new GitHistoryFetcher().fetch(path.join(dataDir, 'current_jobs_2025.db'));

    expect(result.found).toBe(false);
    if (result.found) return;
    expect(result.reason.startsWith('git show HEAD:./current_jobs_2025.db failed: ')).toBe(true);
  });

  describe('inside a repository', () => {
    let filePath: string;

    beforeEach(() => {
      initGitRepo(dataDir);
      fs.mkdirSync(path.join(dataDir, 'data'));
      filePath = path.join(dataDir, 'data', 'current_jobs_2025.db');
      writeSqliteDataset(filePath, makeJobs(10));
      commitAll(dataDir, 'Add 2025 jobs');
    });

    it('reads the committed bytes of a file in a subdirectory', () => {
      writeSqliteDataset(filePath, makeJobs(7));

      const result = new GitHistoryFetcher().fetch(filePath);

      expect(result.found).toBe(true);
      if (!result.found) return;
      expect(new DatasetTableLoader().loadFromBytes(result.content, filePath).rows).toHaveLength(10);
    });

    it('feeds the diagnoser the committed version', () => {
      writeSqliteDataset(filePath, makeJobs(7));

      const diagnosis = diagnoseShrinkage(
        { path: filePath, initialCount: 10 },
        { loader: new DatasetTableLoader(), history: new GitHistoryFetcher() },
      );

      expect(diagnosis).toMatchObject({
        status: 'compared',
        revision: 'HEAD',
        historicalCount: 10,
        currentCount: 7,
        removedCount: 3,
        addedCount: 0,
      });
      if (diagnosis.status !== 'compared') return;
      expect(diagnosis.removed.map((record) => record.id)).toEqual(['JOB-8', 'JOB-9', 'JOB-10']);
    });

    it('reports a file that was never committed as unavailable', () => {
      const untracked = path.join(dataDir, 'data', 'current_jobs_2026.db');
      writeSqliteDataset(untracked, makeJobs(1));

      const result = new GitHistoryFetcher().fetch(untracked);

      expect(result.found).toBe(false);
      if (result.found) return;
      expect(result.reason.startsWith('git show HEAD:./current_jobs_2026.db failed: ')).toBe(true);
    });
  });
});
