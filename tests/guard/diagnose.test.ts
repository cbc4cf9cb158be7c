import fs from 'node:fs';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DatasetTableLoader } from '../../src/db/table-loader.js';
import { diagnoseShrinkage, diffRecordSets } from '../../src/guard/diagnose.js';
import {
  createDataDir,
  InMemoryHistory,
  makeJobs,
  removeDataDir,
  serializeSqliteDataset,
  writeCorruptDataset,
  writeSqliteDataset,
} from '../fixtures/job-datasets.js';

describe('diffRecordSets', () => {
  it('splits identifiers into removed and added sets', () => {
    const diff = diffRecordSets(new Set(['1', '2', '3']), new Set(['2', '3', '4']));

    expect([...diff.removedIds]).toEqual(['1']);
    expect([...diff.addedIds]).toEqual(['4']);
  });

  it('produces disjoint sets whose sizes match the count change', () => {
    const historical = new Set(['a', 'b', 'c', 'd']);
    const current = new Set(['c', 'd', 'e']);

    const diff = diffRecordSets(historical, current);

    expect([...diff.removedIds].filter((id) => diff.addedIds.has(id))).toEqual([]);
    expect(diff.addedIds.size - diff.removedIds.size).toBe(current.size - historical.size);
  });
});

describe('diagnoseShrinkage', () => {
  let dataDir: string;
  let filePath: string;
  const loader = new DatasetTableLoader();

  beforeEach(() => {
    dataDir = createDataDir();
    filePath = path.join(dataDir, 'current_jobs_2025.db');
  });

  afterEach(() => {
    removeDataDir(dataDir);
  });

  it('names every removed posting when only a few disappeared', () => {
    writeSqliteDataset(filePath, makeJobs(95, 6));
    const history = new InMemoryHistory().set(filePath, serializeSqliteDataset(makeJobs(100)));

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 100 }, { loader, history });

    expect(diagnosis).toEqual({
      path: filePath,
      name: 'current_jobs_2025.db',
      initialCount: 100,
      currentCount: 95,
      delta: -5,
      status: 'compared',
      revision: 'HEAD',
      historicalCount: 100,
      removedCount: 5,
      addedCount: 0,
      removed: [1, 2, 3, 4, 5].map((n) => ({
        id: `JOB-${n}`,
        title: `Position ${n}`,
        organization: `Agency ${n}`,
        openedOn: '2025-03-01',
      })),
      sampleIds: [],
    });
  });

  it('reports a bounded sample when too many postings disappeared', () => {
    writeSqliteDataset(filePath, makeJobs(85, 16));
    const history = new InMemoryHistory().set(filePath, serializeSqliteDataset(makeJobs(100)));

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 100 }, { loader, history });

    expect(diagnosis.status).toBe('compared');
    if (diagnosis.status !== 'compared') return;
    expect(diagnosis.removedCount).toBe(15);
    expect(diagnosis.removed).toEqual([]);
    expect(diagnosis.sampleIds).toEqual(['JOB-1', 'JOB-2', 'JOB-3', 'JOB-4', 'JOB-5']);
  });

  it('counts replacements as well as removals', () => {
    writeSqliteDataset(filePath, [...makeJobs(8, 3), ...makeJobs(1, 50)]);
    const history = new InMemoryHistory().set(filePath, serializeSqliteDataset(makeJobs(10)));

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 10 }, { loader, history });

    expect(diagnosis).toMatchObject({ status: 'compared', currentCount: 9, removedCount: 2, addedCount: 1 });
  });

  it('degrades to counts when no committed version exists', () => {
    writeSqliteDataset(filePath, makeJobs(95));
    const history = new InMemoryHistory();

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 100 }, { loader, history });

    expect(diagnosis).toEqual({
      path: filePath,
      name: 'current_jobs_2025.db',
      initialCount: 100,
      currentCount: 95,
      delta: -5,
      status: 'history_unavailable',
      reason: 'current_jobs_2025.db has no committed version',
    });
  });

  it('compares across identifier spellings', () => {
    writeSqliteDataset(filePath, makeJobs(2, 2), 'current');
    const history = new InMemoryHistory().set(filePath, serializeSqliteDataset(makeJobs(3), 'legacy'));

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 3 }, { loader, history });

    expect(diagnosis).toMatchObject({
      status: 'compared',
      removedCount: 1,
      removed: [{ id: 'JOB-1', title: 'Position 1', organization: 'Agency 1', openedOn: '2025-03-01' }],
    });
  });

  it('falls back to counts when the committed table has no identifier column', () => {
    const jsonPath = path.join(dataDir, 'current_jobs_2025.json');
    fs.writeFileSync(jsonPath, JSON.stringify([{ positionTitle: 'Analyst' }]));
    const committed = Buffer.from(JSON.stringify([{ positionTitle: 'Analyst' }, { positionTitle: 'Clerk' }]));
    const history = new InMemoryHistory().set(jsonPath, committed);

    const diagnosis = diagnoseShrinkage({ path: jsonPath, initialCount: 2 }, { loader, history });

    expect(diagnosis).toMatchObject({ status: 'no_identifier_column', currentCount: 1, historicalCount: 2 });
  });

  it('treats a deleted file as having lost every posting', () => {
    const history = new InMemoryHistory().set(filePath, serializeSqliteDataset(makeJobs(3)));

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 3 }, { loader, history });

    expect(diagnosis).toMatchObject({ status: 'compared', currentCount: 0, delta: -3, removedCount: 3 });
    if (diagnosis.status !== 'compared') return;
    expect(diagnosis.removed.map((record) => record.id)).toEqual(['JOB-1', 'JOB-2', 'JOB-3']);
  });

  it('reports unparseable committed content as a diagnosis error', () => {
    writeSqliteDataset(filePath, makeJobs(95));
    const history = new InMemoryHistory().set(filePath, Buffer.from('not a database '.repeat(512)));

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 100 }, { loader, history });

    expect(diagnosis.status).toBe('error');
    expect(diagnosis.currentCount).toBe(95);
  });

  it('reports an unreadable current file as a diagnosis error', () => {
    writeCorruptDataset(filePath);
    const history = new InMemoryHistory().set(filePath, serializeSqliteDataset(makeJobs(3)));

    const diagnosis = diagnoseShrinkage({ path: filePath, initialCount: 3 }, { loader, history });

    expect(diagnosis.status).toBe('error');
    expect(diagnosis.currentCount).toBeNull();
    expect(history.requested).toEqual([]);
  });
});
