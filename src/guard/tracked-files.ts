import path from 'node:path';

import fg from 'fast-glob';

export const DEFAULT_TRACKED_PATTERN = 'current_jobs_*.{db,sqlite,sqlite3,json}';

export interface TrackedFileQuery {
  dataDir: string;
  pattern?: string;
}

/**
 * Resolve the tracked dataset files under `dataDir`. Paths are absolute so the
 * snapshot and the post-collection check key the same file identically.
 */
export function findTrackedFiles(query: TrackedFileQuery): string[] {
  return fg
    .sync(query.pattern ?? DEFAULT_TRACKED_PATTERN, {
      cwd: path.resolve(query.dataDir),
      absolute: true,
      onlyFiles: true,
      dot: false,
    })
    .map((filePath) => path.normalize(filePath))
    .sort();
}
