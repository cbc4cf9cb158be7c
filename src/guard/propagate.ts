import { execFileSync } from 'node:child_process';
import path from 'node:path';

import type { PropagationOutcome, Propagator } from './types.js';

export interface GitPropagatorOptions {
  cwd: string;
  message?: string;
  push?: boolean;
}

export const DEFAULT_COMMIT_MESSAGE = 'Update current job datasets';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Commits the tracked dataset files and optionally pushes the commit. */
export class GitPropagator implements Propagator {
  private readonly options: GitPropagatorOptions;

  constructor(options: GitPropagatorOptions) {
    this.options = options;
  }

  propagate(files: string[]): PropagationOutcome {
    if (files.length === 0) {
      return { status: 'skipped', reason: 'no dataset changes' };
    }

    const cwd = path.resolve(this.options.cwd);
    const relative = files.map((file) => path.relative(cwd, path.resolve(file)));

    try {
      execFileSync('git', ['add', '--', ...relative], { cwd, stdio: 'inherit' });
      execFileSync('git', ['commit', '-m', this.options.message ?? DEFAULT_COMMIT_MESSAGE, '--', ...relative], {
        cwd,
        stdio: 'inherit',
      });
      if (this.options.push) {
        execFileSync('git', ['push'], { cwd, stdio: 'inherit' });
      }
    } catch (error) {
      return { status: 'failed', error: describeError(error) };
    }

    return { status: 'propagated', files: relative, pushed: this.options.push ?? false };
  }
}
