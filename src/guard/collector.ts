import { spawnSync } from 'node:child_process';

import type { Collector, CollectorOutcome } from './types.js';

export interface ShellCollectorOptions {
  cwd?: string;
  /** Capture stdout/stderr instead of streaming them to this process. */
  captureOutput?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs the data collector as a shell command and blocks until it exits. A
 * collector that cannot be started is reported as a failed run.
 */
export class ShellCollector implements Collector {
  readonly description: string;
  private readonly command: string;
  private readonly options: ShellCollectorOptions;

  constructor(command: string, options: ShellCollectorOptions = {}) {
    this.command = command;
    this.options = options;
    this.description = `Collecting current jobs (${command})`;
  }

  run(): CollectorOutcome {
    const capture = this.options.captureOutput ?? false;
    const result = spawnSync(this.command, {
      cwd: this.options.cwd,
      env: this.options.env ?? process.env,
      shell: true,
      stdio: capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
      encoding: 'utf8',
    });

    const output = capture ? `${result.stdout ?? ''}${result.stderr ?? ''}` : '';

    if (result.error) {
      return { success: false, exitCode: result.status, output: output || result.error.message };
    }

    return { success: result.status === 0, exitCode: result.status, output };
  }
}
