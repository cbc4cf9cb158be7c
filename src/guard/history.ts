import { execFileSync } from 'node:child_process';
import path from 'node:path';

export const DEFAULT_REVISION = 'HEAD';
const DEFAULT_MAX_BUFFER_BYTES = 512 * 1024 * 1024;

export type HistoricalFetchResult = { found: true; content: Buffer } | { found: false; reason: string };

/** Source of a tracked file's content as of the last committed state. */
export interface HistoricalVersionFetcher {
  readonly revision: string;
  fetch(filePath: string): HistoricalFetchResult;
}

export interface GitHistoryFetcherOptions {
  revision?: string;
  maxBufferBytes?: number;
}

function failureReason(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    const stderr = 'stderr' in error ? error.stderr : undefined;
    const text = Buffer.isBuffer(stderr) ? stderr.toString('utf8') : typeof stderr === 'string' ? stderr : '';
    const firstLine = text.split('\n').find((line) => line.trim().length > 0);
    if (firstLine) {
      return firstLine.trim();
    }
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads committed content with `git show <revision>:./<file>`, run from the
 * file's own directory so no repository root has to be known.
 */
export class GitHistoryFetcher implements HistoricalVersionFetcher {
  readonly revision: string;
  private readonly maxBufferBytes: number;

  constructor(options: GitHistoryFetcherOptions = {}) {
    this.revision = options.revision ?? DEFAULT_REVISION;
    this.maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  }

  fetch(filePath: string): HistoricalFetchResult {
    const absolute = path.resolve(filePath);
    const objectRef = `${this.revision}:./${path.basename(absolute)}`;

    let content: Buffer;
    try {
      content = execFileSync('git', ['show', objectRef], {
        cwd: path.dirname(absolute),
        encoding: 'buffer',
        maxBuffer: this.maxBufferBytes,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      return { found: false, reason: `git show ${objectRef} failed: ${failureReason(error)}` };
    }

    if (content.length === 0) {
      return { found: false, reason: `git show ${objectRef} returned no content` };
    }

    return { found: true, content };
  }
}
