export type TableFormat = 'sqlite' | 'json';

/** A single posting row as stored in a dataset file. Column values are left untyped. */
export type JobRow = Record<string, unknown>;

export interface DatasetTable {
  format: TableFormat;
  columns: string[];
  rows: JobRow[];
}

export type TableReadReason = 'missing' | 'unsupported_format' | 'unreadable';

export class TableReadError extends Error {
  readonly filePath: string;
  readonly reason: TableReadReason;

  constructor(filePath: string, reason: TableReadReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TableReadError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

export interface TableLoader {
  load(filePath: string): DatasetTable;
  loadFromBytes(content: Buffer, filePath: string): DatasetTable;
}
