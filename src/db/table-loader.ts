import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import { TableReadError, type DatasetTable, type JobRow, type TableFormat, type TableLoader } from './types.js';

export const DEFAULT_TABLE_NAME = 'jobs';

const FORMAT_BY_EXTENSION: Record<string, TableFormat> = {
  '.db': 'sqlite',
  '.sqlite': 'sqlite',
  '.sqlite3': 'sqlite',
  '.json': 'json',
};

export interface DatasetTableLoaderOptions {
  tableName?: string;
}

export function formatForPath(filePath: string): TableFormat | null {
  return FORMAT_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? null;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isJobRow(value: unknown): value is JobRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads tracked dataset files as tables. SQLite files are read from a single
 * table; JSON files must hold an array of row objects.
 */
export class DatasetTableLoader implements TableLoader {
  private readonly tableName: string;

  constructor(options: DatasetTableLoaderOptions = {}) {
    this.tableName = options.tableName ?? DEFAULT_TABLE_NAME;
  }

  load(filePath: string): DatasetTable {
    const format = this.requireFormat(filePath);

    if (!fs.existsSync(filePath)) {
      throw new TableReadError(filePath, 'missing', `${filePath} does not exist`);
    }

    if (format === 'sqlite') {
      return this.readSqlite(filePath, () => new Database(filePath, { readonly: true, fileMustExist: true }));
    }

    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new TableReadError(filePath, 'unreadable', `Could not read ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
    return this.parseJson(raw, filePath);
  }

  loadFromBytes(content: Buffer, filePath: string): DatasetTable {
    const format = this.requireFormat(filePath);

    if (format === 'sqlite') {
      return this.readSqlite(filePath, () => new Database(content));
    }

    return this.parseJson(content.toString('utf8'), filePath);
  }

  private requireFormat(filePath: string): TableFormat {
    const format = formatForPath(filePath);
    if (!format) {
      throw new TableReadError(
        filePath,
        'unsupported_format',
        `Unsupported dataset format for ${filePath}; expected one of ${Object.keys(FORMAT_BY_EXTENSION).join(', ')}`,
      );
    }
    return format;
  }

  private readSqlite(filePath: string, open: () => Database.Database): DatasetTable {
    let db: Database.Database;
    try {
      db = open();
    } catch (error) {
      throw new TableReadError(filePath, 'unreadable', `Could not open ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    try {
      const exists = db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
        .get(this.tableName);
      if (!exists) {
        throw new TableReadError(filePath, 'unreadable', `${filePath} has no table named "${this.tableName}"`);
      }

      const statement = db.prepare(`SELECT * FROM ${quoteIdentifier(this.tableName)}`);
      const columns = statement.columns().map((column) => column.name);
      const rows = statement.all() as JobRow[];

      return { format: 'sqlite', columns, rows };
    } catch (error) {
      if (error instanceof TableReadError) {
        throw error;
      }
      throw new TableReadError(filePath, 'unreadable', `Could not read ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      db.close();
    }
  }

  private parseJson(raw: string, filePath: string): DatasetTable {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new TableReadError(filePath, 'unreadable', `${filePath} is not valid JSON: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!Array.isArray(parsed)) {
      throw new TableReadError(filePath, 'unreadable', `${filePath} must contain a JSON array of rows`);
    }

    const rows: JobRow[] = [];
    const columns: string[] = [];
    const seen = new Set<string>();

    parsed.forEach((entry, index) => {
      if (!isJobRow(entry)) {
        throw new TableReadError(filePath, 'unreadable', `${filePath} row ${index} is not an object`);
      }
      for (const key of Object.keys(entry)) {
        if (!seen.has(key)) {
          seen.add(key);
          columns.push(key);
        }
      }
      rows.push(entry);
    });

    return { format: 'json', columns, rows };
  }
}
