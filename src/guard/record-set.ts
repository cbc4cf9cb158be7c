import type { DatasetTable, JobRow } from '../db/types.js';
import type { RemovedRecord } from './types.js';

export type SchemaVariantName = 'current' | 'legacy';

export interface SchemaVariant {
  name: SchemaVariantName;
  idColumn: string;
  titleColumns: readonly string[];
  organizationColumns: readonly string[];
  openDateColumns: readonly string[];
}

// Detection order matters: a table carrying both identifier columns is read as `current`.
export const SCHEMA_VARIANTS: readonly SchemaVariant[] = [
  {
    name: 'current',
    idColumn: 'usajobs_control_number',
    titleColumns: ['position_title', 'positionTitle'],
    organizationColumns: ['hiring_agency_name', 'hiringAgencyName'],
    openDateColumns: ['position_open_date', 'positionOpenDate'],
  },
  {
    name: 'legacy',
    idColumn: 'usajobsControlNumber',
    titleColumns: ['positionTitle', 'position_title'],
    organizationColumns: ['hiringAgencyName', 'hiring_agency_name'],
    openDateColumns: ['positionOpenDate', 'position_open_date'],
  },
];

export interface RecordSet {
  /** null when neither identifier column exists. */
  variant: SchemaVariant | null;
  ids: Set<string>;
}

export function detectSchemaVariant(columns: readonly string[]): SchemaVariant | null {
  const present = new Set(columns);
  return SCHEMA_VARIANTS.find((variant) => present.has(variant.idColumn)) ?? null;
}

export function normalizeRecordId(value: unknown): string | null {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    text = String(value);
  } else if (typeof value === 'bigint') {
    text = value.toString();
  } else {
    return null;
  }

  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function recordIdOf(row: JobRow, variant: SchemaVariant): string | null {
  return normalizeRecordId(row[variant.idColumn]);
}

/** Unique identifiers in table order, resolved through the detected schema variant. */
export function extractRecordSet(table: DatasetTable): RecordSet {
  const variant = detectSchemaVariant(table.columns);
  const ids = new Set<string>();

  if (!variant) {
    return { variant: null, ids };
  }

  for (const row of table.rows) {
    const id = recordIdOf(row, variant);
    if (id !== null) {
      ids.add(id);
    }
  }

  return { variant, ids };
}

function firstText(row: JobRow, columns: readonly string[]): string | null {
  for (const column of columns) {
    const value = row[column];
    if (value === null || value === undefined) {
      continue;
    }
    const text = String(value).trim();
    if (text.length > 0) {
      return text;
    }
  }
  return null;
}

export function describeRecord(id: string, row: JobRow, variant: SchemaVariant): RemovedRecord {
  return {
    id,
    title: firstText(row, variant.titleColumns),
    organization: firstText(row, variant.organizationColumns),
    openedOn: firstText(row, variant.openDateColumns),
  };
}
