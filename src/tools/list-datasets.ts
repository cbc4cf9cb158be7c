import fs from 'node:fs';
import path from 'node:path';

import type { GuardContext } from '../config.js';
import { detectSchemaVariant, type SchemaVariantName } from '../guard/record-set.js';
import { findTrackedFiles } from '../guard/tracked-files.js';
import { optionalString, type ToolArguments } from './tool-input.js';

export interface ListDatasetsInput {
  pattern?: string;
}

export interface DatasetSummary {
  name: string;
  path: string;
  size: number;
  row_count: number | null;
  schema_variant: SchemaVariantName | null;
  error: string | null;
}

export interface ListDatasetsResult {
  data_dir: string;
  pattern: string;
  datasets: DatasetSummary[];
}

function sizeOf(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}

export function parseListDatasetsInput(args: ToolArguments): ListDatasetsInput {
  return { pattern: optionalString(args, 'pattern') };
}

export async function listDatasets(context: GuardContext, input: ListDatasetsInput): Promise<ListDatasetsResult> {
  const pattern = input.pattern ?? context.config.pattern;
  const paths = findTrackedFiles({ dataDir: context.config.dataDir, pattern });

  const datasets = paths.map((filePath): DatasetSummary => {
    const summary: DatasetSummary = {
      name: path.basename(filePath),
      path: filePath,
      size: sizeOf(filePath),
      row_count: null,
      schema_variant: null,
      error: null,
    };

    try {
      const table = context.loader.load(filePath);
      summary.row_count = table.rows.length;
      summary.schema_variant = detectSchemaVariant(table.columns)?.name ?? null;
    } catch (error) {
      summary.error = error instanceof Error ? error.message : String(error);
    }

    return summary;
  });

  return { data_dir: context.config.dataDir, pattern, datasets };
}
