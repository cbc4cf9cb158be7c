import path from 'node:path';

import { DatasetTableLoader, DEFAULT_TABLE_NAME } from './db/table-loader.js';
import type { TableLoader } from './db/types.js';
import { DEFAULT_REVISION, GitHistoryFetcher, type HistoricalVersionFetcher } from './guard/history.js';
import { DEFAULT_TRACKED_PATTERN } from './guard/tracked-files.js';

export const DATA_DIR_ENV_VAR = 'DATASET_GUARD_DATA_DIR';
export const PATTERN_ENV_VAR = 'DATASET_GUARD_PATTERN';
export const TABLE_ENV_VAR = 'DATASET_GUARD_TABLE';
export const COLLECTOR_ENV_VAR = 'DATASET_GUARD_COLLECTOR_CMD';
export const REVISION_ENV_VAR = 'DATASET_GUARD_REVISION';

export interface GuardConfig {
  dataDir: string;
  pattern: string;
  tableName: string;
  collectorCommand: string | null;
  revision: string;
}

export interface GuardContext {
  config: GuardConfig;
  loader: TableLoader;
  history: HistoricalVersionFetcher;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function defaultDataDir(): string {
  return path.resolve(process.cwd(), 'data');
}

/** Flags win over environment variables, which win over defaults. */
export function resolveGuardConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<GuardConfig> = {},
): GuardConfig {
  const dataDir = overrides.dataDir ?? nonEmpty(env[DATA_DIR_ENV_VAR]) ?? defaultDataDir();

  return {
    dataDir: path.resolve(process.cwd(), dataDir),
    pattern: overrides.pattern ?? nonEmpty(env[PATTERN_ENV_VAR]) ?? DEFAULT_TRACKED_PATTERN,
    tableName: overrides.tableName ?? nonEmpty(env[TABLE_ENV_VAR]) ?? DEFAULT_TABLE_NAME,
    collectorCommand: overrides.collectorCommand ?? nonEmpty(env[COLLECTOR_ENV_VAR]) ?? null,
    revision: overrides.revision ?? nonEmpty(env[REVISION_ENV_VAR]) ?? DEFAULT_REVISION,
  };
}

export function createGuardContext(config: GuardConfig): GuardContext {
  return {
    config,
    loader: new DatasetTableLoader({ tableName: config.tableName }),
    history: new GitHistoryFetcher({ revision: config.revision }),
  };
}
