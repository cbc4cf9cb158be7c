export { ShellCollector, type ShellCollectorOptions } from './collector.js';
export { computeDeltas, totalAdded } from './delta.js';
export {
  diagnoseShrinkage,
  diffRecordSets,
  MAX_LISTED_REMOVALS,
  REMOVED_ID_SAMPLE_SIZE,
  type DiagnoserDeps,
  type ShrinkageInput,
} from './diagnose.js';
export {
  DEFAULT_REVISION,
  GitHistoryFetcher,
  type GitHistoryFetcherOptions,
  type HistoricalFetchResult,
  type HistoricalVersionFetcher,
} from './history.js';
export { checkIntegrity, mayPropagate, readErrorsOf, type IntegrityCheckDeps } from './integrity.js';
export { runUpdatePipeline, type UpdatePipelineDeps, type UpdatePipelineResult } from './pipeline.js';
export { GitPropagator, type GitPropagatorOptions } from './propagate.js';
export {
  detectSchemaVariant,
  extractRecordSet,
  normalizeRecordId,
  SCHEMA_VARIANTS,
  type RecordSet,
  type SchemaVariant,
  type SchemaVariantName,
} from './record-set.js';
export * from './report.js';
export { recordCommittedSnapshot, recordSnapshot, serializeSnapshot } from './snapshot.js';
export { DEFAULT_TRACKED_PATTERN, findTrackedFiles, type TrackedFileQuery } from './tracked-files.js';
export type * from './types.js';
export { DatasetTableLoader, formatForPath } from '../db/table-loader.js';
export { TableReadError, type DatasetTable, type JobRow, type TableLoader } from '../db/types.js';
