import type { GuardContext } from '../config.js';
import { computeDeltas } from '../guard/delta.js';
import { checkIntegrity, mayPropagate } from '../guard/integrity.js';
import { recordCommittedSnapshot } from '../guard/snapshot.js';
import { findTrackedFiles } from '../guard/tracked-files.js';
import type { DatasetDelta, FileCheck, PipelineVerdict, ShrinkageDiagnosis } from '../guard/types.js';
import { optionalString, type ToolArguments } from './tool-input.js';

export interface CheckDatasetIntegrityInput {
  pattern?: string;
}

export interface CheckDatasetIntegrityResult {
  baseline: 'committed';
  revision: string;
  verdict: PipelineVerdict;
  propagation_allowed: boolean;
  files: FileCheck[];
  diagnoses: ShrinkageDiagnosis[];
  deltas: DatasetDelta[] | null;
}

export function parseCheckDatasetIntegrityInput(args: ToolArguments): CheckDatasetIntegrityInput {
  return { pattern: optionalString(args, 'pattern') };
}

/**
 * Check the working copy against the committed version of every tracked file,
 * the same gate the update run applies, without running a collector.
 */
export async function checkDatasetIntegrity(
  context: GuardContext,
  input: CheckDatasetIntegrityInput,
): Promise<CheckDatasetIntegrityResult> {
  const paths = findTrackedFiles({
    dataDir: context.config.dataDir,
    pattern: input.pattern ?? context.config.pattern,
  });
  const snapshot = recordCommittedSnapshot(paths, context.loader, context.history);
  const report = checkIntegrity(paths, snapshot, context);

  return {
    baseline: 'committed',
    revision: context.history.revision,
    verdict: report.verdict,
    propagation_allowed: mayPropagate(report),
    files: report.files,
    diagnoses: report.diagnoses,
    deltas: report.verdict.ok && report.verdict.changed ? computeDeltas(report) : null,
  };
}
