import path from 'node:path';

import type { GuardContext } from '../config.js';
import { diagnoseShrinkage } from '../guard/diagnose.js';
import { recordCommittedSnapshot } from '../guard/snapshot.js';
import { findTrackedFiles } from '../guard/tracked-files.js';
import type { ShrinkageDiagnosis } from '../guard/types.js';
import { requiredString, type ToolArguments } from './tool-input.js';

export interface DiagnoseDatasetInput {
  file: string;
}

export function parseDiagnoseDatasetInput(args: ToolArguments): DiagnoseDatasetInput {
  return { file: requiredString(args, 'file') };
}

function resolveTrackedFile(context: GuardContext, file: string): string {
  const tracked = findTrackedFiles({ dataDir: context.config.dataDir, pattern: context.config.pattern });
  const absolute = path.resolve(context.config.dataDir, file);
  const match = tracked.find((candidate) => candidate === absolute || path.basename(candidate) === file);
  if (!match) {
    throw new Error(`"${file}" is not a tracked dataset file`);
  }
  return match;
}

/**
 * Diff one tracked file against its committed version. The committed row count
 * stands in for the pre-update snapshot.
 */
export async function diagnoseDataset(
  context: GuardContext,
  input: DiagnoseDatasetInput,
): Promise<ShrinkageDiagnosis> {
  const filePath = resolveTrackedFile(context, input.file);
  const baseline = recordCommittedSnapshot([filePath], context.loader, context.history).entries.get(filePath);

  return diagnoseShrinkage({ path: filePath, initialCount: baseline?.count ?? 0 }, context);
}
