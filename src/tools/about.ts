import type { GuardContext } from '../config.js';

export const SERVER_NAME = 'jobs-dataset-guard';
export const SERVER_VERSION = '0.1.0';

export interface AboutResult {
  name: string;
  version: string;
  description: string;
  configuration: {
    data_dir: string;
    pattern: string;
    table: string;
    revision: string;
  };
  policy: string;
  supported_tools: string[];
}

export async function about(context: GuardContext, supportedTools: string[]): Promise<AboutResult> {
  return {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    description:
      'Read-only integrity checks for the current job-postings datasets: row counts against the committed baseline, and identifier-level diagnosis of lost records.',
    configuration: {
      data_dir: context.config.dataDir,
      pattern: context.config.pattern,
      table: context.config.tableName,
      revision: context.config.revision,
    },
    policy: 'Any tracked file with fewer rows than its baseline fails the check. Propagation requires every file to load.',
    supported_tools: supportedTools,
  };
}
