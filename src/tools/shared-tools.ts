/**
 * Tool definitions and call dispatcher for the stdio server.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import type { GuardContext } from '../config.js';
import { about } from './about.js';
import { checkDatasetIntegrity, parseCheckDatasetIntegrityInput } from './check-dataset-integrity.js';
import { diagnoseDataset, parseDiagnoseDatasetInput } from './diagnose-dataset.js';
import { listDatasets, parseListDatasetsInput } from './list-datasets.js';
import type { ToolArguments } from './tool-input.js';

export const TOOLS: Tool[] = [
  {
    name: 'list_datasets',
    description: 'List tracked dataset files with size, row count, and identifier schema variant.',
    inputSchema: {
      type: 'object',
      properties: {
        pattern: {
          type: 'string',
          description: 'Optional glob override, relative to the data directory, e.g. "current_jobs_2025.*".',
        },
      },
      required: [],
    },
  },
  {
    name: 'check_dataset_integrity',
    description:
      'Compare every tracked file against its committed version. Fails when any file has fewer rows, and explains which control numbers disappeared.',
    inputSchema: {
      type: 'object',
      properties: {
        pattern: { type: 'string', description: 'Optional glob override, relative to the data directory.' },
      },
      required: [],
    },
  },
  {
    name: 'diagnose_dataset',
    description:
      'Diff one tracked file against its committed version: removed and added control numbers, with details for a short list of removals.',
    inputSchema: {
      type: 'object',
      properties: {
        file: { type: 'string', description: 'File name (e.g. "current_jobs_2025.db") or path inside the data directory.' },
      },
      required: ['file'],
    },
  },
  {
    name: 'about',
    description: 'Return server identity, configuration in effect, and supported tools.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
];

/**
 * Dispatch a tool call to the correct handler function.
 * Throws for unknown tools and invalid arguments.
 */
export async function callTool(context: GuardContext, name: string, args: ToolArguments): Promise<unknown> {
  switch (name) {
    case 'list_datasets':
      return listDatasets(context, parseListDatasetsInput(args));
    case 'check_dataset_integrity':
      return checkDatasetIntegrity(context, parseCheckDatasetIntegrityInput(args));
    case 'diagnose_dataset':
      return diagnoseDataset(context, parseDiagnoseDatasetInput(args));
    case 'about':
      return about(
        context,
        TOOLS.map((tool) => tool.name),
      );
    default:
      throw new Error(`Unknown tool "${name}".`);
  }
}
