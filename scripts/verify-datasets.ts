#!/usr/bin/env tsx
import fs from 'node:fs/promises';
import path from 'node:path';

import { createGuardContext, resolveGuardConfig, type GuardConfig } from '../src/config.js';
import { checkIntegrity, mayPropagate } from '../src/guard/integrity.js';
import { renderIntegrity, renderSnapshot } from '../src/guard/report.js';
import { recordCommittedSnapshot, serializeSnapshot } from '../src/guard/snapshot.js';
import { findTrackedFiles } from '../src/guard/tracked-files.js';

const PREFIX = 'jobs-dataset-guard';

const VALUE_FLAGS: Record<string, keyof GuardConfig> = {
  '--data-dir': 'dataDir',
  '--pattern': 'pattern',
  '--table': 'tableName',
  '--revision': 'revision',
};

function parseArguments(argv: string[]): { overrides: Partial<GuardConfig>; reportPath?: string } {
  const result: { overrides: Partial<GuardConfig>; reportPath?: string } = { overrides: {} };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const configKey = VALUE_FLAGS[token];

    if (configKey || token === '--report') {
      const value = argv[index + 1];
      if (!value) {
        throw new Error(`Missing value for ${token}`);
      }
      if (configKey) {
        result.overrides[configKey] = value;
      } else {
        result.reportPath = value;
      }
      index += 1;
      continue;
    }

    if (token === '--help' || token === '-h') {
      printUsage();
      process.exit(0);
    }

    throw new Error(`Unknown argument: ${token}`);
  }

  return result;
}

function printUsage(): void {
  console.log('Usage: npm run verify-datasets -- [--revision HEAD] [--data-dir path] [--pattern glob] [--report path]');
}

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  const config = resolveGuardConfig(process.env, args.overrides);
  const context = createGuardContext(config);

  const paths = findTrackedFiles({ dataDir: config.dataDir, pattern: config.pattern });
  const snapshot = recordCommittedSnapshot(paths, context.loader, context.history);
  const report = checkIntegrity(paths, snapshot, context);

  console.log(`${PREFIX}: verifying working copy against ${config.revision}`);
  renderSnapshot(snapshot).forEach((line) => console.log(line));
  renderIntegrity(report).forEach((line) => console.log(line));

  if (args.reportPath) {
    const reportPath = path.resolve(process.cwd(), args.reportPath);
    await fs.mkdir(path.dirname(reportPath), { recursive: true });
    await fs.writeFile(
      reportPath,
      `${JSON.stringify({ snapshot: serializeSnapshot(snapshot), ...report }, null, 2)}\n`,
      'utf8',
    );
    console.log(`${PREFIX}: report written to ${reportPath}`);
  }

  if (!mayPropagate(report)) {
    console.error(`${PREFIX}: VERIFICATION FAILED`);
    process.exit(1);
  }

  console.log(`${PREFIX}: VERIFICATION PASSED`);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${PREFIX}: verify-datasets failed: ${message}`);
  process.exit(1);
});
