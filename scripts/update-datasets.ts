#!/usr/bin/env tsx
import fs from 'node:fs/promises';
import path from 'node:path';

import { createGuardContext, resolveGuardConfig, type GuardConfig } from '../src/config.js';
import { ShellCollector } from '../src/guard/collector.js';
import { runUpdatePipeline } from '../src/guard/pipeline.js';
import { GitPropagator } from '../src/guard/propagate.js';
import { serializeSnapshot } from '../src/guard/snapshot.js';

const PREFIX = 'jobs-dataset-guard';

interface ParsedArgs {
  overrides: Partial<GuardConfig>;
  commit: boolean;
  push: boolean;
  reportPath?: string;
}

const VALUE_FLAGS: Record<string, keyof GuardConfig> = {
  '--data-dir': 'dataDir',
  '--pattern': 'pattern',
  '--table': 'tableName',
  '--collector': 'collectorCommand',
};

function parseArguments(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { overrides: {}, commit: false, push: false };

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

    if (token === '--commit') {
      result.commit = true;
      continue;
    }

    if (token === '--push') {
      result.commit = true;
      result.push = true;
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
  console.log('Usage: npm run update-datasets -- --collector "<command>" [options]');
  console.log('');
  console.log('Options:');
  console.log('  --collector <command>   Command that refreshes the dataset files (or DATASET_GUARD_COLLECTOR_CMD)');
  console.log('  --data-dir <path>       Directory holding the tracked files (default ./data)');
  console.log('  --pattern <glob>        Tracked-file glob inside the data directory');
  console.log('  --table <name>          Table read from SQLite dataset files (default jobs)');
  console.log('  --commit                Commit grown files when the integrity check passes');
  console.log('  --push                  Commit and push when the integrity check passes');
  console.log('  --report <path>         Write the structured result as JSON');
  console.log('  --help, -h              Show this usage text');
}

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  const config = resolveGuardConfig(process.env, args.overrides);

  if (!config.collectorCommand) {
    throw new Error('No collector command; pass --collector or set DATASET_GUARD_COLLECTOR_CMD');
  }

  const context = createGuardContext(config);

  console.log(`${PREFIX}: current data update`);
  console.log(`${PREFIX}: data dir ${config.dataDir}, pattern ${config.pattern}`);

  const result = runUpdatePipeline({
    dataDir: config.dataDir,
    pattern: config.pattern,
    loader: context.loader,
    history: context.history,
    collector: new ShellCollector(config.collectorCommand, { cwd: process.cwd() }),
    propagator: args.commit ? new GitPropagator({ cwd: process.cwd(), push: args.push }) : null,
    log: (line) => console.log(line),
    status: (line) => console.log(`${PREFIX}: ${line}`),
  });

  if (args.reportPath) {
    const reportPath = path.resolve(process.cwd(), args.reportPath);
    const report = { ...result, snapshot: serializeSnapshot(result.snapshot) };
    await fs.mkdir(path.dirname(reportPath), { recursive: true });
    await fs.writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    console.log(`${PREFIX}: report written to ${reportPath}`);
  }

  if (!result.verdict.ok) {
    console.error(`${PREFIX}: data file checks failed`);
    process.exit(1);
  }

  if (!result.collector.success) {
    console.error(`${PREFIX}: collector failed; dataset changes were not propagated`);
    process.exit(1);
  }

  if (!result.propagationAllowed) {
    console.error(`${PREFIX}: unreadable dataset files block propagation`);
    process.exit(1);
  }

  if (result.propagation.status === 'failed') {
    console.error(`${PREFIX}: propagation failed: ${result.propagation.error}`);
    process.exit(1);
  }

  console.log(
    result.verdict.changed
      ? `${PREFIX}: update completed successfully`
      : `${PREFIX}: update completed - no changes detected`,
  );
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${PREFIX}: update-datasets failed: ${message}`);
  process.exit(1);
});
