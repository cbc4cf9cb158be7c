import type { TableLoader } from '../db/types.js';
import { computeDeltas } from './delta.js';
import type { HistoricalVersionFetcher } from './history.js';
import { checkIntegrity, mayPropagate } from './integrity.js';
import { renderCollector, renderDeltas, renderIntegrity, renderPropagation, renderSnapshot } from './report.js';
import { recordSnapshot } from './snapshot.js';
import { findTrackedFiles } from './tracked-files.js';
import type {
  Collector,
  CollectorOutcome,
  DatasetDelta,
  DatasetSnapshot,
  IntegrityReport,
  PipelineVerdict,
  PropagationOutcome,
  Propagator,
} from './types.js';

export interface UpdatePipelineDeps {
  dataDir: string;
  pattern?: string;
  loader: TableLoader;
  history: HistoricalVersionFetcher;
  collector: Collector;
  propagator?: Propagator | null;
  log?: (line: string) => void;
  /** Receives run status lines; report lines go to `log`. Defaults to `log`. */
  status?: (line: string) => void;
  now?: () => Date;
}

export interface UpdatePipelineResult {
  verdict: PipelineVerdict;
  propagationAllowed: boolean;
  snapshot: DatasetSnapshot;
  collector: CollectorOutcome;
  integrity: IntegrityReport;
  deltas: DatasetDelta[] | null;
  propagation: PropagationOutcome;
}

/**
 * snapshot -> collector -> integrity check (with diagnosis) -> deltas -> gated
 * propagation. Every step runs to completion even when the collector fails, so
 * whatever it left behind is still checked, but a failed collection is never
 * propagated.
 */
export function runUpdatePipeline(deps: UpdatePipelineDeps): UpdatePipelineResult {
  const log = deps.log ?? (() => undefined);
  const status = deps.status ?? log;
  const now = deps.now ?? (() => new Date());
  const query = { dataDir: deps.dataDir, pattern: deps.pattern };

  const snapshot = recordSnapshot(findTrackedFiles(query), deps.loader, now());
  renderSnapshot(snapshot).forEach((line) => log(line));

  status(`${deps.collector.description}...`);
  const collected = deps.collector.run();
  renderCollector(deps.collector.description, collected).forEach((line) => status(line));

  const integrity = checkIntegrity(findTrackedFiles(query), snapshot, {
    loader: deps.loader,
    history: deps.history,
  });
  renderIntegrity(integrity).forEach((line) => log(line));

  const propagationAllowed = mayPropagate(integrity);
  let deltas: DatasetDelta[] | null = null;
  let propagation: PropagationOutcome;

  if (!integrity.verdict.ok) {
    propagation = { status: 'skipped', reason: 'data loss detected' };
  } else if (!integrity.verdict.changed) {
    status('No data files changed. Skipping summary.');
    propagation = { status: 'skipped', reason: 'no dataset changes' };
  } else {
    deltas = computeDeltas(integrity);
    renderDeltas(deltas).forEach((line) => log(line));

    if (!collected.success) {
      propagation = { status: 'skipped', reason: 'collector failed' };
    } else if (!propagationAllowed) {
      propagation = { status: 'skipped', reason: 'tracked files could not be read' };
    } else if (!deps.propagator) {
      propagation = { status: 'skipped', reason: 'propagation not requested' };
    } else {
      const grown = integrity.files.flatMap((check) => (check.status === 'growth' ? [check.file.path] : []));
      propagation = deps.propagator.propagate(grown);
    }
  }

  status(renderPropagation(propagation));

  return {
    verdict: integrity.verdict,
    propagationAllowed,
    snapshot,
    collector: collected,
    integrity,
    deltas,
    propagation,
  };
}
