/**
 * StatusStrategy
 *
 * Read-only: runs the same classification as GcStrategy and returns it as a
 * report. Never creates or destroys anything.
 */

import type { SnapshotRepository } from '../repositories/snapshot.repository';
import type {
  DatasetContext,
  DatasetStatusReport,
  OperationResult,
  OperationStrategy,
} from './operation-strategy.interface';
import { emptyResult } from './operation-strategy.interface';
import { classifyDataset } from '../services/dataset-classifier';
import { describeKeptBy, type Classification } from '../retention/retention-selector';
import { enabledGranularities, formatRetentionPolicy } from '../policy/retention-policy';
import type { Granularity } from '../retention/granularity';
import type { Snapshot } from '../catalog/snapshot-catalog';

function totalBytes(snapshots: readonly Snapshot[]): number {
  return snapshots.reduce((sum, snapshot) => sum + snapshot.usedBytes, 0);
}

export function buildStatusReport(dataset: string, classification: Classification): DatasetStatusReport {
  const keptByGranularity: Partial<Record<Granularity, number>> = {};
  for (const granularity of enabledGranularities(classification.policy)) {
    keptByGranularity[granularity] = classification.keptByGranularity[granularity];
  }

  const decisions = [...classification.decisions.values()];

  return {
    dataset,
    policy: formatRetentionPolicy(classification.policy),
    total: decisions.length,
    protectedSnapshots: decisions.filter((d) => d.snapshot.protected).map((d) => d.snapshot.identifier),
    keep: { count: classification.keep.length, bytes: totalBytes(classification.keep) },
    destroy: { count: classification.destroy.length, bytes: totalBytes(classification.destroy) },
    keptByGranularity,
    snapshots: decisions.map((d) => ({
      identifier: d.snapshot.identifier,
      createdAt: d.snapshot.createdAt,
      usedBytes: d.snapshot.usedBytes,
      decision: d.decision,
      reason: describeKeptBy(d),
    })),
  };
}

export class StatusStrategy implements OperationStrategy {
  readonly name = 'StatusStrategy';

  constructor(private snapshotRepo: SnapshotRepository) {}

  async execute(context: DatasetContext): Promise<OperationResult> {
    const classification = await classifyDataset(this.snapshotRepo, context);
    return {
      ...emptyResult(context.dryRun),
      report: buildStatusReport(context.dataset, classification),
    };
  }
}
