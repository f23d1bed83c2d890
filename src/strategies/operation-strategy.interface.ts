/**
 * Operation Strategy Interface
 *
 * Defines the contract for the per-dataset operations (snap, gc, status).
 * The orchestrator enumerates managed datasets, parses their policy and hands
 * each one to the strategy for the requested operation.
 */

import type { FailureKind } from '../errors';
import type { RetentionPolicy } from '../policy/retention-policy';
import type { Granularity } from '../retention/granularity';

export type OperationName = 'snap' | 'gc' | 'status';

export interface DatasetContext {
  dataset: string;
  policy: RetentionPolicy;
  now: Date;
  dryRun: boolean;
}

export interface OperationFailure {
  dataset: string;
  target: string;
  kind: FailureKind;
  message: string;
}

export interface SnapshotLine {
  identifier: string;
  createdAt: Date;
  usedBytes: number;
  decision: 'keep' | 'destroy';
  reason: string;
}

export interface DatasetStatusReport {
  dataset: string;
  policy: string;
  total: number;
  protectedSnapshots: string[];
  keep: { count: number; bytes: number };
  destroy: { count: number; bytes: number };
  keptByGranularity: Partial<Record<Granularity, number>>;
  snapshots: SnapshotLine[];
}

export interface OperationResult {
  snapshotsCreated: string[];
  snapshotsDestroyed: string[];
  failures: OperationFailure[];
  report?: DatasetStatusReport;
  dryRun: boolean;
}

export interface OperationStrategy {
  readonly name: string;
  execute(context: DatasetContext): Promise<OperationResult>;
}

export function emptyResult(dryRun: boolean): OperationResult {
  return {
    snapshotsCreated: [],
    snapshotsDestroyed: [],
    failures: [],
    dryRun,
  };
}
