/**
 * SnapshotOrchestrator
 *
 * Service layer that drives one snapkeep operation over every managed dataset.
 *
 * Responsibilities:
 *   - Enumerate managed datasets
 *   - Parse each dataset's retention policy (invalid policies skip the dataset)
 *   - Execute the operation strategy for each dataset, one at a time
 *   - Isolate per-dataset failures and aggregate them into a run summary
 *   - Update run metrics
 *
 * Only a failure to enumerate datasets aborts the run.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DatasetRepository, ManagedDataset } from '../repositories/dataset.repository';
import type {
  DatasetStatusReport,
  OperationFailure,
  OperationName,
  OperationResult,
  OperationStrategy,
} from '../strategies/operation-strategy.interface';
import type { SnapkeepMetrics } from '../metrics/registry';
import { parseRetentionPolicy } from '../policy/retention-policy';
import { errorMessage, failureKindOf } from '../errors';
import { logger } from '../config/logger';

export interface RunOptions {
  roots?: readonly string[];
  dryRun: boolean;
  now?: Date;
}

export interface RunSummary {
  runId: string;
  operation: OperationName;
  dryRun: boolean;
  datasetsProcessed: number;
  datasetsFailed: number;
  snapshotsCreated: string[];
  snapshotsDestroyed: string[];
  failures: OperationFailure[];
  reports: DatasetStatusReport[];
}

export function hasFailures(summary: RunSummary): boolean {
  return summary.failures.length > 0;
}

export class SnapshotOrchestrator {
  constructor(
    private datasetRepo: DatasetRepository,
    private strategies: Map<OperationName, OperationStrategy>,
    private metrics: SnapkeepMetrics
  ) {}

  async execute(operation: OperationName, options: RunOptions): Promise<RunSummary> {
    const strategy = this.strategies.get(operation);
    if (!strategy) {
      throw new Error(`No strategy registered for operation: ${operation}`);
    }

    const runId = uuidv4();
    const runLogger = logger.child({ runId, operation });
    const now = options.now ?? new Date();

    const datasets = await this.datasetRepo.findManaged(options.roots ?? []);

    runLogger.info('SnapshotOrchestrator: Starting run', {
      datasetsCount: datasets.length,
      dryRun: options.dryRun,
      roots: options.roots ?? [],
    });

    const summary: RunSummary = {
      runId,
      operation,
      dryRun: options.dryRun,
      datasetsProcessed: 0,
      datasetsFailed: 0,
      snapshotsCreated: [],
      snapshotsDestroyed: [],
      failures: [],
      reports: [],
    };

    for (const dataset of datasets) {
      const result = await this.executeDataset(strategy, dataset, now, options.dryRun);
      this.merge(summary, result);
      this.metrics.datasetsProcessed.inc({ operation });
    }

    if (!options.dryRun) {
      this.metrics.snapshotsCreated.inc(summary.snapshotsCreated.length);
      this.metrics.snapshotsDestroyed.inc(summary.snapshotsDestroyed.length);
    }
    for (const failure of summary.failures) {
      this.metrics.recordFailure(failure.kind);
    }
    this.metrics.recordRun(operation, new Date());

    runLogger.info('SnapshotOrchestrator: Run complete', {
      datasetsProcessed: summary.datasetsProcessed,
      datasetsFailed: summary.datasetsFailed,
      snapshotsCreated: summary.snapshotsCreated.length,
      snapshotsDestroyed: summary.snapshotsDestroyed.length,
      failures: summary.failures.length,
    });

    return summary;
  }

  private async executeDataset(
    strategy: OperationStrategy,
    dataset: ManagedDataset,
    now: Date,
    dryRun: boolean
  ): Promise<OperationResult> {
    try {
      const policy = parseRetentionPolicy(dataset.policy);

      logger.debug('SnapshotOrchestrator: Executing strategy', {
        dataset: dataset.name,
        strategy: strategy.name,
        dryRun,
      });

      return await strategy.execute({ dataset: dataset.name, policy, now, dryRun });
    } catch (error) {
      logger.error('SnapshotOrchestrator: Dataset skipped', {
        dataset: dataset.name,
        strategy: strategy.name,
        kind: failureKindOf(error),
        error: errorMessage(error),
      });

      return {
        snapshotsCreated: [],
        snapshotsDestroyed: [],
        failures: [
          {
            dataset: dataset.name,
            target: dataset.name,
            kind: failureKindOf(error),
            message: errorMessage(error),
          },
        ],
        dryRun,
      };
    }
  }

  private merge(summary: RunSummary, result: OperationResult): void {
    summary.datasetsProcessed++;
    if (result.failures.length > 0) {
      summary.datasetsFailed++;
    }
    summary.snapshotsCreated.push(...result.snapshotsCreated);
    summary.snapshotsDestroyed.push(...result.snapshotsDestroyed);
    summary.failures.push(...result.failures);
    if (result.report) {
      summary.reports.push(result.report);
    }
  }
}
