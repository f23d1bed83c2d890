/**
 * GcStrategy
 *
 * Garbage-collects one dataset: classify every snapshot first, then destroy
 * the ones marked `destroy`, newest first. Each destroy is independent: a
 * failure is recorded and the remaining snapshots are still processed. Nothing
 * is retried within a run.
 *
 * Every target passes assertDestroyableSnapshot immediately before the zfs
 * call, whatever the classification said.
 */

import type { SnapshotRepository } from '../repositories/snapshot.repository';
import type { DatasetContext, OperationResult, OperationStrategy } from './operation-strategy.interface';
import { emptyResult } from './operation-strategy.interface';
import { classifyDataset } from '../services/dataset-classifier';
import { assertDestroyableSnapshot } from '../zfs/naming';
import { SafetyViolationError, errorMessage, failureKindOf } from '../errors';
import { logger } from '../config/logger';

export class GcStrategy implements OperationStrategy {
  readonly name = 'GcStrategy';

  constructor(private snapshotRepo: SnapshotRepository) {}

  async execute(context: DatasetContext): Promise<OperationResult> {
    const result = emptyResult(context.dryRun);
    const classification = await classifyDataset(this.snapshotRepo, context);

    logger.info('GcStrategy: Classified snapshots', {
      dataset: context.dataset,
      keep: classification.keep.length,
      destroy: classification.destroy.length,
      keptByGranularity: classification.keptByGranularity,
    });

    for (const snapshot of classification.destroy) {
      if (snapshot.protected) {
        continue;
      }

      try {
        assertDestroyableSnapshot(snapshot.identifier, context.dataset);

        if (context.dryRun) {
          logger.info('GcStrategy: Would destroy snapshot', { dataset: context.dataset, snapshot: snapshot.identifier });
        } else {
          await this.snapshotRepo.destroy(snapshot.identifier);
          logger.info('GcStrategy: Snapshot destroyed', { dataset: context.dataset, snapshot: snapshot.identifier });
        }
        result.snapshotsDestroyed.push(snapshot.identifier);
      } catch (error) {
        const message = error instanceof SafetyViolationError
          ? 'GcStrategy: SAFETY VIOLATION, destroy refused'
          : 'GcStrategy: Snapshot destroy failed';
        logger.error(message, {
          dataset: context.dataset,
          snapshot: snapshot.identifier,
          kind: failureKindOf(error),
          error: errorMessage(error),
        });
        result.failures.push({
          dataset: context.dataset,
          target: snapshot.identifier,
          kind: failureKindOf(error),
          message: errorMessage(error),
        });
      }
    }

    return result;
  }
}
