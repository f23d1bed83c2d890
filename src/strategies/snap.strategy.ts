/**
 * SnapStrategy
 *
 * Takes one new snapshot of the dataset, named after the current UTC instant
 * (e.g. tank/home@2026-10-19T12:00:00Z-snapkeep). The name is for humans;
 * retention only ever looks at the creation property.
 */

import type { SnapshotRepository } from '../repositories/snapshot.repository';
import type { DatasetContext, OperationResult, OperationStrategy } from './operation-strategy.interface';
import { emptyResult } from './operation-strategy.interface';
import { errorMessage, failureKindOf } from '../errors';
import { logger } from '../config/logger';

export class SnapStrategy implements OperationStrategy {
  readonly name = 'SnapStrategy';

  constructor(private snapshotRepo: SnapshotRepository) {}

  async execute(context: DatasetContext): Promise<OperationResult> {
    const result = emptyResult(context.dryRun);

    if (context.dryRun) {
      const identifier = this.snapshotRepo.snapshotIdentifier(context.dataset, context.now);
      logger.info('SnapStrategy: Would create snapshot', { dataset: context.dataset, snapshot: identifier });
      return result;
    }

    try {
      const identifier = await this.snapshotRepo.create(context.dataset, context.now);
      result.snapshotsCreated.push(identifier);
      logger.info('SnapStrategy: Snapshot created', { dataset: context.dataset, snapshot: identifier });
    } catch (error) {
      logger.error('SnapStrategy: Snapshot creation failed', {
        dataset: context.dataset,
        error: errorMessage(error),
      });
      result.failures.push({
        dataset: context.dataset,
        target: context.dataset,
        kind: failureKindOf(error),
        message: errorMessage(error),
      });
    }

    return result;
  }
}
