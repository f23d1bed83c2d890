/**
 * Shared first half of `gc` and `status`: list, normalize, classify.
 * Classification is complete before the caller issues any destroy.
 */

import type { SnapshotRepository } from '../repositories/snapshot.repository';
import type { DatasetContext } from '../strategies/operation-strategy.interface';
import { buildSnapshotCatalog } from '../catalog/snapshot-catalog';
import { classifySnapshots, type Classification } from '../retention/retention-selector';

export async function classifyDataset(
  snapshotRepo: SnapshotRepository,
  context: DatasetContext
): Promise<Classification> {
  const records = await snapshotRepo.listForDataset(context.dataset);
  const catalog = buildSnapshotCatalog(context.dataset, records);
  return classifySnapshots(catalog, context.policy, context.now);
}
