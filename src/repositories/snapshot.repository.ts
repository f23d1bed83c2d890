/**
 * SnapshotRepository
 *
 * Lists, creates and destroys the snapshots of a single dataset.
 */

import type { ZfsCommandRunner } from '../zfs/client';
import type { RawSnapshotRecord } from '../catalog/snapshot-catalog';
import { CatalogError, SafetyViolationError } from '../errors';
import { formatSnapshotIdentifier } from '../zfs/naming';

export class SnapshotRepository {
  constructor(
    private zfs: ZfsCommandRunner,
    private property: string,
    private snapshotSuffix: string
  ) {}

  /**
   * Direct snapshots of `dataset` only (-d 1); children are managed on their own.
   */
  async listForDataset(dataset: string): Promise<RawSnapshotRecord[]> {
    const rows = await this.zfs.read('list', [
      '-p',
      '-t',
      'snapshot',
      '-d',
      '1',
      '-o',
      `name,creation,used,${this.property}`,
      dataset,
    ]);

    return rows.map((row) => {
      if (row.length !== 4) {
        throw new CatalogError(dataset, `unexpected zfs list row: ${row.join(' | ')}`);
      }
      const [identifier, creation, used, policyProperty] = row;
      return {
        identifier,
        creation,
        used,
        policyProperty: policyProperty === '' ? null : policyProperty,
      };
    });
  }

  snapshotIdentifier(dataset: string, createdAt: Date): string {
    return formatSnapshotIdentifier(dataset, createdAt, this.snapshotSuffix);
  }

  async create(dataset: string, createdAt: Date): Promise<string> {
    const identifier = this.snapshotIdentifier(dataset, createdAt);
    await this.zfs.run('snapshot', [identifier]);
    return identifier;
  }

  /**
   * Callers must run assertDestroyableSnapshot first; this only refuses names
   * that are not snapshots at all.
   */
  async destroy(identifier: string): Promise<void> {
    if (!identifier.includes('@')) {
      throw new SafetyViolationError(identifier, 'not a snapshot name');
    }
    await this.zfs.run('destroy', [identifier]);
  }
}
