/**
 * DatasetRepository
 *
 * Reads and writes the retention policy property on filesystems and volumes.
 * A dataset is managed when the property has a value; zfs prints `-` for an
 * unset user property.
 */

import type { ZfsCommandRunner } from '../zfs/client';
import { parseRetentionPolicy, formatRetentionPolicy } from '../policy/retention-policy';
import { PROTECTED_POLICY_VALUE } from '../catalog/snapshot-catalog';
import { parseSnapshotIdentifier } from '../zfs/naming';

export interface ManagedDataset {
  name: string;
  /** Raw property value, not yet validated. */
  policy: string;
}

const UNSET = '-';

export class DatasetRepository {
  constructor(
    private zfs: ZfsCommandRunner,
    private property: string
  ) {}

  /**
   * @param roots limit the search to these datasets and their descendants
   */
  async findManaged(roots: readonly string[] = []): Promise<ManagedDataset[]> {
    const scope = roots.length > 0 ? ['-r'] : [];
    const rows = await this.zfs.read('get', [
      '-p',
      ...scope,
      '-t',
      'filesystem,volume',
      '-o',
      'name,value',
      this.property,
      ...roots,
    ]);

    return rows
      .filter((row) => row.length >= 2 && row[1] !== UNSET)
      .map((row) => ({ name: row[0], policy: row[1] }));
  }

  async getPolicy(dataset: string): Promise<string | null> {
    const rows = await this.zfs.read('get', ['-p', '-o', 'value', this.property, dataset]);
    const value = rows[0]?.[0];
    return value === undefined || value === UNSET ? null : value;
  }

  /**
   * Validates before writing and returns the canonical form. The value is
   * stored as given, so an all-zero policy such as `h0` stays non-empty.
   */
  async setPolicy(dataset: string, policy: string): Promise<string> {
    const canonical = formatRetentionPolicy(parseRetentionPolicy(policy));
    await this.zfs.run('set', [`${this.property}=${policy}`, dataset]);
    return canonical;
  }

  async protectSnapshot(identifier: string): Promise<void> {
    if (!parseSnapshotIdentifier(identifier)) {
      throw new Error(`Not a snapshot name: ${identifier}`);
    }
    await this.zfs.run('set', [`${this.property}=${PROTECTED_POLICY_VALUE}`, identifier]);
  }
}
