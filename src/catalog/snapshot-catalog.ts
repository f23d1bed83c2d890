/**
 * Snapshot Catalog
 *
 * Normalizes the rows zfs(8) reports for one dataset into validated Snapshot
 * values, newest first. A single bad row invalidates the whole catalog: the
 * dataset is skipped rather than collected from a partial view.
 */

import { CatalogError } from '../errors';

export const PROTECTED_POLICY_VALUE = '-';

export interface Snapshot {
  readonly identifier: string;
  readonly dataset: string;
  readonly createdAt: Date;
  readonly usedBytes: number;
  readonly protected: boolean;
}

/**
 * One row of `zfs list -H -p -t snapshot -o name,creation,used,<property>`.
 */
export interface RawSnapshotRecord {
  identifier: string;
  creation: string;
  used: string;
  policyProperty: string | null;
}

const UNSIGNED_INTEGER = /^\d+$/;

export function compareNewestFirst(a: Snapshot, b: Snapshot): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;
}

export function buildSnapshotCatalog(dataset: string, records: readonly RawSnapshotRecord[]): Snapshot[] {
  const seen = new Set<string>();
  const snapshots = records.map((record) => {
    if (seen.has(record.identifier)) {
      throw new CatalogError(dataset, `duplicate snapshot ${record.identifier}`);
    }
    seen.add(record.identifier);
    return toSnapshot(dataset, record);
  });

  return snapshots.sort(compareNewestFirst);
}

function toSnapshot(dataset: string, record: RawSnapshotRecord): Snapshot {
  const separator = record.identifier.indexOf('@');
  if (separator === -1 || record.identifier.slice(0, separator) !== dataset) {
    throw new CatalogError(dataset, `${record.identifier} is not a snapshot of ${dataset}`);
  }
  if (separator === record.identifier.length - 1) {
    throw new CatalogError(dataset, `${record.identifier} has an empty snapshot name`);
  }

  if (!UNSIGNED_INTEGER.test(record.creation)) {
    throw new CatalogError(dataset, `unparseable creation time "${record.creation}" for ${record.identifier}`);
  }
  const createdAt = new Date(Number(record.creation) * 1000);
  if (Number.isNaN(createdAt.getTime())) {
    throw new CatalogError(dataset, `creation time "${record.creation}" out of range for ${record.identifier}`);
  }

  let usedBytes = 0;
  if (record.used !== '-') {
    if (!UNSIGNED_INTEGER.test(record.used)) {
      throw new CatalogError(dataset, `unparseable used size "${record.used}" for ${record.identifier}`);
    }
    usedBytes = Number(record.used);
  }

  return {
    identifier: record.identifier,
    dataset,
    createdAt,
    usedBytes,
    protected: record.policyProperty === PROTECTED_POLICY_VALUE,
  };
}
