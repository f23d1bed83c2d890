/**
 * Snapshot naming and the destroy guard.
 *
 * `zfs destroy` takes filesystems, volumes, snapshot ranges (`fs@a%b`) and
 * comma lists (`fs@a,b`) through the same verb, so every destroy target is
 * checked against the plain single-snapshot form before it is handed over.
 */

import { SafetyViolationError } from '../errors';
import { formatTimestamp } from '../utils/format';

/** Characters zfs(8) accepts in a snapshot name component. */
const SNAPSHOT_COMPONENT = /^[A-Za-z0-9_.: -]+$/;

export interface SnapshotName {
  dataset: string;
  name: string;
}

/**
 * `tank/home` + 2026-10-19T12:00:00.123Z -> `tank/home@2026-10-19T12:00:00Z-snapkeep`
 */
export function formatSnapshotIdentifier(dataset: string, createdAt: Date, suffix: string): string {
  return `${dataset}@${formatTimestamp(createdAt)}-${suffix}`;
}

export function parseSnapshotIdentifier(identifier: string): SnapshotName | null {
  const parts = identifier.split('@');
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    return null;
  }
  return { dataset: parts[0], name: parts[1] };
}

/**
 * Throws SafetyViolationError unless `identifier` names exactly one snapshot
 * of `dataset`. Independent of how the identifier was classified.
 */
export function assertDestroyableSnapshot(identifier: string, dataset: string): void {
  const parsed = parseSnapshotIdentifier(identifier);
  if (!parsed) {
    throw new SafetyViolationError(identifier, 'not of the form <dataset>@<snapshot>');
  }
  if (parsed.dataset !== dataset) {
    throw new SafetyViolationError(identifier, `not a snapshot of managed dataset ${dataset}`);
  }
  if (!SNAPSHOT_COMPONENT.test(parsed.name)) {
    throw new SafetyViolationError(identifier, 'snapshot name contains characters outside a single snapshot component');
  }
}
