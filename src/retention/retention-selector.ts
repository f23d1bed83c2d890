/**
 * Retention Selector
 *
 * Decides which snapshots survive a policy. For every enabled granularity the
 * newest snapshot of each bucket represents that bucket, and the
 * representatives of the N most recent buckets are kept. A snapshot survives if
 * any granularity keeps it, or if it is protected.
 *
 * The decision is recomputed from creation times on every run; there is no
 * rotation state. As a consequence a snapshot that stops being the newest of
 * its bucket (because a newer one landed in the same bucket) loses that
 * bucket's slot.
 */

import { compareNewestFirst, type Snapshot } from '../catalog/snapshot-catalog';
import { enabledGranularities, type RetentionPolicy } from '../policy/retention-policy';
import { bucketStart, type Granularity } from './granularity';

export type Decision = 'keep' | 'destroy';

export interface SnapshotDecision {
  snapshot: Snapshot;
  decision: Decision;
  /** Granularities whose window retained this snapshot. Empty for protected-only keeps. */
  keptBy: Granularity[];
}

export interface Classification {
  evaluatedAt: Date;
  policy: RetentionPolicy;
  decisions: Map<string, SnapshotDecision>;
  keep: Snapshot[];
  destroy: Snapshot[];
  keptByGranularity: Record<Granularity, number>;
}

/**
 * `now` is recorded but does not move any bucket: snapshots dated after it are
 * taken at face value.
 */
export function classifySnapshots(
  snapshots: readonly Snapshot[],
  policy: RetentionPolicy,
  now: Date
): Classification {
  const ordered = [...snapshots].sort(compareNewestFirst);
  const candidates = ordered.filter((snapshot) => !snapshot.protected);

  const keptBy = new Map<string, Granularity[]>();
  const keptByGranularity: Record<Granularity, number> = { hourly: 0, daily: 0, weekly: 0, monthly: 0, yearly: 0 };

  for (const granularity of enabledGranularities(policy)) {
    for (const representative of selectRepresentatives(candidates, granularity, policy[granularity])) {
      const reasons = keptBy.get(representative.identifier) ?? [];
      reasons.push(granularity);
      keptBy.set(representative.identifier, reasons);
      keptByGranularity[granularity]++;
    }
  }

  const decisions = new Map<string, SnapshotDecision>();
  const keep: Snapshot[] = [];
  const destroy: Snapshot[] = [];

  for (const snapshot of ordered) {
    const reasons = keptBy.get(snapshot.identifier) ?? [];
    const decision: Decision = snapshot.protected || reasons.length > 0 ? 'keep' : 'destroy';
    decisions.set(snapshot.identifier, { snapshot, decision, keptBy: reasons });
    (decision === 'keep' ? keep : destroy).push(snapshot);
  }

  return { evaluatedAt: now, policy, decisions, keep, destroy, keptByGranularity };
}

/**
 * Newest snapshot of each of the `count` most recent buckets. Expects
 * `snapshots` ordered newest first.
 */
function selectRepresentatives(snapshots: readonly Snapshot[], granularity: Granularity, count: number): Snapshot[] {
  const representatives: Snapshot[] = [];
  const seenBuckets = new Set<number>();

  for (const snapshot of snapshots) {
    if (representatives.length >= count) {
      break;
    }
    const bucket = bucketStart(granularity, snapshot.createdAt);
    if (seenBuckets.has(bucket)) {
      continue;
    }
    seenBuckets.add(bucket);
    representatives.push(snapshot);
  }

  return representatives;
}

export function describeKeptBy(decision: SnapshotDecision): string {
  if (decision.snapshot.protected) {
    return 'protected';
  }
  return decision.keptBy.join(',') || '-';
}
