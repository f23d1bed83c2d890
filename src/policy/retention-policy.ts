/**
 * Retention policy strings
 *
 * A policy is a run of `<unit><count>` pairs with no separators, e.g.
 * `h24d30w8m6y1`: keep 24 hourly, 30 daily, 8 weekly, 6 monthly and 1 yearly
 * snapshot. Units may come in any order, each at most once; missing units keep
 * nothing at that granularity. The empty string is a valid policy.
 */

import { InvalidPolicyError } from '../errors';
import { GRANULARITIES, GRANULARITY_UNITS, granularityForUnit, type Granularity } from '../retention/granularity';

export type RetentionPolicy = Readonly<Record<Granularity, number>>;

export const MAX_POLICY_COUNT = 1_000_000;

const DIGITS = /^\d+/;

function zeroCounts(): Record<Granularity, number> {
  return { hourly: 0, daily: 0, weekly: 0, monthly: 0, yearly: 0 };
}

export function emptyRetentionPolicy(): RetentionPolicy {
  return Object.freeze(zeroCounts());
}

export function parseRetentionPolicy(input: string): RetentionPolicy {
  if (input === '') {
    return emptyRetentionPolicy();
  }

  const counts = zeroCounts();
  const seen = new Set<Granularity>();

  let position = 0;
  while (position < input.length) {
    const unit = input[position];
    const granularity = granularityForUnit(unit);
    if (!granularity) {
      throw new InvalidPolicyError(input, `unknown unit '${unit}' at position ${position}`);
    }
    if (seen.has(granularity)) {
      throw new InvalidPolicyError(input, `unit '${unit}' appears more than once`);
    }
    seen.add(granularity);

    const digits = DIGITS.exec(input.slice(position + 1));
    if (!digits) {
      throw new InvalidPolicyError(input, `missing count after '${unit}'`);
    }

    const count = Number(digits[0]);
    if (count > MAX_POLICY_COUNT) {
      throw new InvalidPolicyError(input, `count for '${unit}' exceeds ${MAX_POLICY_COUNT}`);
    }

    counts[granularity] = count;
    position += 1 + digits[0].length;
  }

  return Object.freeze(counts);
}

/**
 * Canonical form: units in h, d, w, m, y order, zero counts left out.
 */
export function formatRetentionPolicy(policy: RetentionPolicy): string {
  return GRANULARITIES.filter((granularity) => policy[granularity] > 0)
    .map((granularity) => `${GRANULARITY_UNITS[granularity]}${policy[granularity]}`)
    .join('');
}

export function enabledGranularities(policy: RetentionPolicy): Granularity[] {
  return GRANULARITIES.filter((granularity) => policy[granularity] > 0);
}
