/**
 * Retention granularities and their bucket functions.
 *
 * Buckets are computed in UTC. Weeks follow ISO 8601 and start on Monday
 * 00:00 UTC; months and years start at their calendar boundaries.
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import isoWeek from 'dayjs/plugin/isoWeek';

dayjs.extend(utc);
dayjs.extend(isoWeek);

export type Granularity = 'hourly' | 'daily' | 'weekly' | 'monthly' | 'yearly';

/** Finest first. This is also the canonical policy string order. */
export const GRANULARITIES: readonly Granularity[] = ['hourly', 'daily', 'weekly', 'monthly', 'yearly'];

export const GRANULARITY_UNITS: Readonly<Record<Granularity, string>> = {
  hourly: 'h',
  daily: 'd',
  weekly: 'w',
  monthly: 'm',
  yearly: 'y',
};

const BUCKET_UNITS = {
  hourly: 'hour',
  daily: 'day',
  weekly: 'isoWeek',
  monthly: 'month',
  yearly: 'year',
} as const satisfies Record<Granularity, dayjs.OpUnitType | 'isoWeek'>;

export function granularityForUnit(unit: string): Granularity | undefined {
  return GRANULARITIES.find((granularity) => GRANULARITY_UNITS[granularity] === unit);
}

/**
 * Start of the bucket containing `instant`, as epoch milliseconds.
 * The interval is [start, start of next bucket).
 */
export function bucketStart(granularity: Granularity, instant: Date): number {
  return dayjs.utc(instant).startOf(BUCKET_UNITS[granularity]).valueOf();
}
