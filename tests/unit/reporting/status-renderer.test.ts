/**
 * Status rendering Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  renderFailure,
  renderStatusJson,
  renderStatusReport,
  renderStatusReports,
} from '../../../src/reporting/status-renderer';
import { buildStatusReport } from '../../../src/strategies/status.strategy';
import { classifySnapshots } from '../../../src/retention/retention-selector';
import { parseRetentionPolicy } from '../../../src/policy/retention-policy';
import type { DatasetStatusReport } from '../../../src/strategies/operation-strategy.interface';
import { DATASET, snapshotAt } from '../../fixtures/snapshots';

function sampleReport(): DatasetStatusReport {
  const snapshots = [
    snapshotAt('2026-03-09T09:00:00Z', { usedBytes: 1000 }),
    snapshotAt('2026-03-10T09:00:00Z', { usedBytes: 2000 }),
    snapshotAt('2026-03-10T10:00:00Z', { usedBytes: 3000 }),
    snapshotAt('2026-03-08T09:00:00Z', { usedBytes: 500, protected: true }),
  ];
  const classification = classifySnapshots(snapshots, parseRetentionPolicy('h1d2'), new Date('2026-03-10T11:00:00Z'));
  return buildStatusReport(DATASET, classification);
}

describe('renderStatusReport', () => {
  it('should render the summary and one line per snapshot', () => {
    expect(renderStatusReport(sampleReport())).toEqual([
      'dataset: tank/home',
      'policy: h1d2',
      'snapshots: 4',
      'kept by: hourly 1, daily 2',
      'keep: 3 (4.4 KiB)',
      'destroy: 1 (2.0 KiB)',
      'protected: tank/home@2026-03-08T09:00:00Z',
      'keep:\ttank/home@2026-03-10T10:00:00Z\t2026-03-10T10:00:00Z\t2.9 KiB\thourly,daily',
      'destroy:\ttank/home@2026-03-10T09:00:00Z\t2026-03-10T09:00:00Z\t2.0 KiB\t-',
      'keep:\ttank/home@2026-03-09T09:00:00Z\t2026-03-09T09:00:00Z\t1000 B\tdaily',
      'keep:\ttank/home@2026-03-08T09:00:00Z\t2026-03-08T09:00:00Z\t500 B\tprotected',
    ]);
  });

  it('should mark an empty policy and omit the kept-by line', () => {
    const report = buildStatusReport(
      DATASET,
      classifySnapshots([], parseRetentionPolicy(''), new Date('2026-03-10T11:00:00Z'))
    );

    expect(renderStatusReport(report)).toEqual([
      'dataset: tank/home',
      'policy: (none)',
      'snapshots: 0',
      'keep: 0 (0 B)',
      'destroy: 0 (0 B)',
    ]);
  });
});

describe('renderStatusReports', () => {
  it('should separate datasets with a blank line', () => {
    const empty = buildStatusReport('tank/vm', classifySnapshots([], parseRetentionPolicy('d7'), new Date()));

    const text = renderStatusReports([empty, empty]);

    expect(text.split('\n\n')).toHaveLength(2);
    expect(text.startsWith('dataset: tank/vm\npolicy: d7\nsnapshots: 0\nkept by: daily 0\n')).toBe(true);
  });
});

describe('renderStatusJson', () => {
  it('should print timestamps as UTC strings', () => {
    const parsed: unknown = JSON.parse(renderStatusJson([sampleReport()]));

    expect(parsed).toMatchObject([
      {
        dataset: 'tank/home',
        policy: 'h1d2',
        keep: { count: 3, bytes: 4500 },
        snapshots: [
          { identifier: 'tank/home@2026-03-10T10:00:00Z', createdAt: '2026-03-10T10:00:00Z', decision: 'keep' },
          { identifier: 'tank/home@2026-03-10T09:00:00Z', decision: 'destroy', reason: '-' },
          { identifier: 'tank/home@2026-03-09T09:00:00Z' },
          { identifier: 'tank/home@2026-03-08T09:00:00Z', reason: 'protected' },
        ],
      },
    ]);
  });
});

describe('renderFailure', () => {
  it('should name the kind and the target', () => {
    expect(
      renderFailure({
        dataset: 'tank/home',
        target: 'tank/home@a%b',
        kind: 'safety_violation',
        message: 'Refusing to destroy "tank/home@a%b": no',
      })
    ).toBe('error: [safety_violation] tank/home@a%b: Refusing to destroy "tank/home@a%b": no');
  });
});
