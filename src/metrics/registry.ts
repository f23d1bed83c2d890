/**
 * Prometheus Metrics
 *
 * snapkeep runs from cron and exits, so nothing scrapes it. When
 * METRICS_TEXTFILE is set the registry is written out for node_exporter's
 * textfile collector after every run.
 */

import { rename, writeFile } from 'node:fs/promises';
import { Counter, Gauge, Registry } from 'prom-client';
import type { FailureKind } from '../errors';
import type { OperationName } from '../strategies/operation-strategy.interface';

export class SnapkeepMetrics {
  readonly registry = new Registry();

  readonly snapshotsCreated = new Counter({
    name: 'snapkeep_snapshots_created_total',
    help: 'Snapshots created by snapkeep',
    registers: [this.registry],
  });

  readonly snapshotsDestroyed = new Counter({
    name: 'snapkeep_snapshots_destroyed_total',
    help: 'Snapshots destroyed by snapkeep',
    registers: [this.registry],
  });

  readonly failures = new Counter<'kind'>({
    name: 'snapkeep_failures_total',
    help: 'Failures recorded during a run, by kind',
    labelNames: ['kind'],
    registers: [this.registry],
  });

  readonly datasetsProcessed = new Counter<'operation'>({
    name: 'snapkeep_datasets_processed_total',
    help: 'Managed datasets handed to an operation',
    labelNames: ['operation'],
    registers: [this.registry],
  });

  readonly lastRun = new Gauge<'operation'>({
    name: 'snapkeep_last_run_timestamp_seconds',
    help: 'Unix time the last run of each operation finished',
    labelNames: ['operation'],
    registers: [this.registry],
  });

  recordFailure(kind: FailureKind): void {
    this.failures.inc({ kind });
  }

  recordRun(operation: OperationName, finishedAt: Date): void {
    this.lastRun.set({ operation }, Math.floor(finishedAt.getTime() / 1000));
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Writes beside the target and renames, so the collector never reads a
   * partial file.
   */
  async writeTextfile(path: string): Promise<void> {
    const temporary = `${path}.${process.pid}.tmp`;
    await writeFile(temporary, await this.render(), 'utf8');
    await rename(temporary, path);
  }
}
