#!/usr/bin/env node
/**
 * snapkeep
 *
 * Entry point. Wires the zfs client, repositories, operation strategies and
 * orchestrator, then hands argv to the command surface. Meant to be invoked by
 * cron; every run exits when its work is done.
 */

import { config } from './config';
import { logger } from './config/logger';
import { zfs } from './zfs/client';
import { createProgram } from './cli/program';
import { SnapshotOrchestrator } from './services/snapshot-orchestrator';
import { DatasetRepository } from './repositories/dataset.repository';
import { SnapshotRepository } from './repositories/snapshot.repository';
import { SnapStrategy } from './strategies/snap.strategy';
import { GcStrategy } from './strategies/gc.strategy';
import { StatusStrategy } from './strategies/status.strategy';
import type { OperationName, OperationStrategy } from './strategies/operation-strategy.interface';
import { SnapkeepMetrics } from './metrics/registry';
import { errorMessage } from './errors';
import { writeStderr, writeStdout } from './utils/terminal';

const datasetRepo = new DatasetRepository(zfs, config.zfs.property);
const snapshotRepo = new SnapshotRepository(zfs, config.zfs.property, config.zfs.snapshotSuffix);

const strategies = new Map<OperationName, OperationStrategy>([
  ['snap', new SnapStrategy(snapshotRepo)],
  ['gc', new GcStrategy(snapshotRepo)],
  ['status', new StatusStrategy(snapshotRepo)],
]);

const metrics = new SnapkeepMetrics();
const orchestrator = new SnapshotOrchestrator(datasetRepo, strategies, metrics);

const program = createProgram({
  orchestrator,
  datasetRepo,
  metrics,
  property: config.zfs.property,
  version: config.service.version,
  dryRunDefault: config.dryRun,
  metricsTextfile: config.metrics.textfilePath,
  stdout: writeStdout,
  stderr: writeStderr,
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('snapkeep: Run failed', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  writeStderr(`error: ${errorMessage(error)}`);
  process.exit(1);
});
