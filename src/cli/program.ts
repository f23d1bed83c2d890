/**
 * Command surface: snap, gc, status, policy, protect.
 *
 * Exit status is 1 when any dataset or snapshot recorded a failure. Failures are
 * listed on stderr after the run; command output goes to stdout.
 */

import { Command } from 'commander';
import type { DatasetRepository } from '../repositories/dataset.repository';
import type { SnapkeepMetrics } from '../metrics/registry';
import type { OperationName } from '../strategies/operation-strategy.interface';
import { hasFailures, type RunSummary, type SnapshotOrchestrator } from '../services/snapshot-orchestrator';
import { renderFailure, renderStatusJson, renderStatusReports } from '../reporting/status-renderer';
import { errorMessage } from '../errors';
import { logger } from '../config/logger';

export interface CliDependencies {
  orchestrator: SnapshotOrchestrator;
  datasetRepo: DatasetRepository;
  metrics: SnapkeepMetrics;
  property: string;
  version: string;
  dryRunDefault: boolean;
  metricsTextfile?: string;
  stdout(message: string): void;
  stderr(message: string): void;
}

interface RunCommandOptions {
  dryRun?: boolean;
  json?: boolean;
}

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('snapkeep')
    .description('Grandfather-father-son snapshot retention for ZFS datasets')
    .version(deps.version)
    .addHelpText(
      'after',
      [
        '',
        'Tips:',
        `  use 'snapkeep policy some/dataset h24d30w8m6y1' to enable.`,
        `  use 'snapkeep protect some/dataset@some-snap' to retain a snapshot forever.`,
        `  add 'snapkeep snap' to cron.hourly and 'snapkeep gc' to cron.daily.`,
        '',
        `Policies are stored in the ${deps.property} property.`,
      ].join('\n')
    );

  program
    .command('snap')
    .description('Take one snapshot of every managed dataset')
    .argument('[roots...]', 'Only datasets at or below these')
    .option('--dry-run', 'Log the snapshots that would be created')
    .action(async (roots: string[], options: RunCommandOptions) => {
      await runOperation(deps, 'snap', roots, options);
    });

  program
    .command('gc')
    .description('Destroy snapshots that no retention window keeps')
    .argument('[roots...]', 'Only datasets at or below these')
    .option('--dry-run', 'Classify and report without destroying anything')
    .action(async (roots: string[], options: RunCommandOptions) => {
      await runOperation(deps, 'gc', roots, options);
    });

  program
    .command('status')
    .description('Show what gc would keep and destroy')
    .argument('[roots...]', 'Only datasets at or below these')
    .option('--json', 'Print the reports as JSON')
    .action(async (roots: string[], options: RunCommandOptions) => {
      await runOperation(deps, 'status', roots, options);
    });

  program
    .command('policy')
    .description('Show or set the retention policy of a dataset')
    .argument('<dataset>', 'Filesystem or volume')
    .argument('[policy]', 'Policy string, e.g. h24d30w8m6y1')
    .action(async (dataset: string, policy: string | undefined) => {
      if (policy === undefined) {
        const current = await deps.datasetRepo.getPolicy(dataset);
        deps.stdout(current === null ? `${dataset}: unmanaged` : `${dataset}: ${current}`);
        return;
      }
      const canonical = await deps.datasetRepo.setPolicy(dataset, policy);
      deps.stdout(`${dataset}: ${canonical || '(none)'}`);
    });

  program
    .command('protect')
    .description('Exclude one snapshot from garbage collection')
    .argument('<snapshot>', 'Snapshot name, dataset@snapshot')
    .action(async (snapshot: string) => {
      await deps.datasetRepo.protectSnapshot(snapshot);
      deps.stdout(`protected: ${snapshot}`);
    });

  return program;
}

async function runOperation(
  deps: CliDependencies,
  operation: OperationName,
  roots: string[],
  options: RunCommandOptions
): Promise<void> {
  const dryRun = operation !== 'status' && (options.dryRun ?? deps.dryRunDefault);
  const summary = await deps.orchestrator.execute(operation, { roots, dryRun });

  printSummary(deps, summary, options);
  await writeMetrics(deps);

  if (hasFailures(summary)) {
    process.exitCode = 1;
  }
}

function printSummary(deps: CliDependencies, summary: RunSummary, options: RunCommandOptions): void {
  const prefix = summary.dryRun ? 'would ' : '';

  switch (summary.operation) {
    case 'snap':
      for (const identifier of summary.snapshotsCreated) {
        deps.stdout(`snapshot: ${identifier}`);
      }
      break;
    case 'gc':
      for (const identifier of summary.snapshotsDestroyed) {
        deps.stdout(`${prefix}destroy: ${identifier}`);
      }
      break;
    case 'status':
      if (options.json) {
        deps.stdout(renderStatusJson(summary.reports));
      } else if (summary.reports.length > 0) {
        deps.stdout(renderStatusReports(summary.reports));
      }
      break;
  }

  for (const failure of summary.failures) {
    deps.stderr(renderFailure(failure));
  }
}

async function writeMetrics(deps: CliDependencies): Promise<void> {
  if (!deps.metricsTextfile) {
    return;
  }
  try {
    await deps.metrics.writeTextfile(deps.metricsTextfile);
  } catch (error) {
    logger.error('snapkeep: Could not write metrics textfile', {
      path: deps.metricsTextfile,
      error: errorMessage(error),
    });
  }
}
