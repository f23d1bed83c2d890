/**
 * Plain-text and JSON rendering of status reports and run failures.
 */

import type { DatasetStatusReport, OperationFailure } from '../strategies/operation-strategy.interface';
import { GRANULARITIES } from '../retention/granularity';
import { formatBytes, formatTimestamp } from '../utils/format';

export function renderStatusReport(report: DatasetStatusReport): string[] {
  const lines = [
    `dataset: ${report.dataset}`,
    `policy: ${report.policy || '(none)'}`,
    `snapshots: ${report.total}`,
  ];

  const kept = GRANULARITIES.filter((granularity) => report.keptByGranularity[granularity] !== undefined).map(
    (granularity) => `${granularity} ${report.keptByGranularity[granularity]}`
  );
  if (kept.length > 0) {
    lines.push(`kept by: ${kept.join(', ')}`);
  }

  lines.push(`keep: ${report.keep.count} (${formatBytes(report.keep.bytes)})`);
  lines.push(`destroy: ${report.destroy.count} (${formatBytes(report.destroy.bytes)})`);

  for (const identifier of report.protectedSnapshots) {
    lines.push(`protected: ${identifier}`);
  }

  for (const snapshot of report.snapshots) {
    lines.push(
      [
        `${snapshot.decision}:`,
        snapshot.identifier,
        formatTimestamp(snapshot.createdAt),
        formatBytes(snapshot.usedBytes),
        snapshot.reason,
      ].join('\t')
    );
  }

  return lines;
}

export function renderStatusReports(reports: readonly DatasetStatusReport[]): string {
  return reports.map((report) => renderStatusReport(report).join('\n')).join('\n\n');
}

export function renderStatusJson(reports: readonly DatasetStatusReport[]): string {
  return JSON.stringify(
    reports.map((report) => ({
      ...report,
      snapshots: report.snapshots.map((snapshot) => ({
        ...snapshot,
        createdAt: formatTimestamp(snapshot.createdAt),
      })),
    })),
    null,
    2
  );
}

export function renderFailure(failure: OperationFailure): string {
  return `error: [${failure.kind}] ${failure.target}: ${failure.message}`;
}
