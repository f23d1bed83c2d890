/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the CLI.
 * Uses dotenv so a local .env file can override the defaults.
 *
 * Retention itself is never configured here: policies live on the datasets.
 */

import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  nodeEnv: string;
  logLevel: string;

  // ZFS
  zfs: {
    binary: string;
    property: string;
    snapshotSuffix: string;
  };

  // Execution
  dryRun: boolean;

  // Metrics
  metrics: {
    textfilePath?: string;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

const nodeEnv = process.env.NODE_ENV || 'production';

export const config: Config = {
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),

  zfs: {
    binary: process.env.ZFS_BIN || 'zfs',
    property: process.env.SNAPKEEP_PROPERTY || 'at.rollc.at:snapkeep',
    snapshotSuffix: process.env.SNAPSHOT_SUFFIX || 'snapkeep',
  },

  dryRun: process.env.DRY_RUN === 'true',

  metrics: {
    textfilePath: process.env.METRICS_TEXTFILE || undefined,
  },

  service: {
    name: process.env.SERVICE_NAME || 'snapkeep',
    version: process.env.npm_package_version || '1.0.0',
  },
};
