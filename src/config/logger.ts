/**
 * Winston Logger Configuration
 *
 * Structured JSON logs on stderr; stdout is reserved for command output
 * (status reports, created snapshot names) so the tool composes with pipes.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: config.service.name,
    version: config.service.version,
  },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});
