/**
 * Winston Logger Configuration
 *
 * Structured JSON logging; every entry carries the service name.
 * Silent under the test runner.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  defaultMeta: { service: config.service.name },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});
