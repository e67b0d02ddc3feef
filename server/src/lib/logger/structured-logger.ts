/**
 * Structured Logger with Pino
 *
 * - JSON logging with Pino
 * - Pretty console output in DEV
 * - Optional daily rotated log files (LOG_TO_FILE=true)
 * - Secret redaction (the provider key must never reach a log line)
 * - Request tracking via child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import { PinoPretty } from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

// Streams accept everything; the logger's own level does the filtering
const streams: pino.StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: 'trace',
    stream: config.pretty
      ? PinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  streams.push({
    level: 'trace',
    stream: rfs.createStream('gateway.log', {
      interval: '1d',
      path: logsDir,
      maxFiles: config.rotateDays,
      compress: 'gzip',
    }),
  });
}

export const logger = pino(
  {
    level: config.level,
    base: { service: 'maps-gateway' },
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = pino.Logger;
