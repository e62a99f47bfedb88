import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { Config } from './config.js';

export const VERSION = '0.1.0';

/**
 * Root logger for the report. Writes JSON lines to stdout, or to
 * `reportFile` when one is configured.
 */
export function createReportLogger(config: Pick<Config, 'logLevel' | 'reportFile'>, stream?: DestinationStream): Logger {
  const destination =
    stream ??
    (config.reportFile
      ? pino.destination({ dest: config.reportFile, mkdir: true, sync: true })
      : pino.destination({ dest: 1, sync: true }));

  return pino(
    {
      name: 'proctree',
      level: config.logLevel,
      base: { version: VERSION },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}
