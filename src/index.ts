#!/usr/bin/env node
import isRoot from 'is-root';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { describeError } from './errors.js';
import { logError } from './error-logger.js';
import { createReportLogger } from './logger.js';
import { createProcessSource } from './proc.js';
import { reportSnapshot } from './snapshot.js';

async function main(): Promise<number> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(describeError(error));
    await logError('proctree:config', error);
    return 1;
  }

  const log = createReportLogger(config);
  if (!isRoot()) {
    log.warn('Not running as root: records of other users\' processes may be partly denied');
  }

  try {
    await reportSnapshot(createProcessSource(), log, {
      concurrency: config.concurrency,
      foundLevel: config.foundLevel,
    });
    return 0;
  } catch (error) {
    log.fatal({ err: error }, 'Process tree snapshot failed, nothing was reported');
    await logError('proctree:snapshot', error);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
