import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_CONCURRENCY } from './collect.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  PROCTREE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PROCTREE_REPORT_FILE: z.string().min(1).optional(),
  PROCTREE_CONCURRENCY: z.coerce.number().int().min(1).max(1024).default(DEFAULT_CONCURRENCY),
  PROCTREE_FOUND_LEVEL: z.enum(['debug', 'info']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  logLevel: LogLevel;
  reportFile?: string;
  concurrency: number;
  foundLevel: 'debug' | 'info';
  port: number;
  host: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Blank variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    logLevel: e.PROCTREE_LOG_LEVEL,
    reportFile: e.PROCTREE_REPORT_FILE,
    concurrency: e.PROCTREE_CONCURRENCY,
    foundLevel: e.PROCTREE_FOUND_LEVEL,
    port: e.PORT,
    host: e.HOST,
  };
}
