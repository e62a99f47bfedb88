import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { ProcessTreeError } from './errors.js';

const ERROR_LOG_DIR = path.join(os.homedir(), '.proctree');
export const ERROR_LOG_FILE = path.join(ERROR_LOG_DIR, 'errors.log');

export interface ErrorLogEntry {
  timestamp: string;
  context: string;
  error: {
    name: string;
    kind?: string;
    message: string;
    cause?: string;
    stack?: string;
  };
}

export function toErrorLogEntry(context: string, error: unknown, now = new Date()): ErrorLogEntry {
  let errorMessage = 'Unknown error';
  let errorStack: string | undefined;
  let errorName = 'Error';
  let kind: string | undefined;
  let cause: string | undefined;

  if (error instanceof Error) {
    errorMessage = error.message;
    errorStack = error.stack;
    errorName = error.name;
    if (error.cause !== undefined) {
      cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
  } else if (typeof error === 'string') {
    errorMessage = error;
  } else if (error && typeof error === 'object') {
    errorMessage = JSON.stringify(error);
  }
  if (error instanceof ProcessTreeError) kind = error.kind;

  return {
    timestamp: now.toISOString(),
    context,
    error: { name: errorName, kind, message: errorMessage, cause, stack: errorStack },
  };
}

/**
 * Appends a batch-level failure to the persistent error log as one JSON line.
 * Falls back to console.error if the file cannot be written.
 *
 * @param context - where the failure surfaced (e.g. "snapshot:collect")
 */
export async function logError(context: string, error: unknown, file: string = ERROR_LOG_FILE): Promise<void> {
  const entry = toErrorLogEntry(context, error);
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.appendFile(file, JSON.stringify(entry) + '\n');
  } catch (fileError) {
    console.error(`[${entry.timestamp}] ${context}:`, error);
    console.error('Failed to write to error log file:', fileError);
  }
}
