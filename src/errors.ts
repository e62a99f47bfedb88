import type { Pid } from './types.js';

export type ProcessTreeErrorKind = 'structural-integrity' | 'enumeration-failed' | 'config';

/** Batch-level failure: the whole snapshot is discarded. */
export abstract class ProcessTreeError extends Error {
  abstract readonly kind: ProcessTreeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The process data contradicts itself: a child registered twice, a PID
 * reported twice, or a parent cycle. Points at a source bug or at the host
 * reusing a PID mid-batch, never at a normal OS condition.
 */
export class StructuralIntegrityError extends ProcessTreeError {
  readonly kind = 'structural-integrity';

  constructor(message: string, readonly pid: Pid) {
    super(`${message} (pid ${pid})`);
  }
}

/** The process list or attribute infrastructure itself failed. */
export class EnumerationFailedError extends ProcessTreeError {
  readonly kind = 'enumeration-failed';

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export class ConfigError extends ProcessTreeError {
  readonly kind = 'config';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return JSON.stringify(error) ?? String(error);
}
