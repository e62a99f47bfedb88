import { EnumerationFailedError } from './errors.js';
import type { EnumerationOutcome, IdentifiedProcess, Pid } from './types.js';

export type ProcessQuery = (pid: Pid) => Promise<EnumerationOutcome>;

export interface CollectOptions {
  /** Queries in flight at once */
  concurrency?: number;
}

export const DEFAULT_CONCURRENCY = 32;

/**
 * Query every PID and return the outcomes in input order, or fail the whole
 * batch. Up to `concurrency` queries run at once; each worker picks the next
 * PID as soon as its previous query settles. A `fatal` outcome or a rejected
 * query discards every result gathered so far and no further queries are
 * started.
 */
export async function collectProcessOutcomes(
  pids: readonly Pid[],
  query: ProcessQuery,
  options: CollectOptions = {},
): Promise<IdentifiedProcess[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const collected: IdentifiedProcess[] = new Array(pids.length);
  let next = 0;
  let failure: { cause: unknown } | undefined;

  const worker = async (): Promise<void> => {
    while (!failure && next < pids.length) {
      const index = next++;
      const outcome = await query(pids[index]).catch(
        (cause: unknown): EnumerationOutcome => ({ kind: 'fatal', cause }),
      );
      if (outcome.kind === 'fatal') {
        failure ??= { cause: outcome.cause };
        return;
      }
      collected[index] = { pid: outcome.pid, outcome: outcome.outcome };
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, pids.length) }, () => worker()));

  if (failure) {
    throw new EnumerationFailedError('Process enumeration failed, discarding the whole batch', failure.cause);
  }
  return collected;
}
