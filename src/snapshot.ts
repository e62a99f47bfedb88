import type { Logger } from 'pino';
import { collectProcessOutcomes } from './collect.js';
import type { CollectOptions } from './collect.js';
import type { ProcessSource } from './proc.js';
import { describeProcessTree, logProcessEvents } from './report.js';
import type { ProcessEvent, ReportOptions } from './report.js';
import { buildProcessTree } from './tree.js';
import type { ProcessTree, RecordKind } from './types.js';

export interface Snapshot {
  tree: ProcessTree;
  events: ProcessEvent[];
}

export type SnapshotSummary = { processes: number; roots: number } & Record<RecordKind, number>;

/**
 * Enumerate, query, build and describe. Any batch-level failure rejects
 * before a tree or a single event exists.
 */
export async function takeSnapshot(source: ProcessSource, options: CollectOptions = {}): Promise<Snapshot> {
  const pids = await source.listPids();
  const entries = await collectProcessOutcomes(pids, (pid) => source.queryProcess(pid), options);
  const tree = buildProcessTree(entries);
  return { tree, events: describeProcessTree(tree) };
}

export function summarize(snapshot: Snapshot): SnapshotSummary {
  const summary: SnapshotSummary = {
    processes: snapshot.events.length,
    roots: snapshot.tree.roots.length,
    available: 0,
    vanished: 0,
    zombie: 0,
    denied: 0,
  };
  for (const event of snapshot.events) summary[event.kind]++;
  return summary;
}

export type ReportSnapshotOptions = CollectOptions & ReportOptions;

/** Take a snapshot and log it, one line per process. */
export async function reportSnapshot(
  source: ProcessSource,
  log: Logger,
  options: ReportSnapshotOptions = {},
): Promise<Snapshot> {
  log.debug('Probing running processes...');
  const snapshot = await takeSnapshot(source, options);
  log.debug('Processing process tree...');
  logProcessEvents(snapshot.events, log, options);
  log.info(summarize(snapshot), 'Process tree reported');
  return snapshot;
}
