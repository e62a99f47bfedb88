import type { Logger } from 'pino';
import { StructuralIntegrityError } from './errors.js';
import type { FieldOutcome, Pid, ProcessRecord, ProcessTree, RecordKind } from './types.js';

interface EventPosition {
  pid: Pid;
  /** Parent in the traversal, `null` for roots */
  parentPid: Pid | null;
  depth: number;
}

export type ProcessEvent = EventPosition &
  (
    | { kind: 'available'; record: ProcessRecord }
    | { kind: Exclude<RecordKind, 'available'> }
  );

export type FoundLevel = 'debug' | 'info';

export interface ReportOptions {
  /** Level of the "Found a process" line */
  foundLevel?: FoundLevel;
}

export const DENIED_MARKER = 'Unavailable (access denied)';

/**
 * Depth-first walk of the tree: roots ascending, then each node's children
 * ascending before the next sibling. Uses an explicit stack, so tree depth is
 * not limited by the call stack.
 *
 * Throws StructuralIntegrityError when a node is reached twice or when some
 * nodes cannot be reached from any root (a parent cycle).
 */
export function describeProcessTree(tree: ProcessTree): ProcessEvent[] {
  const events: ProcessEvent[] = [];
  const visited = new Set<Pid>();
  const stack: EventPosition[] = [];

  for (let i = tree.roots.length - 1; i >= 0; i--) {
    stack.push({ pid: tree.roots[i], parentPid: null, depth: 0 });
  }

  let visit = stack.pop();
  while (visit) {
    const node = tree.nodes.get(visit.pid);
    if (!node) {
      throw new StructuralIntegrityError('Tree references an unknown process', visit.pid);
    }
    if (visited.has(node.pid)) {
      throw new StructuralIntegrityError('Reached the same process twice', node.pid);
    }
    visited.add(node.pid);

    const { outcome } = node;
    events.push(
      outcome.kind === 'available'
        ? { ...visit, kind: 'available', record: outcome.record }
        : { ...visit, kind: outcome.kind },
    );

    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ pid: node.children[i], parentPid: node.pid, depth: visit.depth + 1 });
    }
    visit = stack.pop();
  }

  if (visited.size !== tree.nodes.size) {
    const lowest = [...tree.nodes.keys()]
      .filter((pid) => !visited.has(pid))
      .reduce((min, pid) => (pid < min ? pid : min), Number.POSITIVE_INFINITY);
    throw new StructuralIntegrityError('Process is part of a parent cycle', lowest);
  }

  return events;
}

/**
 * Log one line per process, in traversal order. All events are computed
 * before the first line is written, so a broken tree logs nothing.
 */
export function logProcessTree(tree: ProcessTree, log: Logger, options: ReportOptions = {}): void {
  logProcessEvents(describeProcessTree(tree), log, options);
}

export function logProcessEvents(events: readonly ProcessEvent[], log: Logger, options: ReportOptions = {}): void {
  const foundLevel = options.foundLevel ?? 'info';
  const children = new Map<Pid, Logger>();

  for (const event of events) {
    let eventLog = log;
    if (event.parentPid !== null) {
      let childLog = children.get(event.parentPid);
      if (!childLog) {
        childLog = log.child({ parentPid: event.parentPid });
        children.set(event.parentPid, childLog);
      }
      eventLog = childLog;
    }
    emitEvent(eventLog, event, foundLevel);
  }
}

function emitEvent(log: Logger, event: ProcessEvent, foundLevel: FoundLevel): void {
  const { pid } = event;
  switch (event.kind) {
    case 'available':
      log[foundLevel]({ pid, ...renderRecord(event.record) }, 'Found a process');
      break;
    case 'vanished':
      log.debug({ pid }, "Found a nonexistent process (it likely vanished, or isn't a real system process)");
      break;
    case 'zombie':
      log.warn({ pid }, 'Found a process in the zombie state (exit status not yet reclaimed)');
      break;
    case 'denied':
      log.error({ pid }, 'Found a process, but access to its info was denied');
      break;
  }
}

/** `processName` stays clear of the logger's own `name` binding. */
export interface RenderedRecord {
  ppid: string;
  processName: string;
  exe: string;
  command: string;
  createTime: string;
}

export function renderRecord(record: ProcessRecord): RenderedRecord {
  return {
    ppid: renderField(record.parentPid, (ppid) => (ppid === null ? 'None' : String(ppid))),
    processName: renderField(record.name, (name) => name),
    exe: renderField(record.exe, (exe) => exe || 'None'),
    command: renderField(record.command, (args) => (args.length ? args.join(' ') : 'None')),
    createTime: renderField(record.createTime, (time) => time.toISOString()),
  };
}

function renderField<T>(field: FieldOutcome<T>, format: (value: T) => string): string {
  return field.kind === 'value' ? format(field.value) : DENIED_MARKER;
}
