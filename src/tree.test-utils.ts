import { pino } from 'pino';
import type { Logger } from 'pino';
import type { ProcessSource } from './proc.js';
import { FIELD_DENIED, VANISHED, ZOMBIE, available, fieldValue } from './types.js';
import type { EnumerationOutcome, IdentifiedProcess, Pid, ProcessRecord, ProcessTree, RecordKind } from './types.js';

export const CREATED_AT = new Date('2024-01-02T03:04:05.000Z');

export function makeRecord(overrides: Partial<ProcessRecord> = {}): ProcessRecord {
  return {
    parentPid: fieldValue(null),
    name: fieldValue('proc'),
    exe: fieldValue('/usr/bin/proc'),
    command: fieldValue(['proc']),
    createTime: fieldValue(CREATED_AT),
    ...overrides,
  };
}

/** Available process named `p<pid>` whose parent is `parent` */
export function proc(pid: Pid, parent: Pid | null, overrides: Partial<ProcessRecord> = {}): IdentifiedProcess {
  return {
    pid,
    outcome: available(
      makeRecord({
        parentPid: fieldValue(parent),
        name: fieldValue(`p${pid}`),
        command: fieldValue([`p${pid}`, '--flag']),
        ...overrides,
      }),
    ),
  };
}

export function deniedParent(pid: Pid): IdentifiedProcess {
  return proc(pid, null, { parentPid: FIELD_DENIED });
}

export function vanished(pid: Pid): IdentifiedProcess {
  return { pid, outcome: VANISHED };
}

export function zombie(pid: Pid): IdentifiedProcess {
  return { pid, outcome: ZOMBIE };
}

export interface TreeShape {
  roots: Pid[];
  nodes: Array<{ pid: Pid; kind: RecordKind; children: Pid[] }>;
}

/** Plain, order-stable view of a tree for equality checks */
export function shapeOf(tree: ProcessTree): TreeShape {
  return {
    roots: tree.roots,
    nodes: [...tree.nodes.values()]
      .map((node) => ({ pid: node.pid, kind: node.outcome.kind, children: node.children }))
      .sort((a, b) => a.pid - b.pid),
  };
}

export function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  const result: T[][] = [];
  items.forEach((item, i) => {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const tail of permutations(rest)) result.push([item, ...tail]);
  });
  return result;
}

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** pino logger that keeps its output in memory, without timestamps */
export function createMemoryLogger(): { log: Logger; lines: string[]; parsed: () => LogLine[] } {
  const lines: string[] = [];
  const log = pino(
    { level: 'trace', base: null, timestamp: false },
    { write: (msg: string) => void lines.push(msg) },
  );
  return { log, lines, parsed: () => lines.map((line): LogLine => JSON.parse(line)) };
}

export function fakeSource(outcomes: ReadonlyArray<[Pid, EnumerationOutcome]>): ProcessSource & { queried: Pid[] } {
  const byPid = new Map(outcomes);
  const queried: Pid[] = [];
  return {
    queried,
    listPids: async () => outcomes.map(([pid]) => pid),
    queryProcess: async (pid) => {
      queried.push(pid);
      const outcome = byPid.get(pid);
      if (!outcome) throw new Error(`No fake outcome for pid ${pid}`);
      return outcome;
    },
  };
}
