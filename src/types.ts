export type Pid = number;

/**
 * Result of reading one attribute of a process. A denied field only affects
 * that attribute; the rest of the record stays usable.
 */
export type FieldOutcome<T> =
  | { kind: 'value'; value: T }
  | { kind: 'denied' };

export interface ProcessRecord {
  /** `null` when the process authoritatively has no parent */
  parentPid: FieldOutcome<Pid | null>;
  name: FieldOutcome<string>;
  /** Empty string when the process has no executable image (kernel threads) */
  exe: FieldOutcome<string>;
  command: FieldOutcome<string[]>;
  createTime: FieldOutcome<Date>;
}

/**
 * What a query learned about an identified process.
 *
 * - `available`: the process could be queried, fields may still be denied
 * - `vanished`: exited before or during the query
 * - `zombie`: exited, exit status not yet reclaimed by its parent
 * - `denied`: exists, but even its record handle could not be opened
 */
export type RecordOutcome =
  | { kind: 'available'; record: ProcessRecord }
  | { kind: 'vanished' }
  | { kind: 'zombie' }
  | { kind: 'denied' };

export type RecordKind = RecordOutcome['kind'];

export interface IdentifiedProcess {
  pid: Pid;
  outcome: RecordOutcome;
}

/** One query attempt. `fatal` means no PID was obtained and the batch is lost. */
export type EnumerationOutcome =
  | ({ kind: 'identified' } & IdentifiedProcess)
  | { kind: 'fatal'; cause: unknown };

export interface TreeNode {
  pid: Pid;
  outcome: RecordOutcome;
  /** Ascending, no duplicates */
  children: Pid[];
}

export interface ProcessTree {
  /** Ascending */
  roots: Pid[];
  nodes: Map<Pid, TreeNode>;
}

export function fieldValue<T>(value: T): FieldOutcome<T> {
  return { kind: 'value', value };
}

export const FIELD_DENIED: FieldOutcome<never> = { kind: 'denied' };

export const VANISHED: RecordOutcome = { kind: 'vanished' };
export const ZOMBIE: RecordOutcome = { kind: 'zombie' };
export const RECORD_DENIED: RecordOutcome = { kind: 'denied' };

export function available(record: ProcessRecord): RecordOutcome {
  return { kind: 'available', record };
}

export function identified(pid: Pid, outcome: RecordOutcome): EnumerationOutcome {
  return { kind: 'identified', pid, outcome };
}

export function fatal(cause: unknown): EnumerationOutcome {
  return { kind: 'fatal', cause };
}
