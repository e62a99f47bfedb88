import psList from 'ps-list';
import fs from 'node:fs/promises';
import path from 'node:path';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { EnumerationFailedError } from './errors.js';
import {
  FIELD_DENIED,
  RECORD_DENIED,
  VANISHED,
  ZOMBIE,
  available,
  fatal,
  fieldValue,
  identified,
} from './types.js';
import type { EnumerationOutcome, FieldOutcome, Pid } from './types.js';

const execFileP = promisify(execFile);

export interface ProcessSource {
  listPids(): Promise<Pid[]>;
  queryProcess(pid: Pid): Promise<EnumerationOutcome>;
}

/** Linux reports process start times in clock ticks; USER_HZ is 100 on every mainstream build. */
const CLOCK_TICKS_PER_SECOND = 100;

export function createProcessSource(platform: NodeJS.Platform = process.platform): ProcessSource {
  return platform === 'linux' ? new ProcfsSource() : new PsSource();
}

export async function listPids(): Promise<Pid[]> {
  try {
    const all = await psList({ all: true });
    return all.map((p) => p.pid).sort((a, b) => a - b);
  } catch (error) {
    throw new EnumerationFailedError('Could not enumerate processes', error);
  }
}

/** Parent PIDs equal to the process' own PID or missing mean "no parent". */
export function normaliseParent(pid: Pid, ppid: number | undefined): Pid | null {
  if (ppid === undefined || Number.isNaN(ppid) || ppid === pid) return null;
  return ppid;
}

// Per-field read result before it is folded into a record outcome
type FieldRead<T> = FieldOutcome<T> | { kind: 'vanished' } | { kind: 'fatal'; cause: unknown };

export type ErrorClass = 'vanished' | 'denied' | 'fatal';

export function classifyFsError(error: unknown): ErrorClass {
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  switch (code) {
    case 'ENOENT':
    case 'ESRCH':
      return 'vanished';
    case 'EACCES':
    case 'EPERM':
      return 'denied';
    default:
      return 'fatal';
  }
}

function isFieldOutcome<T>(read: FieldRead<T>): read is FieldOutcome<T> {
  return read.kind === 'value' || read.kind === 'denied';
}

async function readField<T>(read: () => Promise<T>): Promise<FieldRead<T>> {
  try {
    return fieldValue(await read());
  } catch (error) {
    const cls = classifyFsError(error);
    if (cls === 'denied') return FIELD_DENIED;
    if (cls === 'vanished') return { kind: 'vanished' };
    return { kind: 'fatal', cause: error };
  }
}

export interface ProcStat {
  name: string;
  state: string;
  ppid: number;
  startTicks: number;
}

/** Parse `/proc/<pid>/stat`. The name is wrapped in parentheses and may contain anything, including ')'. */
export function parseProcStat(content: string): ProcStat {
  const open = content.indexOf('(');
  const close = content.lastIndexOf(')');
  if (open < 0 || close < open) {
    throw new Error(`Malformed process stat line: ${content.slice(0, 80)}`);
  }
  const fields = content.slice(close + 2).trim().split(/\s+/);
  // fields[0] is field 3 of proc(5)
  const state = fields[0];
  const ppid = Number(fields[1]);
  const startTicks = Number(fields[19]);
  if (!state || Number.isNaN(ppid) || Number.isNaN(startTicks)) {
    throw new Error(`Malformed process stat line: ${content.slice(0, 80)}`);
  }
  return { name: content.slice(open + 1, close), state, ppid, startTicks };
}

export function parseBootTime(content: string): number {
  const match = /^btime\s+(\d+)$/m.exec(content);
  if (!match?.[1]) throw new Error('No btime entry in kernel stat file');
  return Number(match[1]);
}

export function parseCmdline(content: string): string[] {
  const args = content.split('\0');
  if (args.at(-1) === '') args.pop();
  return args;
}

/** Reads everything from procfs. `root` is configurable so tests can point it at a fake tree. */
export class ProcfsSource implements ProcessSource {
  private bootTime?: Promise<number>;

  constructor(private readonly root = '/proc') {}

  listPids(): Promise<Pid[]> {
    return listPids();
  }

  async queryProcess(pid: Pid): Promise<EnumerationOutcome> {
    const dir = path.join(this.root, String(pid));

    let stat: ProcStat;
    try {
      stat = parseProcStat(await fs.readFile(path.join(dir, 'stat'), 'utf8'));
    } catch (error) {
      switch (classifyFsError(error)) {
        case 'vanished':
          return identified(pid, VANISHED);
        case 'denied':
          return identified(pid, RECORD_DENIED);
        default:
          return fatal(error);
      }
    }
    if (stat.state === 'Z') return identified(pid, ZOMBIE);
    if (stat.state === 'X') return identified(pid, VANISHED);

    // The kernel stat file belongs to the system, not the process: any failure is fatal
    let bootTime: number;
    try {
      bootTime = await this.readBootTime();
    } catch (error) {
      return fatal(error);
    }
    const createTime = fieldValue(new Date((bootTime + stat.startTicks / CLOCK_TICKS_PER_SECOND) * 1000));

    const [exe, command] = await Promise.all([
      this.readExe(dir),
      readField(async () => parseCmdline(await fs.readFile(path.join(dir, 'cmdline'), 'utf8'))),
    ]);

    const failure = [exe, command].find((field) => field.kind === 'fatal');
    if (failure?.kind === 'fatal') return fatal(failure.cause);
    // The process exited between two reads
    if (!isFieldOutcome(exe) || !isFieldOutcome(command)) {
      return identified(pid, VANISHED);
    }

    return identified(
      pid,
      available({
        parentPid: fieldValue(normaliseParent(pid, stat.ppid)),
        name: fieldValue(stat.name),
        exe,
        command,
        createTime,
      }),
    );
  }

  // Kernel threads have no exe link at all while their directory still exists
  private async readExe(dir: string): Promise<FieldRead<string>> {
    const exe = await readField(() => fs.readlink(path.join(dir, 'exe')));
    if (exe.kind !== 'vanished') return exe;
    try {
      await fs.access(dir);
      return fieldValue('');
    } catch {
      return exe;
    }
  }

  private readBootTime(): Promise<number> {
    this.bootTime ??= fs.readFile(path.join(this.root, 'stat'), 'utf8').then(parseBootTime);
    return this.bootTime;
  }
}

export interface PsStatus {
  ppid: number;
  state: string;
  startTime: Date;
  comm: string;
}

/** Parse one line of `ps -o ppid=,stat=,lstart=,comm=`; `lstart` is always five tokens. */
export function parsePsStatus(line: string): PsStatus {
  const tokens = line.trim().split(/\s+/);
  if (tokens.length < 8) throw new Error(`Malformed ps line: ${line}`);
  const ppid = Number(tokens[0]);
  const startTime = new Date(tokens.slice(2, 7).join(' '));
  if (Number.isNaN(ppid) || Number.isNaN(startTime.getTime())) {
    throw new Error(`Malformed ps line: ${line}`);
  }
  return { ppid, state: tokens[1], startTime, comm: tokens.slice(7).join(' ') };
}

export function extractExecPath(comm: string): string {
  const token = comm.trim().replace(/^"|"$/g, '');
  if (token.startsWith('/')) return token;
  return '';
}

/** Exit status 1 with no output is how ps reports a PID that does not exist. */
function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 1;
}

/**
 * Queries through `ps`, one process at a time. Argument boundaries are lost
 * in `ps` output, so the command line is split on whitespace.
 */
export class PsSource implements ProcessSource {
  listPids(): Promise<Pid[]> {
    return listPids();
  }

  async queryProcess(pid: Pid): Promise<EnumerationOutcome> {
    const opts = { timeout: 5000, maxBuffer: 1024 * 1024 };
    let status: PsStatus;
    let args: string;
    try {
      const [statusOut, argsOut] = await Promise.all([
        execFileP('ps', ['-o', 'ppid=,stat=,lstart=,comm=', '-p', String(pid)], opts),
        execFileP('ps', ['-ww', '-o', 'args=', '-p', String(pid)], opts),
      ]);
      if (!statusOut.stdout.trim()) return identified(pid, VANISHED);
      status = parsePsStatus(statusOut.stdout);
      args = argsOut.stdout.trim();
    } catch (error) {
      if (isMissingProcess(error)) return identified(pid, VANISHED);
      if (classifyFsError(error) === 'denied') return identified(pid, RECORD_DENIED);
      return fatal(error);
    }

    if (status.state.startsWith('Z')) return identified(pid, ZOMBIE);

    const exe = extractExecPath(status.comm);
    return identified(
      pid,
      available({
        parentPid: fieldValue(normaliseParent(pid, status.ppid)),
        name: fieldValue(path.basename(status.comm)),
        exe: fieldValue(exe),
        command: fieldValue(args ? args.split(/\s+/) : []),
        createTime: fieldValue(status.startTime),
      }),
    );
  }
}
