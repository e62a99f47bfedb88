import { describe, it, expect } from 'vitest';
import { DENIED_MARKER, describeProcessTree, logProcessTree, renderRecord } from './report.js';
import { StructuralIntegrityError } from './errors.js';
import { buildProcessTree } from './tree.js';
import { FIELD_DENIED, RECORD_DENIED, VANISHED, fieldValue } from './types.js';
import type { ProcessTree } from './types.js';
import { createMemoryLogger, deniedParent, makeRecord, proc, vanished, zombie } from './tree.test-utils.js';

function sampleTree(): ProcessTree {
  return buildProcessTree([proc(5, 1), proc(3, 2), vanished(10), proc(2, 1), proc(1, null)]);
}

describe('describeProcessTree', () => {
  it('walks roots and children depth-first in ascending order', () => {
    const events = describeProcessTree(sampleTree());

    expect(events.map(({ pid, parentPid, depth }) => ({ pid, parentPid, depth }))).toEqual([
      { pid: 1, parentPid: null, depth: 0 },
      { pid: 2, parentPid: 1, depth: 1 },
      { pid: 3, parentPid: 2, depth: 2 },
      { pid: 5, parentPid: 1, depth: 1 },
      { pid: 10, parentPid: null, depth: 0 },
    ]);
  });

  it('carries the record only for available processes', () => {
    const events = describeProcessTree(buildProcessTree([proc(4, null), zombie(6)]));

    expect(events[0]).toEqual({ pid: 4, parentPid: null, depth: 0, kind: 'available', record: makeRecord({
      name: fieldValue('p4'),
      command: fieldValue(['p4', '--flag']),
    }) });
    expect(events[1]).toEqual({ pid: 6, parentPid: null, depth: 0, kind: 'zombie' });
  });

  it('describes the same tree identically every time', () => {
    const tree = sampleTree();

    expect(JSON.stringify(describeProcessTree(tree))).toBe(JSON.stringify(describeProcessTree(tree)));
  });

  it('rejects a parent cycle', () => {
    const tree = buildProcessTree([proc(1, null), proc(4, 5), proc(5, 4)]);

    expect(() => describeProcessTree(tree)).toThrow(new StructuralIntegrityError('Process is part of a parent cycle', 4));
  });

  it('rejects a process that is its own parent', () => {
    const tree = buildProcessTree([proc(8, 8)]);

    expect(tree.roots).toEqual([]);
    expect(() => describeProcessTree(tree)).toThrow('Process is part of a parent cycle (pid 8)');
  });

  it('rejects a process listed under two parents', () => {
    const tree: ProcessTree = {
      roots: [1, 3],
      nodes: new Map([
        [1, { pid: 1, outcome: VANISHED, children: [2] }],
        [2, { pid: 2, outcome: VANISHED, children: [] }],
        [3, { pid: 3, outcome: VANISHED, children: [2] }],
      ]),
    };

    expect(() => describeProcessTree(tree)).toThrow('Reached the same process twice (pid 2)');
  });

  it('rejects a reference to a missing node', () => {
    const tree: ProcessTree = { roots: [1], nodes: new Map() };

    expect(() => describeProcessTree(tree)).toThrow('Tree references an unknown process (pid 1)');
  });

  it('walks very deep trees without recursion', () => {
    const depth = 50_000;
    const entries = [proc(1, null)];
    for (let pid = 2; pid <= depth; pid++) entries.push(proc(pid, pid - 1));

    const events = describeProcessTree(buildProcessTree(entries));

    expect(events).toHaveLength(depth);
    expect(events[depth - 1]).toMatchObject({ pid: depth, parentPid: depth - 1, depth: depth - 1 });
  });
});

describe('logProcessTree', () => {
  it('logs one line per process with the level of its outcome', () => {
    const { log, parsed } = createMemoryLogger();
    const tree = buildProcessTree([proc(1, null), zombie(2), vanished(3), { pid: 4, outcome: RECORD_DENIED }]);

    logProcessTree(tree, log);

    expect(parsed().map(({ level, pid, msg }) => ({ level, pid, msg }))).toEqual([
      { level: 30, pid: 1, msg: 'Found a process' },
      { level: 40, pid: 2, msg: 'Found a process in the zombie state (exit status not yet reclaimed)' },
      { level: 20, pid: 3, msg: "Found a nonexistent process (it likely vanished, or isn't a real system process)" },
      { level: 50, pid: 4, msg: 'Found a process, but access to its info was denied' },
    ]);
  });

  it('renders every field of an available process and marks denied ones', () => {
    const { log, parsed } = createMemoryLogger();
    const tree = buildProcessTree([
      proc(1, null),
      proc(2, 1, { exe: FIELD_DENIED, command: FIELD_DENIED }),
    ]);

    logProcessTree(tree, log);

    expect(parsed()).toEqual([
      {
        level: 30,
        pid: 1,
        ppid: 'None',
        processName: 'p1',
        exe: '/usr/bin/proc',
        command: 'p1 --flag',
        createTime: '2024-01-02T03:04:05.000Z',
        msg: 'Found a process',
      },
      {
        level: 30,
        parentPid: 1,
        pid: 2,
        ppid: '1',
        processName: 'p2',
        exe: DENIED_MARKER,
        command: DENIED_MARKER,
        createTime: '2024-01-02T03:04:05.000Z',
        msg: 'Found a process',
      },
    ]);
  });

  it('can log found processes at debug level', () => {
    const { log, parsed } = createMemoryLogger();

    logProcessTree(buildProcessTree([deniedParent(9)]), log, { foundLevel: 'debug' });

    expect(parsed()).toHaveLength(1);
    expect(parsed()[0]).toMatchObject({ level: 20, pid: 9, ppid: DENIED_MARKER });
  });

  it('writes identical output on every run', () => {
    const tree = sampleTree();
    const first = createMemoryLogger();
    const second = createMemoryLogger();

    logProcessTree(tree, first.log);
    logProcessTree(tree, second.log);

    expect(first.lines).toHaveLength(5);
    expect(second.lines.join('')).toBe(first.lines.join(''));
  });

  it('logs nothing for a tree with a cycle', () => {
    const { log, lines } = createMemoryLogger();
    const tree = buildProcessTree([proc(1, null), proc(2, 1), proc(4, 5), proc(5, 4)]);

    expect(() => logProcessTree(tree, log)).toThrow(StructuralIntegrityError);
    expect(lines).toEqual([]);
  });
});

describe('renderRecord', () => {
  it('renders empty executables and command lines as None', () => {
    const record = makeRecord({ parentPid: fieldValue(7), exe: fieldValue(''), command: fieldValue([]) });

    expect(renderRecord(record)).toEqual({
      ppid: '7',
      processName: 'proc',
      exe: 'None',
      command: 'None',
      createTime: '2024-01-02T03:04:05.000Z',
    });
  });

  it('never substitutes a value for a denied field', () => {
    const record = makeRecord({
      parentPid: FIELD_DENIED,
      name: FIELD_DENIED,
      exe: FIELD_DENIED,
      command: FIELD_DENIED,
      createTime: FIELD_DENIED,
    });

    expect(Object.values(renderRecord(record))).toEqual([
      DENIED_MARKER,
      DENIED_MARKER,
      DENIED_MARKER,
      DENIED_MARKER,
      DENIED_MARKER,
    ]);
  });
});
