import { describe, it, expect } from 'vitest';
import { buildProcessTree, knownParent } from './tree.js';
import { StructuralIntegrityError } from './errors.js';
import { VANISHED, ZOMBIE, fieldValue } from './types.js';
import { deniedParent, permutations, proc, shapeOf, vanished, zombie } from './tree.test-utils.js';

describe('buildProcessTree', () => {
  it('links children under a parent seen first', () => {
    const tree = buildProcessTree([proc(1, null), proc(2, 1), proc(3, 1)]);

    expect(tree.roots).toEqual([1]);
    expect(tree.nodes.get(1)?.children).toEqual([2, 3]);
    expect(tree.nodes.get(2)?.children).toEqual([]);
    expect(tree.nodes.get(3)?.children).toEqual([]);
  });

  it('builds the same tree when a child arrives before its parent', () => {
    const childFirst = buildProcessTree([proc(3, 1), proc(1, null)]);
    const parentFirst = buildProcessTree([proc(1, null), proc(3, 1)]);

    expect(shapeOf(childFirst)).toEqual(shapeOf(parentFirst));
    expect(childFirst.roots).toEqual([1]);
    expect(childFirst.nodes.get(1)?.outcome.kind).toBe('available');
    expect(childFirst.nodes.get(1)?.children).toEqual([3]);
  });

  it('makes a process with a denied parent field a root', () => {
    const tree = buildProcessTree([deniedParent(5)]);

    expect(tree.roots).toEqual([5]);
    expect(tree.nodes.size).toBe(1);
  });

  it('keeps an unreported parent as a vanished placeholder root', () => {
    const tree = buildProcessTree([proc(7, 99)]);

    expect(tree.roots).toEqual([99]);
    expect(tree.nodes.get(99)).toEqual({ pid: 99, outcome: VANISHED, children: [7] });
  });

  it('settles a placeholder with the outcome reported later', () => {
    const tree = buildProcessTree([proc(2, 1), zombie(1)]);

    expect(tree.nodes.get(1)?.outcome).toEqual(ZOMBIE);
    expect(tree.nodes.get(1)?.children).toEqual([2]);
    expect(tree.roots).toEqual([1]);
  });

  it('makes vanished and zombie processes roots', () => {
    const tree = buildProcessTree([vanished(4), zombie(3), proc(1, null)]);

    expect(tree.roots).toEqual([1, 3, 4]);
  });

  it('keeps children in ascending order whatever the arrival order', () => {
    const tree = buildProcessTree([proc(9, 1), proc(3, 1), proc(5, 1), proc(1, null)]);

    expect(tree.nodes.get(1)?.children).toEqual([3, 5, 9]);
  });

  it('produces the same tree for every arrival order', () => {
    const batch = [proc(1, null), proc(2, 1), proc(3, 2), proc(4, 50), deniedParent(6), zombie(5)];
    const expected = shapeOf(buildProcessTree(batch));

    for (const order of permutations(batch)) {
      expect(shapeOf(buildProcessTree(order))).toEqual(expected);
    }
    expect(expected.roots).toEqual([1, 5, 6, 50]);
  });

  it('leaves no orphaned children', () => {
    const tree = buildProcessTree([proc(10, 1), proc(11, 10), proc(12, 10), proc(1, null), proc(20, 30), vanished(31)]);

    for (const pid of tree.nodes.keys()) {
      if (tree.roots.includes(pid)) continue;
      const parents = [...tree.nodes.values()].filter((node) => node.children.includes(pid));
      expect(parents).toHaveLength(1);
    }
  });

  it('rejects the same child registered twice', () => {
    expect(() => buildProcessTree([proc(2, 1), proc(2, 1)])).toThrow(
      new StructuralIntegrityError('Registered the same child twice', 2),
    );
  });

  it('rejects a second outcome for the same process', () => {
    const build = () => buildProcessTree([proc(1, null), vanished(1)]);

    expect(build).toThrow(StructuralIntegrityError);
    expect(build).toThrow('Received a second outcome for the same process (pid 1)');
  });

  it('rejects a second outcome after a placeholder was settled', () => {
    expect(() => buildProcessTree([proc(2, 1), vanished(1), vanished(1)])).toThrow(
      'Received a second outcome for the same process (pid 1)',
    );
  });

  it('returns an empty tree for an empty batch', () => {
    const tree = buildProcessTree([]);

    expect(tree.roots).toEqual([]);
    expect(tree.nodes.size).toBe(0);
  });
});

describe('knownParent', () => {
  it('returns the parent only for available records with a parent value', () => {
    expect(knownParent(proc(2, 1).outcome)).toBe(1);
    expect(knownParent(proc(2, null).outcome)).toBeNull();
    expect(knownParent(deniedParent(2).outcome)).toBeNull();
    expect(knownParent(VANISHED)).toBeNull();
    expect(knownParent(proc(2, 0, { name: fieldValue('init') }).outcome)).toBe(0);
  });
});
