import { StructuralIntegrityError } from './errors.js';
import { VANISHED } from './types.js';
import type { IdentifiedProcess, Pid, ProcessTree, RecordOutcome, TreeNode } from './types.js';

/**
 * Build a process tree from per-process outcomes in a single pass.
 *
 * Discovery order is arbitrary, so a child can show up before its parent.
 * The parent then gets a placeholder node whose outcome is the `vanished`
 * sentinel; it is overwritten once if the parent's own outcome arrives later.
 * A placeholder that is never settled stays `vanished`: the parent exited
 * mid-enumeration, or is a PID with no user-mode process behind it (PID 0 on
 * Linux).
 */
export function buildProcessTree(entries: Iterable<IdentifiedProcess>): ProcessTree {
  const nodes = new Map<Pid, TreeNode>();
  // Nodes whose outcome came from their own record, as opposed to placeholders
  const settled = new Set<Pid>();

  for (const { pid, outcome } of entries) {
    const parentPid = knownParent(outcome);
    if (parentPid !== null) {
      let parent = nodes.get(parentPid);
      if (!parent) {
        parent = { pid: parentPid, outcome: VANISHED, children: [] };
        nodes.set(parentPid, parent);
      }
      if (!insertSorted(parent.children, pid)) {
        throw new StructuralIntegrityError('Registered the same child twice', pid);
      }
    }

    if (settled.has(pid)) {
      throw new StructuralIntegrityError('Received a second outcome for the same process', pid);
    }
    settled.add(pid);

    const existing = nodes.get(pid);
    if (existing) {
      existing.outcome = outcome;
    } else {
      nodes.set(pid, { pid, outcome, children: [] });
    }
  }

  const roots: Pid[] = [];
  for (const node of nodes.values()) {
    if (knownParent(node.outcome) === null) roots.push(node.pid);
  }
  roots.sort((a, b) => a - b);

  return { roots, nodes };
}

/** Parent PID when the record names one, `null` when the parent is unknown or absent. */
export function knownParent(outcome: RecordOutcome): Pid | null {
  if (outcome.kind !== 'available') return null;
  const { parentPid } = outcome.record;
  return parentPid.kind === 'value' ? parentPid.value : null;
}

/** Returns false when `pid` is already present. */
function insertSorted(list: Pid[], pid: Pid): boolean {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const current = list[mid];
    if (current === pid) return false;
    if (current < pid) lo = mid + 1;
    else hi = mid;
  }
  list.splice(lo, 0, pid);
  return true;
}
