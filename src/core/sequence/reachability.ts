/**
 * Reachability tree over the jumps of one variant.
 *
 * Each jump node has one branch per distinct target of its compressed
 * conditions. A pass continues at the next jump strictly after the jump, a
 * destination at the next jump strictly after the destination time (or at the
 * referenced jump itself), and a terminate ends the branch. A jump already on
 * the current path closes the branch as a loop.
 *
 * A subtree without loop leaves does not depend on the path that reached it,
 * so it is built once per jump and shared by every branch that lands there.
 */
import { MAX_TREE_DEPTH } from '../constants';
import { SequenceErrorKind, SequenceFault } from '../types';
import { compiledConditions } from '../compiler/conditions';
import type { ThresholdEntry } from '../compiler/conditions';
import { describeTarget, sameTarget } from './jumps';
import type { Target } from './jumps';
import { allJumps } from './sequence';
import type { Sequence, TimeResolver } from './sequence';

export type TreeNode =
  | { kind: 'jump'; jump: string; branches: TreeBranch[] }
  | { kind: 'terminator' }
  | { kind: 'loop'; jump: string }
  | { kind: 'aborted'; jump: string };

export interface TreeBranch {
  label: string;
  node: TreeNode;
}

export interface ReachabilityTree {
  root: TreeNode;
  /** Distinct nodes built; shared subtrees count once */
  nodeCount: number;
}

interface TimedJump {
  name: string;
  time: number;
  conditions: ThresholdEntry[];
}

interface Expansion {
  node: TreeNode;
  /** Jump levels below the root of the subtree */
  height: number;
  closed: boolean;
}

export function buildReachabilityTree(sequence: Sequence, resolver: TimeResolver): ReachabilityTree {
  const jumps: TimedJump[] = allJumps(sequence)
    .map(({ jump }) => ({ name: jump.name, time: resolver.jumpTime(jump.name), conditions: compiledConditions(jump) }))
    .sort((a, b) => a.time - b.time);
  const byName = new Map(jumps.map(j => [j.name, j]));
  const shared = new Map<string, Expansion>();
  let nodeCount = 0;

  const nextAfter = (time: number): TimedJump | undefined => jumps.find(j => j.time > time);

  const leaf = (node: TreeNode): Expansion => {
    nodeCount++;
    return { node, height: 0, closed: node.kind !== 'loop' && node.kind !== 'aborted' };
  };

  const expand = (jump: TimedJump, path: string[]): Expansion => {
    if (path.includes(jump.name)) return leaf({ kind: 'loop', jump: jump.name });
    const cached = shared.get(jump.name);
    // Reuse only where the same subtree would stay inside the depth limit
    if (cached !== undefined && path.length + cached.height < MAX_TREE_DEPTH) return cached;
    if (path.length >= MAX_TREE_DEPTH) return leaf({ kind: 'aborted', jump: jump.name });
    nodeCount++;

    const targets: Target[] = [];
    for (const entry of jump.conditions) {
      if (!targets.some(t => sameTarget(t, entry.target))) targets.push(entry.target);
    }
    const inner = [...path, jump.name];
    const branches: TreeBranch[] = [];
    let height = 0;
    let closed = true;
    for (const target of targets) {
      const sub = follow(jump, target, inner);
      branches.push({ label: describeTarget(target), node: sub.node });
      if (sub.node.kind === 'jump') height = Math.max(height, sub.height + 1);
      closed = closed && sub.closed;
    }
    const expansion: Expansion = { node: { kind: 'jump', jump: jump.name, branches }, height, closed };
    if (closed) shared.set(jump.name, expansion);
    return expansion;
  };

  const continueAt = (next: TimedJump | undefined, path: string[]): Expansion =>
    next === undefined ? leaf({ kind: 'terminator' }) : expand(next, path);

  const follow = (from: TimedJump, target: Target, path: string[]): Expansion => {
    switch (target.kind) {
      case 'terminate':
        return leaf({ kind: 'terminator' });
      case 'pass':
        return continueAt(nextAfter(from.time), path);
      case 'destination': {
        const reference = target.reference;
        if (reference.kind === 'jump') {
          const jump = byName.get(reference.jump);
          if (jump === undefined) {
            throw new SequenceFault(SequenceErrorKind.UNRESOLVED_REFERENCE, from.name,
              `Jump '${from.name}' goes to unknown jump '${reference.jump}'`);
          }
          return expand(jump, path);
        }
        return continueAt(nextAfter(resolver.reference(reference, from.name)), path);
      }
    }
  };

  const first = jumps[0];
  const root = continueAt(first, []).node;
  return { root, nodeCount };
}

/** Leaves in branch order, visiting a shared subtree once. */
export function treeLeaves(root: TreeNode): TreeNode[] {
  const leaves: TreeNode[] = [];
  const seen = new Set<TreeNode>();
  const walk = (node: TreeNode): void => {
    if (node.kind !== 'jump') {
      leaves.push(node);
      return;
    }
    if (seen.has(node)) return;
    seen.add(node);
    for (const branch of node.branches) walk(branch.node);
  };
  walk(root);
  return leaves;
}

/** Fails unless every branch finished and at least one reaches a terminator. */
export function checkReachability(tree: ReachabilityTree, subject: string): void {
  const leaves = treeLeaves(tree.root);
  for (const leaf of leaves) {
    if (leaf.kind === 'aborted') {
      throw new SequenceFault(SequenceErrorKind.DEPTH_EXCEEDED, leaf.jump,
        `Reachability tree exceeds depth ${MAX_TREE_DEPTH} at jump '${leaf.jump}'`);
    }
  }
  if (!leaves.some(l => l.kind === 'terminator')) {
    throw new SequenceFault(SequenceErrorKind.UNREACHABLE_TERMINATOR, subject,
      `No terminator reachable in '${subject}'\n${formatTree(tree)}`);
  }
}

function describeNode(node: TreeNode): string {
  switch (node.kind) {
    case 'jump': return `jump '${node.jump}'`;
    case 'terminator': return 'terminator';
    case 'loop': return `loop to '${node.jump}'`;
    case 'aborted': return `aborted at '${node.jump}'`;
  }
}

export function formatTree(tree: ReachabilityTree): string {
  const lines: string[] = [];
  const walk = (node: TreeNode, indent: string): void => {
    if (node.kind !== 'jump') return;
    for (const branch of node.branches) {
      lines.push(`${indent}${branch.label}: ${describeNode(branch.node)}`);
      walk(branch.node, indent + '  ');
    }
  };
  lines.push(describeNode(tree.root));
  walk(tree.root, '  ');
  return lines.join('\n');
}
