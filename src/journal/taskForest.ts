import type { TaskForest, TaskNode } from '../types/journal';
import { formatTaskLine, parseTaskLine } from './markdownFormat';

interface DraftNode {
  text: string;
  completed: boolean;
  depth: number;
  parent: number | null;
  children: number[];
}

/**
 * Rebuilds the checklist hierarchy of a block of lines.
 *
 * Nodes are pushed onto a stack indexed by indentation level; a node at level
 * L hangs under the latest node seen at level L-1. A node with no such
 * ancestor (e.g. indented two units under a top-level item) becomes a root.
 * Lines that are not checklist items are skipped.
 */
export function buildTaskForest(lines: readonly string[]): TaskForest {
  const nodes: DraftNode[] = [];
  const roots: number[] = [];
  const stack: Array<number | undefined> = [];

  for (const line of lines) {
    const task = parseTaskLine(line);
    if (!task) continue;

    const parent = task.level > 0 ? stack[task.level - 1] ?? null : null;
    const index = nodes.length;
    nodes.push({
      text: task.text,
      completed: task.completed,
      depth: parent === null ? 0 : nodes[parent].depth + 1,
      parent,
      children: [],
    });

    if (parent === null) {
      roots.push(index);
    } else {
      nodes[parent].children.push(index);
    }

    stack.length = task.level;
    stack[task.level] = index;
  }

  return { nodes, roots };
}

/**
 * Copies the nodes accepted by `keep` into a fresh arena, in document order.
 * Depths are renumbered from the copied roots, and a rejected node takes its
 * whole subtree with it.
 */
export function copyForest(forest: TaskForest, keep: (index: number) => boolean = () => true): TaskForest {
  const nodes: DraftNode[] = [];
  const roots: number[] = [];
  const pending: Array<{ source: number; parent: number | null }> = [];

  for (let i = forest.roots.length - 1; i >= 0; i--) {
    pending.push({ source: forest.roots[i], parent: null });
  }

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next || !keep(next.source)) continue;

    const source = forest.nodes[next.source];
    const index = nodes.length;
    nodes.push({
      text: source.text,
      completed: source.completed,
      depth: next.parent === null ? 0 : nodes[next.parent].depth + 1,
      parent: next.parent,
      children: [],
    });
    if (next.parent === null) {
      roots.push(index);
    } else {
      nodes[next.parent].children.push(index);
    }

    for (let c = source.children.length - 1; c >= 0; c--) {
      pending.push({ source: source.children[c], parent: index });
    }
  }

  return { nodes, roots };
}

/** Appends forests one after the other into a single arena. */
export function concatForests(forests: readonly TaskForest[]): TaskForest {
  const nodes: TaskNode[] = [];
  const roots: number[] = [];

  for (const forest of forests) {
    const offset = nodes.length;
    for (const node of forest.nodes) {
      nodes.push({
        text: node.text,
        completed: node.completed,
        depth: node.depth,
        parent: node.parent === null ? null : node.parent + offset,
        children: node.children.map(child => child + offset),
      });
    }
    roots.push(...forest.roots.map(root => root + offset));
  }

  return { nodes, roots };
}

/** Node indices in document (pre-)order. */
export function documentOrder(forest: TaskForest): number[] {
  const order: number[] = [];
  const pending = [...forest.roots].reverse();
  while (pending.length > 0) {
    const index = pending.pop();
    if (index === undefined) break;
    order.push(index);
    const children = forest.nodes[index].children;
    for (let c = children.length - 1; c >= 0; c--) {
      pending.push(children[c]);
    }
  }
  return order;
}

export function renderForest(forest: TaskForest): string[] {
  return documentOrder(forest).map(index => {
    const node = forest.nodes[index];
    return formatTaskLine(node.depth, node.completed, node.text);
  });
}
