/**
 * Phase dependency graph helpers
 */

import { ConfigurationError } from '../utils/errors.js';

export interface DagNode {
  id: string;
  dependsOn: readonly string[];
}

/**
 * Find one dependency cycle, returned as a closed path (a -> b -> a)
 */
export function findCycle(nodes: readonly DagNode[]): string[] | null {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    const mark = state.get(id);
    if (mark === 'done') return null;
    if (mark === 'visiting') {
      return [...stack.slice(stack.indexOf(id)), id];
    }

    state.set(id, 'visiting');
    stack.push(id);
    for (const dep of byId.get(id)?.dependsOn ?? []) {
      if (!byId.has(dep)) continue;
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    state.set(id, 'done');
    return null;
  };

  for (const node of nodes) {
    const cycle = visit(node.id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Stable topological sort: among nodes whose dependencies are satisfied,
 * the one listed first goes first, so an already ordered list is returned
 * unchanged
 */
export function topologicalSort<T extends DagNode>(nodes: readonly T[]): T[] {
  const ids = new Set(nodes.map((node) => node.id));
  for (const node of nodes) {
    const missing = node.dependsOn.filter((dep) => !ids.has(dep));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Phase "${node.id}" depends on unknown phases`,
        missing.map((dep) => `unknown dependency "${dep}"`)
      );
    }
  }

  const cycle = findCycle(nodes);
  if (cycle) {
    throw new ConfigurationError('Phase dependencies contain a cycle', [cycle.join(' -> ')]);
  }

  const placed = new Set<string>();
  const remaining = [...nodes];
  const sorted: T[] = [];

  while (remaining.length > 0) {
    const index = remaining.findIndex((node) => node.dependsOn.every((dep) => placed.has(dep)));
    if (index === -1) break;
    const [next] = remaining.splice(index, 1);
    if (!next) break;
    placed.add(next.id);
    sorted.push(next);
  }

  return sorted;
}

/**
 * Every phase reachable through dependsOn, nearest first
 */
export function ancestorsOf(id: string, nodes: ReadonlyMap<string, DagNode>): string[] {
  const seen = new Set<string>();
  const queue = [...(nodes.get(id)?.dependsOn ?? [])];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    queue.push(...(nodes.get(next)?.dependsOn ?? []));
  }
  return [...seen];
}
