/**
 * Execution Order
 *
 * Dependency-respecting linear order over a workflow's nodes. A node depends
 * on the source node of every connection that targets it.
 */

import type { Connection } from '../types/index.js';
import { CycleDetectedError } from './errors.js';

type VisitState = 'unvisited' | 'in-progress' | 'done';

interface Frame {
  id: string;
  next: number;
}

/**
 * Depth-first post-order with an explicit stack. Roots are taken in node
 * insertion order and dependencies in connection insertion order, so ties
 * between independent nodes follow insertion order.
 *
 * @throws CycleDetectedError naming the nodes on the cycle
 */
export function calculateExecutionOrder(
  nodeIds: readonly string[],
  connections: readonly Connection[],
): string[] {
  const dependencies = new Map<string, string[]>();
  for (const id of nodeIds) {
    dependencies.set(id, []);
  }
  for (const connection of connections) {
    const deps = dependencies.get(connection.targetNode);
    if (deps && dependencies.has(connection.sourceNode)) {
      deps.push(connection.sourceNode);
    }
  }

  const state = new Map<string, VisitState>();
  const order: string[] = [];

  for (const root of nodeIds) {
    if (state.get(root) === 'done') continue;

    const stack: Frame[] = [{ id: root, next: 0 }];
    state.set(root, 'in-progress');

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const deps = dependencies.get(frame.id) ?? [];

      if (frame.next < deps.length) {
        const dep = deps[frame.next];
        frame.next += 1;

        const depState = state.get(dep) ?? 'unvisited';
        if (depState === 'in-progress') {
          const cycleStart = stack.findIndex((f) => f.id === dep);
          throw new CycleDetectedError(stack.slice(cycleStart).map((f) => f.id));
        }
        if (depState === 'unvisited') {
          state.set(dep, 'in-progress');
          stack.push({ id: dep, next: 0 });
        }
        continue;
      }

      stack.pop();
      state.set(frame.id, 'done');
      order.push(frame.id);
    }
  }

  return order;
}
