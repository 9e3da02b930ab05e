import { InvalidWeightError, UnknownNodeError } from "../errors.js";
import type { GraphEdgeData, GraphModel } from "../model.js";

export interface ShortestPathResult {
  readonly distance: number;
  readonly path: string[];
}

/**
 * Frontier of the search as a binary heap ordered by tentative distance, then
 * by insertion so equal distances settle first come, first served.
 */
class Frontier {
  private readonly heap: Array<{ node: string; distance: number; sequence: number }> = [];
  private inserted = 0;

  push(node: string, distance: number): void {
    this.heap.push({ node, distance, sequence: this.inserted++ });
    let child = this.heap.length - 1;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.before(child, parent)) {
        return;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  pop(): { node: string; distance: number } | undefined {
    const top = this.heap[0];
    const tail = this.heap.pop();
    if (top === undefined || tail === undefined || this.heap.length === 0) {
      return top;
    }
    this.heap[0] = tail;
    let parent = 0;
    for (;;) {
      let next = parent;
      for (const child of [2 * parent + 1, 2 * parent + 2]) {
        if (child < this.heap.length && this.before(child, next)) {
          next = child;
        }
      }
      if (next === parent) {
        return top;
      }
      this.swap(parent, next);
      parent = next;
    }
  }

  private before(a: number, b: number): boolean {
    const left = this.heap[a];
    const right = this.heap[b];
    return left.distance < right.distance || (left.distance === right.distance && left.sequence < right.sequence);
  }

  private swap(a: number, b: number): void {
    const held = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = held;
  }
}

/**
 * Dijkstra search from {@link source} to {@link target}. Edges without the
 * {@link weight} attribute cost 1. An unreachable target yields an infinite
 * distance and an empty path.
 */
export function shortestPath(
  G: GraphModel,
  source: string,
  target: string,
  weight = "weight",
): ShortestPathResult {
  for (const endpoint of [source, target]) {
    if (!G.hasNode(endpoint)) {
      throw new UnknownNodeError(G.name, endpoint);
    }
  }

  const distances = new Map<string, number>([[source, 0]]);
  const previous = new Map<string, string>();
  const settled = new Set<string>();
  const frontier = new Frontier();
  frontier.push(source, 0);

  for (let current = frontier.pop(); current; current = frontier.pop()) {
    if (settled.has(current.node)) {
      continue;
    }
    settled.add(current.node);
    if (current.node === target) {
      break;
    }
    for (const { neighbor, edge } of G.neighbors(current.node)) {
      const tentative = current.distance + edgeCost(edge, weight);
      if (tentative < (distances.get(neighbor) ?? Number.POSITIVE_INFINITY)) {
        distances.set(neighbor, tentative);
        previous.set(neighbor, current.node);
        frontier.push(neighbor, tentative);
      }
    }
  }

  const distance = distances.get(target);
  if (distance === undefined) {
    return { distance: Number.POSITIVE_INFINITY, path: [] };
  }
  const path = [target];
  for (let step = previous.get(target); step !== undefined; step = previous.get(step)) {
    path.unshift(step);
  }
  return { distance, path };
}

function edgeCost(edge: GraphEdgeData, weight: string): number {
  const value = edge.attributes[weight];
  if (value === undefined || value === null) {
    return 1;
  }
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
    return value;
  }
  throw new InvalidWeightError(edge.from, edge.to, value);
}
