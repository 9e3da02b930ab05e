import { GraphTypeError } from "../errors.js";
import type { GraphModel } from "../model.js";

export type StronglyConnectedComponent = string[];

/**
 * Tarjan's algorithm. Components are emitted in reverse topological order of
 * the condensation; members of a component in the order they leave the stack.
 */
export function stronglyConnectedComponents(G: GraphModel): StronglyConnectedComponent[] {
  if (!G.directed) {
    throw new GraphTypeError(
      "stronglyConnectedComponents",
      false,
      "strongly connected components are only defined for directed graphs",
    );
  }

  let index = 0;
  const stack: string[] = [];
  const onStack = new Set<string>();
  const indices = new Map<string, number>();
  const components: StronglyConnectedComponent[] = [];

  const visit = (nodeId: string): number => {
    const nodeIndex = index;
    let lowlink = index;
    indices.set(nodeId, nodeIndex);
    index++;
    stack.push(nodeId);
    onStack.add(nodeId);

    for (const { neighbor } of G.neighbors(nodeId)) {
      const neighborIndex = indices.get(neighbor);
      if (neighborIndex === undefined) {
        lowlink = Math.min(lowlink, visit(neighbor));
      } else if (onStack.has(neighbor)) {
        lowlink = Math.min(lowlink, neighborIndex);
      }
    }

    if (lowlink === nodeIndex) {
      const component: string[] = [];
      for (let candidate = stack.pop(); candidate !== undefined; candidate = stack.pop()) {
        onStack.delete(candidate);
        component.push(candidate);
        if (candidate === nodeId) {
          break;
        }
      }
      components.push(component);
    }
    return lowlink;
  };

  for (const node of G.listNodes()) {
    if (!indices.has(node.id)) {
      visit(node.id);
    }
  }
  return components;
}
