import type { GraphModel } from "../model.js";

/**
 * Degree of every node divided by the largest possible degree (`n - 1`).
 * Graphs with a single node give that node a centrality of 1.
 */
export function degreeCentrality(G: GraphModel): Record<string, number> {
  const nodes = G.listNodes();
  const centrality: Record<string, number> = {};
  if (nodes.length <= 1) {
    for (const node of nodes) {
      centrality[node.id] = 1;
    }
    return centrality;
  }
  const maxDegree = nodes.length - 1;
  for (const node of nodes) {
    centrality[node.id] = G.degree(node.id) / maxDegree;
  }
  return centrality;
}
