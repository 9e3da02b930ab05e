import { GraphTypeError } from "../errors.js";
import { GraphModel } from "../model.js";

/**
 * Graph holding the nodes present in both {@link G} and {@link H} and the
 * edges present in both. Attributes are not carried over.
 */
export function intersection(G: GraphModel, H: GraphModel): GraphModel {
  if (G.directed !== H.directed) {
    throw new GraphTypeError("intersection", G.directed, "graphs must be both directed or both undirected");
  }
  const result = new GraphModel({ name: `${G.name}&${H.name}`, directed: G.directed });
  for (const node of G.listNodes()) {
    if (H.hasNode(node.id)) {
      result.addNode(node.id);
    }
  }
  for (const edge of G.listEdges()) {
    if (H.hasEdge(edge.from, edge.to)) {
      result.addEdge(edge.from, edge.to);
    }
  }
  return result;
}

/**
 * Edges of {@link G}, kept only when also present in {@link H} (if given) and
 * when both endpoints belong to {@link nbunch} (if given).
 */
export function edgeOverlap(
  G: GraphModel,
  H: GraphModel | null = null,
  nbunch: readonly string[] | null = null,
): Array<[string, string]> {
  const members = nbunch ? new Set(nbunch) : null;
  return G.listEdges()
    .filter((edge) => (H ? H.hasEdge(edge.from, edge.to) : true))
    .filter((edge) => (members ? members.has(edge.from) && members.has(edge.to) : true))
    .map((edge): [string, string] => [edge.from, edge.to]);
}
