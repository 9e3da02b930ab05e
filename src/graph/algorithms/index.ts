import type { DispatchContext } from "../../dispatch/context.js";
import { dispatchable, type DispatchableAlgorithm } from "../../dispatch/dispatchable.js";
import type { GraphModel } from "../model.js";
import { degreeCentrality } from "./centrality.js";
import { stronglyConnectedComponents, type StronglyConnectedComponent } from "./components.js";
import { edgeOverlap, intersection } from "./operators.js";
import { shortestPath, type ShortestPathResult } from "./shortestPath.js";

export { degreeCentrality } from "./centrality.js";
export { stronglyConnectedComponents, type StronglyConnectedComponent } from "./components.js";
export { edgeOverlap, intersection } from "./operators.js";
export { shortestPath, type ShortestPathResult } from "./shortestPath.js";

/** Dispatch wrappers of the native algorithms, bound to one context. */
export interface GraphAlgorithms {
  readonly shortestPath: DispatchableAlgorithm<
    [G: GraphModel, source: string, target: string, weight?: string],
    ShortestPathResult
  >;
  readonly stronglyConnectedComponents: DispatchableAlgorithm<[G: GraphModel], StronglyConnectedComponent[]>;
  readonly degreeCentrality: DispatchableAlgorithm<[G: GraphModel], Record<string, number>>;
  readonly intersection: DispatchableAlgorithm<[G: GraphModel, H: GraphModel], GraphModel>;
  readonly edgeOverlap: DispatchableAlgorithm<
    [G: GraphModel, H?: GraphModel | null, nbunch?: readonly string[] | null],
    Array<[string, string]>
  >;
}

/** Registers the native algorithms with {@link context}. Call once per context. */
export function registerGraphAlgorithms(context: DispatchContext): GraphAlgorithms {
  return {
    shortestPath: dispatchable(shortestPath, {
      context,
      parameters: ["G", "source", "target", { name: "weight", default: "weight" }],
      edgeAttrs: "weight",
    }),
    stronglyConnectedComponents: dispatchable(stronglyConnectedComponents, { context }),
    degreeCentrality: dispatchable(degreeCentrality, { context }),
    intersection: dispatchable(intersection, { context, graphs: { G: 0, H: 1 } }),
    edgeOverlap: dispatchable(edgeOverlap, {
      context,
      graphs: { G: 0, "H?": 1 },
      parameters: ["G", { name: "H", default: null }, { name: "nbunch", default: null }],
    }),
  };
}
