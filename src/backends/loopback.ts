import type { DispatchContext } from "../dispatch/context.js";
import { DispatchError } from "../dispatch/errors.js";
import type { AlgorithmRegistry } from "../dispatch/registry.js";
import { BACKEND_TAG, REFERENCE_BACKEND, type BackendTagged } from "../dispatch/tags.js";
import type { AttributeDefaults, BackendAlgorithm, BackendInterface, ConversionRequest } from "../dispatch/types.js";
import { GraphModel, type Attributes } from "../graph/model.js";

/** Native graph model tagged as owned by the loopback backend. */
export class LoopbackGraph extends GraphModel implements BackendTagged {
  readonly [BACKEND_TAG] = REFERENCE_BACKEND;
}

/**
 * Reference backend: graphs are copied into {@link LoopbackGraph}s carrying
 * only the requested attributes, and every algorithm delegates to the native
 * implementation registered under the same name. Running the native
 * algorithms through it exercises the whole conversion pipeline.
 */
export class LoopbackBackend implements BackendInterface {
  constructor(private readonly registry: AlgorithmRegistry) {}

  /** Every registered algorithm, including those registered after the backend loaded. */
  get algorithms(): ReadonlyMap<string, BackendAlgorithm> {
    const algorithms = new Map<string, BackendAlgorithm>();
    for (const algorithm of this.registry.entries()) {
      algorithms.set(algorithm.dispatchName, (args, kwargs) => algorithm.callNative(args, kwargs));
    }
    return algorithms;
  }

  convertFromNative(graph: unknown, request: ConversionRequest): LoopbackGraph {
    if (!(graph instanceof GraphModel)) {
      throw new DispatchError(`${request.name}() received a graph the loopback backend cannot convert`);
    }
    return copyIntoLoopback(graph, request);
  }

  /** Loopback graphs come back as untagged native copies; other results are returned as is. */
  convertToNative(result: unknown): unknown {
    if (!(result instanceof LoopbackGraph)) {
      return result;
    }
    return new GraphModel({
      name: result.name,
      directed: result.directed,
      nodes: result.listNodes(),
      edges: result.listEdges(),
    });
  }
}

/** Copies a native graph into the loopback representation, keeping every attribute. */
export function toLoopbackGraph(graph: GraphModel): LoopbackGraph {
  return copyIntoLoopback(graph, { edgeAttrs: null, nodeAttrs: null, preserveEdgeAttrs: true, preserveNodeAttrs: true });
}

/** Registers the loopback backend with {@link context} unless already present. */
export function registerLoopbackBackend(context: DispatchContext): void {
  if (context.plugins.has(REFERENCE_BACKEND)) {
    return;
  }
  context.plugins.register(REFERENCE_BACKEND, () => new LoopbackBackend(context.registry));
}

function copyIntoLoopback(graph: GraphModel, request: Omit<ConversionRequest, "name">): LoopbackGraph {
  const copy = new LoopbackGraph({ name: graph.name, directed: graph.directed });
  for (const node of graph.listNodes()) {
    copy.addNode(node.id, selectAttributes(node.attributes, request.nodeAttrs, request.preserveNodeAttrs));
  }
  for (const edge of graph.listEdges()) {
    copy.addEdge(edge.from, edge.to, selectAttributes(edge.attributes, request.edgeAttrs, request.preserveEdgeAttrs));
  }
  return copy;
}

function selectAttributes(attributes: Attributes, wanted: AttributeDefaults | null, preserveAll: boolean): Attributes {
  if (preserveAll) {
    return { ...attributes };
  }
  const selected: Attributes = {};
  for (const [name, fallback] of Object.entries(wanted ?? {})) {
    selected[name] = Object.prototype.hasOwnProperty.call(attributes, name) ? attributes[name] : fallback;
  }
  return selected;
}
