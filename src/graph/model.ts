import type { ConversionCacheCarrier } from "../dispatch/tags.js";

/** Free-form attributes attached to a node or an edge. */
export type Attributes = Record<string, unknown>;

export interface GraphNodeData {
  readonly id: string;
  readonly attributes: Attributes;
}

export interface GraphEdgeData {
  readonly from: string;
  readonly to: string;
  readonly attributes: Attributes;
}

/** Edge reached from a node, with the node found at the other end. */
export interface Adjacency {
  readonly neighbor: string;
  readonly edge: GraphEdgeData;
}

export interface GraphModelInit {
  readonly name?: string;
  readonly directed?: boolean;
  readonly nodes?: ReadonlyArray<string | { readonly id: string; readonly attributes?: Attributes }>;
  readonly edges?: ReadonlyArray<{ readonly from: string; readonly to: string; readonly attributes?: Attributes }>;
}

/**
 * Native in-memory graph: simple (at most one edge per node pair), directed or
 * undirected, with attributes on nodes and edges. Nodes and edges keep their
 * insertion order.
 *
 * Conversions made by the dispatcher may be kept in {@link conversionCache}.
 * {@link addNode} and {@link addEdge} clear it; attributes edited in place on
 * returned node or edge data do not, call {@link clearConversionCache} then.
 */
export class GraphModel implements ConversionCacheCarrier {
  readonly name: string;
  readonly directed: boolean;
  readonly conversionCache = new Map<string, unknown>();
  private readonly nodes = new Map<string, GraphNodeData>();
  private readonly edges = new Map<string, GraphEdgeData>();
  private readonly outgoing = new Map<string, Adjacency[]>();
  private readonly incoming = new Map<string, Adjacency[]>();

  constructor(init: GraphModelInit = {}) {
    this.name = init.name ?? "graph";
    this.directed = init.directed ?? false;
    for (const node of init.nodes ?? []) {
      if (typeof node === "string") {
        this.addNode(node);
      } else {
        this.addNode(node.id, node.attributes);
      }
    }
    for (const edge of init.edges ?? []) {
      this.addEdge(edge.from, edge.to, edge.attributes);
    }
  }

  /** Adds a node, or merges {@link attributes} into the existing one. */
  addNode(id: string, attributes: Attributes = {}): GraphNodeData {
    this.clearConversionCache();
    const existing = this.nodes.get(id);
    if (existing) {
      Object.assign(existing.attributes, attributes);
      return existing;
    }
    const node: GraphNodeData = { id, attributes: { ...attributes } };
    this.nodes.set(id, node);
    this.outgoing.set(id, []);
    this.incoming.set(id, []);
    return node;
  }

  /** Adds an edge (and its missing endpoints), or merges attributes into the existing edge. */
  addEdge(from: string, to: string, attributes: Attributes = {}): GraphEdgeData {
    this.clearConversionCache();
    const existing = this.getEdge(from, to);
    if (existing) {
      Object.assign(existing.attributes, attributes);
      return existing;
    }
    this.addNode(from);
    this.addNode(to);
    const edge: GraphEdgeData = { from, to, attributes: { ...attributes } };
    this.edges.set(this.edgeKey(from, to), edge);
    this.adjacencyOf(this.outgoing, from).push({ neighbor: to, edge });
    if (this.directed) {
      this.adjacencyOf(this.incoming, to).push({ neighbor: from, edge });
    } else if (from !== to) {
      this.adjacencyOf(this.outgoing, to).push({ neighbor: from, edge });
    }
    return edge;
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): GraphNodeData | undefined {
    return this.nodes.get(id);
  }

  hasEdge(from: string, to: string): boolean {
    return this.getEdge(from, to) !== undefined;
  }

  /** Edge between the two nodes; orientation is ignored on undirected graphs. */
  getEdge(from: string, to: string): GraphEdgeData | undefined {
    return this.edges.get(this.edgeKey(from, to)) ?? (this.directed ? undefined : this.edges.get(this.edgeKey(to, from)));
  }

  /** Successors on a directed graph, neighbours on an undirected one. */
  neighbors(id: string): readonly Adjacency[] {
    return this.outgoing.get(id) ?? [];
  }

  /** Number of edge endpoints at {@link id}; a self-loop counts twice. */
  degree(id: string): number {
    const outgoing = this.outgoing.get(id) ?? [];
    const selfLoops = outgoing.filter((entry) => entry.neighbor === id).length;
    if (this.directed) {
      return outgoing.length + (this.incoming.get(id) ?? []).length;
    }
    return outgoing.length + selfLoops;
  }

  listNodes(): GraphNodeData[] {
    return Array.from(this.nodes.values());
  }

  listEdges(): GraphEdgeData[] {
    return Array.from(this.edges.values());
  }

  get order(): number {
    return this.nodes.size;
  }

  get size(): number {
    return this.edges.size;
  }

  clearConversionCache(): void {
    this.conversionCache.clear();
  }

  private edgeKey(from: string, to: string): string {
    return JSON.stringify([from, to]);
  }

  private adjacencyOf(table: Map<string, Adjacency[]>, id: string): Adjacency[] {
    let list = table.get(id);
    if (!list) {
      list = [];
      table.set(id, list);
    }
    return list;
  }
}
