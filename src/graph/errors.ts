/** Base error used by the native graph model and algorithms. */
export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphError";
  }
}

/** Error thrown when an algorithm references a node absent from the graph. */
export class UnknownNodeError extends GraphError {
  public readonly code = "E-GRAPH-NODE";
  public readonly hint = "add the node before using it as an endpoint";
  public readonly details: { graph: string; node: string };

  constructor(graph: string, node: string) {
    super(`node '${node}' is not in graph '${graph}'`);
    this.name = "UnknownNodeError";
    this.details = { graph, node };
  }
}

/** Error thrown when an algorithm cannot run on the given kind of graph. */
export class GraphTypeError extends GraphError {
  public readonly code = "E-GRAPH-TYPE";
  public readonly hint = "check whether the algorithm expects a directed graph";
  public readonly details: { algorithm: string; directed: boolean };

  constructor(algorithm: string, directed: boolean, message: string) {
    super(message);
    this.name = "GraphTypeError";
    this.details = { algorithm, directed };
  }
}

/** Error thrown when an edge weight cannot be used as a traversal cost. */
export class InvalidWeightError extends GraphError {
  public readonly code = "E-GRAPH-WEIGHT";
  public readonly hint = "edge weights must be non-negative finite numbers";
  public readonly details: { from: string; to: string; value: unknown };

  constructor(from: string, to: string, value: unknown) {
    super(`edge ${from} -> ${to} has an invalid weight '${String(value)}'`);
    this.name = "InvalidWeightError";
    this.details = { from, to, value };
  }
}
