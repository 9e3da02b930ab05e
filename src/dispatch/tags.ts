/** Name under which the native implementations are reported. */
export const NATIVE_BACKEND = "native";

/** Canonical reference backend; harness mode never tolerates its gaps. */
export const REFERENCE_BACKEND = "loopback";

/**
 * Property key carried by graph objects that belong to a backend. Using a
 * registered symbol keeps the capability out of the graphs' ordinary keys.
 */
export const BACKEND_TAG: unique symbol = Symbol.for("graph-dispatch.backend");

/** Capability of a graph owned by a backend representation. */
export interface BackendTagged {
  readonly [BACKEND_TAG]: string;
}

/** Capability of a graph able to keep the conversions made from it. */
export interface ConversionCacheCarrier {
  readonly conversionCache: Map<string, unknown>;
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

export function isBackendTagged(value: unknown): value is BackendTagged {
  return isObjectLike(value) && BACKEND_TAG in value && typeof value[BACKEND_TAG] === "string";
}

/** Backend owning {@link graph}; untagged graphs are native. */
export function getBackendTag(graph: unknown): string {
  return isBackendTagged(graph) ? graph[BACKEND_TAG] : NATIVE_BACKEND;
}

export function hasConversionCache(value: unknown): value is ConversionCacheCarrier {
  return isObjectLike(value) && "conversionCache" in value && value.conversionCache instanceof Map;
}

/** Attaches a backend tag to an existing object and returns it with the capability typed. */
export function tagGraph<T extends object>(graph: T, backend: string): T & BackendTagged {
  return Object.assign(graph, { [BACKEND_TAG]: backend });
}
