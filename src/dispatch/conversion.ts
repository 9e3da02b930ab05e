import type { StructuredLogger } from "../logger.js";
import type { ResolvedAttributeConversion } from "./attributes.js";
import type { BoundArguments, GraphArgument } from "./signature.js";
import { hasConversionCache } from "./tags.js";
import type { BackendInterface, ConversionRequest } from "./types.js";

export interface GraphConversionInput {
  readonly algorithm: string;
  readonly backendName: string;
  readonly backend: BackendInterface;
  readonly graphs: readonly GraphArgument[];
  readonly bound: BoundArguments;
  readonly conversion: ResolvedAttributeConversion;
  /** Reuse and store conversions on graphs exposing a conversion cache. */
  readonly useCache: boolean;
  /** Emit a warning whenever a cached conversion is reused. */
  readonly warnOnCacheHit: boolean;
  readonly logger: StructuredLogger;
}

/**
 * Returns a copy of the bound arguments where every graph argument has been
 * converted through `backend.convertFromNative`. Nullish optional graphs are
 * passed through untouched.
 */
export function convertGraphArguments(input: GraphConversionInput): BoundArguments {
  const request: ConversionRequest = { ...input.conversion, name: input.algorithm };
  const converted: BoundArguments = { ...input.bound };
  for (const graph of input.graphs) {
    const value = input.bound[graph.name];
    if (value === null || value === undefined) {
      continue;
    }
    converted[graph.name] = convertOne(input, value, request);
  }
  return converted;
}

/** Cache key of a conversion: the backend plus every setting shaping the converted graph. */
export function conversionCacheKey(backendName: string, conversion: ResolvedAttributeConversion): string {
  const settings = [
    conversion.edgeAttrs,
    conversion.nodeAttrs,
    conversion.preserveEdgeAttrs,
    conversion.preserveNodeAttrs,
  ];
  return `${backendName}:${JSON.stringify(settings, encodeKeyValue)}`;
}

/** Keeps values JSON would drop or fold into `null` distinct in cache keys. */
function encodeKeyValue(_key: string, value: unknown): unknown {
  if (value === undefined) {
    return { $undefined: true };
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return { $number: String(value) };
  }
  if (typeof value === "bigint") {
    return { $bigint: value.toString() };
  }
  return value;
}

function convertOne(input: GraphConversionInput, graph: unknown, request: ConversionRequest): unknown {
  if (!input.useCache || !hasConversionCache(graph)) {
    return input.backend.convertFromNative(graph, request);
  }
  const key = conversionCacheKey(input.backendName, input.conversion);
  if (graph.conversionCache.has(key)) {
    if (input.warnOnCacheHit) {
      input.logger.warn("conversion_cache_hit", {
        algorithm: input.algorithm,
        backend: input.backendName,
        key,
        hint: "mutating a graph in place does not clear its conversion cache",
      });
    }
    return graph.conversionCache.get(key);
  }
  const converted = input.backend.convertFromNative(graph, request);
  graph.conversionCache.set(key, converted);
  return converted;
}
