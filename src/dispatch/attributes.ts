import { RegistrationError } from "./errors.js";
import type { BoundArguments, ParameterDescriptor } from "./signature.js";
import type { AttributeDefaults, ConversionRequest } from "./types.js";

/**
 * Which node or edge attributes a conversion carries over.
 *
 * - `"weight"`: the parameter `weight` holds one attribute name.
 * - `"[attrs]"`: the parameter `attrs` holds a list of attribute names.
 * - `{ weight: "default" }`: each key is a parameter holding an attribute name
 *   (or the attribute name itself when no such parameter exists); each value is
 *   the default, read from the named parameter when it is a parameter name.
 */
export type AttributeSpec = string | Readonly<Record<string, unknown>>;

/** `true` to carry every attribute, or the name of a boolean parameter deciding it per call. */
export type PreserveSpec = boolean | string;

export interface AttributeConversionOptions {
  readonly edgeAttrs?: AttributeSpec;
  readonly nodeAttrs?: AttributeSpec;
  readonly preserveEdgeAttrs?: PreserveSpec;
  readonly preserveNodeAttrs?: PreserveSpec;
}

export type ResolvedAttributeConversion = Omit<ConversionRequest, "name">;

/** Default given to edge attributes missing on an edge. */
export const EDGE_ATTRIBUTE_DEFAULT = 1;
/** Default given to node attributes missing on a node. */
export const NODE_ATTRIBUTE_DEFAULT = null;

type AttributeResolver = (bound: BoundArguments) => AttributeDefaults | null;
type PreserveResolver = (bound: BoundArguments) => boolean;

/**
 * Attribute conversion compiled once at registration: every reference to a
 * parameter is checked then, and only the per-call indirection through the
 * bound argument values is left for {@link resolve}.
 */
export class AttributeConversion {
  private readonly edgeAttrs: AttributeResolver;
  private readonly nodeAttrs: AttributeResolver;
  private readonly preserveEdgeAttrs: PreserveResolver;
  private readonly preserveNodeAttrs: PreserveResolver;

  constructor(algorithm: string, options: AttributeConversionOptions, parameters: readonly ParameterDescriptor[]) {
    const names = new Set(parameters.map((parameter) => parameter.name));
    this.edgeAttrs = compileAttributeSpec(algorithm, "edgeAttrs", options.edgeAttrs, names, EDGE_ATTRIBUTE_DEFAULT);
    this.nodeAttrs = compileAttributeSpec(algorithm, "nodeAttrs", options.nodeAttrs, names, NODE_ATTRIBUTE_DEFAULT);
    this.preserveEdgeAttrs = compilePreserveSpec(algorithm, "preserveEdgeAttrs", options.preserveEdgeAttrs, names);
    this.preserveNodeAttrs = compilePreserveSpec(algorithm, "preserveNodeAttrs", options.preserveNodeAttrs, names);
  }

  /**
   * Effective conversion for one call. Preserving every attribute takes
   * precedence over a named attribute list, which is then ignored.
   */
  resolve(bound: BoundArguments): ResolvedAttributeConversion {
    const preserveEdgeAttrs = this.preserveEdgeAttrs(bound);
    const preserveNodeAttrs = this.preserveNodeAttrs(bound);
    return {
      edgeAttrs: preserveEdgeAttrs ? null : this.edgeAttrs(bound),
      nodeAttrs: preserveNodeAttrs ? null : this.nodeAttrs(bound),
      preserveEdgeAttrs,
      preserveNodeAttrs,
    };
  }
}

function compilePreserveSpec(
  algorithm: string,
  option: string,
  spec: PreserveSpec | undefined,
  parameters: ReadonlySet<string>,
): PreserveResolver {
  if (spec === undefined || typeof spec === "boolean") {
    const preserve = spec === true;
    return () => preserve;
  }
  const flagParameter = spec;
  requireParameter(algorithm, option, flagParameter, parameters);
  return (bound) => bound[flagParameter] === true;
}

function compileAttributeSpec(
  algorithm: string,
  option: string,
  spec: AttributeSpec | undefined,
  parameters: ReadonlySet<string>,
  fallback: unknown,
): AttributeResolver {
  if (spec === undefined) {
    return () => null;
  }

  if (typeof spec === "string") {
    if (spec.startsWith("[") && spec.endsWith("]")) {
      const listParameter = spec.slice(1, -1);
      requireParameter(algorithm, option, listParameter, parameters);
      return (bound) => {
        const defaults: AttributeDefaults = {};
        for (const attribute of attributeNames(bound[listParameter])) {
          defaults[attribute] = fallback;
        }
        return defaults;
      };
    }
    const nameParameter = spec;
    requireParameter(algorithm, option, nameParameter, parameters);
    return (bound) => {
      const defaults: AttributeDefaults = {};
      const attribute = bound[nameParameter];
      if (typeof attribute === "string") {
        defaults[attribute] = fallback;
      }
      return defaults;
    };
  }

  const entries = Object.entries(spec);
  return (bound) => {
    const defaults: AttributeDefaults = {};
    for (const [key, value] of entries) {
      const attribute = parameters.has(key) ? bound[key] : key;
      if (typeof attribute !== "string") {
        continue;
      }
      if (typeof value === "string") {
        // String defaults always name a parameter; unknown or unbound ones take the base default.
        const indirect = parameters.has(value) ? bound[value] : undefined;
        defaults[attribute] = indirect === undefined ? fallback : indirect;
      } else {
        defaults[attribute] = value;
      }
    }
    return defaults;
  };
}

function attributeNames(value: unknown): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string");
  }
  return [];
}

function requireParameter(algorithm: string, option: string, name: string, parameters: ReadonlySet<string>): void {
  if (!parameters.has(name)) {
    throw new RegistrationError(algorithm, `${option} of ${algorithm}() refers to unknown parameter '${name}'`);
  }
}
