import { ArgumentResolutionError, RegistrationError } from "./errors.js";
import type { KeywordArguments } from "./types.js";

/** Suffix marking a graph parameter as optional in a graphs spec. */
export const OPTIONAL_GRAPH_MARKER = "?";

/**
 * Declared parameter of an algorithm: either a bare (required) name or a name
 * with a default value applied when the caller omits it.
 */
export type ParameterSpec = string | { readonly name: string; readonly default: unknown };

export interface ParameterDescriptor {
  readonly name: string;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
}

/**
 * Which parameters are graphs: a single name (position 0) or a map of name to
 * position. Names ending with {@link OPTIONAL_GRAPH_MARKER} are optional.
 */
export type GraphsSpec = string | Readonly<Record<string, number>>;

export interface GraphArgument {
  readonly name: string;
  readonly position: number;
  readonly optional: boolean;
}

/** Name → value map produced by {@link bindArguments}, in declaration order. */
export type BoundArguments = Record<string, unknown>;

export function normaliseParameters(algorithm: string, specs: readonly ParameterSpec[]): ParameterDescriptor[] {
  const seen = new Set<string>();
  return specs.map((spec) => {
    const descriptor: ParameterDescriptor =
      typeof spec === "string"
        ? { name: spec, hasDefault: false, defaultValue: undefined }
        : { name: spec.name, hasDefault: true, defaultValue: spec.default };
    if (descriptor.name.length === 0) {
      throw new RegistrationError(algorithm, `${algorithm}() declares a parameter without a name`);
    }
    if (seen.has(descriptor.name)) {
      throw new RegistrationError(algorithm, `${algorithm}() declares parameter '${descriptor.name}' twice`);
    }
    seen.add(descriptor.name);
    return descriptor;
  });
}

/** Expands a graphs spec, stripping the optional marker from the names. */
export function normaliseGraphs(algorithm: string, graphs: GraphsSpec): GraphArgument[] {
  const entries: Array<[string, number]> = typeof graphs === "string" ? [[graphs, 0]] : Object.entries(graphs);
  if (entries.length === 0) {
    throw new RegistrationError(algorithm, "'graphs' must contain at least one variable name");
  }
  return entries.map(([rawName, position]) => {
    const optional = rawName.endsWith(OPTIONAL_GRAPH_MARKER);
    const name = optional ? rawName.slice(0, -OPTIONAL_GRAPH_MARKER.length) : rawName;
    if (name.length === 0) {
      throw new RegistrationError(algorithm, `Invalid graph name: '${rawName}'`);
    }
    if (!Number.isInteger(position) || position < 0) {
      throw new RegistrationError(algorithm, `Invalid position ${position} for graph '${name}'`);
    }
    return { name, position, optional };
  });
}

/** Ensures every graph is a declared parameter sitting at the declared position. */
export function checkGraphsAgainstParameters(
  algorithm: string,
  graphs: readonly GraphArgument[],
  parameters: readonly ParameterDescriptor[],
): void {
  const missing = graphs.filter((graph) => !parameters.some((parameter) => parameter.name === graph.name));
  if (missing.length > 0) {
    const names = missing.map((graph) => `'${graph.name}'`).join(", ");
    throw new RegistrationError(algorithm, `Invalid graph names: ${names}`);
  }
  for (const graph of graphs) {
    const index = parameters.findIndex((parameter) => parameter.name === graph.name);
    if (index !== graph.position) {
      throw new RegistrationError(
        algorithm,
        `Graph '${graph.name}' is declared at position ${graph.position} but is parameter ${index}`,
      );
    }
  }
}

/**
 * Picks the value of every graph argument. Optional graphs that are absent or
 * nullish are left out of the result.
 */
export function resolveGraphArguments(
  algorithm: string,
  graphs: readonly GraphArgument[],
  args: readonly unknown[],
  kwargs: KeywordArguments,
): Map<string, unknown> {
  const resolved = new Map<string, unknown>();
  for (const graph of graphs) {
    let value: unknown;
    if (graph.position < args.length) {
      if (hasKeyword(kwargs, graph.name)) {
        throw new ArgumentResolutionError(algorithm, graph.name, `${algorithm}() got multiple values for '${graph.name}'`);
      }
      value = args[graph.position];
    } else if (hasKeyword(kwargs, graph.name)) {
      value = kwargs[graph.name];
    } else if (!graph.optional) {
      throw new ArgumentResolutionError(
        algorithm,
        graph.name,
        `${algorithm}() missing required graph argument: ${graph.name}`,
      );
    } else {
      continue;
    }
    if (value === null || value === undefined) {
      if (!graph.optional) {
        throw new ArgumentResolutionError(
          algorithm,
          graph.name,
          `${algorithm}() required graph argument '${graph.name}' is null or undefined; must be a graph`,
        );
      }
      continue;
    }
    resolved.set(graph.name, value);
  }
  return resolved;
}

/**
 * Binds a call against the declared parameters and applies the defaults,
 * producing a value for every parameter.
 */
export function bindArguments(
  algorithm: string,
  parameters: readonly ParameterDescriptor[],
  args: readonly unknown[],
  kwargs: KeywordArguments,
): BoundArguments {
  if (args.length > parameters.length) {
    throw new ArgumentResolutionError(
      algorithm,
      null,
      `${algorithm}() takes ${parameters.length} positional arguments but ${args.length} were given`,
    );
  }
  const unexpected = Object.keys(kwargs).filter((key) => !parameters.some((parameter) => parameter.name === key));
  if (unexpected.length > 0) {
    throw new ArgumentResolutionError(
      algorithm,
      unexpected[0],
      `${algorithm}() got an unexpected keyword argument '${unexpected[0]}'`,
    );
  }

  const bound: BoundArguments = {};
  parameters.forEach((parameter, index) => {
    if (index < args.length) {
      if (hasKeyword(kwargs, parameter.name)) {
        throw new ArgumentResolutionError(
          algorithm,
          parameter.name,
          `${algorithm}() got multiple values for '${parameter.name}'`,
        );
      }
      bound[parameter.name] = withDefault(parameter, args[index]);
    } else if (hasKeyword(kwargs, parameter.name)) {
      bound[parameter.name] = withDefault(parameter, kwargs[parameter.name]);
    } else if (parameter.hasDefault) {
      bound[parameter.name] = parameter.defaultValue;
    } else {
      throw new ArgumentResolutionError(
        algorithm,
        parameter.name,
        `${algorithm}() missing required argument: '${parameter.name}'`,
      );
    }
  });
  return bound;
}

/** Positional argument list matching {@link bound}, in declaration order. */
export function toPositional(parameters: readonly ParameterDescriptor[], bound: BoundArguments): unknown[] {
  return parameters.map((parameter) => bound[parameter.name]);
}

/** `undefined` takes the declared default, as a default parameter would. */
function withDefault(parameter: ParameterDescriptor, value: unknown): unknown {
  return value === undefined && parameter.hasDefault ? parameter.defaultValue : value;
}

function hasKeyword(kwargs: KeywordArguments, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(kwargs, name);
}
