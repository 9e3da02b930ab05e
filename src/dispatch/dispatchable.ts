import { AttributeConversion, type AttributeConversionOptions } from "./attributes.js";
import { getDefaultDispatchContext, type DispatchContext } from "./context.js";
import { convertGraphArguments } from "./conversion.js";
import {
  BackendMismatchError,
  BackendUnavailableError,
  NotImplementedByBackendError,
  RegistrationError,
} from "./errors.js";
import { runConversionHarness } from "./harness.js";
import type { InvokeOptions, RegisteredAlgorithm } from "./registry.js";
import {
  bindArguments,
  checkGraphsAgainstParameters,
  normaliseGraphs,
  normaliseParameters,
  resolveGraphArguments,
  toPositional,
  type GraphArgument,
  type GraphsSpec,
  type ParameterDescriptor,
  type ParameterSpec,
} from "./signature.js";
import { getBackendTag, NATIVE_BACKEND } from "./tags.js";
import type { BackendAlgorithm, BackendInterface, KeywordArguments } from "./types.js";

/** Parameter names taken by the dispatcher itself. */
const RESERVED_PARAMETERS: ReadonlySet<string> = new Set(["backend"]);

export interface DispatchOptions extends AttributeConversionOptions {
  /** Canonical name; defaults to the function's own name. */
  readonly name?: string;
  /** Graph parameters, `"G"` unless stated otherwise. */
  readonly graphs?: GraphsSpec;
  /** Declared parameters in positional order; defaults to the graphs ordered by position. */
  readonly parameters?: readonly ParameterSpec[];
  readonly context?: DispatchContext;
}

/** Dispatch wrapper around a native implementation. Calling it dispatches. */
export interface DispatchableAlgorithm<TArgs extends unknown[], TResult> extends RegisteredAlgorithm {
  (...args: TArgs): TResult;
  readonly originalFunction: (...args: TArgs) => TResult;
  readonly graphs: readonly GraphArgument[];
}

/** Outcome of routing: run the native function, or a value already computed by a backend. */
type Route = { readonly kind: "native" } | { readonly kind: "backend"; readonly value: unknown };

const NATIVE_ROUTE: Route = { kind: "native" };

/**
 * Wraps {@link fn} in a dispatch wrapper and registers it. The wrapper decides
 * per call whether the native implementation or a backend runs.
 */
export function dispatchable<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => TResult,
  options: DispatchOptions = {},
): DispatchableAlgorithm<TArgs, TResult> {
  const context = options.context ?? getDefaultDispatchContext();
  const name = options.name ?? fn.name;
  if (name.length === 0) {
    throw new RegistrationError(name, "dispatchable functions need a name; pass `name` for anonymous functions");
  }
  const graphs = normaliseGraphs(name, options.graphs ?? "G");
  const parameters = normaliseParameters(
    name,
    options.parameters ?? [...graphs].sort((left, right) => left.position - right.position).map((graph) => graph.name),
  );
  const reserved = parameters.find((parameter) => RESERVED_PARAMETERS.has(parameter.name));
  if (reserved) {
    throw new RegistrationError(name, `${name}() may not declare the reserved parameter '${reserved.name}'`);
  }
  checkGraphsAgainstParameters(name, graphs, parameters);
  const conversion = new AttributeConversion(name, options, parameters);
  const router = new DispatchRouter(name, graphs, parameters, conversion, context);

  const runNative = (args: readonly unknown[], kwargs: KeywordArguments): unknown => {
    if (Object.keys(kwargs).length === 0) {
      return Reflect.apply(fn, undefined, args);
    }
    return Reflect.apply(fn, undefined, toPositional(parameters, bindArguments(name, parameters, args, kwargs)));
  };

  const call = (...args: TArgs): TResult => {
    const route = router.route(args, {}, {});
    if (route.kind === "native") {
      return fn(...args);
    }
    // Backends are trusted to honour the native result type, as plugins loaded at run time.
    return route.value as TResult;
  };

  const wrapper: DispatchableAlgorithm<TArgs, TResult> = Object.assign(call, {
    dispatchName: name,
    parameters,
    graphs,
    originalFunction: fn,
    invoke(args: readonly unknown[], kwargs: KeywordArguments = {}, invokeOptions: InvokeOptions = {}): unknown {
      const route = router.route(args, kwargs, invokeOptions);
      return route.kind === "native" ? runNative(args, kwargs) : route.value;
    },
    callNative(args: readonly unknown[], kwargs: KeywordArguments = {}): unknown {
      return runNative(args, kwargs);
    },
  });
  context.registry.register(wrapper);
  return wrapper;
}

/** Per-algorithm routing logic shared by the direct call and {@link RegisteredAlgorithm.invoke}. */
class DispatchRouter {
  constructor(
    private readonly name: string,
    private readonly graphs: readonly GraphArgument[],
    private readonly parameters: readonly ParameterDescriptor[],
    private readonly conversion: AttributeConversion,
    private readonly context: DispatchContext,
  ) {}

  route(args: readonly unknown[], kwargs: KeywordArguments, options: InvokeOptions): Route {
    const config = this.context.config;
    const testBackend = config.get("testBackend");
    if (testBackend !== null) {
      const value = runConversionHarness(
        {
          name: this.name,
          graphs: this.graphs,
          parameters: this.parameters,
          conversion: this.conversion,
          context: this.context,
        },
        testBackend,
        args,
        kwargs,
      );
      return { kind: "backend", value };
    }

    const resolved = resolveGraphArguments(this.name, this.graphs, args, kwargs);
    const tags = new Set<string>();
    for (const graph of resolved.values()) {
      const tag = getBackendTag(graph);
      if (tag !== NATIVE_BACKEND) {
        tags.add(tag);
      }
    }
    const foreign = [...tags].sort();
    if (foreign.length > 1) {
      throw new BackendMismatchError(
        this.name,
        foreign,
        `${this.name}() graphs must all be from the same backend, found ${foreign.map((tag) => `'${tag}'`).join(", ")}`,
      );
    }
    const tag = foreign.length === 1 ? foreign[0] : null;

    const requested = options.backend ?? config.get("backend");
    if (requested !== null) {
      return this.routeToRequested(requested, tag, args, kwargs);
    }
    if (tag !== null) {
      const implementation = this.requireImplementation(tag, this.context.plugins.load(tag));
      this.context.logger.debug("dispatch_forward", { algorithm: this.name, backend: tag });
      return { kind: "backend", value: implementation(args, kwargs) };
    }
    const prioritised = this.routeByPriority(args, kwargs);
    if (prioritised) {
      return prioritised;
    }
    this.context.logger.debug("dispatch_native", { algorithm: this.name });
    return NATIVE_ROUTE;
  }

  private routeToRequested(
    requested: string,
    tag: string | null,
    args: readonly unknown[],
    kwargs: KeywordArguments,
  ): Route {
    if (requested === NATIVE_BACKEND) {
      if (tag !== null) {
        throw new BackendMismatchError(
          this.name,
          [tag],
          `${this.name}() was asked to run natively but received graphs from the '${tag}' backend`,
        );
      }
      this.context.logger.debug("dispatch_native", { algorithm: this.name, requested });
      return NATIVE_ROUTE;
    }
    const backend = this.context.plugins.load(requested);
    const implementation = this.requireImplementation(requested, backend);
    if (tag !== null && tag !== requested) {
      throw new BackendMismatchError(
        this.name,
        [requested, tag],
        `${this.name}() was asked to run on '${requested}' but received graphs from the '${tag}' backend`,
      );
    }
    if (tag !== null) {
      this.context.logger.debug("dispatch_forward", { algorithm: this.name, backend: requested, requested });
      return { kind: "backend", value: implementation(args, kwargs) };
    }
    return { kind: "backend", value: this.convertAndCall(requested, backend, implementation, args, kwargs) };
  }

  private routeByPriority(args: readonly unknown[], kwargs: KeywordArguments): Route | null {
    const priority = this.context.config.get("backendPriority").priorityFor(this.name);
    for (const candidate of priority) {
      let backend: BackendInterface;
      try {
        backend = this.context.plugins.load(candidate);
      } catch (error) {
        if (!(error instanceof BackendUnavailableError)) {
          throw error;
        }
        this.context.logger.warn("dispatch_backend_skipped", {
          algorithm: this.name,
          backend: candidate,
          reason: error.message,
        });
        continue;
      }
      const implementation = backend.algorithms.get(this.name);
      if (!implementation) {
        continue;
      }
      return { kind: "backend", value: this.convertAndCall(candidate, backend, implementation, args, kwargs) };
    }
    return null;
  }

  private convertAndCall(
    backendName: string,
    backend: BackendInterface,
    implementation: BackendAlgorithm,
    args: readonly unknown[],
    kwargs: KeywordArguments,
  ): unknown {
    const config = this.context.config;
    const bound = bindArguments(this.name, this.parameters, args, kwargs);
    const converted = convertGraphArguments({
      algorithm: this.name,
      backendName,
      backend,
      graphs: this.graphs,
      bound,
      conversion: this.conversion.resolve(bound),
      useCache: config.get("cacheConvertedGraphs"),
      warnOnCacheHit: config.get("warnings").has("cache"),
      logger: this.context.logger,
    });
    this.context.logger.debug("dispatch_convert", { algorithm: this.name, backend: backendName });
    return implementation([], converted);
  }

  private requireImplementation(backendName: string, backend: BackendInterface): BackendAlgorithm {
    const implementation = backend.algorithms.get(this.name);
    if (!implementation) {
      throw new NotImplementedByBackendError(this.name, backendName);
    }
    return implementation;
  }
}
