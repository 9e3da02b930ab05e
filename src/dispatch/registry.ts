import { AlgorithmNotFoundError, RegistrationError } from "./errors.js";
import type { ParameterDescriptor } from "./signature.js";
import type { KeywordArguments } from "./types.js";

/** Per-call knobs accepted by {@link RegisteredAlgorithm.invoke}. */
export interface InvokeOptions {
  /** Explicit backend request; `"native"` forces the native implementation. */
  readonly backend?: string;
}

/** Untyped view of a dispatch wrapper, as stored in the registry. */
export interface RegisteredAlgorithm {
  /** Canonical name under which the wrapper is registered. */
  readonly dispatchName: string;
  readonly parameters: readonly ParameterDescriptor[];
  /** Dispatches a call made with positional and keyword arguments. */
  invoke(args: readonly unknown[], kwargs?: KeywordArguments, options?: InvokeOptions): unknown;
  /** Runs the native implementation, binding keywords to positions. */
  callNative(args: readonly unknown[], kwargs?: KeywordArguments): unknown;
}

/**
 * Process-wide catalogue of dispatchable algorithms. The registry is
 * append-only: names are unique for the lifetime of the process and entries are
 * never removed. Registration is expected to happen while modules initialise,
 * before concurrent use.
 */
export class AlgorithmRegistry {
  private readonly algorithms = new Map<string, RegisteredAlgorithm>();

  register(algorithm: RegisteredAlgorithm): void {
    const name = algorithm.dispatchName;
    if (this.algorithms.has(name)) {
      throw new RegistrationError(name, `Algorithm already exists in dispatch registry: ${name}`);
    }
    this.algorithms.set(name, algorithm);
  }

  lookup(name: string): RegisteredAlgorithm | undefined {
    return this.algorithms.get(name);
  }

  require(name: string): RegisteredAlgorithm {
    const algorithm = this.algorithms.get(name);
    if (!algorithm) {
      throw new AlgorithmNotFoundError(name);
    }
    return algorithm;
  }

  has(name: string): boolean {
    return this.algorithms.has(name);
  }

  names(): string[] {
    return [...this.algorithms.keys()];
  }

  entries(): RegisteredAlgorithm[] {
    return [...this.algorithms.values()];
  }

  get size(): number {
    return this.algorithms.size;
  }
}
