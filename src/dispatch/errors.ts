/** Base error used by the dispatch layer. */
export class DispatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DispatchError";
  }
}

/** Error thrown when an algorithm or backend cannot be registered. */
export class RegistrationError extends DispatchError {
  public readonly code = "E-DISPATCH-REGISTRATION";
  public readonly hint = "pick a unique name and declare every graph as a parameter";
  public readonly details: { name: string };

  constructor(name: string, message: string) {
    super(message);
    this.name = "RegistrationError";
    this.details = { name };
  }
}

/** Error thrown when the arguments of a call cannot be matched to the declared parameters. */
export class ArgumentResolutionError extends DispatchError {
  public readonly code = "E-DISPATCH-ARGUMENTS";
  public readonly hint = "pass every required graph once, positionally or by keyword";
  public readonly details: { algorithm: string; argument: string | null };

  constructor(algorithm: string, argument: string | null, message: string) {
    super(message);
    this.name = "ArgumentResolutionError";
    this.details = { algorithm, argument };
  }
}

/** Error thrown when the graphs of one call belong to different backends. */
export class BackendMismatchError extends DispatchError {
  public readonly code = "E-DISPATCH-MISMATCH";
  public readonly hint = "convert every graph argument to the same backend first";
  public readonly details: { algorithm: string; backends: string[] };

  constructor(algorithm: string, backends: readonly string[], message: string) {
    super(message);
    this.name = "BackendMismatchError";
    this.details = { algorithm, backends: [...backends] };
  }
}

/** Error thrown when a backend is not registered or its loader failed. */
export class BackendUnavailableError extends DispatchError {
  public readonly code = "E-DISPATCH-UNAVAILABLE";
  public readonly hint = "register the backend before dispatching to it";
  public readonly details: { backend: string };

  constructor(backend: string, options?: { cause?: unknown }) {
    super(`'${backend}' backend is not installed`, options);
    this.name = "BackendUnavailableError";
    this.details = { backend };
  }
}

/**
 * Error thrown when a backend does not implement an algorithm. In conversion
 * harness mode the error is flagged as `expected` for every backend except the
 * reference one, so test runners can report the case as a known gap instead
 * of a failure.
 */
export class NotImplementedByBackendError extends DispatchError {
  public readonly code = "E-DISPATCH-NOT-IMPLEMENTED";
  public readonly hint = "implement the algorithm in the backend or run it natively";
  public readonly details: { algorithm: string; backend: string };
  public readonly expected: boolean;

  constructor(algorithm: string, backend: string, options: { expected?: boolean } = {}) {
    super(`'${algorithm}' not implemented by ${backend}`);
    this.name = "NotImplementedByBackendError";
    this.details = { algorithm, backend };
    this.expected = options.expected ?? false;
  }
}

/** Error thrown when an algorithm name is not registered. */
export class AlgorithmNotFoundError extends DispatchError {
  public readonly code = "E-DISPATCH-NOT-FOUND";
  public readonly hint = "list the registered algorithms to find the canonical name";
  public readonly details: { algorithm: string };

  constructor(algorithm: string) {
    super(`algorithm '${algorithm}' is not registered`);
    this.name = "AlgorithmNotFoundError";
    this.details = { algorithm };
  }
}

/** Whether {@link error} is a soft "known gap" signal raised in conversion harness mode. */
export function isExpectedFailure(error: unknown): error is NotImplementedByBackendError {
  return error instanceof NotImplementedByBackendError && error.expected;
}
