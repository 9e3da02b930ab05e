/** Keyword arguments of a dispatched call, keyed by declared parameter name. */
export type KeywordArguments = Readonly<Record<string, unknown>>;

/** Implementation of one algorithm inside a backend. */
export type BackendAlgorithm = (args: readonly unknown[], kwargs: KeywordArguments) => unknown;

/** Attribute name → default value used when the attribute is missing on a node or edge. */
export type AttributeDefaults = Record<string, unknown>;

/** Everything a backend needs to convert one native graph argument. */
export interface ConversionRequest {
  /** Edge attributes to carry over, `null` when none (or all, see {@link preserveEdgeAttrs}). */
  readonly edgeAttrs: AttributeDefaults | null;
  readonly nodeAttrs: AttributeDefaults | null;
  readonly preserveEdgeAttrs: boolean;
  readonly preserveNodeAttrs: boolean;
  /** Canonical name of the algorithm about to run. */
  readonly name: string;
}

/** A discovered test case, as handed to {@link BackendInterface.onStartTests}. */
export interface TestCaseHandle {
  readonly title: string;
  markExpectedFailure(reason: string): void;
}

/**
 * Contract a backend fulfils to take part in dispatch. Algorithms are looked up
 * by their canonical registered name.
 */
export interface BackendInterface {
  readonly algorithms: ReadonlyMap<string, BackendAlgorithm>;
  convertFromNative(graph: unknown, request: ConversionRequest): unknown;
  convertToNative(result: unknown, options: { readonly name: string }): unknown;
  /** Lets the backend flag test cases it is known to fail under the conversion harness. */
  onStartTests?(cases: readonly TestCaseHandle[]): void;
}

/** Deferred factory producing a backend the first time it is needed. */
export type BackendLoader = () => BackendInterface;
