/**
 * Conversion harness: while a test backend is configured, every dispatched
 * call is converted into that backend, run there and converted back. Replaying
 * the native test-suite this way checks that a backend behaves like the native
 * implementations without writing backend-specific tests.
 */
import type { AttributeConversion } from "./attributes.js";
import type { DispatchContext } from "./context.js";
import { convertGraphArguments } from "./conversion.js";
import { NotImplementedByBackendError } from "./errors.js";
import { bindArguments, type GraphArgument, type ParameterDescriptor } from "./signature.js";
import { REFERENCE_BACKEND } from "./tags.js";
import type { KeywordArguments, TestCaseHandle } from "./types.js";

/** What the harness needs to know about the algorithm being called. */
export interface HarnessTarget {
  readonly name: string;
  readonly graphs: readonly GraphArgument[];
  readonly parameters: readonly ParameterDescriptor[];
  readonly conversion: AttributeConversion;
  readonly context: DispatchContext;
}

/**
 * Runs one call through {@link backendName}. A missing implementation is a hard
 * failure for the reference backend and an expected failure for any other one.
 */
export function runConversionHarness(
  target: HarnessTarget,
  backendName: string,
  args: readonly unknown[],
  kwargs: KeywordArguments,
): unknown {
  const bound = bindArguments(target.name, target.parameters, args, kwargs);
  const backend = target.context.plugins.load(backendName);
  const implementation = backend.algorithms.get(target.name);
  if (!implementation) {
    throw new NotImplementedByBackendError(target.name, backendName, {
      expected: backendName !== REFERENCE_BACKEND,
    });
  }

  const conversion = target.conversion.resolve(bound);
  target.context.logger.debug("dispatch_harness", {
    algorithm: target.name,
    backend: backendName,
    edge_attrs: conversion.edgeAttrs,
    node_attrs: conversion.nodeAttrs,
  });
  const converted = convertGraphArguments({
    algorithm: target.name,
    backendName,
    backend,
    graphs: target.graphs,
    bound,
    conversion,
    useCache: false,
    warnOnCacheHit: false,
    logger: target.context.logger,
  });
  const result = implementation([], converted);
  return backend.convertToNative(result, { name: target.name });
}

/**
 * Hands the discovered test cases to the test backend so it can flag the ones
 * it is known to fail. Does nothing outside harness mode.
 */
export function markTests(cases: readonly TestCaseHandle[], context: DispatchContext): void {
  const backendName = context.config.get("testBackend");
  if (backendName === null) {
    return;
  }
  const backend = context.plugins.load(backendName);
  backend.onStartTests?.(cases);
}
