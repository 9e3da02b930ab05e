import { registerLoopbackBackend } from "./backends/loopback.js";
import { getDefaultDispatchContext } from "./dispatch/context.js";
import { registerGraphAlgorithms, type GraphAlgorithms } from "./graph/algorithms/index.js";

export { LoopbackBackend, LoopbackGraph, registerLoopbackBackend, toLoopbackGraph } from "./backends/loopback.js";
export {
  BackendPriorities,
  createDispatchConfig,
  DispatchConfig,
  WARNING_CATEGORIES,
  type DispatchConfigValues,
  type WarningCategory,
} from "./config/dispatchConfig.js";
export { ConfigError, ConfigScopeError, ConfigValidationError } from "./config/errors.js";
export { Config, FlexibleConfig, StrictConfig, type ConfigRecord, type ConfigSchema, type ConfigScope } from "./config/store.js";
export type { AttributeConversionOptions, AttributeSpec, PreserveSpec } from "./dispatch/attributes.js";
export { DispatchContext, getDefaultDispatchContext, type DispatchContextOptions } from "./dispatch/context.js";
export { dispatchable, type DispatchableAlgorithm, type DispatchOptions } from "./dispatch/dispatchable.js";
export {
  AlgorithmNotFoundError,
  ArgumentResolutionError,
  BackendMismatchError,
  BackendUnavailableError,
  DispatchError,
  isExpectedFailure,
  NotImplementedByBackendError,
  RegistrationError,
} from "./dispatch/errors.js";
export { markTests } from "./dispatch/harness.js";
export { PluginDescriptor, PluginRegistry } from "./dispatch/plugins.js";
export { AlgorithmRegistry, type InvokeOptions, type RegisteredAlgorithm } from "./dispatch/registry.js";
export type { GraphsSpec, ParameterSpec } from "./dispatch/signature.js";
export {
  BACKEND_TAG,
  getBackendTag,
  NATIVE_BACKEND,
  REFERENCE_BACKEND,
  tagGraph,
  type BackendTagged,
  type ConversionCacheCarrier,
} from "./dispatch/tags.js";
export type {
  BackendAlgorithm,
  BackendInterface,
  BackendLoader,
  ConversionRequest,
  KeywordArguments,
  TestCaseHandle,
} from "./dispatch/types.js";
export * from "./graph/algorithms/index.js";
export { GraphError, GraphTypeError, InvalidWeightError, UnknownNodeError } from "./graph/errors.js";
export { GraphModel, type Attributes, type GraphEdgeData, type GraphModelInit, type GraphNodeData } from "./graph/model.js";
export { LOG_LEVELS, StructuredLogger, type LogEntry, type LoggerOptions, type LogLevel } from "./logger.js";

let defaultAlgorithms: GraphAlgorithms | null = null;

/**
 * Native algorithms registered with the default context, alongside the
 * loopback backend. Registration happens on first call, so backends that
 * should be visible to the environment configuration must be registered with
 * {@link getDefaultDispatchContext} before it.
 */
export function getGraphAlgorithms(): GraphAlgorithms {
  if (!defaultAlgorithms) {
    const context = getDefaultDispatchContext();
    registerLoopbackBackend(context);
    defaultAlgorithms = registerGraphAlgorithms(context);
  }
  return defaultAlgorithms;
}
