import { z } from "zod";

import type { AlgorithmRegistry } from "../dispatch/registry.js";
import type { PluginRegistry } from "../dispatch/plugins.js";
import { NATIVE_BACKEND } from "../dispatch/tags.js";
import { readBool, readList, readOptionalString, type EnvSource } from "./env.js";
import { ConfigValidationError } from "./errors.js";
import { Config, FlexibleConfig, StrictConfig, type ConfigRecord, type ConfigSchema } from "./store.js";

/** Warning categories that can be toggled through `warnings`. */
export const WARNING_CATEGORIES = ["cache"] as const;

export type WarningCategory = (typeof WARNING_CATEGORIES)[number];

const backendListSchema = z.array(z.string().min(1));

/**
 * Ordered backend names tried when a call carries no tag and names no backend.
 * `algos` applies to every algorithm; a key named after a registered algorithm
 * overrides it for that algorithm alone.
 */
export class BackendPriorities extends FlexibleConfig {
  constructor(
    private readonly plugins: PluginRegistry,
    private readonly algorithms: AlgorithmRegistry,
    initial: Readonly<ConfigRecord> = {},
  ) {
    super();
    this.update({ algos: [], ...initial });
  }

  get algos(): string[] {
    return asBackendList(this.get("algos"));
  }

  /** Priority list applying to {@link algorithm}. */
  priorityFor(algorithm: string): string[] {
    return this.has(algorithm) ? asBackendList(this.get(algorithm)) : this.algos;
  }

  override revive(record: Readonly<ConfigRecord>): BackendPriorities {
    return new BackendPriorities(this.plugins, this.algorithms, record);
  }

  protected override onSet(key: string, value: unknown): unknown {
    if (key !== "algos" && !this.algorithms.has(key)) {
      throw new ConfigValidationError(this.configName, key, `Invalid config name: '${key}'`);
    }
    const parsed = backendListSchema.safeParse(value);
    if (!parsed.success) {
      throw new ConfigValidationError(
        this.configName,
        key,
        `'${key}' config must be a list of backend names`,
        parsed.error.issues.map((issue) => issue.message),
      );
    }
    const missing = parsed.data.filter((name) => !this.plugins.has(name));
    if (missing.length > 0) {
      throw new ConfigValidationError(
        this.configName,
        key,
        `Unknown backend when setting '${key}': ${[...new Set(missing)].sort().join(", ")}`,
      );
    }
    return parsed.data;
  }

  protected override onDelete(key: string): void {
    if (key === "algos") {
      throw new ConfigValidationError(this.configName, key, "'algos' configuration item can't be deleted.");
    }
  }
}

export interface DispatchConfigValues {
  /** Backend used for every call that does not name one; `null` dispatches on tags. */
  backend: string | null;
  /** When set, every call goes through the conversion harness of this backend. */
  testBackend: string | null;
  backendPriority: BackendPriorities;
  /** Per-backend configuration, keyed by backend name. */
  backends: FlexibleConfig;
  /** Keep converted graphs on the graphs that offer a conversion cache. */
  cacheConvertedGraphs: boolean;
  warnings: Set<WarningCategory>;
}

const DISPATCH_CONFIG_SCHEMA: ConfigSchema<DispatchConfigValues> = {
  backend: z.string().min(1).nullable(),
  testBackend: z.string().min(1).nullable(),
  backendPriority: z.instanceof(BackendPriorities),
  backends: z.instanceof(FlexibleConfig),
  cacheConvertedGraphs: z.boolean(),
  warnings: z.set(z.enum(WARNING_CATEGORIES)),
};

/**
 * Process-wide settings consulted by the dispatcher on every call.
 *
 * This is a global configuration: overriding it from several concurrent
 * execution contexts at once is not supported.
 */
export class DispatchConfig extends StrictConfig<DispatchConfigValues> {
  constructor(
    private readonly plugins: PluginRegistry,
    initial: DispatchConfigValues,
  ) {
    super(DISPATCH_CONFIG_SCHEMA, initial);
    this.validateAll();
  }

  override revive(record: Readonly<ConfigRecord>): DispatchConfig {
    const next = new DispatchConfig(this.plugins, this.captureState());
    next.load(record);
    return next;
  }

  protected override onSet<K extends Extract<keyof DispatchConfigValues, string>>(
    key: K,
    value: DispatchConfigValues[K],
  ): DispatchConfigValues[K] {
    if ((key === "backend" || key === "testBackend") && typeof value === "string") {
      const allowNative = key === "backend";
      if (!(allowNative && value === NATIVE_BACKEND) && !this.plugins.has(value)) {
        throw new ConfigValidationError(this.configName, key, `Unknown backend when setting '${key}': ${value}`);
      }
    }
    if (key === "backends" && value instanceof FlexibleConfig) {
      for (const [name, entry] of value.entries()) {
        if (!this.plugins.has(name)) {
          throw new ConfigValidationError(this.configName, key, `Unknown backend when setting '${key}': ${name}`);
        }
        if (!(entry instanceof Config)) {
          throw new ConfigValidationError(this.configName, key, `'${key}' config must map backend names to configs`);
        }
      }
    }
    return value;
  }
}

/**
 * Builds the dispatcher configuration from the `GRAPH_DISPATCH_*` variables.
 * Backend names are validated against {@link plugins}, so the backends must be
 * registered first.
 */
export function createDispatchConfig(
  plugins: PluginRegistry,
  algorithms: AlgorithmRegistry,
  env: EnvSource = process.env,
): DispatchConfig {
  const backends = new FlexibleConfig(Object.fromEntries(plugins.names().map((name) => [name, new FlexibleConfig()])));
  return new DispatchConfig(plugins, {
    backend: readOptionalString("GRAPH_DISPATCH_BACKEND", env) ?? null,
    testBackend: readOptionalString("GRAPH_DISPATCH_TEST_BACKEND", env) ?? null,
    backendPriority: new BackendPriorities(plugins, algorithms, {
      algos: readList("GRAPH_DISPATCH_BACKEND_PRIORITY", [], env),
    }),
    backends,
    cacheConvertedGraphs: readBool("GRAPH_DISPATCH_CACHE_CONVERTED_GRAPHS", true, env),
    warnings: parseWarnings(readList("GRAPH_DISPATCH_WARNINGS", ["cache"], env)),
  });
}

function parseWarnings(names: readonly string[]): Set<WarningCategory> {
  const warnings = new Set<WarningCategory>();
  for (const name of names) {
    const category = WARNING_CATEGORIES.find((candidate) => candidate === name);
    if (!category) {
      throw new ConfigValidationError(
        "DispatchConfig",
        "warnings",
        `Unknown warning when setting 'warnings': ${name}. Valid entries: ${WARNING_CATEGORIES.join(", ")}`,
      );
    }
    warnings.add(category);
  }
  return warnings;
}

function asBackendList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];
}
