import { createDispatchConfig, type DispatchConfig } from "../config/dispatchConfig.js";
import type { EnvSource } from "../config/env.js";
import { StructuredLogger } from "../logger.js";
import { PluginRegistry } from "./plugins.js";
import { AlgorithmRegistry } from "./registry.js";

export interface DispatchContextOptions {
  readonly registry?: AlgorithmRegistry;
  readonly plugins?: PluginRegistry;
  readonly logger?: StructuredLogger;
  /** Ready-made configuration; built from {@link env} on first use otherwise. */
  readonly config?: DispatchConfig;
  readonly env?: EnvSource;
}

/**
 * Shared state consulted by every dispatch wrapper: the algorithm and plugin
 * registries, the configuration and the logger. The configuration is built
 * lazily so that backends registered during start-up are known when the
 * environment is validated.
 */
export class DispatchContext {
  readonly registry: AlgorithmRegistry;
  readonly plugins: PluginRegistry;
  readonly logger: StructuredLogger;
  private readonly env: EnvSource;
  private configInstance: DispatchConfig | null;

  constructor(options: DispatchContextOptions = {}) {
    this.logger = options.logger ?? new StructuredLogger();
    this.registry = options.registry ?? new AlgorithmRegistry();
    this.plugins = options.plugins ?? new PluginRegistry({ logger: this.logger });
    this.env = options.env ?? process.env;
    this.configInstance = options.config ?? null;
  }

  get config(): DispatchConfig {
    if (!this.configInstance) {
      this.configInstance = createDispatchConfig(this.plugins, this.registry, this.env);
    }
    return this.configInstance;
  }
}

let defaultContext: DispatchContext | null = null;

/** Context used by algorithms registered without an explicit one. */
export function getDefaultDispatchContext(): DispatchContext {
  if (!defaultContext) {
    defaultContext = new DispatchContext();
  }
  return defaultContext;
}
