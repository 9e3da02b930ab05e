import { StructuredLogger } from "../logger.js";
import { BackendUnavailableError, RegistrationError } from "./errors.js";
import { NATIVE_BACKEND } from "./tags.js";
import type { BackendInterface, BackendLoader } from "./types.js";

/**
 * Registration record of one backend. The loader runs at most once; the
 * resulting backend is kept for the lifetime of the registry.
 */
export class PluginDescriptor {
  private backend: BackendInterface | null = null;
  private attempts = 0;

  constructor(
    readonly name: string,
    private readonly loader: BackendLoader,
  ) {}

  get isLoaded(): boolean {
    return this.backend !== null;
  }

  /** Number of times the loader ran. Exposed for tests. */
  get loadAttempts(): number {
    return this.attempts;
  }

  load(): BackendInterface {
    if (this.backend) {
      return this.backend;
    }
    this.attempts += 1;
    try {
      this.backend = this.loader();
    } catch (error) {
      throw new BackendUnavailableError(this.name, { cause: error });
    }
    return this.backend;
  }
}

export interface PluginRegistryOptions {
  readonly logger?: StructuredLogger;
}

/**
 * Table of the backends available to the dispatcher. Backends register
 * explicitly at start-up through {@link register}; nothing is imported until a
 * call needs it. Registration is expected to finish before concurrent use.
 */
export class PluginRegistry {
  private readonly descriptors = new Map<string, PluginDescriptor>();
  private readonly logger: StructuredLogger;

  constructor(options: PluginRegistryOptions = {}) {
    this.logger = options.logger ?? new StructuredLogger();
  }

  register(name: string, loader: BackendLoader): PluginDescriptor {
    if (name === NATIVE_BACKEND) {
      throw new RegistrationError(name, `'${NATIVE_BACKEND}' is reserved for the native implementations`);
    }
    if (this.descriptors.has(name)) {
      throw new RegistrationError(name, `Backend already exists in plugin registry: ${name}`);
    }
    const descriptor = new PluginDescriptor(name, loader);
    this.descriptors.set(name, descriptor);
    return descriptor;
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  get(name: string): PluginDescriptor | undefined {
    return this.descriptors.get(name);
  }

  names(): string[] {
    return [...this.descriptors.keys()];
  }

  entries(): PluginDescriptor[] {
    return [...this.descriptors.values()];
  }

  get size(): number {
    return this.descriptors.size;
  }

  /** Loads (once) and returns the backend registered under {@link name}. */
  load(name: string): BackendInterface {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new BackendUnavailableError(name);
    }
    if (descriptor.isLoaded) {
      return descriptor.load();
    }
    try {
      const backend = descriptor.load();
      this.logger.info("backend_loaded", { backend: name, algorithms: backend.algorithms.size });
      return backend;
    } catch (error) {
      this.logger.error("backend_load_failed", {
        backend: name,
        reason: error instanceof Error && error.cause instanceof Error ? error.cause.message : String(error),
      });
      throw error;
    }
  }
}
