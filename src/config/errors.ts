/** Base error used by the configuration stores. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Error thrown when a key is undeclared or a value fails validation. */
export class ConfigValidationError extends ConfigError {
  public readonly code = "E-CONFIG-INVALID";
  public readonly hint = "check the declared keys and the expected value types";
  public readonly details: { config: string; key: string; issues?: readonly string[] };

  constructor(config: string, key: string, message: string, issues?: readonly string[]) {
    super(message);
    this.name = "ConfigValidationError";
    this.details = issues ? { config, key, issues } : { config, key };
  }
}

/** Error thrown when override scopes are ended out of order. */
export class ConfigScopeError extends ConfigError {
  public readonly code = "E-CONFIG-SCOPE";
  public readonly hint = "end the innermost override scope first";
  public readonly details: { config: string; depth: number };

  constructor(config: string, depth: number, message: string) {
    super(message);
    this.name = "ConfigScopeError";
    this.details = { config, depth };
  }
}
