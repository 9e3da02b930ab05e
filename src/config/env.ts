/**
 * Helpers reading the `GRAPH_DISPATCH_*` environment variables with
 * predictable coercion rules. Every reader treats blank values as unset so an
 * operator can neutralise a variable with `VAR=` without unsetting it.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Source of environment values, injectable for tests. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the provided environment variable and interprets it as a boolean.
 *
 * Accepts "1", "true", "yes", "on" as truthy and "0", "false", "no", "off" as
 * falsy; anything else (or nothing) yields {@link defaultValue}.
 */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads a comma-separated list. Entries are trimmed, blanks dropped and
 * duplicates removed while preserving the first occurrence.
 *
 * Returns {@link defaultValue} only when the variable is absent; an explicit
 * blank value yields an empty list.
 */
export function readList(name: string, defaultValue: readonly string[], env: EnvSource = process.env): string[] {
  const raw = env[name];
  if (typeof raw !== "string") {
    return [...defaultValue];
  }
  const entries = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return Array.from(new Set(entries));
}

/**
 * Reads an enum-like environment variable while validating that the literal belongs to the
 * supplied allow-list. The comparison is case-insensitive and ignores surrounding whitespace.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }
  return lookup.get(normalised.toLowerCase());
}

/** Returns a canonical enum value, defaulting to {@link defaultValue} when unset or invalid. */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
