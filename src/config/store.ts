import { isDeepStrictEqual } from "node:util";
import type { z } from "zod";

import { ConfigScopeError, ConfigValidationError } from "./errors.js";

/** Plain key/value export of a configuration. */
export type ConfigRecord = Record<string, unknown>;

/**
 * Handle returned by {@link Config.beginOverride}. Ending the scope restores
 * the values captured when it began.
 */
export interface ConfigScope {
  /** Position of the scope on the owning stack (1 = outermost). */
  readonly depth: number;
  end(): void;
}

interface ScopeFrame {
  /** `null` when the scope was opened without changes: ending it restores nothing. */
  readonly restore: (() => void) | null;
}

type Restorer = () => void;

/**
 * Shared behaviour of the strict and flexible configuration stores: ordered
 * keys, structural equality, record export and stack-disciplined overrides.
 *
 * The scope stack is owned by each instance and is not synchronised; opening
 * overrides of one instance from concurrent execution contexts is up to the
 * caller to avoid.
 */
export abstract class Config<S = unknown> {
  abstract readonly strict: boolean;
  private readonly scopes: ScopeFrame[] = [];

  abstract has(key: string): boolean;
  /** Keys in declaration (strict) or insertion (flexible) order. */
  abstract keys(): string[];
  abstract getItem(key: string): unknown;
  abstract setItem(key: string, value: unknown): void;
  abstract deleteItem(key: string): void;
  /** Rebuilds an equal configuration from a {@link toRecord} export. */
  abstract revive(record: Readonly<ConfigRecord>): Config;

  /** Runs the write validation without storing and returns the sanitised value. */
  protected abstract checkItem(key: string, value: unknown): unknown;
  protected abstract captureState(): S;
  protected abstract restoreState(state: S): void;

  get size(): number {
    return this.keys().length;
  }

  get scopeDepth(): number {
    return this.scopes.length;
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.keys()[Symbol.iterator]();
  }

  entries(): Array<[string, unknown]> {
    return this.keys().map((key) => [key, this.getItem(key)]);
  }

  toRecord(): ConfigRecord {
    const record: ConfigRecord = {};
    for (const key of this.keys()) {
      record[key] = this.getItem(key);
    }
    return record;
  }

  /**
   * Structural equality: both configurations come from the same class and
   * hold the same keys with equal values. Key order is irrelevant and nested
   * configurations are compared with their own {@link equals}.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Config) || other.constructor !== this.constructor) {
      return false;
    }
    const keys = this.keys();
    if (keys.length !== other.size) {
      return false;
    }
    return keys.every((key) => other.has(key) && configValuesEqual(this.getItem(key), other.getItem(key)));
  }

  /**
   * Validates every change, snapshots the whole state, applies the changes and
   * pushes the snapshot. The snapshot reaches into nested configurations,
   * sets, maps and arrays, which are restored in place. Validation is all-or-nothing: a rejected change leaves
   * the configuration untouched. Without {@link changes} the scope captures
   * nothing and ending it is a no-op.
   */
  beginOverride(changes?: Readonly<ConfigRecord>): ConfigScope {
    let restore: Restorer | null = null;
    if (changes) {
      const keys = Object.keys(changes);
      for (const key of keys) {
        this.checkItem(key, changes[key]);
      }
      restore = this.snapshot();
      try {
        for (const key of keys) {
          this.setItem(key, changes[key]);
        }
      } catch (error) {
        restore();
        throw error;
      }
    }
    const frame: ScopeFrame = { restore };
    this.scopes.push(frame);
    return { depth: this.scopes.length, end: () => this.endOverride(frame) };
  }

  /** Runs {@link fn} with {@link changes} applied, restoring the state on every exit path. */
  withOverrides<T>(changes: Readonly<ConfigRecord>, fn: () => T): T {
    const scope = this.beginOverride(changes);
    try {
      return fn();
    } finally {
      scope.end();
    }
  }

  toString(): string {
    const fields = this.entries().map(([key, value]) => `${key}=${describeValue(value)}`);
    return `${this.configName}(${fields.join(", ")})`;
  }

  protected get configName(): string {
    return this.constructor.name;
  }

  private snapshot(): Restorer {
    const state = this.captureState();
    const nested = this.keys().map((key) => {
      const value = this.getItem(key);
      return value instanceof Config ? value.snapshot() : snapshotValue(value);
    });
    return () => {
      this.restoreState(state);
      for (const restore of nested) {
        restore();
      }
    };
  }

  private endOverride(frame: ScopeFrame): void {
    const index = this.scopes.lastIndexOf(frame);
    if (index === -1) {
      throw new ConfigScopeError(this.configName, this.scopes.length, "override scope has already ended");
    }
    if (index !== this.scopes.length - 1) {
      throw new ConfigScopeError(
        this.configName,
        this.scopes.length,
        `override scopes must end in reverse order of entry (scope ${index + 1} of ${this.scopes.length})`,
      );
    }
    this.scopes.pop();
    if (frame.restore !== null) {
      frame.restore();
    }
  }
}

/** Zod validator for every declared key of a strict configuration. */
export type ConfigSchema<V> = { readonly [K in keyof V]: z.ZodType<V[K]> };

type ConfigKey<V> = Extract<keyof V, string>;

/**
 * Fixed-schema configuration. Keys are declared once through the schema;
 * reading, writing or deleting anything else fails. Subclasses may refine the
 * validation through {@link onSet}.
 */
export abstract class StrictConfig<V extends object> extends Config<V> {
  readonly strict = true;
  private current: V;

  protected constructor(
    private readonly schema: ConfigSchema<V>,
    initial: V,
  ) {
    super();
    this.current = { ...initial };
  }

  get<K extends ConfigKey<V>>(key: K): V[K] {
    return this.current[key];
  }

  set<K extends ConfigKey<V>>(key: K, value: V[K]): void {
    this.current[key] = this.sanitize(key, value);
  }

  has(key: string): boolean {
    return this.isKey(key);
  }

  keys(): string[] {
    return this.declaredKeys();
  }

  getItem(key: string): unknown {
    return this.current[this.requireKey(key)];
  }

  setItem(key: string, value: unknown): void {
    const declared = this.requireKey(key);
    this.current[declared] = this.sanitize(declared, value);
  }

  deleteItem(key: string): void {
    throw new ConfigValidationError(
      this.configName,
      key,
      `Configuration items can't be deleted (can't delete '${key}').`,
    );
  }

  /** Hook refining a schema-valid value. Throw to reject it. */
  protected onSet<K extends ConfigKey<V>>(_key: K, value: V[K]): V[K] {
    return value;
  }

  /** Re-validates every current value; subclasses call it once their own fields are ready. */
  protected validateAll(): void {
    for (const key of this.declaredKeys()) {
      this.current[key] = this.sanitize(key, this.current[key]);
    }
  }

  /** Replaces every value from an exported record, which must hold exactly the declared keys. */
  protected load(record: Readonly<ConfigRecord>): void {
    for (const key of Object.keys(record)) {
      this.requireKey(key);
    }
    const next: V = { ...this.current };
    for (const key of this.declaredKeys()) {
      if (!Object.prototype.hasOwnProperty.call(record, key)) {
        throw new ConfigValidationError(this.configName, key, `Missing config value: '${key}'`);
      }
      next[key] = this.sanitize(key, record[key]);
    }
    this.current = next;
  }

  protected checkItem(key: string, value: unknown): unknown {
    return this.sanitize(this.requireKey(key), value);
  }

  protected captureState(): V {
    return { ...this.current };
  }

  protected restoreState(state: V): void {
    this.current = { ...state };
  }

  private sanitize<K extends ConfigKey<V>>(key: K, value: unknown): V[K] {
    const result = this.schema[key].safeParse(value);
    if (!result.success) {
      throw new ConfigValidationError(
        this.configName,
        key,
        `Invalid value for config '${key}'`,
        result.error.issues.map((issue) => issue.message),
      );
    }
    return this.onSet(key, result.data);
  }

  private isKey(key: string): key is ConfigKey<V> {
    return Object.prototype.hasOwnProperty.call(this.schema, key);
  }

  private requireKey(key: string): ConfigKey<V> {
    if (this.isKey(key)) {
      return key;
    }
    throw new ConfigValidationError(this.configName, key, `Invalid config name: '${key}'`);
  }

  private declaredKeys(): Array<ConfigKey<V>> {
    return Object.keys(this.schema).filter((key): key is ConfigKey<V> => this.isKey(key));
  }
}

/**
 * Open-schema configuration: keys may be added and deleted freely. Reads of
 * missing keys return a fallback instead of failing.
 */
export class FlexibleConfig extends Config<Map<string, unknown>> {
  readonly strict = false;
  private values = new Map<string, unknown>();

  constructor(initial: Readonly<ConfigRecord> = {}) {
    super();
    this.update(initial);
  }

  get(key: string, fallback?: unknown): unknown {
    return this.values.has(key) ? this.values.get(key) : fallback;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  getItem(key: string): unknown {
    return this.get(key);
  }

  setItem(key: string, value: unknown): void {
    this.values.set(key, this.onSet(key, value));
  }

  /** Sets every entry of {@link record} in order. */
  update(record: Readonly<ConfigRecord>): void {
    for (const [key, value] of Object.entries(record)) {
      this.setItem(key, value);
    }
  }

  deleteItem(key: string): void {
    if (!this.values.has(key)) {
      throw new ConfigValidationError(this.configName, key, `Invalid config name: '${key}'`);
    }
    this.onDelete(key);
    this.values.delete(key);
  }

  revive(record: Readonly<ConfigRecord>): FlexibleConfig {
    return new FlexibleConfig(record);
  }

  /** Hook validating (and possibly sanitising) a value before it is stored. */
  protected onSet(_key: string, value: unknown): unknown {
    return value;
  }

  /** Hook invoked before a key is removed. Throw to forbid the deletion. */
  protected onDelete(_key: string): void {}

  protected checkItem(key: string, value: unknown): unknown {
    return this.onSet(key, value);
  }

  protected captureState(): Map<string, unknown> {
    return new Map(this.values);
  }

  protected restoreState(state: Map<string, unknown>): void {
    this.values = new Map(state);
  }
}

/** Restorer for the contents of a mutable collection; other values need none. */
function snapshotValue(value: unknown): Restorer {
  if (value instanceof Set) {
    const members = [...value];
    return () => {
      value.clear();
      for (const member of members) {
        value.add(member);
      }
    };
  }
  if (value instanceof Map) {
    const pairs = [...value];
    return () => {
      value.clear();
      for (const [key, entry] of pairs) {
        value.set(key, entry);
      }
    };
  }
  if (Array.isArray(value)) {
    const items = [...value];
    return () => {
      value.splice(0, value.length, ...items);
    };
  }
  return () => {};
}

function configValuesEqual(left: unknown, right: unknown): boolean {
  if (left instanceof Config && right instanceof Config) {
    return left.equals(right);
  }
  return isDeepStrictEqual(left, right);
}

function describeValue(value: unknown): string {
  if (value instanceof Config) {
    return value.toString();
  }
  if (value instanceof Set) {
    return `{${[...value].map((entry) => describeValue(entry)).join(", ")}}`;
  }
  if (typeof value === "string") {
    return `'${value}'`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => describeValue(entry)).join(", ")}]`;
  }
  return String(value);
}
