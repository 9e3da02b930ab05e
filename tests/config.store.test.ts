import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { ConfigScopeError, ConfigValidationError } from "../src/config/errors.js";
import { FlexibleConfig, StrictConfig, type ConfigRecord, type ConfigSchema } from "../src/config/store.js";

interface SampleValues {
  depth: number;
  label: string;
  nested: FlexibleConfig;
}

const SAMPLE_SCHEMA: ConfigSchema<SampleValues> = {
  depth: z.number().int().nonnegative(),
  label: z.string(),
  nested: z.instanceof(FlexibleConfig),
};

class SampleConfig extends StrictConfig<SampleValues> {
  constructor(initial: SampleValues) {
    super(SAMPLE_SCHEMA, initial);
    this.validateAll();
  }

  override revive(record: Readonly<ConfigRecord>): SampleConfig {
    const next = new SampleConfig(this.captureState());
    next.load(record);
    return next;
  }

  protected override onSet<K extends Extract<keyof SampleValues, string>>(
    key: K,
    value: SampleValues[K],
  ): SampleValues[K] {
    if (key === "label" && value === "forbidden") {
      throw new ConfigValidationError("SampleConfig", key, "label 'forbidden' is not allowed");
    }
    return value;
  }
}

function sample(): SampleConfig {
  return new SampleConfig({ depth: 1, label: "base", nested: new FlexibleConfig({ colour: "red" }) });
}

describe("StrictConfig", () => {
  it("reads and writes declared keys", () => {
    const config = sample();
    config.set("depth", 3);
    config.setItem("label", "renamed");

    expect(config.get("depth")).to.equal(3);
    expect(config.getItem("label")).to.equal("renamed");
    expect(config.keys()).to.deep.equal(["depth", "label", "nested"]);
    expect(config.strict).to.equal(true);
  });

  it("rejects undeclared keys on read, write and delete", () => {
    const config = sample();

    expect(() => config.getItem("colour")).to.throw(ConfigValidationError, "Invalid config name: 'colour'");
    expect(() => config.setItem("colour", "blue")).to.throw(ConfigValidationError, "Invalid config name: 'colour'");
    expect(() => config.deleteItem("depth")).to.throw(
      ConfigValidationError,
      "Configuration items can't be deleted (can't delete 'depth').",
    );
    expect(config.has("colour")).to.equal(false);
  });

  it("validates values through the schema and the class hook", () => {
    const config = sample();

    expect(() => config.setItem("depth", -1)).to.throw(ConfigValidationError, "Invalid value for config 'depth'");
    expect(() => config.setItem("label", "forbidden")).to.throw(
      ConfigValidationError,
      "label 'forbidden' is not allowed",
    );
    expect(config.get("depth")).to.equal(1);
    expect(config.get("label")).to.equal("base");
  });

  it("compares structurally, including nested configs", () => {
    const left = sample();
    const right = sample();
    expect(left.equals(right)).to.equal(true);

    right.get("nested").setItem("colour", "blue");
    expect(left.equals(right)).to.equal(false);
    expect(left.equals(new FlexibleConfig(left.toRecord()))).to.equal(false);
  });

  it("round-trips through toRecord and revive", () => {
    const config = sample();
    config.set("depth", 5);

    const revived = config.revive(config.toRecord());
    expect(revived.equals(config)).to.equal(true);
    expect(revived).to.not.equal(config);
  });

  it("refuses to revive a record with missing or unknown keys", () => {
    const config = sample();

    expect(() => config.revive({ depth: 1, label: "base" })).to.throw(
      ConfigValidationError,
      "Missing config value: 'nested'",
    );
    expect(() => config.revive({ ...config.toRecord(), extra: true })).to.throw(
      ConfigValidationError,
      "Invalid config name: 'extra'",
    );
  });

  it("renders its entries", () => {
    const config = sample();
    expect(config.toString()).to.equal("SampleConfig(depth=1, label='base', nested=FlexibleConfig(colour='red'))");
  });
});

describe("FlexibleConfig", () => {
  it("accepts new keys, which then take part in iteration and equality", () => {
    const config = new FlexibleConfig({ a: 1 });
    const other = new FlexibleConfig({ a: 1 });

    config.setItem("b", 2);

    expect([...config]).to.deep.equal(["a", "b"]);
    expect(config.get("b")).to.equal(2);
    expect(config.equals(other)).to.equal(false);
    other.setItem("b", 2);
    expect(config.equals(other)).to.equal(true);
    expect(config.strict).to.equal(false);
  });

  it("returns the fallback for missing keys and deletes existing ones", () => {
    const config = new FlexibleConfig({ a: 1 });

    expect(config.get("missing", "fallback")).to.equal("fallback");
    config.deleteItem("a");
    expect(config.size).to.equal(0);
    expect(() => config.deleteItem("a")).to.throw(ConfigValidationError, "Invalid config name: 'a'");
  });

  it("round-trips through toRecord and revive", () => {
    const config = new FlexibleConfig({ a: 1, b: [1, 2] });
    expect(config.revive(config.toRecord()).equals(config)).to.equal(true);
  });
});

describe("config override scopes", () => {
  it("restores the exact previous state when the scope ends", () => {
    const config = new FlexibleConfig({ a: 1 });
    const snapshot = config.toRecord();

    const scope = config.beginOverride({ a: 2, added: true });
    expect(config.toRecord()).to.deep.equal({ a: 2, added: true });
    expect(scope.depth).to.equal(1);
    scope.end();

    expect(config.toRecord()).to.deep.equal(snapshot);
    expect(config.has("added")).to.equal(false);
    expect(config.scopeDepth).to.equal(0);
  });

  it("restores the state even when the scoped work throws", () => {
    const config = sample();
    const snapshot = config.toRecord();

    expect(() =>
      config.withOverrides({ depth: 9 }, () => {
        throw new Error("boom");
      }),
    ).to.throw("boom");

    expect(config.toRecord()).to.deep.equal(snapshot);
    expect(config.scopeDepth).to.equal(0);
  });

  it("unwinds nested scopes in reverse order", () => {
    const config = sample();

    const outer = config.beginOverride({ depth: 2 });
    const inner = config.beginOverride({ depth: 3, label: "inner" });
    expect(inner.depth).to.equal(2);

    expect(() => outer.end()).to.throw(ConfigScopeError);
    inner.end();
    expect(config.get("depth")).to.equal(2);
    expect(config.get("label")).to.equal("base");
    outer.end();
    expect(config.get("depth")).to.equal(1);
    expect(() => outer.end()).to.throw(ConfigScopeError, "override scope has already ended");
  });

  it("applies nothing when one change is invalid", () => {
    const config = sample();

    expect(() => config.beginOverride({ label: "changed", depth: -4 })).to.throw(ConfigValidationError);
    expect(config.get("label")).to.equal("base");
    expect(config.scopeDepth).to.equal(0);
  });

  it("keeps values set inside a scope opened without changes", () => {
    const config = new FlexibleConfig({ a: 1 });

    const scope = config.beginOverride();
    config.setItem("a", 5);
    scope.end();

    expect(config.get("a")).to.equal(5);
  });
});
