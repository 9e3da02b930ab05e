import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { dispatchable } from "../src/dispatch/dispatchable.js";
import {
  ArgumentResolutionError,
  BackendMismatchError,
  BackendUnavailableError,
  NotImplementedByBackendError,
  RegistrationError,
} from "../src/dispatch/errors.js";
import { createTestContext, DemoBackend, plainGraph, taggedGraph, type FakeGraph } from "./helpers/dispatch.js";

function foo(G: FakeGraph): string {
  return `native:${G.id}`;
}

function pair(G: FakeGraph, H: FakeGraph | null = null): string {
  return H ? `native:${G.id}+${H.id}` : `native:${G.id}`;
}

const PAIR_OPTIONS = {
  graphs: { G: 0, "H?": 1 },
  parameters: ["G", { name: "H", default: null }],
} as const;

describe("dispatchable registration", () => {
  it("registers the wrapper under the function name and finds it again by name", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(foo, { context });

    expect(wrapped.dispatchName).to.equal("foo");
    expect(wrapped.originalFunction).to.equal(foo);
    expect(context.registry.lookup("foo")).to.equal(wrapped);
  });

  it("rejects a second registration under the same name", () => {
    const { context } = createTestContext();
    dispatchable(foo, { context });

    expect(() => dispatchable(foo, { context })).to.throw(
      RegistrationError,
      "Algorithm already exists in dispatch registry: foo",
    );
    expect(() => dispatchable(foo, { context, name: "foo_alias" })).to.not.throw();
    expect(context.registry.names()).to.deep.equal(["foo", "foo_alias"]);
  });

  it("requires a name for anonymous functions", () => {
    const { context } = createTestContext();
    expect(() => dispatchable((G: FakeGraph) => G.id, { context })).to.throw(RegistrationError);
  });

  it("rejects an empty graphs spec", () => {
    const { context } = createTestContext();
    expect(() => dispatchable(foo, { context, graphs: {} })).to.throw(
      RegistrationError,
      "'graphs' must contain at least one variable name",
    );
  });

  it("rejects graphs that are not declared parameters", () => {
    const { context } = createTestContext();
    expect(() => dispatchable(pair, { context, graphs: { G: 0, H: 1 }, parameters: ["G"] })).to.throw(
      RegistrationError,
      "Invalid graph names: 'H'",
    );
    expect(context.registry.has("pair")).to.equal(false);
  });

  it("reserves the backend parameter name", () => {
    const { context } = createTestContext();
    expect(() => dispatchable(foo, { context, parameters: ["G", "backend"] })).to.throw(
      RegistrationError,
      "foo() may not declare the reserved parameter 'backend'",
    );
  });
});

describe("dispatchable graph resolution", () => {
  it("accepts the graph positionally or by keyword with the same result", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(foo, { context });
    const graph = plainGraph("a");

    expect(wrapped(graph)).to.equal("native:a");
    expect(wrapped.invoke([], { G: graph })).to.equal("native:a");
  });

  it("fails when the required graph is missing, null or given twice", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(foo, { context });
    const graph = plainGraph("a");

    expect(() => wrapped.invoke([])).to.throw(ArgumentResolutionError, "foo() missing required graph argument: G");
    expect(() => wrapped.invoke([null])).to.throw(
      ArgumentResolutionError,
      "foo() required graph argument 'G' is null or undefined; must be a graph",
    );
    expect(() => wrapped.invoke([], { G: undefined })).to.throw(ArgumentResolutionError, "must be a graph");
    expect(() => wrapped.invoke([graph], { G: graph })).to.throw(
      ArgumentResolutionError,
      "foo() got multiple values for 'G'",
    );
  });

  it("skips an optional graph when it is omitted or null", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(pair, { context, ...PAIR_OPTIONS });
    const graph = plainGraph("a");

    expect(wrapped(graph)).to.equal("native:a");
    expect(wrapped(graph, null)).to.equal("native:a");
    expect(wrapped.invoke([graph], { H: null })).to.equal("native:a");
    expect(wrapped(graph, plainGraph("b"))).to.equal("native:a+b");
  });

  it("takes the backend of a supplied optional graph into account", () => {
    const { context } = createTestContext();
    const implementation = sinon.stub().returns("demo:pair");
    context.plugins.register("demo", () => new DemoBackend("demo", { pair: implementation }));
    const wrapped = dispatchable(pair, { context, ...PAIR_OPTIONS });

    expect(wrapped(plainGraph("a"), null)).to.equal("native:a");
    expect(implementation.called).to.equal(false);

    const tagged = taggedGraph("b", "demo");
    expect(wrapped(plainGraph("a"), tagged)).to.equal("demo:pair");
    expect(implementation.calledOnce).to.equal(true);
  });

  it("raises a mismatch naming both tags when graphs come from different backends", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(pair, { context, graphs: { G: 0, H: 1 }, parameters: ["G", "H"] });

    let caught: unknown;
    try {
      wrapped(taggedGraph("a", "beta"), taggedGraph("b", "alpha"));
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(BackendMismatchError);
    if (caught instanceof BackendMismatchError) {
      expect(caught.message).to.equal("pair() graphs must all be from the same backend, found 'alpha', 'beta'");
      expect(caught.details.backends).to.deep.equal(["alpha", "beta"]);
    }
  });

  it("treats graphs tagged 'native' like untagged graphs", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(pair, { context, graphs: { G: 0, H: 1 }, parameters: ["G", "H"] });

    expect(wrapped(taggedGraph("a", "native"), plainGraph("b"))).to.equal("native:a+b");
  });
});

describe("dispatchable backend selection", () => {
  it("runs untagged graphs natively without loading or converting anything", () => {
    const { context } = createTestContext();
    const backend = new DemoBackend("demo", { foo: () => "demo" });
    const convert = sinon.spy(backend, "convertFromNative");
    const descriptor = context.plugins.register("demo", () => backend);
    const wrapped = dispatchable(foo, { context });

    expect(wrapped(plainGraph("a"))).to.equal("native:a");
    expect(convert.called).to.equal(false);
    expect(descriptor.loadAttempts).to.equal(0);
  });

  it("forwards tagged graphs to their backend and returns its result unmodified", () => {
    const { context, logger } = createTestContext();
    const sentinel = { computedBy: "demo" };
    const implementation = sinon.stub().returns(sentinel);
    const backend = new DemoBackend("demo", { foo: implementation });
    const convertToNative = sinon.spy(backend, "convertToNative");
    context.plugins.register("demo", () => backend);
    const wrapped = dispatchable(foo, { context });
    const graph = taggedGraph("a", "demo");

    expect(wrapped.invoke([graph])).to.equal(sentinel);
    expect(implementation.calledOnceWithExactly([graph], {})).to.equal(true);
    expect(convertToNative.called).to.equal(false);
    expect(logger.find("dispatch_forward")).to.have.length(1);
  });

  it("passes keyword arguments through to the backend untouched", () => {
    const { context } = createTestContext();
    const implementation = sinon.stub().returns("demo");
    context.plugins.register("demo", () => new DemoBackend("demo", { foo: implementation }));
    const wrapped = dispatchable(foo, { context });
    const graph = taggedGraph("a", "demo");

    wrapped.invoke([], { G: graph });
    expect(implementation.calledOnceWithExactly([], { G: graph })).to.equal(true);
  });

  it("fails when the tagged backend is not registered", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(foo, { context });

    expect(() => wrapped(taggedGraph("a", "ghost"))).to.throw(
      BackendUnavailableError,
      "'ghost' backend is not installed",
    );
  });

  it("fails when the tagged backend does not implement the algorithm", () => {
    const { context } = createTestContext();
    context.plugins.register("demo", () => new DemoBackend("demo"));
    const wrapped = dispatchable(foo, { context });

    let caught: unknown;
    try {
      wrapped(taggedGraph("a", "demo"));
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(NotImplementedByBackendError);
    if (caught instanceof NotImplementedByBackendError) {
      expect(caught.message).to.equal("'foo' not implemented by demo");
      expect(caught.expected).to.equal(false);
    }
  });

  it("converts untagged graphs for an explicitly requested backend", () => {
    const { context } = createTestContext();
    const implementation = sinon.stub().returns("demo:converted");
    const backend = new DemoBackend("demo", { foo: implementation });
    context.plugins.register("demo", () => backend);
    const wrapped = dispatchable(foo, { context });
    const graph = plainGraph("a");

    expect(wrapped.invoke([graph], {}, { backend: "demo" })).to.equal("demo:converted");
    expect(backend.conversions).to.have.length(1);
    expect(backend.conversions[0].graph).to.equal(graph);
    expect(backend.conversions[0].request).to.deep.equal({
      edgeAttrs: null,
      nodeAttrs: null,
      preserveEdgeAttrs: false,
      preserveNodeAttrs: false,
      name: "foo",
    });
    const [args, kwargs] = implementation.firstCall.args;
    expect(args).to.deep.equal([]);
    expect(kwargs.G.source).to.equal(graph);
    expect(backend.results).to.have.length(0);
  });

  it("honours an explicit native request unless a graph belongs to a backend", () => {
    const { context } = createTestContext();
    context.plugins.register("demo", () => new DemoBackend("demo", { foo: () => "demo" }));
    const wrapped = dispatchable(foo, { context });

    expect(wrapped.invoke([plainGraph("a")], {}, { backend: "native" })).to.equal("native:a");
    expect(() => wrapped.invoke([taggedGraph("a", "demo")], {}, { backend: "native" })).to.throw(
      BackendMismatchError,
      "foo() was asked to run natively but received graphs from the 'demo' backend",
    );
  });

  it("rejects an explicit backend disagreeing with the graphs' tag", () => {
    const { context } = createTestContext();
    context.plugins.register("demo", () => new DemoBackend("demo", { foo: () => "demo" }));
    context.plugins.register("other", () => new DemoBackend("other", { foo: () => "other" }));
    const wrapped = dispatchable(foo, { context });

    expect(() => wrapped.invoke([taggedGraph("a", "other")], {}, { backend: "demo" })).to.throw(
      BackendMismatchError,
      "foo() was asked to run on 'demo' but received graphs from the 'other' backend",
    );
    expect(wrapped.invoke([taggedGraph("a", "demo")], {}, { backend: "demo" })).to.equal("demo");
  });

  it("fails on an explicit backend that is not registered", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(foo, { context });

    expect(() => wrapped.invoke([plainGraph("a")], {}, { backend: "ghost" })).to.throw(
      BackendUnavailableError,
      "'ghost' backend is not installed",
    );
  });

  it("uses the configured default backend while it is overridden", () => {
    const { context } = createTestContext();
    context.plugins.register("demo", () => new DemoBackend("demo", { foo: () => "demo:default" }));
    const wrapped = dispatchable(foo, { context });
    const graph = plainGraph("a");

    const result = context.config.withOverrides({ backend: "demo" }, () => wrapped(graph));
    expect(result).to.equal("demo:default");
    expect(wrapped(graph)).to.equal("native:a");
  });

  it("walks the priority list, skipping unavailable backends and backends lacking the algorithm", () => {
    const { context, logger } = createTestContext({ GRAPH_DISPATCH_BACKEND_PRIORITY: "broken,empty,demo" });
    context.plugins.register("broken", () => {
      throw new Error("missing native bindings");
    });
    context.plugins.register("empty", () => new DemoBackend("empty"));
    const demo = new DemoBackend("demo", { foo: () => "demo:priority" });
    context.plugins.register("demo", () => demo);
    const wrapped = dispatchable(foo, { context });

    expect(wrapped(plainGraph("a"))).to.equal("demo:priority");
    expect(demo.conversions).to.have.length(1);
    const skipped = logger.find("dispatch_backend_skipped");
    expect(skipped).to.have.length(1);
    expect(skipped[0].level).to.equal("warn");
    expect(skipped[0].payload).to.deep.equal({
      algorithm: "foo",
      backend: "broken",
      reason: "'broken' backend is not installed",
    });
  });

  it("lets a per-algorithm priority list override the general one", () => {
    const { context } = createTestContext();
    context.plugins.register("demo", () => new DemoBackend("demo", { foo: () => "demo:foo", bar: () => "demo:bar" }));
    const fooWrapper = dispatchable(foo, { context });
    const barWrapper = dispatchable(foo, { context, name: "bar" });

    context.config.get("backendPriority").setItem("foo", ["demo"]);
    expect(fooWrapper(plainGraph("a"))).to.equal("demo:foo");
    expect(barWrapper(plainGraph("a"))).to.equal("native:a");
  });

  it("falls back to native when no prioritised backend implements the algorithm", () => {
    const { context } = createTestContext({ GRAPH_DISPATCH_BACKEND_PRIORITY: "empty" });
    context.plugins.register("empty", () => new DemoBackend("empty"));
    const wrapped = dispatchable(foo, { context });

    expect(wrapped(plainGraph("a"))).to.equal("native:a");
  });

  it("binds keyword calls before running the native function", () => {
    const { context } = createTestContext();
    const wrapped = dispatchable(pair, { context, ...PAIR_OPTIONS });

    expect(wrapped.invoke([], { H: plainGraph("b"), G: plainGraph("a") })).to.equal("native:a+b");
    expect(wrapped.callNative([plainGraph("a")], { H: plainGraph("c") })).to.equal("native:a+c");
    expect(() => wrapped.invoke([plainGraph("a")], { K: 1 })).to.throw(
      ArgumentResolutionError,
      "pair() got an unexpected keyword argument 'K'",
    );
  });
});
