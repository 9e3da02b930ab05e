import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";

import { FlexibleConfig } from "../src/config/store.js";

const keyArb = fc.constantFrom("alpha", "beta", "gamma", "delta");
const valueArb = fc.oneof(fc.integer(), fc.string({ maxLength: 8 }), fc.boolean());
const recordArb = fc.dictionary(keyArb, valueArb);

describe("config scope properties", () => {
  it("restores the initial state after unwinding any stack of overrides", () => {
    fc.assert(
      fc.property(recordArb, fc.array(recordArb, { minLength: 1, maxLength: 4 }), (initial, overrides) => {
        const config = new FlexibleConfig(initial);
        const snapshot = config.toRecord();

        const scopes = overrides.map((changes) => config.beginOverride(changes));
        for (const scope of scopes.reverse()) {
          scope.end();
        }

        expect(config.toRecord()).to.deep.equal(snapshot);
        expect(config.scopeDepth).to.equal(0);
      }),
      { numRuns: 100 },
    );
  });

  it("restores the initial state when nested scoped work throws", () => {
    fc.assert(
      fc.property(recordArb, recordArb, recordArb, (initial, outer, inner) => {
        const config = new FlexibleConfig(initial);
        const snapshot = config.toRecord();

        expect(() =>
          config.withOverrides(outer, () =>
            config.withOverrides(inner, () => {
              throw new Error("scoped failure");
            }),
          ),
        ).to.throw("scoped failure");

        expect(config.toRecord()).to.deep.equal(snapshot);
      }),
      { numRuns: 100 },
    );
  });

  it("revives an equal configuration from its record", () => {
    fc.assert(
      fc.property(recordArb, (initial) => {
        const config = new FlexibleConfig(initial);
        expect(config.revive(config.toRecord()).equals(config)).to.equal(true);
      }),
      { numRuns: 100 },
    );
  });
});
