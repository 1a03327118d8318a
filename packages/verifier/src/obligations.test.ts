/**
 * Tests for lifetime facts and obligations
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";
import type { IrFunctionSignature, IrLifetime } from "@typestate/frontend";
import {
  builders,
  formatLifetimes,
  formatObligations,
  formatWhereClause,
} from "@typestate/frontend";
import {
  beginLifetime,
  checkCallObligations,
  endLifetime,
  entails,
  instantiateWhereClause,
  lifetimeOutlives,
  mentionsOnlyActive,
  obligationsEquivalent,
  typeOutlives,
} from "./obligations.js";
import {
  INT,
  VEC,
  flow,
  makeFunction,
  preludeStore,
  refTo,
  storeFor,
  unwrapOk,
} from "./test-harness.js";

const {
  bind,
  lifetime,
  local,
  outlives,
  staticLifetime,
  traitBound,
  typeParam,
  uninit,
  typeOutlives: typeFact,
} = builders;

const a = lifetime("a");
const b = lifetime("b");
const c = lifetime("c");

const activeLifetimes = (state: { lifetimes: ReadonlyMap<string, IrLifetime> }) =>
  formatLifetimes([...state.lifetimes.values()]);

describe("Obligations", () => {
  describe("lifetimeOutlives", () => {
    it("should follow facts transitively", () => {
      const facts = [outlives(a, b), outlives(b, c)];
      expect(lifetimeOutlives(facts, a, c)).to.equal(true);
      expect(lifetimeOutlives(facts, c, a)).to.equal(false);
    });

    it("should let 'static outlive everything", () => {
      expect(lifetimeOutlives([], staticLifetime, a)).to.equal(true);
      expect(lifetimeOutlives([], a, staticLifetime)).to.equal(false);
      expect(
        lifetimeOutlives([outlives(a, staticLifetime)], a, b)
      ).to.equal(true);
    });

    const lifetimeArb = fc.constantFrom<IrLifetime>(staticLifetime, a, b, c);
    const factsArb = fc.array(
      fc.tuple(lifetimeArb, lifetimeArb).map(([l, s]) => outlives(l, s)),
      { maxLength: 8 }
    );

    it("should be reflexive", () => {
      fc.assert(
        fc.property(factsArb, lifetimeArb, (facts, l) =>
          lifetimeOutlives(facts, l, l)
        )
      );
    });

    it("should be transitive", () => {
      fc.assert(
        fc.property(
          factsArb,
          lifetimeArb,
          lifetimeArb,
          lifetimeArb,
          (facts, x, y, z) =>
            !lifetimeOutlives(facts, x, y) ||
            !lifetimeOutlives(facts, y, z) ||
            lifetimeOutlives(facts, x, z)
        )
      );
    });

    it("should entail every fact it was given", () => {
      fc.assert(
        fc.property(factsArb, (facts) =>
          facts.every((fact) => entails(facts, fact))
        )
      );
    });
  });

  describe("typeOutlives", () => {
    it("should require every lifetime argument to outlive", () => {
      expect(typeOutlives([outlives(a, b)], refTo("a", INT), b)).to.equal(true);
      expect(typeOutlives([], refTo("a", INT), b)).to.equal(false);
      expect(typeOutlives([], INT, b)).to.equal(true);
    });

    it("should only trust recorded facts about type parameters", () => {
      const t = typeParam("T");
      expect(typeOutlives([], t, a)).to.equal(false);
      expect(typeOutlives([typeFact(t, staticLifetime)], t, a)).to.equal(true);
      expect(typeOutlives([typeFact(t, b)], t, a)).to.equal(false);
    });

    it("should treat uninitialized types as outliving everything", () => {
      expect(typeOutlives([], uninit(8), a)).to.equal(true);
    });
  });

  describe("obligationsEquivalent", () => {
    it("should compare by entailment rather than by listing", () => {
      const chain = [outlives(a, b), outlives(b, c)];
      expect(
        obligationsEquivalent(chain, [...chain, outlives(a, c)])
      ).to.equal(true);
      expect(obligationsEquivalent(chain, [outlives(a, c)])).to.equal(false);
    });
  });

  describe("mentionsOnlyActive", () => {
    it("should report the first inactive lifetime", () => {
      const result = mentionsOnlyActive(refTo("a", INT), flow([]).lifetimes);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("DanglingLifetime");
        expect(result.error.message).to.equal(
          "Ref<'a, Int> mentions 'a, which is not active"
        );
        expect(result.error.actual).to.equal("['static]");
      }
    });
  });

  describe("beginLifetime", () => {
    const store = preludeStore();

    it("should make every active lifetime outlive the new one", () => {
      const begun = unwrapOk(beginLifetime(store, b, flow([], ["a"])));

      expect(activeLifetimes(begun)).to.equal("['static, 'a, 'b]");
      expect(formatObligations(begun.obligations)).to.equal(
        "['static: 'b, 'a: 'b]"
      );
    });

    it("should reject a lifetime that is already active", () => {
      const result = beginLifetime(store, a, flow([], ["a"]));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MalformedContext");
        expect(result.error.message).to.equal("'a begins while already active");
      }
    });

    it("should reject beginning a lifetime parameter", () => {
      const generic = storeFor(
        makeFunction({ lifetimeParameters: ["p"], labels: [] })
      );
      const result = beginLifetime(generic, lifetime("p"), flow([], ["p"]));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MalformedContext");
      }
    });

    it("should reject beginning 'static", () => {
      expect(beginLifetime(store, staticLifetime, flow([])).ok).to.equal(false);
    });
  });

  describe("endLifetime", () => {
    const store = preludeStore();

    it("should deactivate a lifetime and keep the obligations", () => {
      const begun = unwrapOk(beginLifetime(store, a, flow([])));
      const ended = unwrapOk(endLifetime(store, a, begun));

      expect(activeLifetimes(ended)).to.equal("['static]");
      expect(formatObligations(ended.obligations)).to.equal("['static: 'a]");
    });

    it("should reject ending an inactive lifetime", () => {
      const result = endLifetime(store, a, flow([]));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("DanglingLifetime");
        expect(result.error.message).to.equal("'a ends while not active");
      }
    });

    it("should reject ending a lifetime a location still mentions", () => {
      const state = flow([bind(local("r"), refTo("a", INT))], ["a"]);
      const result = endLifetime(store, a, state);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("DanglingLifetime");
        expect(result.error.locations).to.deep.equal(["r"]);
      }
    });

    it("should reject ending a lifetime before a shorter one", () => {
      const outer = unwrapOk(beginLifetime(store, a, flow([])));
      const inner = unwrapOk(beginLifetime(store, b, outer));
      const result = endLifetime(store, a, inner);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("ObligationUnproved");
        expect(result.error.message).to.equal(
          "'b stays active but is not known to outlive 'a"
        );
        expect(result.error.expected).to.equal("'b: 'a");
      }
    });

    it("should reject ending a lifetime something active relies on", () => {
      const state = flow([], ["a", "b"], [outlives(a, b), outlives(b, a)]);
      const result = endLifetime(store, b, state);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("ObligationUnproved");
        expect(result.error.message).to.equal(
          "'b ends but is required to outlive 'a, which stays active"
        );
      }
    });
  });

  describe("call obligations", () => {
    const store = preludeStore();
    const shorten: IrFunctionSignature = {
      name: "shorten",
      typeParameters: [{ name: "T", size: 16 }],
      lifetimeParameters: ["x", "y"],
      parameters: [],
      returnType: INT,
      whereClause: [
        outlives(lifetime("x"), lifetime("y")),
        traitBound("Copy", typeParam("T")),
      ],
    };

    it("should substitute the call's arguments into the where-clause", () => {
      const clauses = instantiateWhereClause(shorten, [VEC], [a, b]);
      expect(clauses.map(formatWhereClause)).to.deep.equal([
        "'a: 'b",
        "Vec: Copy",
      ]);
    });

    it("should accept outlives bounds that hold at the call site", () => {
      const copyable: IrFunctionSignature = {
        ...shorten,
        whereClause: [outlives(lifetime("x"), lifetime("y"))],
      };
      const state = flow([], ["a", "b"], [outlives(a, b)]);
      expect(checkCallObligations(store, state, copyable, [VEC], [a, b]).ok).to.equal(
        true
      );
    });

    it("should reject outlives bounds that do not hold", () => {
      const state = flow([], ["a", "b"], [outlives(a, b)]);
      const result = checkCallObligations(store, state, shorten, [VEC], [b, a]);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("ObligationUnproved");
        expect(result.error.expected).to.equal("'b: 'a");
        expect(result.error.actual).to.equal("['a: 'b]");
      }
    });

    it("should reject trait bounds without an impl", () => {
      const state = flow([], ["a", "b"], [outlives(a, b)]);
      const result = checkCallObligations(store, state, shorten, [VEC], [a, b]);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("UnresolvedTraitBound");
      }
    });

    it("should reject inactive lifetime arguments", () => {
      const result = checkCallObligations(store, flow([], ["a"]), shorten, [VEC], [a, c]);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("DanglingLifetime");
        expect(result.error.message).to.equal(
          "lifetime argument 'c of 'shorten' is not active"
        );
      }
    });
  });
});
