/**
 * Tests for NodeType resolution and edge checks
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";
import type { IrLifetime, IrType } from "@typestate/frontend";
import { builders, formatType } from "@typestate/frontend";
import { lookupLocation } from "./location-context.js";
import {
  checkEntry,
  checkExit,
  checkSuccessor,
  isNodeTypeSubtype,
  resolveNodeType,
} from "./node-type.js";
import {
  BOOL,
  INT,
  VEC,
  flow,
  makeFunction,
  option,
  preludeStore,
  refTo,
  storeFor,
  unwrapOk,
} from "./test-harness.js";

const {
  absurd,
  bind,
  lifetime,
  local,
  nodeType,
  outlives,
  param,
  ret,
  staticLifetime,
  staticLocation,
  uninit,
} = builders;

const a = lifetime("a");
const b = lifetime("b");

const fn = makeFunction({
  parameters: [{ name: "p", type: INT }],
  locals: ["x"],
  labels: [],
});

const exitState = (x: IrType = uninit(16), r: IrType = INT) =>
  flow([bind(param("p"), uninit(4)), bind(local("x"), x), bind(ret, r)]);

describe("Node Types", () => {
  const store = preludeStore({
    statics: [{ name: "LIMIT", type: INT }],
  });

  describe("resolveNodeType", () => {
    const complete = [
      bind(param("p"), INT),
      bind(local("x"), uninit(16)),
      bind(ret, uninit(4)),
    ];

    it("should fill in unmentioned statics", () => {
      const state = unwrapOk(resolveNodeType(store, fn, nodeType(complete)));
      const limit = lookupLocation(state.locations, staticLocation("LIMIT"));

      expect(state.locations.size).to.equal(4);
      expect(limit && formatType(limit)).to.equal("Int");
    });

    it("should require 'static to be active", () => {
      const result = resolveNodeType(store, fn, nodeType(complete, [a]));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MalformedContext");
        expect(result.error.message).to.equal(
          "'static is missing from the active lifetimes"
        );
      }
    });

    it("should require every parameter, local and the return slot", () => {
      const result = resolveNodeType(
        store,
        fn,
        nodeType([bind(param("p"), INT)])
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MalformedContext");
        expect(result.error.locations).to.deep.equal(["x", "ret"]);
      }
    });

    it("should reject undeclared locations", () => {
      const result = resolveNodeType(
        store,
        fn,
        nodeType([...complete, bind(local("y"), INT)])
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal("y is not declared by 'f'");
      }
    });

    it("should hold statics to their declared type", () => {
      const result = resolveNodeType(
        store,
        fn,
        nodeType([...complete, bind(staticLocation("LIMIT"), BOOL)])
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TypeMismatch");
        expect(result.error.expected).to.equal("Int");
        expect(result.error.actual).to.equal("Bool");
      }
    });

    it("should reject types mentioning inactive lifetimes", () => {
      const borrowing = makeFunction({ locals: ["r"], labels: [] });
      const result = resolveNodeType(
        store,
        borrowing,
        nodeType([bind(local("r"), refTo("a", INT)), bind(ret, uninit(4))])
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MalformedContext");
        expect(result.error.locations).to.deep.equal(["r"]);
      }
    });

    it("should reject obligations mentioning inactive lifetimes", () => {
      const result = resolveNodeType(
        store,
        fn,
        nodeType(complete, [staticLifetime, a], [outlives(a, b)])
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "obligation 'a: 'b mentions 'b, which is not active"
        );
      }
    });
  });

  describe("isNodeTypeSubtype", () => {
    const lifetimeArb = fc.constantFrom<IrLifetime>(staticLifetime, a, b);
    const factsArb = fc.array(
      fc.tuple(lifetimeArb, lifetimeArb).map(([l, s]) => outlives(l, s)),
      { maxLength: 6 }
    );
    const locations = [bind(local("x"), option(INT, ["Some"]))];

    it("should be reflexive", () => {
      fc.assert(
        fc.property(factsArb, (facts) => {
          const state = flow(locations, ["a", "b"], facts);
          return isNodeTypeSubtype(store, state, state);
        })
      );
    });

    it("should let a state with more facts stand for one with fewer", () => {
      fc.assert(
        fc.property(factsArb, factsArb, (facts, extra) =>
          isNodeTypeSubtype(
            store,
            flow(locations, ["a", "b"], [...facts, ...extra]),
            flow(locations, ["a", "b"], facts)
          )
        )
      );
    });

    it("should be transitive along refinements", () => {
      const none = flow([bind(local("x"), option(INT, []))]);
      const some = flow(locations);
      const any = flow([bind(local("x"), option(INT))]);

      expect(isNodeTypeSubtype(store, none, some)).to.equal(true);
      expect(isNodeTypeSubtype(store, some, any)).to.equal(true);
      expect(isNodeTypeSubtype(store, none, any)).to.equal(true);
      expect(isNodeTypeSubtype(store, any, some)).to.equal(false);
    });

    describe("over generated states", () => {
      const bindingTypeArb = fc.oneof(
        fc.constant<IrType>(uninit(24)),
        fc.constant<IrType>(absurd),
        fc.constant(option(INT)),
        fc.subarray(["Some", "None"]).map((variants) => option(INT, variants))
      );
      const factPool = [outlives(a, b), outlives(b, a), outlives(a, staticLifetime)];
      const shapeArb = fc.record({
        withY: fc.boolean(),
        lifetimes: fc.subarray(["a", "b"]),
      });
      const stateOf = (shape: { withY: boolean; lifetimes: string[] }) =>
        fc
          .record({
            x: bindingTypeArb,
            y: bindingTypeArb,
            facts: fc.subarray(factPool),
          })
          .map(({ x, y, facts }) =>
            flow(
              [
                bind(local("x"), x),
                ...(shape.withY ? [bind(local("y"), y)] : []),
              ],
              shape.lifetimes,
              facts
            )
          );
      const stateArb = shapeArb.chain(stateOf);

      it("should be reflexive", () => {
        fc.assert(
          fc.property(stateArb, (state) =>
            isNodeTypeSubtype(store, state, state)
          )
        );
      });

      it("should be transitive", () => {
        const chainArb = shapeArb.chain((shape) =>
          fc.tuple(stateOf(shape), stateOf(shape), stateOf(shape))
        );
        fc.assert(
          fc.property(
            chainArb,
            ([first, second, third]) =>
              !isNodeTypeSubtype(store, first, second) ||
              !isNodeTypeSubtype(store, second, third) ||
              isNodeTypeSubtype(store, first, third)
          ),
          { numRuns: 1000 }
        );
      });

      it("should reject states over different locations", () => {
        fc.assert(
          fc.property(
            stateOf({ withY: true, lifetimes: [] }),
            stateOf({ withY: false, lifetimes: [] }),
            (wide, narrow) =>
              !isNodeTypeSubtype(store, wide, narrow) &&
              !isNodeTypeSubtype(store, narrow, wide)
          )
        );
      });
    });

    it("should require equal lifetime sets", () => {
      expect(
        isNodeTypeSubtype(store, flow(locations, ["a"]), flow(locations))
      ).to.equal(false);
    });
  });

  describe("checkSuccessor", () => {
    it("should accept anything from an unreachable state", () => {
      const dead = flow([bind(local("x"), absurd)], ["a"]);
      expect(checkSuccessor(store, dead, flow([bind(local("x"), VEC)])).ok).to.equal(
        true
      );
    });

    it("should reject differing lifetime sets", () => {
      const result = checkSuccessor(store, flow([], ["a"]), flow([]));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TypeMismatch");
        expect(result.error.expected).to.equal("['static]");
        expect(result.error.actual).to.equal("['static, 'a]");
      }
    });

    it("should reject obligations the current point does not entail", () => {
      const result = checkSuccessor(
        store,
        flow([], ["a", "b"]),
        flow([], ["a", "b"], [outlives(a, b)])
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("ObligationUnproved");
        expect(result.error.expected).to.equal("'a: 'b");
      }
    });
  });

  describe("checkExit", () => {
    it("should accept uninitialized slots and a returned value", () => {
      expect(checkExit(store, fn, exitState()).ok).to.equal(true);
    });

    it("should reject a local that still holds a value", () => {
      const result = checkExit(store, fn, exitState(VEC));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TypeMismatch");
        expect(result.error.message).to.equal(
          "x still holds Vec when 'f' returns"
        );
      }
    });

    it("should reject a return slot of the wrong type", () => {
      const result = checkExit(store, fn, exitState(uninit(16), uninit(4)));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal("'f' must return Int");
        expect(result.error.actual).to.equal("Uninit<4>");
      }
    });

    it("should reject local lifetimes still active", () => {
      const state = {
        ...exitState(),
        lifetimes: flow([], ["a"]).lifetimes,
      };
      const result = checkExit(store, fn, state);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TypeMismatch");
      }
    });

    it("should hold the where-clause in force", () => {
      const bounded = makeFunction({
        lifetimeParameters: ["a", "b"],
        whereClause: [outlives(a, b)],
        labels: [],
      });
      const slots = [bind(ret, INT)];
      const boundedStore = storeFor(bounded);

      expect(
        checkExit(boundedStore, bounded, flow(slots, ["a", "b"], [outlives(a, b)])).ok
      ).to.equal(true);

      const missing = checkExit(boundedStore, bounded, flow(slots, ["a", "b"]));
      expect(missing.ok).to.equal(false);
      if (!missing.ok) {
        expect(missing.error.code).to.equal("ObligationUnproved");
        expect(missing.error.expected).to.equal("'a: 'b");
      }

      const extra = checkExit(
        boundedStore,
        bounded,
        flow(slots, ["a", "b"], [outlives(a, b), outlives(b, a)])
      );
      expect(extra.ok).to.equal(false);
      if (!extra.ok) {
        expect(extra.error.code).to.equal("ObligationUnproved");
        expect(extra.error.expected).to.equal("'b: 'a");
      }
    });
  });

  describe("checkEntry", () => {
    it("should accept a parameter entering at a supertype", () => {
      const optional = makeFunction({
        parameters: [{ name: "p", type: option(INT, ["Some"]) }],
        labels: [],
      });
      const entry = flow([bind(param("p"), option(INT)), bind(ret, uninit(4))]);
      expect(checkEntry(store, optional, entry).ok).to.equal(true);
    });

    it("should reject a parameter entering at an unrelated type", () => {
      const entry = flow([
        bind(param("p"), BOOL),
        bind(local("x"), uninit(16)),
        bind(ret, uninit(4)),
      ]);
      const result = checkEntry(store, fn, entry);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal("parameter p enters as Int");
        expect(result.error.actual).to.equal("Bool");
      }
    });

    it("should reject an initialized local", () => {
      const entry = flow([
        bind(param("p"), INT),
        bind(local("x"), VEC),
        bind(ret, uninit(4)),
      ]);
      const result = checkEntry(store, fn, entry);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "x must be uninitialized at entry"
        );
      }
    });
  });
});
