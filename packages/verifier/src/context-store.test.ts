/**
 * Tests for the context store
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { IrFunctionSignature, IrWhereClause } from "@typestate/frontend";
import { builders } from "@typestate/frontend";
import {
  createContextStore,
  extendContextStore,
  holds,
  isCopy,
  lookupPrimitive,
  lookupSignature,
  requireBound,
  sizeOf,
  variantsOf,
} from "./context-store.js";
import {
  INT,
  PRELUDE,
  VEC,
  makeFunction,
  option,
  preludeStore,
  refTo,
  storeFor,
  unwrapOk,
} from "./test-harness.js";

const { absurd, typeParam, traitBound, outlives, lifetime, uninit } = builders;

describe("Context Store", () => {
  describe("createContextStore", () => {
    it("should reject a type declared twice", () => {
      const result = createContextStore({
        ...PRELUDE,
        types: [
          ...PRELUDE.types,
          { name: "Int", typeParameters: [], lifetimeParameters: [], size: 8 },
        ],
      });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MalformedContext");
        expect(result.error.message).to.equal("type 'Int' is declared twice");
      }
    });

    it("should reject an uninitialized static", () => {
      const result = createContextStore({
        ...PRELUDE,
        statics: [{ name: "COUNTER", type: uninit(4) }],
      });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "static 'COUNTER' must have an initialized type"
        );
      }
    });

    it("should reject a static mentioning a local lifetime", () => {
      const result = createContextStore({
        ...PRELUDE,
        statics: [{ name: "R", type: refTo("a", INT) }],
      });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal("static 'R' may only mention 'static");
      }
    });

    describe("extern signatures", () => {
      const grab = (
        lifetimeParameters: readonly string[],
        whereClause: readonly IrWhereClause[]
      ): IrFunctionSignature => ({
        name: "grab",
        typeParameters: [],
        lifetimeParameters,
        parameters: [],
        returnType: refTo("a", INT),
        whereClause,
      });

      it("should reject a where-clause naming undeclared lifetimes", () => {
        const result = createContextStore({
          ...PRELUDE,
          externs: [grab(["a"], [outlives(lifetime("q"), lifetime("r"))])],
        });

        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error.code).to.equal("MalformedContext");
          expect(result.error.message).to.equal(
            "lifetime 'q' in the where-clause of 'grab' is not a parameter"
          );
        }
      });

      it("should reject a signature type naming an undeclared lifetime", () => {
        const result = createContextStore({ ...PRELUDE, externs: [grab([], [])] });

        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error.code).to.equal("MalformedContext");
          expect(result.error.message).to.equal(
            "lifetime 'a' in the signature of 'grab' is not a parameter"
          );
        }
      });

      it("should accept an extern that declares its lifetimes", () => {
        const store = unwrapOk(
          createContextStore({ ...PRELUDE, externs: [grab(["a"], [])] })
        );
        expect(store.signatures.has("grab")).to.equal(true);
        expect(store.lifetimeParameters.size).to.equal(0);
      });
    });

    it("should default the boolean type to Bool", () => {
      expect(preludeStore().boolType).to.equal("Bool");
      expect(
        unwrapOk(createContextStore(PRELUDE, { boolType: "Flag" })).boolType
      ).to.equal("Flag");
    });
  });

  describe("trait facts", () => {
    it("should find impl facts by lookup", () => {
      const store = preludeStore();
      expect(holds(store, INT, "Copy")).to.equal(true);
      expect(holds(store, VEC, "Copy")).to.equal(false);
    });

    it("should match generic impl patterns", () => {
      const store = preludeStore();
      expect(isCopy(store, refTo("x", VEC))).to.equal(true);
    });

    it("should treat the absurd type as Copy", () => {
      expect(isCopy(preludeStore(), absurd)).to.equal(true);
    });

    it("should report a missing bound", () => {
      const result = requireBound(preludeStore(), VEC, "Copy");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("UnresolvedTraitBound");
        expect(result.error.message).to.equal(
          "no impl or where-clause establishes Vec: Copy"
        );
      }
    });
  });

  describe("extendContextStore", () => {
    it("should add where-clause trait bounds as postulates", () => {
      const generic = makeFunction({
        typeParameters: [{ name: "T", size: 4 }],
        whereClause: [traitBound("Copy", typeParam("T"))],
        labels: [],
      });
      const plain = makeFunction({
        typeParameters: [{ name: "T", size: 4 }],
        labels: [],
      });

      expect(isCopy(storeFor(generic), typeParam("T"))).to.equal(true);
      expect(isCopy(storeFor(plain), typeParam("T"))).to.equal(false);
    });

    it("should reject a bound naming an undeclared lifetime", () => {
      const fn = makeFunction({
        lifetimeParameters: ["a"],
        whereClause: [outlives(lifetime("a"), lifetime("b"))],
        labels: [],
      });
      const result = extendContextStore(preludeStore(), fn);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MalformedContext");
        expect(result.error.message).to.equal(
          "lifetime 'b' in the where-clause of 'f' is not a parameter"
        );
      }
    });

    it("should reject a type parameter shadowing a declared type", () => {
      const fn = makeFunction({
        typeParameters: [{ name: "Int", size: 4 }],
        labels: [],
      });
      expect(extendContextStore(preludeStore(), fn).ok).to.equal(false);
    });
  });

  describe("sizes and variants", () => {
    it("should size declared types, parameters and absurd", () => {
      const store = storeFor(
        makeFunction({ typeParameters: [{ name: "T", size: 12 }], labels: [] })
      );

      expect(sizeOf(store, INT)).to.deep.equal({ ok: true, value: 4 });
      expect(sizeOf(store, typeParam("T"))).to.deep.equal({
        ok: true,
        value: 12,
      });
      expect(sizeOf(store, absurd)).to.deep.equal({ ok: true, value: "any" });
    });

    it("should prefer a refinement over the declared variants", () => {
      const store = preludeStore();
      expect(variantsOf(store, option(INT))).to.deep.equal(["Some", "None"]);
      expect(variantsOf(store, option(INT, ["None"]))).to.deep.equal(["None"]);
      expect(variantsOf(store, INT)).to.deep.equal([]);
    });
  });

  describe("lookups", () => {
    it("should report an unknown callee as an unresolved bound", () => {
      const result = lookupSignature(preludeStore(), "missing");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("UnresolvedTraitBound");
      }
    });

    it("should check primitive arity", () => {
      const result = lookupPrimitive(preludeStore(), "add", 1);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TypeMismatch");
        expect(result.error.message).to.equal(
          "primitive 'add' takes 2 operands, got 1"
        );
      }
    });
  });
});
