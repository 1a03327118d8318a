/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  atLabel,
  createDiagnostic,
  formatDiagnostic,
  withRule,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "UseAfterMove",
        "x is used while uninitialized",
        {
          rule: "assign",
          actual: "Uninit<4>",
          locations: ["x"],
          hint: "Assign x before reading it",
        }
      );

      expect(diagnostic.code).to.equal("UseAfterMove");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.message).to.equal("x is used while uninitialized");
      expect(diagnostic.rule).to.equal("assign");
      expect(diagnostic.actual).to.equal("Uninit<4>");
      expect(diagnostic.locations).to.deep.equal(["x"]);
      expect(diagnostic.hint).to.equal("Assign x before reading it");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("DoubleInit", "x");

      expect(diagnostic.locations).to.deep.equal([]);
      expect(diagnostic.rule).to.be.undefined;
      expect(diagnostic.source).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("withRule and atLabel", () => {
    it("should keep a rule set by a nested check", () => {
      const inner = createDiagnostic("TypeMismatch", "bad", { rule: "exit" });
      expect(withRule(inner, "successor").rule).to.equal("exit");
    });

    it("should attach a rule when none is set", () => {
      const inner = createDiagnostic("TypeMismatch", "bad");
      expect(withRule(inner, "successor").rule).to.equal("successor");
    });

    it("should attach function and label once", () => {
      const first = atLabel(createDiagnostic("DoubleInit", "x"), "main", "l1");
      const second = atLabel(first, "other", "l2");

      expect(second.functionName).to.equal("main");
      expect(second.label).to.equal("l1");
    });
  });

  describe("formatDiagnostic", () => {
    it("should format every part in order", () => {
      const diagnostic = atLabel(
        withRule(
          createDiagnostic("TypeMismatch", "bad", {
            expected: "Int",
            actual: "Bool",
            locations: ["x", "y"],
            hint: "h",
          }),
          "successor"
        ),
        "main",
        "l1"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "main@l1: error TypeMismatch: [successor] bad (at x, y) expected Int actual Bool Hint: h"
      );
    });

    it("should format a source position", () => {
      const diagnostic = createDiagnostic("InvalidProgram", "expected a list", {
        rule: "load",
        source: { file: "p.yaml", path: "functions[0].locals" },
      });

      expect(formatDiagnostic(diagnostic)).to.equal(
        "p.yaml:functions[0].locals error InvalidProgram: [load] expected a list"
      );
    });

    it("should format a bare diagnostic", () => {
      expect(formatDiagnostic(createDiagnostic("DoubleInit", "x"))).to.equal(
        "error DoubleInit: x"
      );
    });
  });
});
