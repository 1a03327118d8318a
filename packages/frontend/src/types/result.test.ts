/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { Result } from "./result.js";
import { ok, error, map, foldResults } from "./result.js";

const sizeOf = (name: string): Result<number, string> =>
  name === "Int" ? ok(4) : name === "Vec" ? ok(16) : error(`unknown type '${name}'`);

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      expect(ok<number, string>(4)).to.deep.equal({ ok: true, value: 4 });
    });

    it("should create error result", () => {
      expect(error<number, string>("unknown type 'Foo'")).to.deep.equal({
        ok: false,
        error: "unknown type 'Foo'",
      });
    });
  });

  describe("map", () => {
    it("should transform the value of an ok result", () => {
      expect(map(sizeOf("Vec"), (size) => `Uninit<${size}>`)).to.deep.equal({
        ok: true,
        value: "Uninit<16>",
      });
    });

    it("should pass an error through unchanged", () => {
      expect(map(sizeOf("Foo"), (size) => size * 2)).to.deep.equal({
        ok: false,
        error: "unknown type 'Foo'",
      });
    });
  });

  describe("foldResults", () => {
    it("should thread the state through every step", () => {
      const total = foldResults(["Int", "Vec", "Int"], 0, (sum, name) =>
        map(sizeOf(name), (size) => sum + size)
      );
      expect(total).to.deep.equal({ ok: true, value: 24 });
    });

    it("should pass each item's index to the step", () => {
      const none: readonly number[] = [];
      const indices = foldResults(["a", "b"], none, (seen, _item, index) =>
        ok<readonly number[], string>([...seen, index])
      );
      expect(indices).to.deep.equal({ ok: true, value: [0, 1] });
    });

    it("should stop at the first failing step", () => {
      const visited: string[] = [];
      const total = foldResults(["Int", "Foo", "Bar"], 0, (sum, name) => {
        visited.push(name);
        return map(sizeOf(name), (size) => sum + size);
      });

      expect(total).to.deep.equal({ ok: false, error: "unknown type 'Foo'" });
      expect(visited).to.deep.equal(["Int", "Foo"]);
    });

    it("should return the initial state for no items", () => {
      expect(foldResults<number, string, string>([], 7, () => error("never"))).to.deep.equal({
        ok: true,
        value: 7,
      });
    });
  });
});
