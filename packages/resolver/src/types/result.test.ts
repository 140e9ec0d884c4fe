/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      expect(ok<number, string>(42)).to.deep.equal({ ok: true, value: 42 });
    });

    it("should create error result", () => {
      expect(error<number, string>("Something went wrong")).to.deep.equal({
        ok: false,
        error: "Something went wrong",
      });
    });
  });

  describe("map", () => {
    it("should map ok value", () => {
      expect(map(ok<number, string>(5), (x) => x * 2)).to.deep.equal({
        ok: true,
        value: 10,
      });
    });

    it("should pass the error through", () => {
      const result = map(error<number, string>("bad"), (x) => x * 2);
      expect(result).to.deep.equal({ ok: false, error: "bad" });
    });
  });

  describe("flatMap", () => {
    const half = (x: number) =>
      x % 2 === 0 ? ok<number, string>(x / 2) : error<number, string>("odd");

    it("should chain ok results", () => {
      expect(flatMap(ok<number, string>(8), half)).to.deep.equal({ ok: true, value: 4 });
    });

    it("should return the first error", () => {
      expect(flatMap(ok<number, string>(3), half)).to.deep.equal({
        ok: false,
        error: "odd",
      });
      expect(flatMap(error<number, string>("first"), half)).to.deep.equal({
        ok: false,
        error: "first",
      });
    });
  });
});
