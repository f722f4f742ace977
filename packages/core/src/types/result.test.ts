/**
 * Tests for Result helpers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ok,
  error,
  map,
  flatMap,
  mapError,
  all,
  type Result,
} from "./result.js";

describe("Result", () => {
  describe("map and flatMap", () => {
    it("should map an ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass an error through map", () => {
      const mapped = map(error<number, string>("bad alias"), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: false, error: "bad alias" });
    });

    it("should chain with flatMap", () => {
      const halve = (x: number): Result<number, string> =>
        x % 2 === 0 ? ok(x / 2) : error(`${x} is odd`);

      expect(flatMap(ok<number, string>(8), halve)).to.deep.equal({
        ok: true,
        value: 4,
      });
      expect(flatMap(ok<number, string>(3), halve)).to.deep.equal({
        ok: false,
        error: "3 is odd",
      });
    });
  });

  describe("mapError", () => {
    it("should map the error value only", () => {
      const failed = mapError(error<number, string>("cycle"), (e) =>
        e.toUpperCase()
      );
      const passed = mapError(ok<number, string>(1), (e) => e.toUpperCase());

      expect(failed).to.deep.equal({ ok: false, error: "CYCLE" });
      expect(passed).to.deep.equal({ ok: true, value: 1 });
    });
  });

  describe("all", () => {
    it("should collect ok values in order", () => {
      const collected = all([ok<number, string>(1), ok<number, string>(2)]);
      expect(collected).to.deep.equal({ ok: true, value: [1, 2] });
    });

    it("should return the first error", () => {
      const collected = all([
        ok<number, string>(1),
        error<number, string>("first"),
        error<number, string>("second"),
      ]);
      expect(collected).to.deep.equal({ ok: false, error: "first" });
    });

    it("should stop consuming the input at the first error", () => {
      const seen: number[] = [];
      function* results(): Generator<Result<number, string>> {
        for (const n of [1, 2, 3]) {
          seen.push(n);
          yield n === 2 ? error("stop") : ok(n);
        }
      }

      expect(all(results()).ok).to.equal(false);
      expect(seen).to.deep.equal([1, 2]);
    });
  });
});
