/**
 * Tests for Result constructors
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { error, fail, ok } from "./result.js";

describe("Result", () => {
  it("should wrap a value", () => {
    expect(ok<number, string>(42)).to.deep.equal({ ok: true, value: 42 });
  });

  it("should wrap an error", () => {
    expect(error<number, string>("boom")).to.deep.equal({
      ok: false,
      error: "boom",
    });
  });

  it("should wrap a diagnostic", () => {
    const result = fail<number>(
      "PGW2002",
      "a.ts: generated source does not parse",
      "a.ts:1:1: oops"
    );
    expect(result).to.deep.equal({
      ok: false,
      error: {
        code: "PGW2002",
        severity: "error",
        message: "a.ts: generated source does not parse",
        location: undefined,
        hint: undefined,
        detail: "a.ts:1:1: oops",
      },
    });
  });

  it("should leave detail unset when absent", () => {
    const result = fail<number>("PGW1001", "bad");
    expect(!result.ok && result.error.detail).to.equal(undefined);
  });
});
