import { describe, expect, it } from "vitest";

import { ERROR_CODES, failure, formatFailure, mapValue, ok, type Result } from "../src/index.js";

describe("result helpers", () => {
  it("omits the warnings key when there are none", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect("warnings" in ok(1, ["  ", ""])).toBe(false);
  });

  it("trims, dedupes and sorts warnings", () => {
    expect(ok("x", [" beta ", "alpha", "beta", ""]).warnings).toEqual(["alpha", "beta"]);
  });

  it("canonicalizes failure details", () => {
    const result = failure(ERROR_CODES.invalidRecord, "bad record", { b: 1, a: { d: undefined, c: 2 } });
    expect(result.error).toEqual({ code: "E_INVALID_RECORD", explain: "bad record", details: { a: { c: 2 }, b: 1 } });
    expect(formatFailure(result)).toBe('E_INVALID_RECORD: bad record | details={"a":{"c":2},"b":1}');
  });

  it("formats failures without details", () => {
    expect(formatFailure(failure(ERROR_CODES.regulationNotFound, "missing"))).toBe("E_REGULATION_NOT_FOUND: missing");
    expect(formatFailure(ok(3))).toBe("ok");
  });

  it("maps values and keeps warnings", () => {
    const mapped = mapValue(ok(2, ["w"]), (value) => value * 10);
    expect(mapped).toEqual({ ok: true, value: 20, warnings: ["w"] });
    const failed: Result<number> = failure(ERROR_CODES.providerFailure, "down");
    expect(mapValue(failed, (value: number) => value + 1)).toBe(failed);
  });
});
