import { describe, expect, it } from "vitest";

import { canonicalJson, canonicalize, deepFreeze, pointerFromSegments, prettyCanonicalJson } from "../src/index.js";

describe("canonical JSON", () => {
  it("sorts keys, drops undefined entries and rounds float noise", () => {
    expect(canonicalJson({ b: 1, a: { d: undefined, c: [0.1 + 0.2] } })).toBe('{"a":{"c":[0.3]},"b":1}\n');
  });

  it("pretty prints with two-space indentation", () => {
    expect(prettyCanonicalJson({ z: null, a: true })).toBe('{\n  "a": true,\n  "z": null\n}\n');
  });

  it("normalizes negative zero and non-finite numbers", () => {
    expect(Object.is(canonicalize(-0), 0)).toBe(true);
    expect(canonicalize(Number.POSITIVE_INFINITY)).toBe("Infinity");
    expect(canonicalize(Number.NaN)).toBe("NaN");
  });

  it("sorts set members", () => {
    expect(canonicalize(new Set(["XC4", "XA1", "XD2"]))).toEqual(["XA1", "XC4", "XD2"]);
  });

  it("rejects values JSON cannot carry", () => {
    expect(() => canonicalize(undefined)).toThrow(TypeError);
    expect(() => canonicalize(new Date(0))).toThrow("cannot canonicalize value of type object");
  });

  it("escapes JSON pointer segments", () => {
    expect(pointerFromSegments([])).toBe("/");
    expect(pointerFromSegments(["mat_comp", 0, "a/b", "c~d"])).toBe("/mat_comp/0/a~1b/c~0d");
  });
});

describe("deepFreeze", () => {
  it("freezes nested objects and arrays", () => {
    const frozen = deepFreeze({ table: { XC4: { min_cement_content: 300 } }, classes: ["XC4"] });
    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.table.XC4)).toBe(true);
    expect(Object.isFrozen(frozen.classes)).toBe(true);
  });
});
