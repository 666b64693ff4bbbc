import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { canonicalize } from "./canonical-json.js";

describe("canonicalize", () => {
  it("sorts object keys", () => {
    expect(canonicalize({ unit: "celsius", kind: "sensor", reading: 21.5 })).toBe(
      '{"kind":"sensor","reading":21.5,"unit":"celsius"}',
    );
  });

  it("sorts nested keys and keeps array order", () => {
    expect(canonicalize({ b: [{ y: 1, x: 2 }, 3], a: null })).toBe('{"a":null,"b":[{"x":2,"y":1},3]}');
  });

  it("drops undefined members", () => {
    expect(canonicalize({ a: 1, b: undefined })).toBe('{"a":1}');
  });

  it("serializes primitives like JSON.stringify", () => {
    expect(canonicalize("a/b+c=")).toBe('"a/b+c="');
    expect(canonicalize(-12.34)).toBe("-12.34");
    expect(canonicalize(true)).toBe("true");
    expect(canonicalize(undefined)).toBe("null");
  });

  it("rejects values JSON cannot carry", () => {
    expect(() => canonicalize(1n)).toThrow(TypeError);
  });

  it("is independent of key insertion order", () => {
    fc.assert(
      fc.property(fc.dictionary(fc.string(), fc.jsonValue()), (record) => {
        const reversed = Object.fromEntries(Object.entries(record).reverse());
        expect(canonicalize(reversed)).toBe(canonicalize(record));
      }),
    );
  });

  it("always produces parseable JSON", () => {
    fc.assert(
      fc.property(fc.jsonValue(), (value) => {
        expect(() => JSON.parse(canonicalize(value))).not.toThrow();
      }),
    );
  });
});
