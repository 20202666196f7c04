import { describe, it, expect } from "vitest";
import { encodeLiteral, KdlError } from "../src/kdl/index.js";
import { catchKdlError } from "./utils/catchKdlError.js";

describe("encodeLiteral", () => {
  it("should encode null and booleans as bare tokens", () => {
    expect(encodeLiteral({ kind: "null" })).toBe("null");
    expect(encodeLiteral({ kind: "bool", value: true })).toBe("true");
    expect(encodeLiteral({ kind: "bool", value: false })).toBe("false");
  });

  it("should encode numbers unquoted", () => {
    expect(encodeLiteral({ kind: "int", value: 42 })).toBe("42");
    expect(encodeLiteral({ kind: "int", value: -7 })).toBe("-7");
    expect(encodeLiteral({ kind: "int", value: 9007199254740993n })).toBe(
      "9007199254740993"
    );
    expect(encodeLiteral({ kind: "float", value: 0.5 })).toBe("0.5");
    expect(encodeLiteral({ kind: "float", value: -1.25 })).toBe("-1.25");
  });

  it("should keep a fractional part on whole floats", () => {
    expect(encodeLiteral({ kind: "float", value: 1 })).toBe("1.0");
    expect(encodeLiteral({ kind: "float", value: -3 })).toBe("-3.0");
    expect(encodeLiteral({ kind: "float", value: 0 })).toBe("0.0");
    expect(encodeLiteral({ kind: "float", value: 1e21 })).toBe("1e+21");
    expect(encodeLiteral({ kind: "float", value: 1e-7 })).toBe("1e-7");
  });

  it("should quote strings and escape newlines and double quotes", () => {
    expect(encodeLiteral({ kind: "string", value: "us" })).toBe('"us"');
    expect(encodeLiteral({ kind: "string", value: 'a"b\nc' })).toBe(
      '"a\\"b\\nc"'
    );
    expect(encodeLiteral({ kind: "string", value: "" })).toBe('""');
  });

  it("should leave backslashes and tabs untouched", () => {
    expect(encodeLiteral({ kind: "string", value: "C:\\dir\tx" })).toBe(
      '"C:\\dir\tx"'
    );
  });

  it("should reject mappings and sequences", () => {
    const mapping = () =>
      encodeLiteral({
        kind: "mapping",
        body: { args: [], props: [], orderedChildren: [], extra: [] },
      });
    expect(mapping).toThrow(KdlError);
    expect(mapping).toThrow(
      "Cannot convert value of type mapping to KDL literal: { ... } (at /)"
    );

    expect(
      catchKdlError(() => encodeLiteral({ kind: "sequence", items: [] }))
    ).toEqual({
      type: "unsupportedLiteralType",
      path: "",
      valueType: "sequence",
      value: "[ ... ]",
    });
  });

  it("should reject non-finite floats", () => {
    expect(() => encodeLiteral({ kind: "float", value: Number.NaN })).toThrow(
      "Cannot convert value of type float to KDL literal: NaN (at /)"
    );
    expect(() =>
      encodeLiteral({ kind: "float", value: Number.POSITIVE_INFINITY })
    ).toThrow(KdlError);
  });
});
