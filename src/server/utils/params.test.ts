import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../core/errors";
import { accessParam, boolParam, bytesParam, fieldsOf, intParam, whenceParam } from "./params";

describe("params", () => {
  it("parses integers from query strings and payloads", () => {
    expect(intParam("42", "offset")).toBe(42);
    expect(intParam(7, "count")).toBe(7);
    expect(intParam(undefined, "offset", 0)).toBe(0);
    expect(() => intParam(undefined, "len")).toThrow("missing len");
    expect(() => intParam("-1", "offset")).toThrow(InvalidArgumentError);
    expect(() => intParam("1.5", "offset")).toThrow("invalid offset: 1.5");
    expect(() => intParam(["1"], "offset")).toThrow(InvalidArgumentError);
  });

  it("accepts only known access modes and whences", () => {
    expect(accessParam(undefined)).toBe("r");
    expect(accessParam("w")).toBe("w");
    expect(() => accessParam("x")).toThrow("invalid access mode: x");
    expect(whenceParam("end")).toBe("end");
    expect(() => whenceParam(2)).toThrow(InvalidArgumentError);
  });

  it("reads flags and payload shapes", () => {
    expect(boolParam("true")).toBe(true);
    expect(boolParam("no")).toBe(false);
    expect(fieldsOf(null)).toEqual({});
    expect(fieldsOf({ minor: 1 })).toEqual({ minor: 1 });
    expect(Array.from(bytesParam("hi", "data"))).toEqual([104, 105]);
    expect(Array.from(bytesParam(new Uint8Array([1, 2]).buffer, "data"))).toEqual([1, 2]);
    expect(() => bytesParam(5, "data")).toThrow("invalid data: expected bytes");
  });
});
