import { describe, expect, it } from "vitest";
import { FtlError, fail, ok, unwrap } from "../src/errors";

describe("FtlError", () => {
  it("carries its code and name", () => {
    const error = new FtlError("E_NOT_MAPPED", "Logical address 4 is not mapped");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("FtlError");
    expect(error.code).toBe("E_NOT_MAPPED");
  });
});

describe("results", () => {
  it("unwraps successful results", () => {
    expect(unwrap(ok(12))).toBe(12);
  });

  it("throws the carried error on failure", () => {
    const result = fail<number>("E_STORAGE_EXHAUSTED", "full");
    expect(() => unwrap(result)).toThrow(FtlError);
    expect(() => unwrap(result)).toThrow("full");
  });
});
