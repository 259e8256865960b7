import { describe, it, expect } from "vitest";
import { Ok, Err, toError } from "../src/result.js";

describe("Result", () => {
  it("Ok and Err build the two variants", () => {
    expect(Ok(42)).toEqual({ ok: true, value: 42 });
    expect(Err("failed")).toEqual({ ok: false, error: "failed" });
  });

  it("toError keeps Error instances and wraps everything else", () => {
    const error = new Error("boom");
    expect(toError(error)).toBe(error);
    expect(toError("text").message).toBe("text");
  });
});
