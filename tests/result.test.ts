import { describe, it, expect } from "vitest";
import { ok, err, isOk, isErr, andThen, type Result } from "../src/result.js";

describe("Result helpers", () => {
  it("ok/err and type guards", () => {
    const a = ok(1);
    expect(isOk(a)).toBe(true);
    expect(isErr(a)).toBe(false);

    const b = err("nope");
    expect(isOk(b)).toBe(false);
    expect(isErr(b)).toBe(true);
  });

  it("andThen chains successful results and short-circuits on Err", () => {
    const a: Result<number, string> = ok(2);
    const a2 = andThen(a, (x) => ok(x * 5));
    expect(a2).toEqual({ ok: true, value: 10 });

    const b: Result<number, string> = err("fail");
    let called = false;
    const b2 = andThen(b, (x: number) => {
      called = true;
      return ok(x * 2);
    });
    expect(b2).toEqual({ ok: false, error: "fail" });
    expect(called).toBe(false);
  });
});
