import { describe, expect, test } from "vitest";

import { resolveConfig } from "../src/config.js";

describe("resolveConfig", () => {
  test("defaults", () => {
    expect(resolveConfig(["main.plates"])).toEqual({
      ok: true,
      value: {
        files: ["main.plates"],
        maxDepth: 100_000,
        dialect: "params",
        debug: false,
        help: false,
      },
    });
  });

  test("accepts flags with separate or inline values", () => {
    const r = resolveConfig(["--seed", "42", "a.plates", "--max-depth=10", "--dialect=stack", "b.plates"]);
    expect(r.ok && r.value).toMatchObject({
      files: ["a.plates", "b.plates"],
      seed: 42,
      maxDepth: 10,
      dialect: "stack",
    });
  });

  test("reads PLATES_* variables", () => {
    const r = resolveConfig([], {
      PLATES_SEED: "7",
      PLATES_MAX_DEPTH: "64",
      PLATES_DIALECT: "stack",
      PLATES_DEBUG: "1",
    });
    expect(r.ok && r.value).toMatchObject({ seed: 7, maxDepth: 64, dialect: "stack", debug: true });
  });

  test("flags override the environment", () => {
    const r = resolveConfig(["--seed", "3"], { PLATES_SEED: "7" });
    expect(r.ok && r.value.seed).toBe(3);
  });

  test("empty variables are ignored", () => {
    const r = resolveConfig([], { PLATES_SEED: "", PLATES_DEBUG: "0" });
    expect(r.ok && r.value.seed).toBeUndefined();
    expect(r.ok && r.value.debug).toBe(false);
  });

  test("everything after -- is a file", () => {
    const r = resolveConfig(["--debug", "--", "--help"]);
    expect(r.ok && r.value).toMatchObject({ files: ["--help"], debug: true, help: false });
  });

  test.each([
    [["--verbose"], "unknown option '--verbose'"],
    [["--seed"], "option '--seed' requires a value"],
    [["--seed", "-1"], "--seed: expected an integer between 0 and 4294967295, got '-1'"],
    [["--seed=4294967296"], "--seed: expected an integer between 0 and 4294967295, got '4294967296'"],
    [["--max-depth", "0"], "--max-depth: expected a positive integer, got '0'"],
    [["--dialect", "forth"], "--dialect: expected 'params' or 'stack', got 'forth'"],
  ])("rejects %j", (argv, message) => {
    expect(resolveConfig(argv)).toEqual({ ok: false, error: message });
  });

  test("names the variable when the environment is invalid", () => {
    expect(resolveConfig([], { PLATES_MAX_DEPTH: "deep" })).toEqual({
      ok: false,
      error: "PLATES_MAX_DEPTH: expected a positive integer, got 'deep'",
    });
  });
});
