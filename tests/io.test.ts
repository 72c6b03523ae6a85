import { closeSync, mkdtempSync, openSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { FdInput, MemoryInput, MemoryOutput, type ReadChunk } from "../src/io.js";
import { ErrorCode, PlatesError } from "../src/runtime/errors.js";

function readAll(input: { readLine(): string | undefined }): string[] {
  const lines: string[] = [];
  for (let line = input.readLine(); line !== undefined; line = input.readLine()) {
    lines.push(line);
  }
  return lines;
}

describe("MemoryInput", () => {
  test.each([
    ["", []],
    ["a", ["a"]],
    ["a\n", ["a"]],
    ["a\nb\n", ["a", "b"]],
    ["a\r\n\nb", ["a", "", "b"]],
  ])("splits %j into lines", (text, lines) => {
    expect(readAll(new MemoryInput(text))).toEqual(lines);
  });
});

describe("MemoryOutput", () => {
  test("collects everything written", () => {
    const out = new MemoryOutput();
    out.write("ab");
    out.write("");
    out.write("c");
    expect(out.text).toBe("abc");
  });
});

describe("FdInput", () => {
  let dir: string;
  let fds: number[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "plates-io-"));
    fds = [];
  });

  afterEach(() => {
    for (const fd of fds) closeSync(fd);
    rmSync(dir, { recursive: true, force: true });
  });

  function open(text: string | Buffer): FdInput {
    const path = join(dir, "stdin.txt");
    writeFileSync(path, text);
    const fd = openSync(path, "r");
    fds.push(fd);
    return new FdInput(fd);
  }

  test("reads line by line and strips terminators", () => {
    expect(readAll(open("one\r\ntwo\n\nlast"))).toEqual(["one", "two", "", "last"]);
  });

  test("reports end of input on an empty stream", () => {
    const input = open("");
    expect(input.readLine()).toBeUndefined();
    expect(input.readLine()).toBeUndefined();
  });

  test("keeps multi-byte characters that straddle a read boundary", () => {
    const text = `${"x".repeat(4095)}é\nnext\n`;
    expect(readAll(open(text))).toEqual([`${"x".repeat(4095)}é`, "next"]);
  });

  test("a failing read is an IOError", () => {
    const fd = openSync(dir, "r");
    fds.push(fd);
    const input = new FdInput(fd);
    let caught: unknown;
    try {
      input.readLine();
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(PlatesError);
    expect(caught instanceof PlatesError && caught.code).toBe(ErrorCode.IOError);
    expect(
      caught instanceof PlatesError &&
        caught.message.startsWith("failed to read from standard input: ")
    ).toBe(true);
  });

  test("retries after EAGAIN until data arrives", () => {
    let calls = 0;
    const read: ReadChunk = (_fd, buffer) => {
      calls++;
      if (calls === 1) throw Object.assign(new Error("try again"), { code: "EAGAIN" });
      if (calls === 2) return buffer.write("late\n");
      return 0;
    };
    const input = new FdInput(0, read);
    expect(input.readLine()).toBe("late");
    expect(input.readLine()).toBeUndefined();
    expect(calls).toBe(3);
  });
});
