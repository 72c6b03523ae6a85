import {
  MemoryInput,
  MemoryOutput,
  SeededRandom,
  runSource,
  type RunOptions,
  type RunOutcome,
} from "../src/index.js";
import type { Word } from "../src/words.js";

export type Run = {
  outcome: RunOutcome;
  stdout: string;
};

export const TEST_FILE = "/virtual/test.plates";

/** Runs `source` with in-memory I/O and a fixed seed. */
export function run(
  source: string,
  opts: RunOptions & { stdin?: string } = {}
): Run {
  const output = new MemoryOutput();
  const outcome = runSource(source, {
    filePath: TEST_FILE,
    random: new SeededRandom(1),
    input: new MemoryInput(opts.stdin ?? ""),
    output,
    ...opts,
  });
  return { outcome, stdout: output.text };
}

/** Bottom-first: integers as numbers, function references as names. */
export function values(stack: readonly Word[]): (number | string)[] {
  return stack.map((w) => (w.kind === "int" ? w.value : w.name));
}

export function stackOf(r: Run): (number | string)[] {
  if (r.outcome.status === "static-error") {
    throw new Error(
      r.outcome.diagnostics.map((d) => `${d.code}: ${d.message}`).join("\n")
    );
  }
  return values(r.outcome.stack);
}

export function runtimeError(r: Run) {
  if (r.outcome.status !== "runtime-error") {
    throw new Error(`expected a runtime error, got ${r.outcome.status}`);
  }
  return r.outcome.error;
}

export function staticErrors(r: Run) {
  if (r.outcome.status !== "static-error") {
    throw new Error(`expected static errors, got ${r.outcome.status}`);
  }
  return r.outcome.diagnostics;
}
