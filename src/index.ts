import type { Dialect, FunctionDef, Program } from "./ast.js";
import { Diagnostics, type Diagnostic } from "./diagnostics.js";
import { Lexer } from "./lexer.js";
import { Machine, type Halt, type MachineOptions } from "./machine.js";
import { Parser } from "./parser.js";
import { andThen, err, isErr, isOk, ok, type Result } from "./result.js";
import { createRandomSource } from "./rng.js";
import { ErrorCode, type PlatesError } from "./runtime/errors.js";
import type { Word } from "./words.js";

export type SourceFile = {
  filePath: string;
  source: string;
};

export type CompileOptions = {
  dialect?: Dialect;
};

export type CompileOutput = {
  program?: Program;
  diagnostics: readonly Diagnostic[];
};

/** Lexes and parses one file. `program` is absent when any error was reported. */
export function compileProgram(
  file: SourceFile,
  opts: CompileOptions = {}
): CompileOutput {
  const diags = new Diagnostics();
  const tokens = new Lexer(file.filePath, file.source, diags).tokenize();
  // Parsing a broken token stream only produces follow-on noise.
  if (diags.hasErrors) return { diagnostics: diags.all };
  const program = new Parser(file.filePath, tokens, diags, opts).parseProgram();
  if (diags.hasErrors) return { diagnostics: diags.all };
  return { program, diagnostics: diags.all };
}

export type LinkedProgram = {
  programs: Program[];
  functions: ReadonlyMap<string, FunctionDef>;
};

/**
 * Compiles every file and merges their function tables. Nothing is linked
 * unless every file compiles.
 */
export function compileFiles(
  files: readonly SourceFile[],
  opts: CompileOptions = {}
): Result<LinkedProgram, readonly Diagnostic[]> {
  const diagnostics: Diagnostic[] = [];
  const programs: Program[] = [];
  for (const file of files) {
    const out = compileProgram(file, opts);
    diagnostics.push(...out.diagnostics);
    if (out.program) programs.push(out.program);
  }
  if (diagnostics.some((d) => d.severity === "error")) return err(diagnostics);

  const diags = new Diagnostics();
  const functions = new Map<string, FunctionDef>();
  for (const program of programs) {
    for (const fn of program.functions.values()) {
      if (functions.has(fn.name)) {
        diags.report(ErrorCode.DuplicateFunctionName, { name: fn.name }, fn.span);
        continue;
      }
      functions.set(fn.name, fn);
    }
  }
  if (diags.hasErrors) return err(diags.all);
  return ok({ programs, functions });
}

export type RunOptions = CompileOptions &
  Omit<MachineOptions, "functions" | "dialect"> & {
    /** Ignored when `random` is given. */
    seed?: number;
  };

export type RunOutcome =
  | { status: "ok"; halt: Halt; stack: readonly Word[] }
  | { status: "static-error"; diagnostics: readonly Diagnostic[] }
  | { status: "runtime-error"; error: PlatesError; stack: readonly Word[] };

/**
 * Compiles all files, then runs their top-level programs in order against a
 * single machine. An `EXIT` anywhere ends the whole run.
 */
export function runFiles(
  files: readonly SourceFile[],
  opts: RunOptions = {}
): RunOutcome {
  const linked = compileFiles(files, opts);
  if (isErr(linked)) return { status: "static-error", diagnostics: linked.error };

  const machine = new Machine({
    ...opts,
    functions: linked.value.functions,
    random: opts.random ?? createRandomSource(opts.seed),
  });
  let outcome: Result<Halt, PlatesError> = ok({ reason: "end", steps: 0 });
  for (const program of linked.value.programs) {
    outcome = andThen(outcome, () => machine.run(program.instructions));
  }

  return isOk(outcome)
    ? { status: "ok", halt: outcome.value, stack: machine.stack }
    : { status: "runtime-error", error: outcome.error, stack: machine.stack };
}

export function runSource(
  source: string,
  opts: RunOptions & { filePath?: string } = {}
): RunOutcome {
  return runFiles([{ filePath: opts.filePath ?? "<source>", source }], opts);
}

export function exitCodeFor(outcome: RunOutcome): number {
  return outcome.status === "ok" ? 0 : 1;
}

export type { Dialect, FunctionDef, Instruction, Program } from "./ast.js";
export type { Diagnostic, SourceSpan } from "./diagnostics.js";
export { Diagnostics } from "./diagnostics.js";
export { Lexer } from "./lexer.js";
export { Parser } from "./parser.js";
export { Machine } from "./machine.js";
export type { Halt, MachineOptions, StepEvent } from "./machine.js";
export { FdInput, MemoryInput, MemoryOutput, StdoutOutput } from "./io.js";
export type { InputPort, OutputPort } from "./io.js";
export { SeededRandom, createRandomSource } from "./rng.js";
export type { RandomSource } from "./rng.js";
export { ErrorCode, PlatesError } from "./runtime/errors.js";
export type { Word } from "./words.js";
export { formatDiagnostic, formatRuntimeError } from "./pretty_diagnostics.js";
