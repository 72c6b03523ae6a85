#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { formatInstruction } from "./ast.js";
import { USAGE, resolveConfig, type Env } from "./config.js";
import { exitCodeFor, runFiles, type SourceFile } from "./index.js";
import { FdInput, StdoutOutput, type InputPort, type OutputPort } from "./io.js";
import type { StepEvent } from "./machine.js";
import { formatDiagnostics, formatRuntimeError } from "./pretty_diagnostics.js";
import { isErr } from "./result.js";
import { ErrorCode } from "./runtime/errors.js";
import { formatStack } from "./words.js";

export type CliDeps = {
  env?: Env;
  input?: InputPort;
  output?: OutputPort;
  /** Receives diagnostics and debug lines, one call per line or block. */
  log?: (text: string) => void;
};

function traceStep(log: (text: string) => void) {
  return (step: StepEvent) => {
    const indent = "  ".repeat(step.depth);
    log(`${indent}${formatInstruction(step.instruction)}  ${formatStack(step.stack)}`);
  };
}

async function loadSources(
  paths: readonly string[],
  log: (text: string) => void
): Promise<SourceFile[] | undefined> {
  const files: SourceFile[] = [];
  for (const path of paths) {
    try {
      files.push({ filePath: path, source: await readFile(resolve(path), "utf8") });
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      log(`error[${ErrorCode.IOError}]: cannot read '${path}': ${detail}`);
      return undefined;
    }
  }
  return files;
}

/** Runs the interpreter with the given arguments and returns the exit code. */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.log ?? ((text: string) => console.error(text));
  const config = resolveConfig(argv, deps.env ?? process.env);
  if (isErr(config)) {
    log(`error: ${config.error}`);
    log(USAGE);
    return 2;
  }
  if (config.value.help) {
    log(USAGE);
    return 0;
  }
  if (config.value.files.length === 0) {
    log(USAGE);
    return 2;
  }

  const files = await loadSources(config.value.files, log);
  if (!files) return 1;

  const outcome = runFiles(files, {
    dialect: config.value.dialect,
    seed: config.value.seed,
    maxDepth: config.value.maxDepth,
    input: deps.input ?? new FdInput(),
    output: deps.output ?? new StdoutOutput(),
    onStep: config.value.debug ? traceStep(log) : undefined,
  });

  const sources = Object.fromEntries(files.map((f) => [f.filePath, f.source]));
  if (outcome.status === "static-error") {
    log(formatDiagnostics(outcome.diagnostics, sources));
  } else if (outcome.status === "runtime-error") {
    log(formatRuntimeError(outcome.error, sources));
  }
  return exitCodeFor(outcome);
}

function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    }
  );
}
