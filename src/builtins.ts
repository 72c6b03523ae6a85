import type { Dialect } from "./ast.js";
import type { InputPort, OutputPort } from "./io.js";
import { ErrorCode, throwError } from "./runtime/errors.js";
import { describeWord, int, type Word } from "./words.js";

/** What a native subroutine may touch. Errors are thrown as `PlatesError`. */
export interface BuiltinContext {
  /** Bottom first; the last element is the top of the stack. */
  readonly stack: Word[];
  readonly input: InputPort;
  readonly output: OutputPort;
  pop(op: string): Word;
  popInt(op: string): number;
  push(word: Word): void;
}

export type Builtin = {
  name: string;
  dialects: readonly Dialect[];
  run(ctx: BuiltinContext): void;
};

const BOTH: readonly Dialect[] = ["params", "stack"];
const STACK_ONLY: readonly Dialect[] = ["stack"];

function isScalarValue(cp: number): boolean {
  return cp <= 0x10ffff && (cp < 0xd800 || cp > 0xdfff);
}

function print(ctx: BuiltinContext) {
  const { stack } = ctx;
  let i = stack.length - 1;
  // A zero on top opens the text rather than ending it.
  if (i >= 0) {
    const top = stack[i];
    if (top.kind === "int" && top.value === 0) i--;
  }

  let text = "";
  for (; i >= 0; i--) {
    const w = stack[i];
    if (w.kind !== "int") {
      throwError(ErrorCode.TypeError, {
        expected: "a code point",
        actual: describeWord(w),
      });
    }
    if (w.value === 0) break;
    if (!isScalarValue(w.value)) {
      throwError(ErrorCode.InvalidCodePoint, { value: w.value });
    }
    text += String.fromCodePoint(w.value);
  }
  ctx.output.write(text);
}

function input(ctx: BuiltinContext) {
  const line = ctx.input.readLine();
  if (line === undefined) return;
  for (const ch of line) {
    ctx.push(int(ch.codePointAt(0) ?? 0));
  }
}

function nand(ctx: BuiltinContext) {
  const a = ctx.popInt("__nand__");
  const b = ctx.popInt("__nand__");
  ctx.push(int(~(a & b)));
}

function shiftLeft(ctx: BuiltinContext) {
  ctx.push(int(ctx.popInt("__shift_left__") << 1));
}

function shiftRight(ctx: BuiltinContext) {
  ctx.push(int(ctx.popInt("__shift_right__") >>> 1));
}

function depthIndex(ctx: BuiltinContext, op: string): number {
  const depth = ctx.popInt(op);
  if (depth >= ctx.stack.length) {
    throwError(ErrorCode.StackUnderflow, { op: `${op} ${depth}` });
  }
  return ctx.stack.length - 1 - depth;
}

function dup(ctx: BuiltinContext) {
  const at = depthIndex(ctx, "__dup__");
  ctx.push(ctx.stack[at]);
}

function swap(ctx: BuiltinContext) {
  const at = depthIndex(ctx, "__swap__");
  const { stack } = ctx;
  const top = stack.length - 1;
  [stack[top], stack[at]] = [stack[at], stack[top]];
}

function drop(ctx: BuiltinContext) {
  ctx.pop("__drop__");
}

const ALL: Builtin[] = [
  { name: "__print__", dialects: BOTH, run: print },
  { name: "__input__", dialects: BOTH, run: input },
  { name: "__nand__", dialects: BOTH, run: nand },
  { name: "__shift_left__", dialects: BOTH, run: shiftLeft },
  { name: "__shift_right__", dialects: BOTH, run: shiftRight },
  { name: "__dup__", dialects: STACK_ONLY, run: dup },
  { name: "__swap__", dialects: STACK_ONLY, run: swap },
  { name: "__drop__", dialects: STACK_ONLY, run: drop },
];

export function builtinsFor(dialect: Dialect): ReadonlyMap<string, Builtin> {
  return new Map(
    ALL.filter((b) => b.dialects.includes(dialect)).map((b) => [b.name, b])
  );
}
