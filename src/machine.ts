import type { Dialect, FunctionTable, Instruction } from "./ast.js";
import { builtinsFor, type Builtin, type BuiltinContext } from "./builtins.js";
import type { SourceSpan } from "./diagnostics.js";
import { MemoryInput, MemoryOutput, type InputPort, type OutputPort } from "./io.js";
import { err, ok, type Result } from "./result.js";
import { createRandomSource, type RandomSource } from "./rng.js";
import { ErrorCode, PlatesError, throwError } from "./runtime/errors.js";
import { describeWord, fnRef, int, type Word } from "./words.js";

export const DEFAULT_MAX_DEPTH = 100_000;

export const MAIN_FRAME = "<main>";

export type MachineOptions = {
  functions: FunctionTable;
  dialect?: Dialect;
  random?: RandomSource;
  input?: InputPort;
  output?: OutputPort;
  /** Maximum number of active user-function frames. */
  maxDepth?: number;
  /** Called after every executed instruction. */
  onStep?: (step: StepEvent) => void;
};

export type StepEvent = {
  instruction: Instruction;
  /** User-function frames active when the instruction ran, 0 at top level. */
  depth: number;
  stack: readonly Word[];
};

export type Halt = {
  reason: "exit" | "end";
  steps: number;
};

class Frame {
  ip = 0;

  constructor(
    readonly name: string,
    readonly body: readonly Instruction[],
    readonly args: readonly Word[]
  ) {}

  /** The instruction most recently fetched from this frame. */
  get current(): Instruction | undefined {
    return this.body[this.ip - 1];
  }
}

/**
 * Executes parsed instructions against one data stack.
 * Calls run on an explicit frame stack, so recursion depth is bounded by
 * `maxDepth` rather than by the host call stack.
 */
export class Machine implements BuiltinContext {
  readonly stack: Word[] = [];
  readonly input: InputPort;
  readonly output: OutputPort;

  private readonly functions: FunctionTable;
  private readonly builtins: ReadonlyMap<string, Builtin>;
  private readonly random: RandomSource;
  private readonly maxDepth: number;
  private readonly onStep?: (step: StepEvent) => void;

  private frames: Frame[] = [];
  private halted = false;
  private steps = 0;

  constructor(options: MachineOptions) {
    this.functions = options.functions;
    this.builtins = builtinsFor(options.dialect ?? "params");
    this.random = options.random ?? createRandomSource();
    this.input = options.input ?? new MemoryInput("");
    this.output = options.output ?? new MemoryOutput();
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.onStep = options.onStep;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  /**
   * Runs a top-level instruction sequence to completion. May be called again
   * with further sequences; the stack carries over until an `EXIT`.
   */
  run(instructions: readonly Instruction[]): Result<Halt, PlatesError> {
    if (this.halted) return ok({ reason: "exit", steps: this.steps });
    this.frames = [new Frame(MAIN_FRAME, instructions, [])];
    try {
      while (this.frames.length > 0) {
        const frame = this.frames[this.frames.length - 1];
        if (frame.ip >= frame.body.length) {
          this.frames.pop();
          continue;
        }
        const ins = frame.body[frame.ip++];
        const depth = this.frames.length - 1;
        this.execute(ins, frame);
        this.steps++;
        this.onStep?.({ instruction: ins, depth, stack: this.stack });
        if (this.halted) {
          this.frames = [];
          return ok({ reason: "exit", steps: this.steps });
        }
      }
      return ok({ reason: "end", steps: this.steps });
    } catch (e) {
      if (!(e instanceof PlatesError)) throw e;
      e.trace = this.trace();
      e.span ??= e.trace[0]?.span;
      this.frames = [];
      return err(e);
    }
  }

  private execute(ins: Instruction, frame: Frame) {
    switch (ins.kind) {
      case "PushInt":
        this.push(int(ins.value));
        return;
      case "PushFunction":
        if (!this.functions.has(ins.name) && !this.builtins.has(ins.name)) {
          throwError(
            ErrorCode.UnknownFunctionReference,
            { name: ins.name },
            ins.span
          );
        }
        this.push(fnRef(ins.name));
        return;
      case "PushRandom":
        this.push(int(this.random.nextByte()));
        return;
      case "PushDup":
        this.push(this.peek("PUSH ^"));
        return;
      case "PushArg": {
        const arg = frame.args[ins.index];
        if (arg === undefined) {
          throwError(
            ErrorCode.InvalidArgument,
            {
              detail: `argument $${ins.index} does not exist in '${frame.name}'`,
            },
            ins.span
          );
        }
        this.push(arg);
        return;
      }
      case "CallIf":
        this.callIf(ins.span);
        return;
      case "Exit":
        this.halted = true;
        return;
    }
  }

  private callIf(span: SourceSpan) {
    const cond = this.pop("CALLIF");
    if (cond.kind !== "int") {
      throwError(
        ErrorCode.TypeError,
        { expected: "an integer condition", actual: describeWord(cond) },
        span
      );
    }
    const target = this.pop("CALLIF");
    if (target.kind !== "fn") {
      throwError(
        ErrorCode.TypeError,
        { expected: "a function reference", actual: describeWord(target) },
        span
      );
    }
    if (cond.value === 0) return;
    this.invoke(target.name, span);
  }

  private invoke(name: string, span: SourceSpan) {
    const builtin = this.builtins.get(name);
    if (builtin) {
      builtin.run(this);
      return;
    }
    const fn = this.functions.get(name);
    if (!fn) {
      throwError(ErrorCode.UnknownFunctionReference, { name }, span);
    }
    if (this.frames.length - 1 >= this.maxDepth) {
      throwError(
        ErrorCode.StackOverflow,
        { name, limit: this.maxDepth },
        span
      );
    }
    const args: Word[] = [];
    for (let k = 0; k < fn.paramCount; k++) {
      args.push(this.pop(`call to '${name}'`));
    }
    this.frames.push(new Frame(fn.name, fn.body, args));
  }

  /** Innermost first. */
  private trace() {
    return this.frames
      .map((f) => ({ name: f.name, span: f.current?.span }))
      .reverse();
  }

  pop(op: string): Word {
    const w = this.stack.pop();
    if (w === undefined) {
      throwError(ErrorCode.StackUnderflow, { op });
    }
    return w;
  }

  popInt(op: string): number {
    const w = this.pop(op);
    if (w.kind !== "int") {
      throwError(ErrorCode.TypeError, {
        expected: "an integer",
        actual: describeWord(w),
      });
    }
    return w.value;
  }

  push(word: Word): void {
    this.stack.push(word);
  }

  private peek(op: string): Word {
    const w = this.stack[this.stack.length - 1];
    if (w === undefined) {
      throwError(ErrorCode.StackUnderflow, { op });
    }
    return w;
  }
}
