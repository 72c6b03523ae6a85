import type { SourceSpan } from "./diagnostics.js";

export type Dialect = "params" | "stack";

export type PushInt = { kind: "PushInt"; value: number; span: SourceSpan };
export type PushFunction = { kind: "PushFunction"; name: string; span: SourceSpan };
export type PushRandom = { kind: "PushRandom"; span: SourceSpan };
export type PushDup = { kind: "PushDup"; span: SourceSpan };
export type PushArg = { kind: "PushArg"; index: number; span: SourceSpan };
export type CallIf = { kind: "CallIf"; span: SourceSpan };
export type Exit = { kind: "Exit"; span: SourceSpan };

export type Instruction =
  | PushInt
  | PushFunction
  | PushRandom
  | PushDup
  | PushArg
  | CallIf
  | Exit;

export type FunctionDef = {
  readonly name: string;
  readonly paramCount: number;
  readonly body: readonly Instruction[];
  readonly span: SourceSpan;
};

export type FunctionTable = ReadonlyMap<string, FunctionDef>;

export type Program = {
  filePath: string;
  instructions: readonly Instruction[];
  functions: FunctionTable;
};

/** Source-like rendering of one instruction, used by the debug trace. */
export function formatInstruction(ins: Instruction): string {
  switch (ins.kind) {
    case "PushInt":
      return `PUSH ${ins.value}`;
    case "PushFunction":
      return `PUSH ${ins.name}`;
    case "PushRandom":
      return "PUSH *";
    case "PushDup":
      return "PUSH ^";
    case "PushArg":
      return `PUSH $${ins.index}`;
    case "CallIf":
      return "CALLIF";
    case "Exit":
      return "EXIT";
  }
}
