import type { Dialect, FunctionDef, Instruction, Program } from "./ast.js";
import type { Diagnostics, SourceSpan } from "./diagnostics.js";
import { ErrorCode } from "./runtime/errors.js";
import { describeToken, type Token } from "./tokens.js";

export const RESERVED_PREFIX = "__";

export type ParserOptions = {
  dialect?: Dialect;
};

/** The function whose body is being parsed; `$i` resolves against it. */
type BodyContext = {
  name: string;
  paramCount: number;
};

export class Parser {
  private i = 0;
  private readonly functions = new Map<string, FunctionDef>();
  private readonly dialect: Dialect;

  constructor(
    private readonly filePath: string,
    private readonly tokens: Token[],
    private readonly diags: Diagnostics,
    options: ParserOptions = {}
  ) {
    this.dialect = options.dialect ?? "params";
  }

  parseProgram(): Program {
    const instructions: Instruction[] = [];
    while (!this.is("eof")) {
      if (this.is("rbrace")) {
        this.parseError("unmatched '}'", this.spanOf(this.next()));
        continue;
      }
      this.parseStmt(instructions, undefined);
    }
    return {
      filePath: this.filePath,
      instructions,
      functions: this.functions,
    };
  }

  private parseStmt(into: Instruction[], ctx: BodyContext | undefined) {
    const t = this.cur();
    if (t.kind === "kw") {
      switch (t.text) {
        case "PUSH": {
          const ins = this.parsePush(ctx);
          if (ins) into.push(ins);
          return;
        }
        case "DEFN":
          this.parseDefn();
          return;
        case "CALLIF":
          this.next();
          into.push({ kind: "CallIf", span: this.spanOf(t) });
          return;
        case "EXIT":
          this.next();
          into.push({ kind: "Exit", span: this.spanOf(t) });
          return;
      }
    }
    this.parseError(
      `unexpected ${describeToken(t)}; expected PUSH, DEFN, CALLIF or EXIT`,
      this.spanOf(t)
    );
    this.next();
  }

  private parsePush(ctx: BodyContext | undefined): Instruction | undefined {
    const pushTok = this.next();
    const operand = this.cur();
    const span = this.spanBetween(pushTok, operand);

    switch (operand.kind) {
      case "number":
        this.next();
        return { kind: "PushInt", value: operand.value ?? 0, span };
      case "ident":
        this.next();
        return { kind: "PushFunction", name: operand.text, span };
      case "star":
        this.next();
        return { kind: "PushRandom", span };
      case "caret":
        this.next();
        return { kind: "PushDup", span };
      case "arg":
        this.next();
        return this.checkArgument(operand, ctx, span);
      default:
        this.parseError(
          `expected an operand after PUSH but found ${describeToken(operand)}`,
          this.spanOf(operand)
        );
        // Leave statement starters and braces for the enclosing loop.
        if (!this.startsStatement() && !this.is("rbrace") && !this.is("eof")) {
          this.next();
        }
        return undefined;
    }
  }

  private checkArgument(
    tok: Token,
    ctx: BodyContext | undefined,
    span: SourceSpan
  ): Instruction | undefined {
    const index = tok.value ?? 0;
    if (this.dialect === "stack") {
      this.diags.report(
        ErrorCode.InvalidArgument,
        { detail: `argument ${tok.text} is not available in the stack dialect` },
        this.spanOf(tok)
      );
      return undefined;
    }
    if (!ctx) {
      this.diags.report(
        ErrorCode.InvalidArgument,
        { detail: `argument ${tok.text} used outside a function body` },
        this.spanOf(tok)
      );
      return undefined;
    }
    if (index >= ctx.paramCount) {
      this.diags.report(
        ErrorCode.InvalidArgument,
        {
          detail: `argument ${tok.text} is out of range: function '${ctx.name}' takes ${ctx.paramCount} parameter${ctx.paramCount === 1 ? "" : "s"}`,
        },
        this.spanOf(tok)
      );
      return undefined;
    }
    return { kind: "PushArg", index, span };
  }

  private parseDefn() {
    const defnTok = this.next();
    const nameTok = this.cur();
    if (nameTok.kind !== "ident") {
      this.parseError(
        `expected a function name after DEFN but found ${describeToken(nameTok)}`,
        this.spanOf(nameTok)
      );
      this.skipDefinition();
      return;
    }
    this.next();
    const name = nameTok.text;
    if (name.startsWith(RESERVED_PREFIX)) {
      this.diags.report(
        ErrorCode.ReservedFunctionName,
        { name },
        this.spanOf(nameTok)
      );
    }

    let paramCount = 0;
    if (this.is("lparen")) {
      this.next();
      const countTok = this.cur();
      if (countTok.kind !== "number") {
        this.parseError(
          `expected a parameter count in the signature of '${name}' but found ${describeToken(countTok)}`,
          this.spanOf(countTok)
        );
        this.skipDefinition();
        return;
      }
      this.next();
      paramCount = countTok.value ?? 0;
      if (!this.is("rparen")) {
        this.parseError(
          `expected ')' in the signature of '${name}' but found ${describeToken(this.cur())}`,
          this.spanOf(this.cur())
        );
        this.skipDefinition();
        return;
      }
      this.next();
      if (this.dialect === "stack" && paramCount > 0) {
        this.diags.report(
          ErrorCode.InvalidArgument,
          {
            detail: `function '${name}' declares ${paramCount} parameters, but named parameters are not available in the stack dialect`,
          },
          this.spanOf(countTok)
        );
      }
    }

    const open = this.cur();
    if (open.kind !== "lbrace") {
      this.parseError(
        `expected '{' to open the body of '${name}' but found ${describeToken(open)}`,
        this.spanOf(open)
      );
      this.skipDefinition();
      return;
    }
    this.next();

    const ctx: BodyContext = { name, paramCount };
    const body: Instruction[] = [];
    for (;;) {
      if (this.is("rbrace")) {
        this.next();
        break;
      }
      if (this.is("eof")) {
        this.parseError(
          `unmatched '{': the body of '${name}' is never closed`,
          this.spanOf(open)
        );
        break;
      }
      this.parseStmt(body, ctx);
    }

    if (this.functions.has(name)) {
      this.diags.report(
        ErrorCode.DuplicateFunctionName,
        { name },
        this.spanOf(nameTok)
      );
      return;
    }
    this.functions.set(name, {
      name,
      paramCount,
      body,
      span: this.spanBetween(defnTok, nameTok),
    });
  }

  /** Skips a malformed definition header and, when present, its whole body. */
  private skipDefinition() {
    while (!this.is("eof") && !this.is("lbrace")) {
      if (this.startsStatement() && !this.isKw("DEFN")) return;
      this.next();
    }
    if (this.is("eof")) return;
    let depth = 0;
    do {
      if (this.is("lbrace")) depth++;
      if (this.is("rbrace")) depth--;
      this.next();
    } while (depth > 0 && !this.is("eof"));
  }

  private startsStatement(): boolean {
    return this.cur().kind === "kw";
  }

  private parseError(detail: string, span: SourceSpan) {
    this.diags.report(ErrorCode.ParseError, { detail }, span);
  }

  private spanOf(t: Token): SourceSpan {
    return {
      filePath: this.filePath,
      start: t.start,
      end: t.end,
      line: t.line,
      col: t.col,
    };
  }

  private spanBetween(first: Token, last: Token): SourceSpan {
    return { ...this.spanOf(first), end: Math.max(first.end, last.end) };
  }

  private cur(): Token {
    return this.tokens[Math.min(this.i, this.tokens.length - 1)];
  }

  private next(): Token {
    const t = this.cur();
    if (this.i < this.tokens.length - 1) this.i++;
    return t;
  }

  private is(kind: Token["kind"], text?: string): boolean {
    const t = this.cur();
    if (t.kind !== kind) return false;
    if (text !== undefined && t.text !== text) return false;
    return true;
  }

  private isKw(text: string): boolean {
    return this.is("kw", text);
  }
}
