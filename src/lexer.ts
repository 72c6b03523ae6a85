import type { Diagnostics, SourceSpan } from "./diagnostics.js";
import { ErrorCode } from "./runtime/errors.js";
import { isKeyword, type Token, type TokenKind } from "./tokens.js";
import { MAX_U32 } from "./words.js";

const RADIX_PREFIXES: Record<string, { radix: number; name: string }> = {
  x: { radix: 16, name: "hexadecimal" },
  b: { radix: 2, name: "binary" },
  o: { radix: 8, name: "octal" },
};

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  "'": "'",
};

export class Lexer {
  private i = 0;
  private line = 1;
  private col = 1;

  constructor(
    private readonly filePath: string,
    private readonly src: string,
    private readonly diags: Diagnostics
  ) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (!this.isEOF()) {
      const ch = this.peek();
      if (ch === " " || ch === "\t" || ch === "\r") {
        this.advance();
        continue;
      }
      if (ch === "\n") {
        this.advance();
        this.line++;
        this.col = 1;
        continue;
      }
      if (ch === "/" && this.peek2() === "/") {
        this.readLineComment();
        continue;
      }

      const start = this.i;
      const line = this.line;
      const col = this.col;

      const punct = this.punctuation(ch);
      if (punct) {
        this.advance();
        tokens.push(this.makeToken(punct, ch, start, this.i, line, col));
        continue;
      }

      if (this.isDigit(ch)) {
        const tok = this.readNumber();
        if (tok) tokens.push(tok);
        continue;
      }

      if (ch === "'") {
        const tok = this.readCharLiteral();
        if (tok) tokens.push(tok);
        continue;
      }

      if (ch === "$") {
        const tok = this.readArgument();
        if (tok) tokens.push(tok);
        continue;
      }

      if (this.isIdentStart(ch)) {
        tokens.push(this.readIdentOrKeyword());
        continue;
      }

      const bad = String.fromCodePoint(this.src.codePointAt(this.i) ?? 0);
      this.advance();
      this.error(
        `unexpected character '${bad}'`,
        this.span(start, this.i, line, col)
      );
    }

    tokens.push(this.makeToken("eof", "", this.i, this.i, this.line, this.col));
    return tokens;
  }

  private punctuation(ch: string): TokenKind | undefined {
    switch (ch) {
      case "(":
        return "lparen";
      case ")":
        return "rparen";
      case "{":
        return "lbrace";
      case "}":
        return "rbrace";
      case "*":
        return "star";
      case "^":
        return "caret";
      default:
        return undefined;
    }
  }

  private readLineComment() {
    while (!this.isEOF() && this.peek() !== "\n") {
      this.advance();
    }
  }

  private readIdentOrKeyword(): Token {
    const start = this.i;
    const line = this.line;
    const col = this.col;
    this.advance();
    while (!this.isEOF() && this.isIdentPart(this.peek())) this.advance();
    const text = this.src.slice(start, this.i);
    return this.makeToken(
      isKeyword(text) ? "kw" : "ident",
      text,
      start,
      this.i,
      line,
      col
    );
  }

  private readNumber(): Token | undefined {
    const start = this.i;
    const line = this.line;
    const col = this.col;
    // Swallow the whole alphanumeric run so `12ab` is one bad literal, not two tokens.
    while (!this.isEOF() && this.isIdentPart(this.peek())) this.advance();
    const text = this.src.slice(start, this.i);
    const span = this.span(start, this.i, line, col);

    const prefix = text.length > 1 && text[0] === "0" ? RADIX_PREFIXES[text[1]] : undefined;
    let value: number;
    if (prefix) {
      const digits = text.slice(2);
      if (digits.length === 0 || !this.allDigitsIn(digits, prefix.radix)) {
        this.error(`malformed ${prefix.name} literal '${text}'`, span);
        return undefined;
      }
      value = parseInt(digits, prefix.radix);
    } else {
      if (!this.allDigitsIn(text, 10)) {
        this.error(`malformed numeric literal '${text}'`, span);
        return undefined;
      }
      if (text.length > 1 && text[0] === "0") {
        this.error(
          `malformed numeric literal '${text}': leading zeros are not allowed`,
          span
        );
        return undefined;
      }
      value = parseInt(text, 10);
    }

    if (value > MAX_U32) {
      this.error(
        `numeric literal '${text}' does not fit in 32 bits (max ${MAX_U32})`,
        span
      );
      return undefined;
    }
    return { ...this.makeToken("number", text, start, this.i, line, col), value };
  }

  private readCharLiteral(): Token | undefined {
    const start = this.i;
    const line = this.line;
    const col = this.col;
    this.advance(); // opening quote
    const contentStart = this.i;
    while (!this.isEOF() && this.peek() !== "\n") {
      if (this.peek() === "\\") {
        this.advance();
        if (!this.isEOF() && this.peek() !== "\n") this.advance();
        continue;
      }
      if (this.peek() === "'") break;
      this.advance();
    }
    if (this.peek() !== "'") {
      this.error(
        "unterminated character literal",
        this.span(start, this.i, line, col)
      );
      return undefined;
    }
    const content = this.src.slice(contentStart, this.i);
    this.advance(); // closing quote
    const text = this.src.slice(start, this.i);
    const span = this.span(start, this.i, line, col);

    let decoded: string | undefined;
    if (content.startsWith("\\")) {
      decoded = content.length === 2 ? ESCAPES[content[1]] : undefined;
      if (decoded === undefined) {
        this.error(`unknown escape sequence in character literal ${text}`, span);
        return undefined;
      }
    } else {
      if (Array.from(content).length !== 1) {
        this.error(
          content.length === 0
            ? "empty character literal"
            : `character literal ${text} must contain exactly one character`,
          span
        );
        return undefined;
      }
      decoded = content;
    }

    return {
      ...this.makeToken("number", text, start, this.i, line, col),
      value: decoded.codePointAt(0) ?? 0,
    };
  }

  private readArgument(): Token | undefined {
    const start = this.i;
    const line = this.line;
    const col = this.col;
    this.advance(); // $
    while (!this.isEOF() && this.isIdentPart(this.peek())) this.advance();
    const text = this.src.slice(start, this.i);
    const digits = text.slice(1);
    if (digits.length === 0 || !this.allDigitsIn(digits, 10)) {
      this.error(
        `malformed argument reference '${text}': expected '$' followed by a parameter index`,
        this.span(start, this.i, line, col)
      );
      return undefined;
    }
    return {
      ...this.makeToken("arg", text, start, this.i, line, col),
      value: parseInt(digits, 10),
    };
  }

  private allDigitsIn(text: string, radix: number): boolean {
    for (const ch of text) {
      const d = parseInt(ch, 36);
      if (Number.isNaN(d) || d >= radix) return false;
    }
    return true;
  }

  private error(message: string, span: SourceSpan) {
    this.diags.error(ErrorCode.LexError, message, span);
  }

  private span(start: number, end: number, line: number, col: number): SourceSpan {
    return { filePath: this.filePath, start, end, line, col };
  }

  private makeToken(
    kind: TokenKind,
    text: string,
    start: number,
    end: number,
    line?: number,
    col?: number
  ): Token {
    return {
      kind,
      text,
      start,
      end,
      line: line ?? this.line,
      col: col ?? this.col,
    };
  }

  /** Steps over one code point; columns count code points. */
  private advance() {
    const cp = this.src.codePointAt(this.i) ?? 0;
    this.i += cp > 0xffff ? 2 : 1;
    this.col++;
  }

  private peek(): string {
    return this.src[this.i] ?? "";
  }

  private peek2(): string {
    return this.src[this.i + 1] ?? "";
  }

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isIdentStart(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isIdentPart(ch: string): boolean {
    return this.isIdentStart(ch) || this.isDigit(ch);
  }
}
