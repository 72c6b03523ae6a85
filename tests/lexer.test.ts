import { describe, expect, test } from "vitest";

import { Diagnostics } from "../src/diagnostics.js";
import { Lexer } from "../src/lexer.js";
import { ErrorCode } from "../src/runtime/errors.js";

function lex(src: string) {
  const diags = new Diagnostics();
  const tokens = new Lexer("/virtual/test.plates", src, diags).tokenize();
  return { tokens, diags };
}

function kinds(src: string) {
  return lex(src).tokens.map((t) => t.kind);
}

describe("lexer", () => {
  test("recognizes keywords, punctuation and operands", () => {
    expect(kinds("DEFN f (2) { PUSH $1 PUSH * PUSH ^ CALLIF EXIT }")).toEqual([
      "kw",
      "ident",
      "lparen",
      "number",
      "rparen",
      "lbrace",
      "kw",
      "arg",
      "kw",
      "star",
      "kw",
      "caret",
      "kw",
      "kw",
      "rbrace",
      "eof",
    ]);
  });

  test("keywords are whole words", () => {
    const { tokens } = lex("PUSHY EXIT_now");
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ["ident", "PUSHY"],
      ["ident", "EXIT_now"],
      ["eof", ""],
    ]);
  });

  test("strips line comments regardless of token boundaries", () => {
    const { tokens } = lex("PUSH 1// one\nPUSH 2 // two // still two\n// EXIT");
    expect(tokens.map((t) => t.text)).toEqual(["PUSH", "1", "PUSH", "2", ""]);
  });

  test("tracks line and column", () => {
    const { tokens } = lex("PUSH 1\n  CALLIF");
    const callif = tokens[2];
    expect(callif.text).toBe("CALLIF");
    expect(callif.line).toBe(2);
    expect(callif.col).toBe(3);
  });

  test("parses numeric literals in every base", () => {
    const { tokens, diags } = lex("0 42 4294967295 0xff 0b101 0o17");
    expect(diags.hasErrors).toBe(false);
    expect(tokens.filter((t) => t.kind === "number").map((t) => t.value)).toEqual([
      0, 42, 4294967295, 255, 5, 15,
    ]);
  });

  test("parses character literals and escapes as code points", () => {
    const { tokens, diags } = lex("'H' '\\n' '\\'' '\\0' 'é' '😀'");
    expect(diags.hasErrors).toBe(false);
    expect(tokens.filter((t) => t.kind === "number").map((t) => t.value)).toEqual([
      72, 10, 39, 0, 0xe9, 0x1f600,
    ]);
  });

  test("reads argument indices", () => {
    const { tokens } = lex("$0 $12");
    expect(tokens.filter((t) => t.kind === "arg").map((t) => t.value)).toEqual([0, 12]);
  });

  test.each([
    ["4294967296", "numeric literal '4294967296' does not fit in 32 bits (max 4294967295)"],
    ["007", "malformed numeric literal '007': leading zeros are not allowed"],
    ["12ab", "malformed numeric literal '12ab'"],
    ["0x", "malformed hexadecimal literal '0x'"],
    ["0b102", "malformed binary literal '0b102'"],
    ["0o8", "malformed octal literal '0o8'"],
    ["$", "malformed argument reference '$': expected '$' followed by a parameter index"],
    ["$x", "malformed argument reference '$x': expected '$' followed by a parameter index"],
    ["'a", "unterminated character literal"],
    ["''", "empty character literal"],
    ["'ab'", "character literal 'ab' must contain exactly one character"],
    ["'\\q'", "unknown escape sequence in character literal '\\q'"],
    ["PUSH #", "unexpected character '#'"],
  ])("reports a lexical error for %s", (src, message) => {
    const { diags } = lex(src);
    expect(diags.all.map((d) => [d.code, d.message])).toEqual([
      [ErrorCode.LexError, message],
    ]);
  });

  test("attaches the position of the bad token", () => {
    const { diags } = lex("PUSH 1\nPUSH 99999999999");
    const span = diags.all[0].span;
    expect(span?.line).toBe(2);
    expect(span?.col).toBe(6);
  });

  test("a character literal may not span lines", () => {
    const { diags, tokens } = lex("PUSH 'a\nEXIT");
    expect(diags.all.map((d) => d.message)).toEqual(["unterminated character literal"]);
    expect(tokens.map((t) => t.text)).toEqual(["PUSH", "EXIT", ""]);
  });

  test("columns count code points, not UTF-16 units", () => {
    const { tokens, diags } = lex("PUSH '😀' EXIT");
    expect(diags.hasErrors).toBe(false);
    expect(tokens.map((t) => [t.text, t.col])).toEqual([
      ["PUSH", 1],
      ["'😀'", 6],
      ["EXIT", 10],
      ["", 14],
    ]);
  });

  test("an unexpected astral character is reported once", () => {
    const { diags, tokens } = lex("😀 EXIT");
    expect(diags.all.map((d) => d.message)).toEqual(["unexpected character '😀'"]);
    expect(tokens[0]).toMatchObject({ text: "EXIT", col: 3 });
  });
});
