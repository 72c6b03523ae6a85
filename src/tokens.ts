export type TokenKind =
  | "eof"
  | "kw"
  | "ident"
  | "number"
  | "arg"
  | "lparen"
  | "rparen"
  | "lbrace"
  | "rbrace"
  | "star"
  | "caret";

export type Keyword = "PUSH" | "DEFN" | "CALLIF" | "EXIT";

export type Token = {
  kind: TokenKind;
  text: string;
  /** Numeric payload for `number` (the literal's value) and `arg` (the index). */
  value?: number;
  start: number;
  end: number;
  line: number;
  col: number;
};

export const KEYWORDS: ReadonlySet<string> = new Set<Keyword>([
  "PUSH",
  "DEFN",
  "CALLIF",
  "EXIT",
]);

export function isKeyword(text: string): text is Keyword {
  return KEYWORDS.has(text);
}

/** Human-readable token description for parser messages. */
export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case "eof":
      return "end of input";
    case "kw":
      return `'${tok.text}'`;
    case "ident":
      return `identifier '${tok.text}'`;
    case "number":
      return `number ${tok.text}`;
    case "arg":
      return `argument ${tok.text}`;
    default:
      return `'${tok.text}'`;
  }
}
