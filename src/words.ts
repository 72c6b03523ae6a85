export type IntWord = { readonly kind: "int"; readonly value: number };
export type FnWord = { readonly kind: "fn"; readonly name: string };

/** The only stack value: an unsigned 32-bit integer or a function reference. */
export type Word = IntWord | FnWord;

export const MAX_U32 = 0xffffffff;

export function int(value: number): IntWord {
  return { kind: "int", value: value >>> 0 };
}

export function fnRef(name: string): FnWord {
  return { kind: "fn", name };
}

export function describeWord(w: Word): string {
  return w.kind === "int" ? `integer ${w.value}` : `function '${w.name}'`;
}

/** `[72, 0, function f]  <-- top` */
export function formatStack(stack: readonly Word[]): string {
  const words = stack.map((w) =>
    w.kind === "int" ? String(w.value) : `function ${w.name}`
  );
  return `[${words.join(", ")}]  <-- top`;
}
