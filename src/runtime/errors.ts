/**
 * Centralized error catalog for the plates interpreter.
 * Static (lexer/parser) and runtime failures share these codes so that the
 * driver can report every error the same way.
 */

import type { SourceSpan } from "../diagnostics.js";

export enum ErrorCode {
  LexError = "LexError",
  ParseError = "ParseError",
  DuplicateFunctionName = "DuplicateFunctionName",
  ReservedFunctionName = "ReservedFunctionName",
  InvalidArgument = "InvalidArgument",
  UnknownFunctionReference = "UnknownFunctionReference",
  TypeError = "TypeError",
  StackUnderflow = "StackUnderflow",
  StackOverflow = "StackOverflow",
  InvalidCodePoint = "InvalidCodePoint",
  IOError = "IOError",
}

export type ErrorParams = Record<string, string | number>;

export interface ErrorDefinition {
  code: ErrorCode;
  format: (params: ErrorParams) => string;
}

function makeErrorDef(
  code: ErrorCode,
  format: (params: ErrorParams) => string
): ErrorDefinition {
  return { code, format };
}

/**
 * Messages for errors raised with a fixed shape. Lexer and parser messages
 * vary too much to template and are passed through `detail`.
 */
export const ERROR_CATALOG: Record<ErrorCode, ErrorDefinition> = {
  [ErrorCode.LexError]: makeErrorDef(
    ErrorCode.LexError,
    ({ detail }) => `${detail}`
  ),
  [ErrorCode.ParseError]: makeErrorDef(
    ErrorCode.ParseError,
    ({ detail }) => `${detail}`
  ),
  [ErrorCode.DuplicateFunctionName]: makeErrorDef(
    ErrorCode.DuplicateFunctionName,
    ({ name }) => `function '${name}' is already defined`
  ),
  [ErrorCode.ReservedFunctionName]: makeErrorDef(
    ErrorCode.ReservedFunctionName,
    ({ name }) =>
      `cannot define function '${name}': the prefix '__' is reserved for built-in functions`
  ),
  [ErrorCode.InvalidArgument]: makeErrorDef(
    ErrorCode.InvalidArgument,
    ({ detail }) => `${detail}`
  ),
  [ErrorCode.UnknownFunctionReference]: makeErrorDef(
    ErrorCode.UnknownFunctionReference,
    ({ name }) => `function '${name}' is not defined`
  ),
  [ErrorCode.TypeError]: makeErrorDef(
    ErrorCode.TypeError,
    ({ expected, actual }) => `expected ${expected} but found ${actual}`
  ),
  [ErrorCode.StackUnderflow]: makeErrorDef(
    ErrorCode.StackUnderflow,
    ({ op }) => `${op}: not enough words on the stack`
  ),
  [ErrorCode.StackOverflow]: makeErrorDef(
    ErrorCode.StackOverflow,
    ({ name, limit }) =>
      `call to '${name}' exceeds the maximum call depth of ${limit}`
  ),
  [ErrorCode.InvalidCodePoint]: makeErrorDef(
    ErrorCode.InvalidCodePoint,
    ({ value }) => `${value} is not a valid Unicode code point`
  ),
  [ErrorCode.IOError]: makeErrorDef(
    ErrorCode.IOError,
    ({ detail }) => `${detail}`
  ),
};

/** One entry of a runtime call trace, innermost first. */
export type TraceEntry = {
  name: string;
  span?: SourceSpan;
};

export class PlatesError extends Error {
  span?: SourceSpan;
  trace: TraceEntry[] = [];

  constructor(
    readonly code: ErrorCode,
    message: string,
    span?: SourceSpan
  ) {
    super(message);
    this.name = code;
    this.span = span;
  }
}

export function makeError(
  code: ErrorCode,
  params: ErrorParams = {},
  span?: SourceSpan
): PlatesError {
  const def = ERROR_CATALOG[code];
  return new PlatesError(code, def.format(params), span);
}

export function throwError(
  code: ErrorCode,
  params: ErrorParams = {},
  span?: SourceSpan
): never {
  throw makeError(code, params, span);
}
