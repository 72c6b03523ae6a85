import { ERROR_CATALOG, type ErrorCode, type ErrorParams } from "./runtime/errors.js";

export type Severity = "error";

export type SourceSpan = {
  filePath: string;
  start: number;
  end: number;
  line: number;
  col: number;
};

export type Diagnostic = {
  severity: Severity;
  code: ErrorCode;
  message: string;
  span?: SourceSpan;
};

export class Diagnostics {
  private readonly list: Diagnostic[] = [];

  error(code: ErrorCode, message: string, span?: SourceSpan) {
    this.list.push({ severity: "error", code, message, span });
  }

  /** Records an error whose message comes from the catalog. */
  report(code: ErrorCode, params: ErrorParams, span?: SourceSpan) {
    this.error(code, ERROR_CATALOG[code].format(params), span);
  }

  get all(): readonly Diagnostic[] {
    return this.list;
  }

  get hasErrors(): boolean {
    return this.list.some((d) => d.severity === "error");
  }
}
