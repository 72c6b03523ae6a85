import type { Diagnostic, SourceSpan } from "./diagnostics.js";
import type { PlatesError } from "./runtime/errors.js";

export type FormatDiagnosticOptions = {
  contextLines?: number;
  /** Trace entries kept at each end of a long call trace. */
  traceEdge?: number;
};

const DEFAULT_TRACE_EDGE = 10;

function computeLineStarts(src: string): number[] {
  const starts = [0];
  for (let i = 0; i < src.length; i++) {
    if (src.charCodeAt(i) === 10 /* \n */) starts.push(i + 1);
  }
  return starts;
}

function getLineText(src: string, lineStarts: number[], line: number): string {
  const idx = Math.max(1, line) - 1;
  const start = lineStarts[idx] ?? 0;
  const end = lineStarts[idx + 1] ?? src.length;
  // drop trailing newline
  const raw = src.slice(start, end);
  return raw.endsWith("\n") ? raw.slice(0, -1) : raw;
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

function caretLine(col: number, lineNoWidth: number): string {
  const safeCol = Math.max(1, col);
  return `${" ".repeat(lineNoWidth)} | ${" ".repeat(safeCol - 1)}^`;
}

function location(span: SourceSpan): string {
  return `${span.filePath}:${span.line}:${span.col}`;
}

function header(span: SourceSpan | undefined, label: string, message: string) {
  if (!span) return `${label}: ${message}`;
  return `${location(span)} ${label}: ${message}`;
}

function codeFrame(span: SourceSpan, source: string, contextLines: number): string[] {
  const lineStarts = computeLineStarts(source);
  const lineNo = Math.max(1, span.line);
  const startLine = Math.max(1, lineNo - contextLines);
  const endLine = Math.min(lineStarts.length, lineNo + contextLines);
  const lineNoWidth = String(endLine).length;

  const lines: string[] = [];
  for (let ln = startLine; ln <= endLine; ln++) {
    const txt = getLineText(source, lineStarts, ln);
    lines.push(`${padLeft(String(ln), lineNoWidth)} | ${txt}`);
    if (ln === lineNo) lines.push(caretLine(span.col, lineNoWidth));
  }
  return lines;
}

/**
 * Formats a single diagnostic into a human-friendly error message with a code frame.
 *
 * Note: `source` should be the text for `diag.span.filePath`.
 */
export function formatDiagnostic(
  diag: Diagnostic,
  source?: string,
  opts: FormatDiagnosticOptions = {}
): string {
  const h = header(diag.span, `${diag.severity}[${diag.code}]`, diag.message);
  if (!diag.span || source === undefined) return h;
  return [h, ...codeFrame(diag.span, source, opts.contextLines ?? 0)].join("\n");
}

export function formatDiagnostics(
  diags: readonly Diagnostic[],
  sourceByFilePath: Record<string, string>,
  opts: FormatDiagnosticOptions = {}
): string {
  return diags
    .map((d) => {
      const src = d.span ? sourceByFilePath[d.span.filePath] : undefined;
      return formatDiagnostic(d, src, opts);
    })
    .join("\n\n");
}

/** Same layout as a diagnostic, followed by the call trace (innermost first). */
export function formatRuntimeError(
  error: PlatesError,
  sourceByFilePath: Record<string, string> = {},
  opts: FormatDiagnosticOptions = {}
): string {
  const lines = [header(error.span, `error[${error.code}]`, error.message)];
  const source = error.span ? sourceByFilePath[error.span.filePath] : undefined;
  if (error.span && source !== undefined) {
    lines.push(...codeFrame(error.span, source, opts.contextLines ?? 0));
  }
  const edge = opts.traceEdge ?? DEFAULT_TRACE_EDGE;
  const trace = error.trace;
  const elided = trace.length - 2 * edge;
  const shown =
    elided > 1 ? [...trace.slice(0, edge), elided, ...trace.slice(trace.length - edge)] : trace;
  for (const entry of shown) {
    if (typeof entry === "number") {
      lines.push(`  ... ${entry} more frames`);
    } else {
      lines.push(
        entry.span ? `  in ${entry.name} (${location(entry.span)})` : `  in ${entry.name}`
      );
    }
  }
  return lines.join("\n");
}
