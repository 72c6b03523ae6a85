import { readSync } from "node:fs";

import { ErrorCode, throwError } from "./runtime/errors.js";

/** Line-oriented input used by `__input__`. */
export interface InputPort {
  /** Next line without its terminator, or `undefined` at end of stream. */
  readLine(): string | undefined;
}

/** Text sink used by `__print__`. */
export interface OutputPort {
  write(text: string): void;
}

const NEWLINE = 0x0a;
const CHUNK_SIZE = 4096;
const RETRY_DELAY_MS = 10;

/** Reads into `buffer` from `fd`; 0 means end of stream. */
export type ReadChunk = (fd: number, buffer: Buffer) => number;

const readChunk: ReadChunk = (fd, buffer) => readSync(fd, buffer, 0, buffer.length, null);

function sleep(ms: number) {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function errorCode(e: unknown): unknown {
  return e instanceof Error && "code" in e ? e.code : undefined;
}

/**
 * Blocking line reader over a file descriptor (stdin by default).
 * Bytes past the current line stay buffered for the next call.
 */
export class FdInput implements InputPort {
  private pending: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(
    private readonly fd = 0,
    private readonly read: ReadChunk = readChunk
  ) {}

  readLine(): string | undefined {
    for (;;) {
      const nl = this.pending.indexOf(NEWLINE);
      if (nl >= 0) {
        const line = this.pending.subarray(0, nl).toString("utf8");
        this.pending = this.pending.subarray(nl + 1);
        return stripCarriageReturn(line);
      }
      if (this.ended) {
        if (this.pending.length === 0) return undefined;
        const rest = this.pending.toString("utf8");
        this.pending = Buffer.alloc(0);
        return stripCarriageReturn(rest);
      }
      this.fill();
    }
  }

  private fill() {
    const chunk = Buffer.alloc(CHUNK_SIZE);
    let n: number;
    try {
      n = this.read(this.fd, chunk);
    } catch (e) {
      const code = errorCode(e);
      // Non-blocking stdin with nothing buffered yet.
      if (code === "EAGAIN") {
        sleep(RETRY_DELAY_MS);
        return;
      }
      if (code === "EOF") {
        this.ended = true;
        return;
      }
      const detail = e instanceof Error ? e.message : String(e);
      throwError(ErrorCode.IOError, {
        detail: `failed to read from standard input: ${detail}`,
      });
    }
    if (n === 0) {
      this.ended = true;
      return;
    }
    this.pending = Buffer.concat([this.pending, chunk.subarray(0, n)]);
  }
}

export class StdoutOutput implements OutputPort {
  write(text: string): void {
    process.stdout.write(text);
  }
}

/** In-memory input, one entry per line. */
export class MemoryInput implements InputPort {
  private readonly lines: string[];

  constructor(text: string) {
    this.lines = text.length === 0 ? [] : text.split(/\r?\n/);
    // "a\nb\n" is two lines, not three
    if (text.endsWith("\n")) this.lines.pop();
  }

  readLine(): string | undefined {
    return this.lines.shift();
  }
}

export class MemoryOutput implements OutputPort {
  text = "";

  write(text: string): void {
    this.text += text;
  }
}
