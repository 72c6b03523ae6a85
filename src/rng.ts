import { randomBytes } from "node:crypto";

/**
 * Source of the bytes produced by `PUSH *`.
 * The machine never touches global randomness; it only calls this.
 */
export interface RandomSource {
  /** Uniform integer in [0, 255]. */
  nextByte(): number;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return (x ^ (x >>> 14)) >>> 0;
  };
}

export class SeededRandom implements RandomSource {
  private readonly next: () => number;

  constructor(readonly seed: number) {
    this.next = mulberry32(seed);
  }

  nextByte(): number {
    // top byte of the 32-bit output
    return this.next() >>> 24;
  }
}

export function createRandomSource(seed?: number): RandomSource {
  return new SeededRandom(seed ?? randomBytes(4).readUInt32LE(0));
}
