/**
 * Seeded PRNG (xorshift128+) for reproducible weight init, mutation and noise.
 */
import type { Rng } from "./interfaces.js";

const TWO_POW_32 = 0x100000000;
const TWO_POW_53 = 2 ** 53;

export class SeededRng implements Rng {
  private _s0 = 0;
  private _s1 = 0;
  private _seed = 0;

  constructor(seed = 42) {
    this.seed(seed);
  }

  seed(s: number): void {
    this._seed = s >>> 0;
    this._s0 = this._seed;
    this._s1 = this._seed ^ 0xdeadbeef;
    // Warm up
    for (let i = 0; i < 20; i++) this.nextUint32();
  }

  state(): number {
    return this._seed;
  }

  /** Raw 32-bit output of one xorshift128+ step. */
  nextUint32(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    return (this._s0 + this._s1) >>> 0;
  }

  /** Returns a float64 in [0, 1) with 53 random bits. */
  next(): number {
    const hi = this.nextUint32() >>> 5; // 27 bits
    const lo = this.nextUint32() >>> 6; // 26 bits
    return (hi * 2 ** 26 + lo) / TWO_POW_53;
  }

  range(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }
}

/** Process-wide generator used when a caller does not pass one. */
export const globalRng: Rng = new SeededRng(Date.now() % TWO_POW_32);

/** Uniform draw in [min, max). */
export function uniform(min: number, max: number, rng: Rng = globalRng): number {
  return rng.range(min, max);
}

/** Uniform draw in [-1, 1). */
export function symmetric(rng: Rng = globalRng): number {
  return rng.next() * 2 - 1;
}
