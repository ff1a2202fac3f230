/**
 * Seeded PRNG (xorshift128+) for reproducible sampling, shuffling and fold
 * assignment.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private _s0: number;
  private _s1: number;
  private _seed: number;

  constructor(seed = 42) {
    this._seed = seed;
    this._s0 = seed;
    this._s1 = seed ^ 0xdeadbeef;
    // Warm up
    for (let i = 0; i < 20; i++) this.next();
  }

  seed(s: number): void {
    this._seed = s;
    this._s0 = s;
    this._s1 = s ^ 0xdeadbeef;
    for (let i = 0; i < 20; i++) this.next();
  }

  state(): number {
    return this._seed;
  }

  /** Returns a number in [0, 1). */
  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }

  /** Uniform integer in [0, n). */
  nextInt(n: number): number {
    if (n <= 0) throw new RangeError(`nextInt bound must be positive, got ${n}`);
    return Math.floor(this.next() * n);
  }
}

/** In-place Fisher-Yates shuffle. Returns the same array. */
export function shuffle<T>(items: T[], rng: Rng): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = rng.nextInt(i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
