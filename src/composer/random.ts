import { randomInt } from "node:crypto";

/**
 * Pseudo-random source threaded through one composition. Each call to
 * `compose` creates its own instance, so concurrent compositions never share
 * generator state.
 */
export interface Random {
  readonly seed: number;
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  /** True with probability `p`. */
  chance(p: number): boolean;
  pick<T>(items: readonly T[]): T;
  /** Zero-padded string of `length` random digits. */
  digits(length: number): string;
}

export function normalizeSeed(seed: number | undefined): number {
  if (seed === undefined) return randomInt(0, 0xffffffff);
  return Math.trunc(seed) >>> 0;
}

/** mulberry32 */
class SeededRandom implements Random {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.int(0, items.length - 1)];
    if (item === undefined) {
      throw new Error("Cannot pick from an empty list");
    }
    return item;
  }

  digits(length: number): string {
    let result = "";
    for (let i = 0; i < length; i++) {
      result += String(this.int(0, 9));
    }
    return result;
  }
}

export function createRandom(seed?: number): Random {
  return new SeededRandom(normalizeSeed(seed));
}
