/** Randomness seam carried by the engine context. */
export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
  /** Integer in [min, max] inclusive */
  nextInt(min: number, max: number): number;
  /** Float in [min, max) */
  nextFloat(min: number, max: number): number;
  /** True with the given probability */
  chance(probability: number): boolean;
  /** Uniform pick; undefined for an empty list */
  pick<T>(items: readonly T[]): T | undefined;
}

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Same seed, same sequence.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.next() * items.length)];
  }
}

/** Seed from the clock when the config does not pin one */
export function randomSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x7fffffff)) | 0;
}
