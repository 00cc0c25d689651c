/**
 * @fileoverview Seedable pseudo-random source for estimate sampling.
 * @module src/services/causalModel/quantification/random
 */

export interface RandomSource {
  /** Uniform draw in [0, 1). */
  next(): number;
}

/** Mulberry32: 32-bit state, period 2^32. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number = Math.floor(Math.random() * 0x1_0000_0000)) {
    this.state = seed >>> 0;
  }

  public next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x1_0000_0000;
  }
}

/** Standard normal draw (Box-Muller). */
export function standardNormal(random: RandomSource): number {
  let u = 0;
  while (u === 0) {
    u = random.next();
  }
  const v = random.next();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}
