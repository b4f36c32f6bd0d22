// src/util/rng.ts
import seedrandom, { PRNG } from "seedrandom";

/**
 * Seeded random source. One instance per generator run, so a fixed seed
 * reproduces a file exactly. Without a seed, seedrandom autoseeds from entropy.
 */
export class RNG {
  private r: PRNG;

  constructor(seed?: string) {
    this.r = seedrandom(seed);
  }

  uniform(): number {
    return this.r.quick(); // [0,1)
  }

  /** real on [min, max) */
  between(min: number, max: number): number {
    return min + this.uniform() * (max - min);
  }

  int(min: number, max: number): number {
    // integer on [min, max]
    return Math.floor(min + this.uniform() * (max - min + 1));
  }

  coin(): boolean {
    return this.uniform() < 0.5;
  }
}
