/**
 * MidPriceWalk — bounded additive random walk for the synthetic mid price.
 *
 *   mid_{n+1} = clamp(mid_n + U(-maxStep, +maxStep), floor, ceil)
 *
 * Each generator owns its own walk; nothing is shared between the orderbook
 * and trade series.
 */

import { RNG } from "../util/rng";

export type MidPriceWalkOpts = {
  start?: number;
  maxStep?: number;
  floor?: number;
  ceil?: number;
};

export const MID_START = 50_000;
export const MID_FLOOR = 40_000;
export const MID_CEIL = 60_000;
export const MID_MAX_STEP = 10;

export class MidPriceWalk {
  private rng: RNG;
  private mid: number;
  private maxStep: number;
  private floor: number;
  private ceil: number;

  constructor(rng: RNG, opts: MidPriceWalkOpts = {}) {
    this.rng = rng;
    this.floor = opts.floor ?? MID_FLOOR;
    this.ceil = opts.ceil ?? MID_CEIL;
    this.maxStep = opts.maxStep ?? MID_MAX_STEP;
    if (this.floor > this.ceil) throw new RangeError(`MidPriceWalk: floor ${this.floor} above ceil ${this.ceil}`);
    this.mid = this.clamp(opts.start ?? MID_START);
  }

  get value(): number {
    return this.mid;
  }

  /** advance one step and return the new mid */
  step(): number {
    const delta = this.rng.between(-this.maxStep, this.maxStep);
    this.mid = this.clamp(this.mid + delta);
    return this.mid;
  }

  private clamp(p: number) {
    return Math.min(this.ceil, Math.max(this.floor, p));
  }
}
