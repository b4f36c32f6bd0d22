import { describe, expect, it } from "vitest";

import { RNG } from "../src/util/rng";
import { ScriptedRNG } from "./helpers";

describe("RNG", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new RNG("fixture-seed");
    const b = new RNG("fixture-seed");
    const seqA = Array.from({ length: 20 }, () => a.uniform());
    const seqB = Array.from({ length: 20 }, () => b.uniform());
    expect(seqA).toEqual(seqB);
  });

  it("diverges for different seeds", () => {
    const a = new RNG("seed-a");
    const b = new RNG("seed-b");
    const seqA = Array.from({ length: 20 }, () => a.uniform());
    const seqB = Array.from({ length: 20 }, () => b.uniform());
    expect(seqA).not.toEqual(seqB);
  });

  it("keeps between() inside [min, max)", () => {
    const rng = new RNG("between");
    for (let i = 0; i < 5000; i++) {
      const v = rng.between(-10, 10);
      expect(v).toBeGreaterThanOrEqual(-10);
      expect(v).toBeLessThan(10);
    }
  });

  it("covers both ends of int() and nothing outside", () => {
    const rng = new RNG("int");
    const seen = new Set<number>();
    for (let i = 0; i < 5000; i++) seen.add(rng.int(1, 3));
    expect([...seen].sort()).toEqual([1, 2, 3]);
  });

  it("maps uniform draws onto int() buckets", () => {
    const rng = new ScriptedRNG([0, 0.5, 0.9999999]);
    expect(rng.int(100, 1000)).toBe(100);
    expect(rng.int(100, 1000)).toBe(550);
    expect(rng.int(100, 1000)).toBe(1000);
  });

  it("flips coin() at one half", () => {
    const rng = new ScriptedRNG([0.49, 0.5]);
    expect(rng.coin()).toBe(true);
    expect(rng.coin()).toBe(false);
  });
});
