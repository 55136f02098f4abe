import { describe, expect, it } from "vitest";

import { createSeededRandom, pickOne, shuffle } from "../random";

describe("random helpers", () => {
  it("replays the same sequence for the same seed", () => {
    const a = createSeededRandom(7);
    const b = createSeededRandom(7);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
    for (const value of seqA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("diverges for different seeds", () => {
    const a = createSeededRandom(1);
    const b = createSeededRandom(2);
    expect([a(), a(), a()]).not.toEqual([b(), b(), b()]);
  });

  it("shuffles into a permutation without touching the input", () => {
    const input = ["a", "b", "c", "d", "e"];
    const result = shuffle(input, createSeededRandom(3));
    expect(input).toEqual(["a", "b", "c", "d", "e"]);
    expect([...result].sort()).toEqual(input);
  });

  it("picks by scaling the random value", () => {
    expect(pickOne(["x", "y", "z", "w"], () => 0.5)).toBe("z");
    expect(pickOne(["x", "y"], () => 0)).toBe("x");
    expect(() => pickOne([], () => 0)).toThrow(/empty/);
  });
});
