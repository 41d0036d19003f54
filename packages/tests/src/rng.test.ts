import { describe, it, expect } from "vitest";
import { SeededRng, deriveSeed } from "@lockstep/core";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("nextInt stays in range", () => {
    const rng = new SeededRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng.nextInt(5);
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(5);
    }
  });

  it("setState replays the sequence from the seed", () => {
    const rng = new SeededRng(99);
    const first = Array.from({ length: 5 }, () => rng.next());
    rng.setState(rng.state());
    expect(Array.from({ length: 5 }, () => rng.next())).toEqual(first);
  });
});

describe("deriveSeed", () => {
  it("is a pure function of its inputs", () => {
    expect(deriveSeed(42, 3, 1)).toBe(deriveSeed(42, 3, 1));
  });

  it("gives every worker of an epoch its own seed, none equal to the root", () => {
    const seeds = [1, 2, 3, 4].map((w) => deriveSeed(42, 0, w));
    expect(new Set(seeds).size).toBe(4);
    expect(seeds).not.toContain(42);
  });

  it("changes with the epoch", () => {
    expect(deriveSeed(42, 0, 1)).not.toBe(deriveSeed(42, 1, 1));
  });
});
