import { describe, expect, it } from "vitest";
import { distancesTo, euclideanDistance } from "./distance.js";

describe("euclideanDistance", () => {
  it("returns 0 for a vector and itself", () => {
    const v = [0.125, -2.5, 3.75, 1e-9];
    expect(euclideanDistance(v, v)).toBe(0);
  });

  it("computes the 3-4-5 triangle exactly", () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
  });

  it("is symmetric", () => {
    const a = [1, 2, 3];
    const b = [-4, 0.5, 9];
    expect(euclideanDistance(a, b)).toBe(euclideanDistance(b, a));
  });

  it("throws on length mismatch", () => {
    expect(() => euclideanDistance([1, 2], [1, 2, 3])).toThrow("Vector length mismatch: 2 vs 3");
  });
});

describe("distancesTo", () => {
  it("returns distances in input order", () => {
    expect(distancesTo([0, 0], [[3, 4], [0, 1], [0, 0]])).toEqual([5, 1, 0]);
  });

  it("returns an empty array for no vectors", () => {
    expect(distancesTo([1, 2], [])).toEqual([]);
  });
});
