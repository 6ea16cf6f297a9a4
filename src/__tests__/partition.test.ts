import { describe, it, expect } from "vitest";
import { partitionGroups, groupSizes, clampGroupSize } from "../consensus/partition.js";
import { InvariantViolationError } from "../errors.js";
import { seededRandom } from "../random.js";

describe("groupSizes", () => {
  it("uses the fewest groups with near-equal sizes", () => {
    expect(groupSizes(20, 9)).toEqual([7, 7, 6]);
    expect(groupSizes(9, 9)).toEqual([9]);
    expect(groupSizes(10, 9)).toEqual([5, 5]);
    expect(groupSizes(3, 2)).toEqual([2, 1]);
    expect(groupSizes(0, 9)).toEqual([]);
  });
});

describe("partitionGroups", () => {
  it("keeps every item exactly once", () => {
    const items = Array.from({ length: 23 }, (_, i) => i);
    const groups = partitionGroups(items, 9, seededRandom(1));
    expect(groups.flat().sort((a, b) => a - b)).toEqual(items);
  });

  it("respects the size bounds for many inputs", () => {
    const random = seededRandom(3);
    for (let total = 1; total <= 40; total++) {
      for (const max of [2, 3, 5, 9]) {
        const groups = partitionGroups(Array.from({ length: total }, (_, i) => i), max, random);
        const sizes = groups.map((g) => g.length);
        expect(groups.length).toBe(Math.ceil(total / max));
        expect(Math.max(...sizes)).toBeLessThanOrEqual(max);
        expect(Math.max(...sizes) - Math.min(...sizes)).toBeLessThanOrEqual(1);
      }
    }
  });

  it("leaves the input untouched", () => {
    const items = ["a", "b", "c", "d"];
    partitionGroups(items, 2, seededRandom(5));
    expect(items).toEqual(["a", "b", "c", "d"]);
  });

  it("is reproducible with the same seed", () => {
    const items = Array.from({ length: 12 }, (_, i) => i);
    expect(partitionGroups(items, 5, seededRandom(9))).toEqual(partitionGroups(items, 5, seededRandom(9)));
  });

  it("moves whole objects between groups", () => {
    const entries = [
      { statement: "x", owners: [0, 3] },
      { statement: "y", owners: [1] },
      { statement: "z", owners: [2, 4] },
    ];
    const groups = partitionGroups(entries, 2, seededRandom(2));
    for (const entry of groups.flat()) {
      expect(entries).toContain(entry);
    }
  });

  it("returns no groups for no items", () => {
    expect(partitionGroups([], 9)).toEqual([]);
  });

  it("rejects a group size below one", () => {
    expect(() => partitionGroups([1, 2], 0)).toThrow(InvariantViolationError);
  });
});

describe("clampGroupSize", () => {
  it("clamps to 2..9", () => {
    expect(clampGroupSize(1)).toBe(2);
    expect(clampGroupSize(12)).toBe(9);
    expect(clampGroupSize(5)).toBe(5);
  });
});
