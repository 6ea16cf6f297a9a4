import { InvariantViolationError } from "../errors.js";
import { defaultRandom, shuffle, type RandomSource } from "../random.js";

/** Largest group a single election handles. */
export const MAX_GROUP_SIZE = 9;
export const MIN_GROUP_SIZE = 2;

export function clampGroupSize(size: number): number {
  return Math.min(MAX_GROUP_SIZE, Math.max(MIN_GROUP_SIZE, Math.floor(size)));
}

/** Sizes of the groups `partitionGroups` would form for `total` items. */
export function groupSizes(total: number, maxGroupSize: number): number[] {
  if (total === 0) return [];
  const numGroups = Math.ceil(total / maxGroupSize);
  const base = Math.floor(total / numGroups);
  const remainder = total % numGroups;
  return Array.from({ length: numGroups }, (_, g) => (g < remainder ? base + 1 : base));
}

/**
 * Shuffle `items` and split them into the fewest groups of at most
 * `maxGroupSize`, with sizes differing by at most one. Larger groups come
 * first.
 */
export function partitionGroups<T>(
  items: readonly T[],
  maxGroupSize: number,
  random: RandomSource = defaultRandom,
): T[][] {
  if (!Number.isInteger(maxGroupSize) || maxGroupSize < 1) {
    throw new InvariantViolationError(`max group size must be a positive integer, got ${maxGroupSize}`);
  }

  const shuffled = shuffle(items, random);
  const groups: T[][] = [];
  let offset = 0;
  for (const size of groupSizes(shuffled.length, maxGroupSize)) {
    groups.push(shuffled.slice(offset, offset + size));
    offset += size;
  }
  return groups;
}
