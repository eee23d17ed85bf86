/**
 * UAGen Engine — Random Selection
 */

import { EmptyDataError } from "@uagen/catalog";

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

/**
 * Pick one element uniformly at random.
 */
export function pickRandom<T>(
  items: readonly T[],
  random: RandomSource = Math.random,
): T {
  if (items.length === 0) {
    throw new EmptyDataError("Cannot pick from an empty list");
  }
  // Clamp so a source returning exactly 1 still lands on the last item
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
