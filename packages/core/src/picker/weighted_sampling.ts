/** Uniform random number in [0, 1) */
export type RandomSource = () => number;

function drawIndex(length: number, random: RandomSource): number {
  return Math.min(Math.floor(random() * length), length - 1);
}

/**
 * Orders items by weighted sampling without replacement.
 *
 * Positive-weight items come first, each drawn with probability
 * proportional to its weight among those still left (sequential
 * renormalization). Items with weight ≤ 0 follow in uniformly random
 * order, so taking a prefix of the result only reaches them once every
 * positive-weight item is taken.
 */
export function weightedOrder<T>(
  items: readonly T[],
  weightOf: (item: T) => number,
  random: RandomSource,
): T[] {
  const pool = items.filter(item => weightOf(item) > 0);
  const rest = items.filter(item => !(weightOf(item) > 0));
  const order: T[] = [];

  while (pool.length > 0) {
    const total = pool.reduce((sum, item) => sum + weightOf(item), 0);
    let target = random() * total;
    // floating point may leave target just above the last boundary
    let index = pool.length - 1;
    for (const [i, item] of pool.entries()) {
      target -= weightOf(item);
      if (target < 0) {
        index = i;
        break;
      }
    }
    order.push(...pool.splice(index, 1));
  }

  while (rest.length > 0) {
    order.push(...rest.splice(drawIndex(rest.length, random), 1));
  }

  return order;
}
