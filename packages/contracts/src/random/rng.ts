/**
 * Utility functions for random operations using any number generator
 */

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Draw `count` distinct elements without replacement.
 *
 * Runs a partial Fisher-Yates over a copy, so exactly `min(count, length)`
 * numbers are consumed from the generator. The input is left untouched and
 * the result keeps the order in which elements were drawn.
 */
export function sample<T>(
  rng: () => number,
  array: readonly T[],
  count: number,
): T[] {
  const pool: T[] = Array.from(array);
  const take = Math.max(0, Math.min(Math.floor(count), pool.length));

  for (let i = 0; i < take; i++) {
    const j = range(rng, i, pool.length - 1);
    if (j === i) continue;
    const picked = pool[j];
    const displaced = pool[i];
    if (picked === undefined || displaced === undefined) continue;
    pool[i] = picked;
    pool[j] = displaced;
  }

  return pool.slice(0, take);
}
