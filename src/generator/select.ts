import { NoCandidatesError } from "../catalog/errors.js";
import type { RandomSource } from "./random.js";

function randomIndex(rng: RandomSource, size: number): number {
  return Math.min(size - 1, Math.floor(rng() * size));
}

/**
 * Uniform pick; null for an empty pool. Consumes one draw when the pool is non-empty.
 */
export function pickOne<T>(rng: RandomSource, pool: readonly T[]): T | null {
  if (pool.length === 0) return null;
  return pool[randomIndex(rng, pool.length)];
}

/**
 * Same as pickOne, but an empty pool is an error naming `category`.
 */
export function requireOne<T>(rng: RandomSource, pool: readonly T[], category: string): T {
  if (pool.length === 0) {
    throw new NoCandidatesError(category);
  }
  return pool[randomIndex(rng, pool.length)];
}

/**
 * Up to `count` distinct elements, without replacement, in random order.
 * A pool smaller than `count` just yields every element, shuffled.
 */
export function pickUnique<T>(rng: RandomSource, pool: readonly T[], count: number): T[] {
  if (pool.length === 0 || count <= 0) return [];

  const population = [...pool];
  const size = Math.min(count, population.length);

  // Partial Fisher-Yates: the first `size` slots end up as the sample
  for (let i = 0; i < size; i++) {
    const j = i + randomIndex(rng, population.length - i);
    const tmp = population[i];
    population[i] = population[j];
    population[j] = tmp;
  }

  return population.slice(0, size);
}

export function rollDie(rng: RandomSource, sides = 6): number {
  return 1 + randomIndex(rng, sides);
}
