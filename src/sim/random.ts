import seedrandom from 'seedrandom';

import type { Rng } from '../state/types';

export function createRng(seed?: string | number): Rng {
  return seed === undefined ? seedrandom() : seedrandom(String(seed));
}

/** Bernoulli draw on a half-open [0, 1) source. */
export function chance(rng: Rng, p: number): boolean {
  return rng() < p;
}

export function uniform(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

function index(rng: Rng, length: number): number {
  return Math.min(length - 1, Math.floor(rng() * length));
}

export function pick<T>(rng: Rng, items: readonly T[]): T | null {
  if (items.length === 0) return null;
  return items[index(rng, items.length)];
}

/**
 * Uniform sample without replacement. `k` is clamped to the pool size; the
 * input array is left untouched.
 */
export function sample<T>(rng: Rng, items: readonly T[], k: number): T[] {
  const pool = items.slice();
  const n = Math.max(0, Math.min(k, pool.length));
  for (let i = 0; i < n; i++) {
    const j = i + index(rng, pool.length - i);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, n);
}
