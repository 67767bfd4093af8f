/**
 * @fileoverview Seeded pseudo-random numbers for reproducible demo data.
 *
 * @module @bullion/market-data/random
 */

export interface SeededRandom {
  /** Uniform in [0, 1) */
  next(): number;
  /** Uniform in [min, max) */
  uniform(min: number, max: number): number;
  /** Normal with the given mean and standard deviation */
  normal(mean: number, stdDev: number): number;
  /** Integer in [min, max) */
  integer(min: number, max: number): number;
}

/**
 * mulberry32 generator with Box-Muller normals.
 */
export function createSeededRandom(seed: number): SeededRandom {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const uniform = (min: number, max: number): number => min + (max - min) * next();

  return {
    next,
    uniform,
    normal(mean, stdDev) {
      // 1 - next() keeps the log argument in (0, 1]
      const u1 = 1 - next();
      const u2 = next();
      const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
      return mean + stdDev * z;
    },
    integer(min, max) {
      return Math.floor(uniform(min, max));
    },
  };
}

export function linspace(start: number, end: number, count: number): number[] {
  if (count === 1) return [start];
  return Array.from({ length: count }, (_, i) => start + ((end - start) * i) / (count - 1));
}
