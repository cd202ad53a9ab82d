/**
 * Random sources and draw primitives.
 *
 * Everything random in the simulator goes through an injected RandomSource,
 * so a seeded run is reproducible and parallel runs never share a stream.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export interface WeightedCandidate<T> {
  value: T;
  /** Relative weight (>= 0) */
  weight: number;
}

/**
 * mulberry32 generator
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0 || 1;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let value = Math.imul(state ^ (state >>> 15), 1 | state);
    value ^= value + Math.imul(value ^ (value >>> 7), 61 | value);
    return ((value ^ (value >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Derive an independent seed for the index-th stream of a run
 * (splitmix32 finalizer over seed + index).
 */
export function deriveSeed(seed: number, index: number): number {
  let z = (seed + Math.imul(index + 1, 0x9e3779b9)) >>> 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b) >>> 0;
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35) >>> 0;
  return (z ^ (z >>> 16)) >>> 0;
}

/**
 * True with probability p
 */
export function chance(probability: number, random: RandomSource): boolean {
  return random() < probability;
}

/**
 * Pick one candidate with probability proportional to its weight.
 * All-zero weights fall back to a uniform pick.
 */
export function weightedDraw<T>(candidates: readonly WeightedCandidate<T>[], random: RandomSource): T {
  if (candidates.length === 0) {
    throw new RangeError('weightedDraw needs at least one candidate');
  }

  const total = candidates.reduce((sum, c) => sum + c.weight, 0);
  const r = random();

  if (total <= 0) {
    console.warn('[Random] Candidate weights sum to zero, picking uniformly');
    const index = Math.min(Math.floor(r * candidates.length), candidates.length - 1);
    return candidates[index].value;
  }

  let cumulative = 0;
  for (const candidate of candidates) {
    cumulative += candidate.weight / total;
    if (r < cumulative) {
      return candidate.value;
    }
  }

  // Rounding can leave cumulative a hair under 1; take the last weighted candidate
  for (let i = candidates.length - 1; i >= 0; i--) {
    if (candidates[i].weight > 0) {
      return candidates[i].value;
    }
  }
  return candidates[candidates.length - 1].value;
}

/**
 * A source that replays a fixed sequence, cycling when exhausted.
 * Used to script draws in tests and examples.
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError('createSequenceRandom needs at least one value');
  }
  let i = 0;
  return () => {
    const value = values[i % values.length];
    i++;
    return value;
  };
}
