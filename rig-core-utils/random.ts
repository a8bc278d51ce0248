import { assert } from '.';

/** A source of uniformly distributed doubles in [0, 1). */
export interface RandomSource {
  nextDouble(): number;
}

const TWO_TO_32 = 4294967296;

/** 32-bit linear congruential generator. The same seed replays the same program. */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextUint32(): number {
    this.state = (1664525 * this.state + 1013904223) >>> 0;
    return this.state;
  }

  nextDouble(): number {
    return this.nextUint32() / TWO_TO_32;
  }
}

/**
 * Picks an index with probability proportional to its weight. Consumes exactly one draw.
 * Same bisection rule as cumulative-weight sampling: the first index whose running total exceeds
 * `random * total`.
 */
export const weightedChoice = (random: RandomSource, weights: readonly number[]): number => {
  assert(weights.length > 0, 'Cannot choose from an empty list of weights.');
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  assert(total > 0, `Weights must have a positive sum, got ${total}.`);
  const threshold = random.nextDouble() * total;
  let cumulative = 0;
  for (let index = 0; index < weights.length; index += 1) {
    cumulative += weights[index] ?? 0;
    if (threshold < cumulative) {
      return index;
    }
  }
  return weights.length - 1;
};
