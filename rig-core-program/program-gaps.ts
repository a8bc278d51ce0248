import { checkProgramInvariant, hex } from './program-errors';

import {
  alignDown,
  alignUp,
  NONE,
  Optional,
  RandomSource,
  SOME,
  weightedChoice,
} from 'rig-core-utils';

/** `length` instructions starting at `address`. */
export type OccupiedRange = { readonly address: number; readonly length: number };

/** Addresses in [low, high] (both word aligned) are acceptable branch targets. */
export type TargetGap = { readonly low: number; readonly high: number };

/** Optional inclusive window for branch targets. A missing side is unbounded. */
export type BranchTargetBounds = { readonly min?: number; readonly max?: number };

export type BranchTargetLayout = {
  readonly imemSize: number;
  /** Sorted by address, non-overlapping. */
  readonly occupiedRanges: readonly OccupiedRange[];
};

const GAP_WEIGHT_POWER = 2;
const EDGE_BIAS = 0.5;
const BAND_WEIGHTS: readonly number[] = [EDGE_BIAS / 2, 1 - EDGE_BIAS, EDGE_BIAS / 2];

export const collectTargetGaps = (
  { imemSize, occupiedRanges }: BranchTargetLayout,
  minLength: number,
  { min, max }: BranchTargetBounds
): TargetGap[] => {
  const gaps: TargetGap[] = [];

  // There must be room for minLength instructions between a target and the end of its gap.
  const addGap = (gapStart: number, gapEnd: number): void => {
    const low = alignUp(min == null ? gapStart : Math.max(gapStart, min), 4);
    const high = alignDown(Math.min(gapEnd - 4 * minLength, max ?? Infinity), 4);
    if (low <= high) {
      gaps.push({ low, high });
    }
  };

  let gapStart = 0;
  occupiedRanges.forEach(({ address, length }) => {
    checkProgramInvariant(
      gapStart <= address,
      () => `Occupied ranges overlap or are unsorted at ${hex(address)}.`
    );
    // Skip gaps completely below min or completely above max.
    if ((min == null || min < address) && (max == null || gapStart <= max)) {
      addGap(gapStart, address);
    }
    gapStart = address + 4 * length;
  });
  addGap(gapStart, imemSize);

  return gaps;
};

/** Gaps with more slack than the minimum are strongly favored. */
export const gapWeight = ({ low, high }: TargetGap): number => 1 + (high - low) ** GAP_WEIGHT_POWER;

/**
 * Picks an address in the gap, biased toward its edges so that big gaps do not get split into
 * many small ones. The offset range is cut into a low 10%, a middle 80% and a high 10% band.
 */
export const pickTargetInGap = (random: RandomSource, { low, high }: TargetGap): number => {
  const maxOffset = Math.floor((high - low) / 4);
  const tenth = Math.floor(maxOffset / 10);
  const ninetieth = Math.floor((maxOffset * 9) / 10);
  const bands: readonly (readonly [number, number])[] = [
    [0, tenth],
    [tenth, ninetieth],
    [ninetieth, maxOffset],
  ];
  const [bandLow, bandHigh] = bands[weightedChoice(random, BAND_WEIGHTS)] ?? [0, maxOffset];
  const offset = bandLow + Math.floor(0.5 + random.nextDouble() * (bandHigh - bandLow));
  return low + 4 * offset;
};

/** Removes [target - 4 * minLength, target + 4 * minLength) from every gap. */
export const reserveTarget = (
  gaps: readonly TargetGap[],
  target: number,
  minLength: number
): TargetGap[] =>
  gaps.flatMap(({ low, high }) => {
    const remainders: TargetGap[] = [];
    const leftHigh = Math.min(high, target - 4 * minLength - 4);
    if (low <= leftHigh) {
      remainders.push({ low, high: leftHigh });
    }
    const rightLow = Math.max(low, target + 4 * minLength);
    if (rightLow <= high) {
      remainders.push({ low: rightLow, high });
    }
    return remainders;
  });

/**
 * Picks `count` branch targets, each with room for `minLength` instructions, pairwise at least
 * `minLength` instructions apart. Draws from `random` in a fixed order: gap, band, offset.
 *
 * @returns NONE when the free space runs out before `count` targets are found.
 */
export const pickBranchTargets = (
  random: RandomSource,
  layout: BranchTargetLayout,
  minLength: number,
  count: number,
  bounds: BranchTargetBounds = {}
): Optional<readonly number[]> => {
  checkProgramInvariant(
    Number.isInteger(minLength) && minLength > 0,
    () => `Branch targets need a positive minimum length, got ${minLength}.`
  );
  checkProgramInvariant(
    Number.isInteger(count) && count >= 0,
    () => `Cannot pick ${count} branch targets.`
  );

  let gaps = collectTargetGaps(layout, minLength, bounds);
  const targets: number[] = [];
  for (let i = 0; i < count; i += 1) {
    if (gaps.length === 0) {
      return NONE;
    }
    const gap = gaps[weightedChoice(random, gaps.map(gapWeight))];
    if (gap == null) {
      return NONE;
    }
    const target = pickTargetInGap(random, gap);
    targets.push(target);
    gaps = reserveTarget(gaps, target, minLength);
  }
  return SOME(targets);
};
