import { collectTargetGaps, gapWeight, pickTargetInGap, reserveTarget } from '..';
import scriptedRandom from './scripted-random';

const SCENARIO_LAYOUT = {
  imemSize: 64,
  occupiedRanges: [
    { address: 0, length: 4 },
    { address: 48, length: 2 },
  ],
};

describe('rig-core-program/program-gaps', () => {
  it('collectTargetGaps leaves room for the minimum length', () => {
    expect(collectTargetGaps(SCENARIO_LAYOUT, 2, {})).toEqual([
      { low: 16, high: 40 },
      { low: 56, high: 56 },
    ]);
    expect(collectTargetGaps(SCENARIO_LAYOUT, 3, {})).toEqual([{ low: 16, high: 36 }]);
  });

  it('collectTargetGaps clips gaps to the bounds', () => {
    expect(collectTargetGaps(SCENARIO_LAYOUT, 1, { min: 21, max: 30 })).toEqual([
      { low: 24, high: 28 },
    ]);
  });

  it('collectTargetGaps skips a gap that ends exactly at min', () => {
    expect(collectTargetGaps(SCENARIO_LAYOUT, 1, { min: 48 })).toEqual([{ low: 56, high: 60 }]);
  });

  it('collectTargetGaps rejects overlapping ranges', () => {
    expect(() =>
      collectTargetGaps(
        {
          imemSize: 64,
          occupiedRanges: [
            { address: 0, length: 4 },
            { address: 8, length: 1 },
          ],
        },
        1,
        {}
      )
    ).toThrow('Occupied ranges overlap or are unsorted at 0x8.');
  });

  it('gapWeight grows with the slack', () => {
    expect(gapWeight({ low: 56, high: 56 })).toBe(1);
    expect(gapWeight({ low: 16, high: 40 })).toBe(577);
  });

  it('pickTargetInGap uses the edge bands', () => {
    const gap = { low: 0, high: 400 };
    expect(pickTargetInGap(scriptedRandom(0, 1), gap)).toBe(40);
    expect(pickTargetInGap(scriptedRandom(0.5, 0), gap)).toBe(40);
    expect(pickTargetInGap(scriptedRandom(0.9, 0.5), gap)).toBe(380);
    expect(pickTargetInGap(scriptedRandom(0.9, 0.99), gap)).toBe(400);
  });

  it('reserveTarget cuts a zone around the target', () => {
    expect(
      reserveTarget(
        [
          { low: 16, high: 40 },
          { low: 56, high: 56 },
        ],
        28,
        2
      )
    ).toEqual([
      { low: 16, high: 16 },
      { low: 36, high: 40 },
      { low: 56, high: 56 },
    ]);
    expect(reserveTarget([{ low: 0, high: 8 }], 4, 2)).toEqual([]);
  });
});
