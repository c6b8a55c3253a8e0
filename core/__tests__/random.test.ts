import { describe, expect, it } from 'vitest';
import { createSeededRandom, sample, shuffle } from '../quiz/random';

describe('random helpers', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createSeededRandom(1234);
    const b = createSeededRandom(1234);
    const first = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it('shuffles into a new array with Fisher–Yates swaps', () => {
    const items = [1, 2, 3];

    expect(shuffle(items, () => 0)).toEqual([2, 3, 1]);
    expect(items).toEqual([1, 2, 3]);
  });

  it('samples without replacement and caps at the pool size', () => {
    const random = createSeededRandom(99);
    const picked = sample(['a', 'b', 'c', 'd'], 2, random);

    expect(picked).toHaveLength(2);
    expect(new Set(picked).size).toBe(2);
    expect(sample(['x', 'y'], 5, random).sort()).toEqual(['x', 'y']);
    expect(sample(['x'], 0, random)).toEqual([]);
  });
});
