import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Food } from './Food';
import { Snake } from './Snake';
import { type RandomInt } from './types';

// Replays the given values in order, then keeps returning 0
const sequence = (values: number[]): RandomInt => {
  const queue = [...values];
  return () => queue.shift() ?? 0;
};

describe('Food', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('takes the first sample that misses the snake', () => {
    const snake = new Snake([{ x: 1, y: 1 }, { x: 0, y: 1 }]);
    const food = new Food();

    const placed = food.relocate(snake, 5, 5, sequence([1, 1, 0, 1, 3, 4]));

    expect(placed).toBe(true);
    expect(food.cell).toEqual({ x: 3, y: 4 });
  });

  it('never lands on the snake for any random source', () => {
    const snake = new Snake([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 1 },
      { x: 1, y: 1 },
    ]);
    const food = new Food();
    let seed = 7;
    const lcg: RandomInt = (max) => {
      seed = (seed * 75 + 74) % 65537;
      return seed % max;
    };

    for (let round = 0; round < 200; round++) {
      expect(food.relocate(snake, 3, 3, lcg)).toBe(true);
      expect(snake.occupies(food.cell)).toBe(false);
    }
  });

  it('falls back to the free cells once sampling gives up', () => {
    const snake = new Snake([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }]);
    const food = new Food();
    const random = vi.fn<RandomInt>(() => 0);

    const placed = food.relocate(snake, 2, 2, random, 10);

    expect(placed).toBe(true);
    expect(food.cell).toEqual({ x: 1, y: 1 });
    // 10 draws of (x, y), then one pick among the free cells
    expect(random).toHaveBeenCalledTimes(21);
    expect(random).toHaveBeenLastCalledWith(1);
  });

  it('reports a full grid and stays where it was', () => {
    const snake = new Snake([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
      { x: 0, y: 1 },
    ]);
    const food = new Food({ x: 1, y: 1 });

    expect(food.relocate(snake, 2, 2, () => 0, 5)).toBe(false);
    expect(food.cell).toEqual({ x: 1, y: 1 });
    expect(console.warn).toHaveBeenCalledWith('[Food]', 'No free cell left for food');
  });
});
