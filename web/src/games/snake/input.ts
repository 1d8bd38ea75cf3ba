import { type Direction } from './types';

export type SnakeInput = { type: 'direction'; direction: Direction } | { type: 'restart' };

const KEY_DIRECTIONS = new Map<string, Direction>([
  ['arrowup', 'up'],
  ['w', 'up'],
  ['arrowdown', 'down'],
  ['s', 'down'],
  ['arrowleft', 'left'],
  ['a', 'left'],
  ['arrowright', 'right'],
  ['d', 'right'],
]);

const RESTART_KEYS = new Set([' ', 'enter']);

export const MIN_SWIPE_DISTANCE = 30;

export function keyToInput(key: string): SnakeInput | null {
  const normalized = key.toLowerCase();
  if (RESTART_KEYS.has(normalized)) {
    return { type: 'restart' };
  }
  const direction = KEY_DIRECTIONS.get(normalized);
  return direction ? { type: 'direction', direction } : null;
}

/**
 * Direction of a swipe along its dominant axis, or null when the finger
 * travelled less than `minDistance` pixels along it.
 */
export function swipeToDirection(
  dx: number,
  dy: number,
  minDistance: number = MIN_SWIPE_DISTANCE
): Direction | null {
  if (Math.abs(dx) > Math.abs(dy)) {
    if (Math.abs(dx) <= minDistance) return null;
    return dx > 0 ? 'right' : 'left';
  }
  if (Math.abs(dy) <= minDistance) return null;
  return dy > 0 ? 'down' : 'up';
}
