import { type Cell } from '../games/snake/types';

export const randomInt = (maxExclusive: number): number => {
  return Math.floor(Math.random() * maxExclusive);
};

export const sameCell = (a: Readonly<Cell>, b: Readonly<Cell>): boolean => {
  return a.x === b.x && a.y === b.y;
};

// Modulo that stays non-negative for negative operands
export const mod = (value: number, divisor: number): number => {
  return ((value % divisor) + divisor) % divisor;
};
