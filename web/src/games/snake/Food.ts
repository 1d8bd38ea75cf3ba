import { MAX_PLACEMENT_ATTEMPTS } from './constants';
import { type Snake } from './Snake';
import { type Cell, type RandomInt } from './types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('Food');

export class Food {
  private position: Cell;

  constructor(cell: Cell = { x: 0, y: 0 }) {
    this.position = { ...cell };
  }

  get cell(): Readonly<Cell> {
    return this.position;
  }

  /**
   * Moves the food to a random cell the snake does not cover.
   *
   * Rejection sampling runs for at most `maxAttempts` draws; after that the
   * free cells are listed and one of them is drawn. Returns false, leaving the
   * food in place, when the snake covers the whole grid.
   */
  relocate(
    snake: Snake,
    cols: number,
    rows: number,
    random: RandomInt,
    maxAttempts: number = MAX_PLACEMENT_ATTEMPTS
  ): boolean {
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const candidate = { x: random(cols), y: random(rows) };
      if (!snake.occupies(candidate)) {
        this.position = candidate;
        return true;
      }
    }

    const free: Cell[] = [];
    for (let y = 0; y < rows; y++) {
      for (let x = 0; x < cols; x++) {
        if (!snake.occupies({ x, y })) {
          free.push({ x, y });
        }
      }
    }

    if (free.length === 0) {
      logger.warn('No free cell left for food');
      return false;
    }

    logger.log(`Sampling gave up after ${maxAttempts} draws, picking from ${free.length} free cells`);
    this.position = free[random(free.length)];
    return true;
  }
}
