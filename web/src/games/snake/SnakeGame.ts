import { DEFAULT_CONFIG, isDirection } from './constants';
import { Food } from './Food';
import { Snake } from './Snake';
import {
  type Cell,
  type Clock,
  type EndReason,
  type GameConfig,
  type GamePhase,
  type RandomInt,
  type SnakeGameOptions,
  type SnakeGameState,
} from './types';
import { randomInt, sameCell } from '../../utils/helpers';
import { createLogger } from '../../utils/logger';

const logger = createLogger('SnakeGame');

export const moveDelayForScore = (
  score: number,
  config: Pick<GameConfig, 'initialDelay' | 'minDelay' | 'speedupStep'> = DEFAULT_CONFIG
): number => Math.max(config.initialDelay - score * config.speedupStep, config.minDelay);

const validateConfig = (config: GameConfig): void => {
  const { gridCols, gridRows, initialDelay, minDelay } = config;
  if (!Number.isInteger(gridCols) || !Number.isInteger(gridRows) || gridCols < 1 || gridRows < 1) {
    throw new Error(`Grid must be a positive integer size, got ${gridCols}x${gridRows}`);
  }
  if (minDelay <= 0 || initialDelay < minDelay) {
    throw new Error(`Invalid move delays: initial ${initialDelay}ms, minimum ${minDelay}ms`);
  }
};

export class SnakeGame {
  private config: GameConfig;
  private clock: Clock;
  private random: RandomInt;

  private snake: Snake;
  private apple = new Food();
  private phase: GamePhase = 'playing';
  private endReason: EndReason | null = null;
  private currentScore = 0;
  private moveDelay = 0;
  private lastMoveTime = 0;

  private onStateChange?: (state: SnakeGameState) => void;

  constructor(options: SnakeGameOptions = {}) {
    const { clock, random, ...overrides } = options;
    this.config = { ...DEFAULT_CONFIG, ...overrides };
    validateConfig(this.config);
    this.clock = clock ?? (() => performance.now());
    this.random = random ?? randomInt;
    this.snake = this.spawnSnake();
    this.reset(this.clock());
  }

  private spawnSnake(): Snake {
    const { gridCols, gridRows } = this.config;
    return new Snake([{ x: Math.floor(gridCols / 2), y: Math.floor(gridRows / 2) }], 'right');
  }

  private reset(now: number): void {
    this.snake = this.spawnSnake();
    this.apple = new Food();
    this.phase = 'playing';
    this.endReason = null;
    this.currentScore = 0;
    this.moveDelay = this.config.initialDelay;
    this.lastMoveTime = now;

    if (!this.relocateFood()) {
      // A 1x1 grid has nowhere to put food
      this.endGame('boardFilled');
    }
  }

  setOnStateChange(callback: (state: SnakeGameState) => void): void {
    this.onStateChange = callback;
  }

  // Copies, so callers cannot move the snake or the food
  get segments(): Cell[] {
    return this.snake.body.map((cell) => ({ ...cell }));
  }

  get food(): Cell {
    return { ...this.apple.cell };
  }

  get score(): number {
    return this.currentScore;
  }

  get gameOver(): boolean {
    return this.phase === 'gameOver';
  }

  getState(): SnakeGameState {
    return {
      phase: this.phase,
      score: this.currentScore,
      snake: this.segments,
      food: this.food,
      direction: this.snake.currentDirection,
      moveDelay: this.moveDelay,
      endReason: this.endReason,
    };
  }

  getConfig(): GameConfig {
    return { ...this.config };
  }

  tick(now: number = this.clock()): void {
    if (this.phase !== 'playing') {
      return;
    }
    if (now - this.lastMoveTime < this.moveDelay) {
      return;
    }

    this.snake.move();
    this.checkCollisions();
    this.lastMoveTime = now;
    this.notifyStateChange();
  }

  /**
   * Buffers a turn for the next move. Ignored after game over and for
   * anything that is not one of the four directions.
   */
  onDirectionInput(direction: string): void {
    if (this.phase !== 'playing' || !isDirection(direction)) {
      return;
    }
    this.snake.changeDirection(direction);
  }

  onRestartInput(now: number = this.clock()): void {
    if (this.phase !== 'gameOver') {
      return;
    }
    this.reset(now);
    logger.log('Restarted');
    this.notifyStateChange();
  }

  // Order matters: eat, then self-collision, then wrap
  private checkCollisions(): void {
    const { gridCols, gridRows } = this.config;

    if (sameCell(this.snake.head, this.apple.cell)) {
      this.snake.grow();
      this.currentScore += 1;
      this.moveDelay = moveDelayForScore(this.currentScore, this.config);
      if (!this.relocateFood()) {
        this.endGame('boardFilled');
      }
    }

    if (this.snake.selfCollision()) {
      this.endGame('selfCollision');
    }

    if (!this.snake.isHeadInside(gridCols, gridRows)) {
      this.snake.wrap(gridCols, gridRows);
    }
  }

  private relocateFood(): boolean {
    const { gridCols, gridRows, maxPlacementAttempts } = this.config;
    return this.apple.relocate(this.snake, gridCols, gridRows, this.random, maxPlacementAttempts);
  }

  private endGame(reason: EndReason): void {
    if (this.phase === 'gameOver') {
      return;
    }
    this.phase = 'gameOver';
    this.endReason = reason;
    logger.log(`Game over (${reason}), score ${this.currentScore}`);
  }

  private notifyStateChange(): void {
    if (this.onStateChange) {
      this.onStateChange(this.getState());
    }
  }
}
