import { type Cell, type Direction, type GameConfig } from './types';

export const CELL_SIZE = 20;
export const VIEWPORT_WIDTH = 640;
export const VIEWPORT_HEIGHT = 480;

export const INITIAL_DELAY = 150;
export const MIN_DELAY = 50;
export const SPEEDUP_STEP = 2;
export const MAX_PLACEMENT_ATTEMPTS = 100;

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

export const DIRECTION_OFFSETS: Record<Direction, Cell> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export const OPPOSITE: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export const isDirection = (value: unknown): value is Direction =>
  typeof value === 'string' && (DIRECTIONS as readonly string[]).includes(value);

/**
 * Grid dimensions for a viewport carved into square cells.
 * 640x480 at 20px gives 32x24.
 */
export const gridFromViewport = (
  width: number,
  height: number,
  cellSize: number = CELL_SIZE
): Pick<GameConfig, 'gridCols' | 'gridRows' | 'cellSize'> => ({
  gridCols: Math.floor(width / cellSize),
  gridRows: Math.floor(height / cellSize),
  cellSize,
});

export const DEFAULT_CONFIG: GameConfig = {
  ...gridFromViewport(VIEWPORT_WIDTH, VIEWPORT_HEIGHT),
  initialDelay: INITIAL_DELAY,
  minDelay: MIN_DELAY,
  speedupStep: SPEEDUP_STEP,
  maxPlacementAttempts: MAX_PLACEMENT_ATTEMPTS,
};
