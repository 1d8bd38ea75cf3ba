export type Direction = 'up' | 'down' | 'left' | 'right';

export type Cell = {
  x: number;
  y: number;
};

export type GamePhase = 'playing' | 'gameOver';

export type EndReason = 'selfCollision' | 'boardFilled';

// Uniform integer in [0, maxExclusive)
export type RandomInt = (maxExclusive: number) => number;

export type Clock = () => number;

export type GameConfig = {
  gridCols: number;
  gridRows: number;
  cellSize: number;
  initialDelay: number; // milliseconds per move at score 0
  minDelay: number;
  speedupStep: number; // milliseconds removed per point
  maxPlacementAttempts: number;
};

export type SnakeGameOptions = Partial<GameConfig> & {
  clock?: Clock;
  random?: RandomInt;
};

export type SnakeGameState = {
  phase: GamePhase;
  score: number;
  snake: Cell[];
  food: Cell;
  direction: Direction;
  moveDelay: number;
  endReason: EndReason | null;
};
