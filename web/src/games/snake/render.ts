import { type Cell, type GameConfig, type SnakeGameState } from './types';

export type SnakeRenderContext = Pick<
  CanvasRenderingContext2D,
  'fillStyle' | 'font' | 'textAlign' | 'fillRect' | 'fillText'
>;

export const COLORS = {
  background: '#000000',
  food: '#ef4444',
  head: '#22c55e',
  body: '#4ade80',
  text: '#ffffff',
  title: '#facc15',
  hint: '#9ca3af',
  overlay: 'rgba(0, 0, 0, 0.6)',
};

const drawCell = (ctx: SnakeRenderContext, cell: Cell, cellSize: number) => {
  ctx.fillRect(cell.x * cellSize, cell.y * cellSize, cellSize, cellSize);
};

export function drawGame(
  ctx: SnakeRenderContext,
  state: SnakeGameState,
  config: Pick<GameConfig, 'gridCols' | 'gridRows' | 'cellSize'>
): void {
  const width = config.gridCols * config.cellSize;
  const height = config.gridRows * config.cellSize;

  ctx.fillStyle = COLORS.background;
  ctx.fillRect(0, 0, width, height);

  ctx.fillStyle = COLORS.food;
  drawCell(ctx, state.food, config.cellSize);

  state.snake.forEach((segment, index) => {
    ctx.fillStyle = index === 0 ? COLORS.head : COLORS.body;
    drawCell(ctx, segment, config.cellSize);
  });

  ctx.fillStyle = COLORS.text;
  ctx.font = '20px monospace';
  ctx.textAlign = 'left';
  ctx.fillText(`Score: ${state.score}`, 10, 30);

  if (state.phase === 'gameOver') {
    ctx.fillStyle = COLORS.overlay;
    ctx.fillRect(0, 0, width, height);
    ctx.textAlign = 'center';
    ctx.fillStyle = COLORS.title;
    ctx.font = 'bold 40px monospace';
    ctx.fillText('Game Over!', width / 2, height / 2 - 20);
    ctx.fillStyle = COLORS.hint;
    ctx.font = '20px monospace';
    ctx.fillText('Press Space or Enter to Restart', width / 2, height / 2 + 20);
  }
}
