import { useEffect, useRef } from 'react';
import { SnakeGame } from './SnakeGame';
import { keyToInput, swipeToDirection } from './input';
import { drawGame } from './render';
import { type SnakeGameOptions } from './types';
import { useHudStore } from '../../state/hudStore';
import { createLogger } from '../../utils/logger';

const logger = createLogger('SnakeGameCanvas');

type SnakeGameCanvasProps = {
  options?: SnakeGameOptions;
};

export function SnakeGameCanvas({ options }: SnakeGameCanvasProps) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const animationFrameRef = useRef<number | null>(null);
  const touchStartRef = useRef<{ x: number; y: number } | null>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const ctx = canvas.getContext('2d');
    if (!ctx) {
      logger.error('2D canvas context unavailable');
      return;
    }

    const game = new SnakeGame(options);
    logger.log('Game created');

    const hud = useHudStore.getState();
    hud.update(game.getState());
    game.setOnStateChange(hud.update);

    const config = game.getConfig();
    canvas.width = config.gridCols * config.cellSize;
    canvas.height = config.gridRows * config.cellSize;

    // One tick and one draw per animation frame
    const gameLoop = (now: number) => {
      try {
        game.tick(now);
        drawGame(ctx, game.getState(), config);
      } catch (error) {
        logger.error('Frame failed', error);
      }
      animationFrameRef.current = requestAnimationFrame(gameLoop);
    };
    animationFrameRef.current = requestAnimationFrame(gameLoop);

    const handleKeyDown = (e: KeyboardEvent) => {
      const input = keyToInput(e.key);
      if (!input) return;
      e.preventDefault();
      if (input.type === 'restart') {
        game.onRestartInput();
      } else {
        game.onDirectionInput(input.direction);
      }
    };

    const handleTouchStart = (e: TouchEvent) => {
      e.preventDefault();
      if (e.touches.length > 0) {
        touchStartRef.current = {
          x: e.touches[0].clientX,
          y: e.touches[0].clientY,
        };
      }
    };

    const handleTouchEnd = (e: TouchEvent) => {
      e.preventDefault();
      const start = touchStartRef.current;
      touchStartRef.current = null;
      if (!start || e.changedTouches.length === 0) return;

      if (game.gameOver) {
        game.onRestartInput();
        return;
      }

      const direction = swipeToDirection(
        e.changedTouches[0].clientX - start.x,
        e.changedTouches[0].clientY - start.y
      );
      if (direction) {
        game.onDirectionInput(direction);
      }
    };

    window.addEventListener('keydown', handleKeyDown);
    canvas.addEventListener('touchstart', handleTouchStart, { passive: false });
    canvas.addEventListener('touchend', handleTouchEnd, { passive: false });
    canvas.addEventListener('touchcancel', handleTouchEnd, { passive: false });

    return () => {
      window.removeEventListener('keydown', handleKeyDown);
      canvas.removeEventListener('touchstart', handleTouchStart);
      canvas.removeEventListener('touchend', handleTouchEnd);
      canvas.removeEventListener('touchcancel', handleTouchEnd);
      if (animationFrameRef.current !== null) {
        cancelAnimationFrame(animationFrameRef.current);
        animationFrameRef.current = null;
      }
      logger.log('Game disposed');
    };
  }, [options]);

  return (
    <canvas
      ref={canvasRef}
      className="snake-canvas"
      style={{ imageRendering: 'pixelated', touchAction: 'none' }}
    />
  );
}
