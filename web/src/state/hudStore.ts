import { create } from 'zustand';
import { type GamePhase, type SnakeGameState } from '../games/snake/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('HudStore');

type HudStore = {
  score: number;
  bestScore: number; // this session only
  phase: GamePhase;
  length: number;
  update: (state: SnakeGameState) => void;
  clear: () => void;
};

export const useHudStore = create<HudStore>((set) => ({
  score: 0,
  bestScore: 0,
  phase: 'playing',
  length: 1,
  update: (state) =>
    set((current) => {
      if (state.phase === 'gameOver' && current.phase !== 'gameOver') {
        logger.log(`Round ended with score ${state.score}`);
      }
      return {
        score: state.score,
        bestScore: Math.max(current.bestScore, state.score),
        phase: state.phase,
        length: state.snake.length,
      };
    }),
  clear: () => set({ score: 0, bestScore: 0, phase: 'playing', length: 1 }),
}));
