// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from 'vitest';
import { act, cleanup, render, screen } from '@testing-library/react';
import { SnakeHud } from './SnakeHud';
import { useHudStore } from '../../state/hudStore';

describe('SnakeHud', () => {
  afterEach(() => {
    cleanup();
    useHudStore.getState().clear();
    vi.restoreAllMocks();
  });

  it('shows the current stats and steering hint', () => {
    useHudStore.setState({ score: 4, bestScore: 9, length: 5, phase: 'playing' });

    render(<SnakeHud />);

    expect(screen.getByText('Score: 4')).toBeTruthy();
    expect(screen.getByText('Best: 9')).toBeTruthy();
    expect(screen.getByText('Length: 5')).toBeTruthy();
    expect(screen.getByText('Arrow keys, WASD or swipe to steer')).toBeTruthy();
  });

  it('switches to the restart hint when the round ends', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    render(<SnakeHud />);

    act(() => {
      useHudStore.getState().update({
        phase: 'gameOver',
        score: 2,
        snake: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }],
        food: { x: 5, y: 5 },
        direction: 'left',
        moveDelay: 146,
        endReason: 'selfCollision',
      });
    });

    expect(screen.getByText('Score: 2')).toBeTruthy();
    expect(screen.getByText('Length: 3')).toBeTruthy();
    expect(screen.getByText('Game Over! Press Space or Enter to restart')).toBeTruthy();
  });
});
