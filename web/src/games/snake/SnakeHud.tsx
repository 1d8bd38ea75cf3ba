import { useHudStore } from '../../state/hudStore';

export function SnakeHud() {
  const score = useHudStore((state) => state.score);
  const bestScore = useHudStore((state) => state.bestScore);
  const length = useHudStore((state) => state.length);
  const phase = useHudStore((state) => state.phase);

  return (
    <div className="snake-hud">
      <div className="snake-hud__stats">
        <span>Score: {score}</span>
        <span>Best: {bestScore}</span>
        <span>Length: {length}</span>
      </div>
      <div className="snake-hud__hint">
        {phase === 'playing'
          ? 'Arrow keys, WASD or swipe to steer'
          : 'Game Over! Press Space or Enter to restart'}
      </div>
    </div>
  );
}
