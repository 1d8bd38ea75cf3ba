import { useEffect } from 'react';
import { SnakeGameCanvas } from '../games/snake/SnakeGameCanvas';
import { SnakeHud } from '../games/snake/SnakeHud';
import { createLogger } from '../utils/logger';

const logger = createLogger('SnakePage');

export default function SnakePage() {
  useEffect(() => {
    logger.log('Component mounted');
    return () => {
      logger.log('Component unmounting');
    };
  }, []);

  return (
    <div className="snake-page">
      <h1 className="snake-page__title">Snake</h1>
      <SnakeHud />
      <SnakeGameCanvas />
    </div>
  );
}
